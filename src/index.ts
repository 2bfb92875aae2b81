/**
 * Library entry: SSML builder, token catalogs and the JSON script composer.
 */

export * from "./ssml";
export * from "./script";
