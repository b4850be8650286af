/**
 * Materializer module - live and text renderings of planned models
 */

export * from "./types.js";
export * from "./fields.js";
export * from "./live.js";
export * from "./text.js";
