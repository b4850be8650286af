/**
 * Connection module - target connection config and the lazy init gate
 */

export * from "./types.js";
export * from "./config.js";
export * from "./postgres.js";
export * from "./gate.js";
