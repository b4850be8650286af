// Core re-exports for the schema-mirror type system

export * from "./source-schema.js";
export * from "./config.js";
export * from "../lib/introspector/types.js";
export * from "../lib/type-mapping/types.js";
export * from "../lib/generator/types.js";
export * from "../lib/materializer/types.js";
export * from "../lib/connection/types.js";
