/**
 * schema-mirror: drizzle pg-core mirrors of source ORM models
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/introspector/index.js";
export * from "./lib/type-mapping/index.js";
export * from "./lib/generator/index.js";
export * from "./lib/materializer/index.js";
export * from "./lib/registry/index.js";
export * from "./lib/connection/index.js";
export * from "./lib/source/index.js";
export * from "./lib/mirror/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/config-loader.js";
