/**
 * Type-mapping module - source field kinds → drizzle pg-core columns
 *
 * Two tables kept in step: FIELD_MAP builds live column builders,
 * SOURCE_FIELD_MAP renders the same columns as TypeScript source.
 */

export * from "./types.js";
export * from "./semantics.js";
export * from "./columns.js";
export * from "./sources.js";
