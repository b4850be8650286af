/**
 * Source module - declared schema manifests as source models
 */

export * from "./manifest.js";
