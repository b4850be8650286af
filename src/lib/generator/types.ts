/**
 * Generator module types
 */

import type { SourceModel } from "../../types/source-schema.js";
import type { ModelInfo } from "../introspector/types.js";

/**
 * Pass-1 options. Patterns are globs over `app.ObjectName` labels.
 */
export interface PlanOptions {
  /** `null` includes everything; `[]` includes nothing. */
  includeModels?: readonly string[] | null;
  excludeModels?: readonly string[] | null;
  /** Restrict the run to these source namespaces. */
  appLabels?: readonly string[] | null;
  classNameSuffix?: string;
  fieldKindMap?: Record<string, string>;
}

/**
 * A surviving model with its pre-assigned class name.
 */
export interface ModelPlan {
  info: ModelInfo;
  label: string;
  className: string;
}

export interface SkippedModel {
  label: string;
  reason: string;
}

/**
 * Pass-1 output. `classNames` belongs to this run only.
 */
export interface GenerationPlan {
  models: ModelPlan[];
  classNames: Map<SourceModel, string>;
  skipped: SkippedModel[];
}

/**
 * Renders one model against the current class-name map. Returns null when
 * the model has nothing to materialize.
 */
export type ModelRenderer<T> = (
  model: ModelPlan,
  classNames: ReadonlyMap<SourceModel, string>,
) => T | null;

/**
 * Called once per Pass-2 round; per-round state lives in the renderer.
 */
export type RoundFactory<T> = () => ModelRenderer<T>;

export interface RenderedModel<T> {
  model: ModelPlan;
  result: T;
}

export interface MaterializeResult<T> {
  rendered: RenderedModel<T>[];
  failed: SkippedModel[];
  /** Class names of the models that materialized. */
  classNames: Map<SourceModel, string>;
  rounds: number;
}
