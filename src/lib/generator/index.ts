/**
 * Generator module - two-pass model generation
 *
 * Pass 1 introspects every eligible model and fixes its class name before
 * anything is built, so relations can point at models that come later in
 * the enumeration, or at each other. Pass 2 renders the models against that
 * name table.
 */

import { minimatch } from "minimatch";
import {
  modelLabel,
  type SourceModel,
  type SourceSchema,
} from "../../types/source-schema.js";
import { introspectModel, shouldSkipModel } from "../introspector/index.js";
import type { ModelInfo } from "../introspector/types.js";
import type {
  GenerationPlan,
  MaterializeResult,
  ModelPlan,
  PlanOptions,
  RenderedModel,
  RoundFactory,
  SkippedModel,
} from "./types.js";
import { errorMessage } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";

export const DEFAULT_CLASS_NAME_SUFFIX = "Table";

function matchesPattern(label: string, pattern: string): boolean {
  return minimatch(label, pattern, { nocomment: true, nonegate: true, dot: true });
}

/**
 * Allow/deny filter over model labels. Deny always wins; a `null` allow
 * list admits everything and an empty one admits nothing.
 */
export function shouldInclude(
  label: string,
  include: readonly string[] | null | undefined,
  exclude: readonly string[] | null | undefined,
): boolean {
  if (exclude && exclude.some((pattern) => matchesPattern(label, pattern))) {
    return false;
  }
  if (include === null || include === undefined) {
    return true;
  }
  return include.some((pattern) => matchesPattern(label, pattern));
}

export function pascalCase(value: string): string {
  return value
    .split(/[^A-Za-z0-9]+/)
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join("");
}

/**
 * Deterministic class names: `<ObjectName><suffix>`, prefixed with the app
 * label when two namespaces declare the same object name. A prefixed name
 * that is already taken gets a numeric tail.
 */
export function assignClassNames(
  infos: readonly ModelInfo[],
  suffix: string = DEFAULT_CLASS_NAME_SUFFIX,
): Map<SourceModel, string> {
  const counts = new Map<string, number>();
  for (const info of infos) {
    counts.set(info.objectName, (counts.get(info.objectName) ?? 0) + 1);
  }
  const isShared = (info: ModelInfo) => (counts.get(info.objectName) ?? 0) > 1;

  const taken = new Set<string>();
  for (const info of infos) {
    if (!isShared(info)) {
      taken.add(info.objectName);
    }
  }

  const classNames = new Map<SourceModel, string>();
  for (const info of infos) {
    let base = info.objectName;
    if (isShared(info)) {
      const prefixed = `${pascalCase(info.appLabel)}${info.objectName}`;
      base = prefixed;
      for (let n = 2; taken.has(base); n++) {
        base = `${prefixed}${n}`;
      }
      taken.add(base);
    }
    classNames.set(info.identity, `${base}${suffix}`);
  }
  return classNames;
}

/**
 * Pass 1: filter, introspect, skip and name every model.
 */
export function planModels(
  schema: SourceSchema,
  options: PlanOptions = {},
): GenerationPlan {
  const skipped: SkippedModel[] = [];
  const infos: ModelInfo[] = [];

  for (const model of schema.getModels()) {
    const label = modelLabel(model);
    if (options.appLabels && !options.appLabels.includes(model.meta.appLabel)) {
      continue;
    }
    if (!shouldInclude(label, options.includeModels, options.excludeModels)) {
      logger.debug("Model filtered out", { model: label });
      skipped.push({ label, reason: "filtered" });
      continue;
    }

    const info = introspectModel(model, { fieldKindMap: options.fieldKindMap });
    const [skip, reason] = shouldSkipModel(info);
    if (skip) {
      logger.info(`Skipping ${label}: ${reason}`);
      skipped.push({ label, reason });
      continue;
    }
    infos.push(info);
  }

  const classNames = assignClassNames(
    infos,
    options.classNameSuffix ?? DEFAULT_CLASS_NAME_SUFFIX,
  );
  const models: ModelPlan[] = [];
  for (const info of infos) {
    const className = classNames.get(info.identity);
    if (className !== undefined) {
      models.push({ info, label: modelLabel(info.identity), className });
    }
  }

  logger.debug("Pass 1 complete", { models: models.length, skipped: skipped.length });
  return { models, classNames, skipped };
}

/**
 * Pass 2: render every planned model.
 *
 * A model that throws or renders nothing leaves the class-name map, and
 * the round is repeated so relations pointing at it are dropped whatever
 * the enumeration order. Each round removes at least one model, so this
 * terminates.
 */
export function materializeModels<T>(
  plan: GenerationPlan,
  beginRound: RoundFactory<T>,
): MaterializeResult<T> {
  const classNames = new Map(plan.classNames);
  const failed: SkippedModel[] = [];
  let active = [...plan.models];
  let rounds = 0;

  for (;;) {
    rounds++;
    const render = beginRound();
    const rendered: RenderedModel<T>[] = [];
    const dropped = new Set<ModelPlan>();

    for (const model of active) {
      let result: T | null;
      try {
        result = render(model, classNames);
      } catch (error) {
        const reason = errorMessage(error);
        logger.warn(`Failed to materialize ${model.label}: ${reason}`);
        failed.push({ label: model.label, reason });
        dropped.add(model);
        continue;
      }
      if (result === null) {
        logger.warn(`Model ${model.label} has no convertible fields; skipping.`);
        failed.push({ label: model.label, reason: "no convertible fields" });
        dropped.add(model);
        continue;
      }
      rendered.push({ model, result });
    }

    if (dropped.size === 0) {
      return { rendered, failed, classNames, rounds };
    }
    for (const model of dropped) {
      classNames.delete(model.info.identity);
    }
    active = active.filter((model) => !dropped.has(model));
  }
}
