/**
 * Field selection shared by the live and text renderers
 */

import { modelLabel, type SourceModel } from "../../types/source-schema.js";
import type { ModelPlan } from "../generator/types.js";
import { FIELD_MAP } from "../type-mapping/columns.js";
import { SOURCE_FIELD_MAP } from "../type-mapping/sources.js";
import {
  referenceColumnKind,
  validateFieldInfo,
} from "../type-mapping/semantics.js";
import type { FieldInfo } from "../introspector/types.js";
import type { FieldPlan } from "./types.js";
import { logger } from "../../utils/logger.js";

function hasConverter(kind: string): boolean {
  return FIELD_MAP.has(kind) && SOURCE_FIELD_MAP.has(kind);
}

/**
 * Why the referenced column of a foreign key or one-to-one will not exist
 * on the target mirror, or null when it will.
 */
function missingReference(
  info: FieldInfo,
  classNames: ReadonlyMap<SourceModel, string>,
): string | null {
  if (info.manyToMany) {
    return null;
  }
  const target = `${info.relatedModelLabel ?? "?"}.${info.relatedFieldName ?? "id"}`;
  if (info.relatedFieldKind === null) {
    return `Referenced field '${target}' does not exist`;
  }
  const unmirrored = info.relatedFieldVia.find((model) => !classNames.has(model));
  if (unmirrored !== undefined) {
    return `Referenced field '${target}' points into '${modelLabel(unmirrored)}', which is not mirrored`;
  }
  if (!hasConverter(info.relatedFieldKind) || !hasConverter(referenceColumnKind(info))) {
    return `Referenced field '${target}' has unsupported type '${info.relatedFieldKind}'`;
  }
  return null;
}

/**
 * Validate every field and resolve relation targets through the class-name
 * map. Relations whose target model or referenced column is not mirrored
 * are dropped with a warning naming it.
 */
export function planFields(
  model: ModelPlan,
  classNames: ReadonlyMap<SourceModel, string>,
): FieldPlan[] {
  const plans: FieldPlan[] = [];
  for (const info of model.info.fields) {
    const invalid = validateFieldInfo(info);
    if (invalid !== null) {
      logger.warn(`${model.label}: ${invalid} Skipping.`);
      continue;
    }
    if (!info.isRelation || info.relatedModel === null) {
      plans.push({ kind: "data", info });
      continue;
    }

    const targetClassName = classNames.get(info.relatedModel);
    if (targetClassName === undefined) {
      logger.warn(
        `Related model '${modelLabel(info.relatedModel)}' of field '${model.label}.${info.name}' is not mirrored; dropping relation.`,
      );
      continue;
    }
    const missing = missingReference(info, classNames);
    if (missing !== null) {
      logger.warn(`${missing}; dropping relation '${model.label}.${info.name}'.`);
      continue;
    }
    plans.push({
      kind: "relation",
      info,
      target: info.relatedModel,
      targetClassName,
    });
  }
  return plans;
}

/**
 * Keep a composite-uniqueness group only when every field it names became
 * a column; otherwise drop the whole group.
 */
export function retainUniqueTogether(
  model: ModelPlan,
  columns: ReadonlySet<string>,
): string[][] {
  const kept: string[][] = [];
  for (const group of model.info.uniqueTogether) {
    const missing = group.filter((name) => !columns.has(name));
    if (group.length === 0 || missing.length > 0) {
      logger.warn(
        `${model.label}: dropping unique constraint (${group.join(", ")}); missing fields: ${missing.join(", ")}`,
      );
      continue;
    }
    kept.push([...group]);
  }
  return kept;
}
