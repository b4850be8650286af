/**
 * Introspector module - extracts FieldInfo/ModelInfo from source declarations
 */

import {
  EnumMember,
  modelLabel,
  type ChoiceEnum,
  type SourceField,
  type SourceModel,
} from "../../types/source-schema.js";
import type {
  FieldInfo,
  IntrospectOptions,
  ModelInfo,
  SkipDecision,
} from "./types.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";

/**
 * Recover the enum backing a field's choices.
 *
 * Only the default value is trusted: choices may already be flattened to
 * `[value, label]` pairs. An enum field without a default therefore comes
 * back as plain choices with no enum.
 */
export function detectEnumType(field: SourceField): ChoiceEnum | null {
  if (!field.choices || field.choices.length === 0) {
    return null;
  }

  if (field.hasDefault && field.default instanceof EnumMember) {
    return field.default.enumType;
  }

  if (!field.hasDefault) {
    logger.debug("Choices without an enum default; enum type not recovered", {
      field: `${modelLabel(field.model)}.${field.name}`,
    });
  }
  return null;
}

function findField(model: SourceModel, name: string): SourceField | undefined {
  return model.getFields().find((f) => f.name === name && f.concrete);
}

function referencedName(model: SourceModel, toField: string | null | undefined): string {
  return toField ?? model.meta.pkName ?? "id";
}

interface StoredReference {
  kind: string | null;
  maxLength: number | null;
  via: SourceModel[];
}

/**
 * Follow a referenced field to the column that actually stores it. A
 * referenced one-to-one or foreign key (an inheritance child's parent link)
 * stores its own target's key, so the walk continues there.
 */
function resolveStoredReference(
  model: SourceModel,
  name: string,
  options: IntrospectOptions,
): StoredReference {
  const via: SourceModel[] = [];
  const seen = new Set<SourceField>();
  let target = findField(model, name);
  while (target !== undefined) {
    const relation = target.relation;
    if (relation === null || target.manyToMany) {
      break;
    }
    if (relation.model === null || seen.has(target)) {
      return { kind: null, maxLength: null, via };
    }
    seen.add(target);
    via.push(relation.model);
    target = findField(relation.model, referencedName(relation.model, relation.toField));
  }
  if (target === undefined) {
    return { kind: null, maxLength: null, via };
  }
  return {
    kind: options.fieldKindMap?.[target.kind] ?? target.kind,
    maxLength: target.maxLength,
    via,
  };
}

/**
 * Extract metadata from a single source field.
 *
 * Returns null for reverse relations and any other non-concrete field that
 * is not a forward many-to-many.
 */
export function introspectField(
  field: SourceField,
  options: IntrospectOptions = {},
): FieldInfo | null {
  if (!field.concrete && !field.manyToMany) {
    return null;
  }
  if (field.manyToMany && field.reverse) {
    return null;
  }

  const relation = field.relation;
  const relatedModel = relation?.model ?? null;

  let relatedFieldName: string | null = null;
  let stored: StoredReference = { kind: null, maxLength: null, via: [] };
  if (relatedModel !== null) {
    relatedFieldName = referencedName(relatedModel, relation?.toField);
    stored = resolveStoredReference(relatedModel, relatedFieldName, options);
  }

  const throughModel = relation?.through ?? null;
  const info: FieldInfo = {
    name: field.name,
    internalType: options.fieldKindMap?.[field.kind] ?? field.kind,
    column: field.column || field.name,
    primaryKey: field.primaryKey,
    null: field.null,
    unique: field.unique,
    hasDefault: field.hasDefault,
    default: field.hasDefault ? field.default : null,
    maxLength: field.maxLength,
    maxDigits: field.maxDigits,
    decimalPlaces: field.decimalPlaces,
    dbIndex: field.dbIndex,
    choices: field.choices && field.choices.length > 0 ? [...field.choices] : null,
    enumType: detectEnumType(field),

    isRelation: relation !== null,
    relatedModel,
    relatedModelLabel: relatedModel ? modelLabel(relatedModel) : null,
    onDelete: relation?.onDelete ?? null,
    relatedName: relation?.relatedName ?? null,
    isSelfReferential: relatedModel !== null && relatedModel === field.model,
    relatedFieldName,
    relatedFieldKind: stored.kind,
    relatedFieldMaxLength: stored.maxLength,
    relatedFieldVia: Object.freeze(stored.via),

    manyToMany: field.manyToMany,
    throughModel,
    throughDbTable:
      relation?.throughTable ?? throughModel?.meta.dbTable ?? null,
  };

  return Object.freeze(info);
}

/**
 * Extract all schema metadata from a source model.
 */
export function introspectModel(
  model: SourceModel,
  options: IntrospectOptions = {},
): ModelInfo {
  const meta = model.meta;

  const fields: FieldInfo[] = [];
  for (const field of model.getFields()) {
    const info = introspectField(field, options);
    if (info !== null) {
      fields.push(info);
    }
  }

  return Object.freeze({
    identity: model,
    appLabel: meta.appLabel,
    modelName: meta.modelName,
    objectName: meta.objectName,
    module: meta.module,
    dbTable: meta.dbTable,
    fields: Object.freeze(fields),
    uniqueTogether: meta.uniqueTogether.map((group) => [...group]),
    isAbstract: meta.abstract,
    isProxy: meta.proxy,
    isManaged: meta.managed,
    pkName: meta.pkName ?? "id",
  });
}

/**
 * Decide whether a model gets a mirror at all.
 *
 * Unmanaged models are kept: their tables exist even though the source
 * framework does not migrate them.
 */
export function shouldSkipModel(info: ModelInfo): SkipDecision {
  if (info.isAbstract) {
    return [true, `Model '${info.modelName}' is abstract.`];
  }
  if (info.isProxy) {
    return [true, `Model '${info.modelName}' is a proxy model.`];
  }
  if (info.fields.length === 0) {
    return [true, `Model '${info.modelName}' has no concrete fields.`];
  }
  return [false, ""];
}
