import type { FieldInfo } from '../../src/lib/introspector/types.js';

/**
 * A plain non-null, non-relational field; override what the test needs.
 */
export function fieldInfo(overrides: Partial<FieldInfo> = {}): FieldInfo {
  const name = overrides.name ?? 'value';
  return {
    name,
    internalType: 'IntegerField',
    column: name,
    primaryKey: false,
    null: false,
    unique: false,
    hasDefault: false,
    default: null,
    maxLength: null,
    maxDigits: null,
    decimalPlaces: null,
    dbIndex: false,
    choices: null,
    enumType: null,
    isRelation: false,
    relatedModel: null,
    relatedModelLabel: null,
    onDelete: null,
    relatedName: null,
    isSelfReferential: false,
    relatedFieldName: null,
    relatedFieldKind: null,
    relatedFieldMaxLength: null,
    relatedFieldVia: [],
    manyToMany: false,
    throughModel: null,
    throughDbTable: null,
    ...overrides,
  };
}
