/**
 * Introspector module types
 */

import type {
  Choice,
  ChoiceEnum,
  SourceModel,
} from "../../types/source-schema.js";

/**
 * FieldInfo - framework-neutral description of one source field
 */
export interface FieldInfo {
  readonly name: string;
  /** Source kind tag (after any configured kind override). */
  readonly internalType: string;
  readonly column: string;
  readonly primaryKey: boolean;
  readonly null: boolean;
  readonly unique: boolean;
  /** Tracked apart from `default`: a field can default to `null`. */
  readonly hasDefault: boolean;
  readonly default: unknown;
  readonly maxLength: number | null;
  readonly maxDigits: number | null;
  readonly decimalPlaces: number | null;
  readonly dbIndex: boolean;
  readonly choices: readonly Choice[] | null;
  readonly enumType: ChoiceEnum | null;

  readonly isRelation: boolean;
  /** Identity of the related source model; never owned by this record. */
  readonly relatedModel: SourceModel | null;
  readonly relatedModelLabel: string | null;
  readonly onDelete: string | null;
  readonly relatedName: string | null;
  readonly isSelfReferential: boolean;
  /** Field on the related model the relation points at. */
  readonly relatedFieldName: string | null;
  /** Kind of the column storing the referenced value, after kind overrides. */
  readonly relatedFieldKind: string | null;
  readonly relatedFieldMaxLength: number | null;
  /** Models passed through when the referenced field is itself a relation. */
  readonly relatedFieldVia: readonly SourceModel[];

  readonly manyToMany: boolean;
  readonly throughModel: SourceModel | null;
  readonly throughDbTable: string | null;
}

/**
 * ModelInfo - framework-neutral description of one source model
 */
export interface ModelInfo {
  readonly identity: SourceModel;
  readonly appLabel: string;
  readonly modelName: string;
  readonly objectName: string;
  readonly module: string;
  readonly dbTable: string;
  /** Declaration order, which is also rendering order. */
  readonly fields: readonly FieldInfo[];
  readonly uniqueTogether: readonly (readonly string[])[];
  readonly isAbstract: boolean;
  readonly isProxy: boolean;
  readonly isManaged: boolean;
  readonly pkName: string;
}

export interface IntrospectOptions {
  /** Source kind → kind with a registered converter. */
  fieldKindMap?: Record<string, string>;
}

export type SkipDecision = readonly [skip: boolean, reason: string];
