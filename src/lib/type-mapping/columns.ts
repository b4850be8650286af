/**
 * Live field converters: source kind → drizzle pg-core column builder
 */

import {
  bigint,
  bigserial,
  boolean,
  customType,
  date,
  doublePrecision,
  integer,
  interval,
  jsonb,
  numeric,
  serial,
  smallint,
  smallserial,
  text,
  time,
  timestamp,
  uuid,
  varchar,
  type PgColumn,
} from "drizzle-orm/pg-core";
import type { FieldInfo } from "../introspector/types.js";
import type {
  ColumnBuilder,
  FieldConverter,
  RelationDescriptor,
} from "./types.js";
import {
  commonParams,
  mapOnDelete,
  mapRelatedName,
  maxLengthFor,
  referenceColumnKind,
  relationKindOf,
} from "./semantics.js";
import { logger } from "../../utils/logger.js";

/**
 * pg-core ships no bytea builder.
 */
export const bytea = customType<{ data: Buffer; driverData: Buffer }>({
  dataType() {
    return "bytea";
  },
});

/**
 * Source kind → live converter.
 */
export const FIELD_MAP = new Map<string, FieldConverter>();

export function registerField(
  kind: string,
  converter: FieldConverter,
): FieldConverter {
  FIELD_MAP.set(kind, converter);
  return converter;
}

/**
 * Column for an enum-backed field, or null when the field has no enum.
 */
export function tryEnumColumn(info: FieldInfo): ColumnBuilder | null {
  const enumType = info.enumType;
  if (enumType === null) {
    return null;
  }
  if (enumType.valueType === "integer") {
    return integer(info.column);
  }
  const [first, ...rest] = enumType.values().map(String);
  if (first === undefined) {
    return varchar(info.column, { length: maxLengthFor(info) });
  }
  return varchar(info.column, {
    length: maxLengthFor(info),
    enum: [first, ...rest],
  });
}

function withEnum(build: (info: FieldInfo) => ColumnBuilder): FieldConverter {
  return (info) => tryEnumColumn(info) ?? build(info);
}

function boundedString(info: FieldInfo): ColumnBuilder {
  return varchar(info.column, { length: maxLengthFor(info) });
}

function pathString(info: FieldInfo): ColumnBuilder {
  logger.debug(`Mapping ${info.internalType} '${info.name}' to varchar (stores path).`);
  return boundedString(info);
}

// Auto fields
registerField("AutoField", (info) => serial(info.column));
registerField("BigAutoField", (info) => bigserial(info.column, { mode: "number" }));
registerField("SmallAutoField", (info) => smallserial(info.column));

// Integers
registerField("IntegerField", withEnum((info) => integer(info.column)));
registerField("PositiveIntegerField", withEnum((info) => integer(info.column)));
registerField(
  "BigIntegerField",
  withEnum((info) => bigint(info.column, { mode: "number" })),
);
registerField(
  "PositiveBigIntegerField",
  withEnum((info) => bigint(info.column, { mode: "number" })),
);
registerField("SmallIntegerField", withEnum((info) => smallint(info.column)));
registerField("PositiveSmallIntegerField", withEnum((info) => smallint(info.column)));

// Strings
registerField("CharField", withEnum(boundedString));
registerField("TextField", (info) => text(info.column));

registerField("BooleanField", (info) => boolean(info.column));

// Date and time
registerField("DateField", (info) => date(info.column));
registerField("DateTimeField", (info) => timestamp(info.column, { withTimezone: true }));
registerField("TimeField", (info) => time(info.column));
registerField("DurationField", (info) => interval(info.column));

// Numbers
registerField("DecimalField", (info) => {
  const precision = info.maxDigits;
  const scale = info.decimalPlaces;
  if (precision !== null) {
    return scale !== null
      ? numeric(info.column, { precision, scale })
      : numeric(info.column, { precision });
  }
  return scale !== null ? numeric(info.column, { scale }) : numeric(info.column);
});
registerField("FloatField", (info) => doublePrecision(info.column));

registerField("BinaryField", (info) => bytea(info.column));
registerField("UUIDField", (info) => uuid(info.column));
registerField("JSONField", (info) => jsonb(info.column));

// Approximations: these keep the stored text only
registerField("FileField", pathString);
registerField("ImageField", pathString);
registerField("FilePathField", pathString);
registerField("SlugField", boundedString);
registerField("EmailField", boundedString);
registerField("URLField", boundedString);
registerField("GenericIPAddressField", boundedString);

/**
 * Apply nullability, primary key, uniqueness and default to a bare column.
 */
export function applyCommon(builder: ColumnBuilder, info: FieldInfo): ColumnBuilder {
  const params = commonParams(info);
  let column = builder;
  if (params.primaryKey) {
    column = column.primaryKey();
  }
  if (params.notNull) {
    column = column.notNull();
  }
  if (params.unique) {
    column = column.unique();
  }

  const plan = params.default;
  switch (plan.kind) {
    case "literal":
      column = column.default(plan.value);
      break;
    case "enum":
      column = column.default(plan.member.value);
      break;
    case "factory":
      column = column.$defaultFn(plan.factory);
      break;
    case "none":
      break;
  }
  return column;
}

/**
 * Convert a non-relational FieldInfo to a drizzle column builder.
 *
 * Unknown kinds are dropped with a warning, never thrown.
 */
export function convertField(info: FieldInfo): ColumnBuilder | null {
  const converter = FIELD_MAP.get(info.internalType);
  if (converter === undefined) {
    logger.warn(
      `Unsupported field type '${info.internalType}' on field '${info.name}'. Skipping.`,
    );
    return null;
  }
  return applyCommon(converter(info), info);
}

/**
 * Where a relation points once its target has a class name.
 */
export interface RelationTarget {
  className: string;
  /** Resolved lazily, after every mirror in the run exists. */
  column: () => PgColumn;
}

export interface LiveRelation {
  descriptor: RelationDescriptor;
  /** Storage column; null for many-to-many. */
  column: ColumnBuilder | null;
}

export function describeRelation(
  info: FieldInfo,
  targetClassName: string,
): RelationDescriptor | null {
  const kind = relationKindOf(info);
  if (kind === null) {
    return null;
  }
  return {
    kind,
    target: targetClassName,
    references: info.relatedFieldName ?? "id",
    onDelete: mapOnDelete(info.onDelete),
    relatedName: mapRelatedName(info.relatedName),
    through: kind === "manyToMany" ? info.throughDbTable : null,
  };
}

function referenceColumn(info: FieldInfo): ColumnBuilder {
  const kind = referenceColumnKind(info);
  const converter = FIELD_MAP.get(kind);
  if (converter === undefined) {
    logger.warn(
      `Referenced field kind '${kind}' of '${info.name}' has no converter; storing as integer.`,
    );
    return integer(info.column);
  }
  return converter({
    ...info,
    internalType: kind,
    maxLength: info.relatedFieldMaxLength,
    enumType: null,
  });
}

/**
 * Convert a relational FieldInfo. Returns null for relation kinds without
 * a mapping.
 */
export function convertRelationField(
  info: FieldInfo,
  target: RelationTarget,
): LiveRelation | null {
  const descriptor = describeRelation(info, target.className);
  if (descriptor === null) {
    logger.warn(
      `Unsupported relation type '${info.internalType}' on field '${info.name}'. Skipping.`,
    );
    return null;
  }
  if (descriptor.kind === "manyToMany") {
    return { descriptor, column: null };
  }

  let column = referenceColumn(info).references(target.column, {
    onDelete: descriptor.onDelete,
  });
  if (info.primaryKey) {
    column = column.primaryKey();
  } else {
    if (!info.null) {
      column = column.notNull();
    }
    if (descriptor.kind === "oneToOne" || info.unique) {
      column = column.unique();
    }
  }
  return { descriptor, column };
}
