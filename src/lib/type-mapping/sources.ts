/**
 * Text field converters: source kind → drizzle column expression
 *
 * Mirrors columns.ts entry for entry. Every kind registered there has a
 * renderer here, and both read the shared decisions from semantics.ts.
 */

import type { FieldInfo } from "../introspector/types.js";
import type {
  FieldSource,
  ImportSpec,
  RelationDescriptor,
  SourceRenderer,
} from "./types.js";
import {
  DRIZZLE,
  KNOWN_FACTORIES,
  PG_CORE,
  commonParams,
  maxLengthFor,
  referenceColumnKind,
} from "./semantics.js";
import { describeRelation } from "./columns.js";
import { logger } from "../../utils/logger.js";

export const BYTEA_PREAMBLE = [
  "const bytea = customType<{ data: Buffer; driverData: Buffer }>({",
  "  dataType() {",
  '    return "bytea";',
  "  },",
  "});",
].join("\n");

/**
 * Source kind → text renderer.
 */
export const SOURCE_FIELD_MAP = new Map<string, SourceRenderer>();

export function registerSourceField(
  kind: string,
  renderer: SourceRenderer,
): SourceRenderer {
  SOURCE_FIELD_MAP.set(kind, renderer);
  return renderer;
}

function pgImport(name: string): ImportSpec {
  return { module: PG_CORE, name };
}

function builderCall(builder: string, info: FieldInfo, options?: string): FieldSource {
  const args = options
    ? `${JSON.stringify(info.column)}, ${options}`
    : JSON.stringify(info.column);
  return { expression: `${builder}(${args})`, imports: [pgImport(builder)] };
}

function simple(builder: string, options?: string): SourceRenderer {
  return (info) => builderCall(builder, info, options);
}

/**
 * Render a value as a TypeScript literal, or null when it has no literal form.
 */
export function literalSource(value: unknown): string | null {
  if (value === null) {
    return "null";
  }
  switch (typeof value) {
    case "string":
    case "boolean":
      return JSON.stringify(value);
    case "number":
      return Number.isFinite(value) ? String(value) : null;
    case "bigint":
      return `${value}n`;
    default:
      break;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime())
      ? null
      : `new Date(${JSON.stringify(value.toISOString())})`;
  }
  if (isJsonValue(value)) {
    return JSON.stringify(value);
  }
  return null;
}

function isJsonValue(value: unknown): boolean {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return true;
  }
  if (typeof value === "number") {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  if (typeof value === "object" && Object.getPrototypeOf(value) === Object.prototype) {
    return Object.values(value).every(isJsonValue);
  }
  return false;
}

function enumImport(info: FieldInfo): ImportSpec | null {
  return info.enumType
    ? { module: info.enumType.module, name: info.enumType.name }
    : null;
}

/**
 * Expression for an enum-backed field, or null when the field has no enum.
 */
export function tryEnumSource(info: FieldInfo): FieldSource | null {
  const enumType = info.enumType;
  const spec = enumImport(info);
  if (enumType === null || spec === null) {
    return null;
  }
  if (enumType.valueType === "integer") {
    const base = builderCall("integer", info);
    return {
      expression: `${base.expression}.$type<${enumType.name}>()`,
      imports: [...base.imports, spec],
    };
  }
  const values = enumType.values().map((v) => JSON.stringify(String(v)));
  const options =
    values.length > 0
      ? `{ length: ${maxLengthFor(info)}, enum: [${values.join(", ")}] }`
      : `{ length: ${maxLengthFor(info)} }`;
  const base = builderCall("varchar", info, options);
  return {
    expression: `${base.expression}.$type<${enumType.name}>()`,
    imports: [...base.imports, spec],
  };
}

function withEnum(render: SourceRenderer): SourceRenderer {
  return (info) => tryEnumSource(info) ?? render(info);
}

function boundedString(info: FieldInfo): FieldSource {
  return builderCall("varchar", info, `{ length: ${maxLengthFor(info)} }`);
}

// Auto fields
registerSourceField("AutoField", simple("serial"));
registerSourceField("BigAutoField", simple("bigserial", '{ mode: "number" }'));
registerSourceField("SmallAutoField", simple("smallserial"));

// Integers
registerSourceField("IntegerField", withEnum(simple("integer")));
registerSourceField("PositiveIntegerField", withEnum(simple("integer")));
registerSourceField("BigIntegerField", withEnum(simple("bigint", '{ mode: "number" }')));
registerSourceField(
  "PositiveBigIntegerField",
  withEnum(simple("bigint", '{ mode: "number" }')),
);
registerSourceField("SmallIntegerField", withEnum(simple("smallint")));
registerSourceField("PositiveSmallIntegerField", withEnum(simple("smallint")));

// Strings
registerSourceField("CharField", withEnum(boundedString));
registerSourceField("TextField", simple("text"));

registerSourceField("BooleanField", simple("boolean"));

// Date and time
registerSourceField("DateField", simple("date"));
registerSourceField("DateTimeField", simple("timestamp", "{ withTimezone: true }"));
registerSourceField("TimeField", simple("time"));
registerSourceField("DurationField", simple("interval"));

// Numbers
registerSourceField("DecimalField", (info) => {
  const options: string[] = [];
  if (info.maxDigits !== null) {
    options.push(`precision: ${info.maxDigits}`);
  }
  if (info.decimalPlaces !== null) {
    options.push(`scale: ${info.decimalPlaces}`);
  }
  return builderCall("numeric", info, options.length > 0 ? `{ ${options.join(", ")} }` : undefined);
});
registerSourceField("FloatField", simple("doublePrecision"));

registerSourceField("BinaryField", (info) => ({
  expression: `bytea(${JSON.stringify(info.column)})`,
  imports: [pgImport("customType")],
  preamble: [BYTEA_PREAMBLE],
}));
registerSourceField("UUIDField", simple("uuid"));
registerSourceField("JSONField", simple("jsonb"));

registerSourceField("FileField", boundedString);
registerSourceField("ImageField", boundedString);
registerSourceField("FilePathField", boundedString);
registerSourceField("SlugField", boundedString);
registerSourceField("EmailField", boundedString);
registerSourceField("URLField", boundedString);
registerSourceField("GenericIPAddressField", boundedString);

/**
 * drizzle types `.default()` by the column's data type, so a null default
 * goes through `sql`.
 */
const SQL_NULL = "sql`null`";

/**
 * drizzle reads and writes numeric columns as strings.
 */
function defaultLiteral(info: FieldInfo, value: unknown): string | null {
  if (info.internalType === "DecimalField" && typeof value === "number") {
    return Number.isFinite(value) ? JSON.stringify(String(value)) : null;
  }
  return literalSource(value);
}

/**
 * Append the shared modifiers to a bare column expression.
 *
 * Defaults without a literal spelling become a null default plus a comment
 * in the generated code asking for a real value.
 */
export function applyCommonSource(source: FieldSource, info: FieldInfo): FieldSource {
  const params = commonParams(info);
  let expression = source.expression;
  const imports = [...source.imports];
  let comment = source.comment;

  if (params.primaryKey) {
    expression += ".primaryKey()";
  }
  if (params.notNull) {
    expression += ".notNull()";
  }
  if (params.unique) {
    expression += ".unique()";
  }

  const nullDefault = (): void => {
    expression += `.default(${SQL_NULL})`;
    imports.push({ module: DRIZZLE, name: "sql" });
  };
  const placeholder = (): void => {
    nullDefault();
    comment = `TODO: set default for '${info.name}'`;
  };

  const plan = params.default;
  switch (plan.kind) {
    case "none":
      break;
    case "enum": {
      const { enumType, name } = plan.member;
      expression += `.default(${enumType.name}.${name})`;
      imports.push({ module: enumType.module, name: enumType.name });
      break;
    }
    case "literal": {
      if (plan.value === null) {
        nullDefault();
        break;
      }
      const literal = defaultLiteral(info, plan.value);
      if (literal === null) {
        placeholder();
      } else {
        expression += `.default(${literal})`;
      }
      break;
    }
    case "factory": {
      const known = KNOWN_FACTORIES.get(plan.origin);
      if (known === undefined) {
        placeholder();
      } else {
        expression += `.$defaultFn(${known.expression})`;
        imports.push(...known.imports);
      }
      break;
    }
  }

  return { ...source, expression, imports, comment };
}

/**
 * Render a non-relational FieldInfo, or null for kinds without a renderer.
 */
export function renderFieldSource(info: FieldInfo): FieldSource | null {
  const renderer = SOURCE_FIELD_MAP.get(info.internalType);
  if (renderer === undefined) {
    logger.warn(
      `Unsupported field type '${info.internalType}' on field '${info.name}'. Skipping.`,
    );
    return null;
  }
  return applyCommonSource(renderer(info), info);
}

export interface RelationSource {
  descriptor: RelationDescriptor;
  /** Storage column; null for many-to-many. */
  source: FieldSource | null;
}

function referenceSource(info: FieldInfo): FieldSource {
  const kind = referenceColumnKind(info);
  const renderer = SOURCE_FIELD_MAP.get(kind);
  if (renderer === undefined) {
    logger.warn(
      `Referenced field kind '${kind}' of '${info.name}' has no converter; storing as integer.`,
    );
    return builderCall("integer", info);
  }
  return renderer({
    ...info,
    internalType: kind,
    maxLength: info.relatedFieldMaxLength,
    enumType: null,
  });
}

/**
 * Render a relational FieldInfo pointing at `targetClassName`.
 */
export function renderRelationSource(
  info: FieldInfo,
  targetClassName: string,
): RelationSource | null {
  const descriptor = describeRelation(info, targetClassName);
  if (descriptor === null) {
    logger.warn(
      `Unsupported relation type '${info.internalType}' on field '${info.name}'. Skipping.`,
    );
    return null;
  }
  if (descriptor.kind === "manyToMany") {
    return { descriptor, source: null };
  }

  const base = referenceSource(info);
  let expression =
    `${base.expression}.references((): AnyPgColumn => ${targetClassName}.${descriptor.references}, ` +
    `{ onDelete: ${JSON.stringify(descriptor.onDelete)} })`;
  if (info.primaryKey) {
    expression += ".primaryKey()";
  } else {
    if (!info.null) {
      expression += ".notNull()";
    }
    if (descriptor.kind === "oneToOne" || info.unique) {
      expression += ".unique()";
    }
  }
  return {
    descriptor,
    source: {
      ...base,
      expression,
      imports: [...base.imports, { module: PG_CORE, name: "AnyPgColumn", typeOnly: true }],
    },
  };
}
