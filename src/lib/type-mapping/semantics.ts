/**
 * Field semantics shared by the live and text converters.
 *
 * Both renderers decide nullability, defaults, lengths, cascade actions and
 * reverse accessors here so the two outputs cannot drift apart.
 */

import { randomUUID } from "node:crypto";
import { EnumMember } from "../../types/source-schema.js";
import type { FieldInfo } from "../introspector/types.js";
import type {
  ImportSpec,
  OnDeleteAction,
  RelationKind,
} from "./types.js";

export const PG_CORE = "drizzle-orm/pg-core";
export const DRIZZLE = "drizzle-orm";

/**
 * Bounds used when a string-like field declares no max length. File-like
 * and specialised string kinds are approximations: only the stored text
 * survives, not the source framework's validation.
 */
export const DEFAULT_MAX_LENGTH: Readonly<Record<string, number>> = {
  CharField: 255,
  FileField: 100,
  ImageField: 100,
  FilePathField: 100,
  SlugField: 50,
  EmailField: 254,
  URLField: 200,
};

/** Always 39: the longest textual IPv6 address. */
export const IP_ADDRESS_LENGTH = 39;

export function maxLengthFor(info: FieldInfo): number {
  if (info.internalType === "GenericIPAddressField") {
    return IP_ADDRESS_LENGTH;
  }
  return info.maxLength ?? DEFAULT_MAX_LENGTH[info.internalType] ?? 255;
}

/**
 * Source deletion tags → drizzle referential actions.
 */
export const ON_DELETE_MAP: Readonly<Record<string, OnDeleteAction>> = {
  CASCADE: "cascade",
  SET_NULL: "set null",
  SET_DEFAULT: "set default",
  PROTECT: "restrict",
  RESTRICT: "restrict",
  DO_NOTHING: "no action",
};

/**
 * Tags match case-insensitively with `-` and `_` interchangeable; anything
 * unknown, or no tag at all, cascades.
 */
export function mapOnDelete(tag: string | null | undefined): OnDeleteAction {
  if (!tag) {
    return "cascade";
  }
  const normalized = tag.trim().toUpperCase().replace(/-/g, "_");
  return ON_DELETE_MAP[normalized] ?? "cascade";
}

/**
 * `+` and a missing name both disable the reverse accessor.
 */
export function mapRelatedName(name: string | null | undefined): string | false {
  if (!name || name === "+") {
    return false;
  }
  return name;
}

export function relationKindOf(info: FieldInfo): RelationKind | null {
  if (info.manyToMany) {
    return "manyToMany";
  }
  if (info.internalType === "ForeignKey") {
    return "foreignKey";
  }
  if (info.internalType === "OneToOneField") {
    return "oneToOne";
  }
  return null;
}

/**
 * Reasons a FieldInfo cannot be rendered, or null when it is well formed.
 */
export function validateFieldInfo(info: FieldInfo): string | null {
  if (info.isRelation && info.relatedModel === null) {
    return `Relation field '${info.name}' has no related model.`;
  }
  if (info.manyToMany && info.primaryKey) {
    return `Many-to-many field '${info.name}' cannot be a primary key.`;
  }
  return null;
}

/**
 * Kind of the column a foreign key stores: auto-increment targets are
 * referenced through plain integers of the same width.
 */
export function referenceColumnKind(info: FieldInfo): string {
  switch (info.relatedFieldKind) {
    case "AutoField":
      return "IntegerField";
    case "BigAutoField":
      return "BigIntegerField";
    case "SmallAutoField":
      return "SmallIntegerField";
    case null:
      return "IntegerField";
    default:
      return info.relatedFieldKind;
  }
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export type DefaultFactory = () => unknown;

export function emptyObject(): Record<string, unknown> {
  return {};
}

export function emptyArray(): unknown[] {
  return [];
}

export function currentTimestamp(): Date {
  return new Date();
}

export function uuid4(): string {
  return randomUUID();
}

/**
 * Callables with a known source spelling.
 */
export const KNOWN_FACTORIES: ReadonlyMap<
  unknown,
  { expression: string; imports: ImportSpec[] }
> = new Map<unknown, { expression: string; imports: ImportSpec[] }>([
  [emptyObject, { expression: "() => ({})", imports: [] }],
  [emptyArray, { expression: "() => []", imports: [] }],
  [currentTimestamp, { expression: "() => new Date()", imports: [] }],
  [
    uuid4,
    {
      expression: "() => randomUUID()",
      imports: [{ module: "node:crypto", name: "randomUUID" }],
    },
  ],
  [
    randomUUID,
    {
      expression: "() => randomUUID()",
      imports: [{ module: "node:crypto", name: "randomUUID" }],
    },
  ],
]);

export type DefaultPlan =
  | { kind: "none" }
  | { kind: "literal"; value: unknown }
  | { kind: "enum"; member: EnumMember }
  | { kind: "factory"; factory: DefaultFactory; origin: unknown };

/**
 * Presence decides, not the value: a declared `null` default is still a
 * default and is rendered as one.
 */
export function planDefault(info: FieldInfo): DefaultPlan {
  if (!info.hasDefault) {
    return { kind: "none" };
  }
  const value = info.default;
  // enum members render by member name, so check them before literals
  if (value instanceof EnumMember) {
    return { kind: "enum", member: value };
  }
  if (typeof value === "function") {
    const factory: DefaultFactory = () => {
      const produced: unknown = Reflect.apply(value, undefined, []);
      return produced;
    };
    return { kind: "factory", factory, origin: value };
  }
  return { kind: "literal", value };
}

export interface CommonParams {
  primaryKey: boolean;
  notNull: boolean;
  unique: boolean;
  default: DefaultPlan;
}

/**
 * Parameters every non-relational column carries. Indexes stay with the
 * source framework's migrations.
 */
export function commonParams(info: FieldInfo): CommonParams {
  return {
    primaryKey: info.primaryKey,
    notNull: !info.null && !info.primaryKey,
    unique: info.unique && !info.primaryKey,
    default: planDefault(info),
  };
}
