/**
 * Type-mapping module types
 */

import type { PgColumn, PgColumnBuilderBase } from "drizzle-orm/pg-core";
import type { FieldInfo } from "../introspector/types.js";

/**
 * Any drizzle pg-core column builder, before or after modifiers.
 *
 * The modifiers are declared as methods so every concrete builder fits,
 * whatever its data type.
 */
export interface ColumnBuilder extends PgColumnBuilderBase {
  primaryKey(): ColumnBuilder;
  notNull(): ColumnBuilder;
  unique(): ColumnBuilder;
  default(value: unknown): ColumnBuilder;
  $defaultFn(fn: () => unknown): ColumnBuilder;
  references(
    ref: () => PgColumn,
    actions?: { onDelete?: OnDeleteAction },
  ): ColumnBuilder;
}

/**
 * Live converter: builds the bare column (type and type options only).
 * Shared modifiers are applied by `convertField`.
 */
export type FieldConverter = (info: FieldInfo) => ColumnBuilder;

/**
 * One named import a generated module needs.
 */
export interface ImportSpec {
  module: string;
  name: string;
  typeOnly?: boolean;
}

/**
 * Generated source for one column expression.
 */
export interface FieldSource {
  expression: string;
  imports: ImportSpec[];
  /** Module-level declarations the expression depends on. */
  preamble?: string[];
  /** Trailing comment for the property line. */
  comment?: string;
}

/**
 * Text converter: the bare column expression, mirroring a FieldConverter.
 */
export type SourceRenderer = (info: FieldInfo) => FieldSource;

/**
 * drizzle's referential actions.
 */
export type OnDeleteAction =
  | "cascade"
  | "restrict"
  | "no action"
  | "set null"
  | "set default";

export type RelationKind = "foreignKey" | "oneToOne" | "manyToMany";

/**
 * Relation metadata kept next to the drizzle table in both renderings.
 */
export interface RelationDescriptor {
  kind: RelationKind;
  /** Target class name, resolved through the class-name map. */
  target: string;
  /** Field on the target the relation points at. */
  references: string;
  onDelete: OnDeleteAction;
  /** `false` disables the reverse accessor. */
  relatedName: string | false;
  /** Join table for many-to-many relations. */
  through: string | null;
}
