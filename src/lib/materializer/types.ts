/**
 * Materializer module types
 */

import type { PgTable } from "drizzle-orm/pg-core";
import type { FieldInfo } from "../introspector/types.js";
import type { ImportSpec, RelationDescriptor } from "../type-mapping/types.js";
import type { SourceModel } from "../../types/source-schema.js";

/**
 * Metadata block carried next to every mirrored table.
 */
export interface MirrorMeta {
  /** Physical table name, shared with the source model. */
  table: string;
  /** Target namespace. */
  app: string;
  uniqueTogether: string[][];
  relations: Record<string, RelationDescriptor>;
}

/**
 * Live rendering of one source model.
 */
export interface MirrorModel {
  className: string;
  /** `app.ObjectName` of the source model. */
  label: string;
  table: PgTable;
  meta: MirrorMeta;
  /** Column keys plus many-to-many relation names. */
  fieldNames: string[];
}

/**
 * Text rendering of one source model.
 */
export interface ModelSourceResult {
  className: string;
  label: string;
  appLabel: string;
  code: string;
  imports: ImportSpec[];
  /** Module-level declarations the model needs, e.g. custom column types. */
  preamble: string[];
  fieldNames: string[];
}

/**
 * A field that passed validation, with its relation target resolved.
 */
export type FieldPlan =
  | { kind: "data"; info: FieldInfo }
  | {
      kind: "relation";
      info: FieldInfo;
      target: SourceModel;
      targetClassName: string;
    };
