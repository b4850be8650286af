/**
 * JSON Schema (draft-07) for schema manifest documents
 */

import type { Choice, ChoiceValue } from "../../types/source-schema.js";

/** Shape of a document that passed {@link MANIFEST_SCHEMA}. */
export interface RawManifest {
  defaultAutoField?: string | null;
  enums?: Record<string, RawEnum> | null;
  models: RawModel[];
}

export interface RawEnum {
  module?: string | null;
  members: Record<string, ChoiceValue | { value: ChoiceValue; label?: string | null }>;
}

export interface RawModel {
  app: string;
  name: string;
  table?: string | null;
  abstract?: boolean | null;
  proxy?: boolean | null;
  managed?: boolean | null;
  module?: string | null;
  uniqueTogether?: string[][] | null;
  fields?: RawField[] | null;
}

export interface RawField {
  name: string;
  kind: string;
  column?: string | null;
  primaryKey?: boolean | null;
  null?: boolean | null;
  unique?: boolean | null;
  dbIndex?: boolean | null;
  default?: unknown;
  maxLength?: number | null;
  maxDigits?: number | null;
  decimalPlaces?: number | null;
  choices?: Choice[] | { enum: string } | null;
  to?: string | null;
  onDelete?: string | null;
  relatedName?: string | null;
  toField?: string | null;
  through?: string | null;
  throughTable?: string | null;
}

const name = { type: "string", minLength: 1 } as const;
const optionalString = { type: ["string", "null"] } as const;
const optionalBoolean = { type: ["boolean", "null"] } as const;
const optionalCount = { type: ["integer", "null"], minimum: 0 } as const;
const choiceValue = { type: ["string", "number"] } as const;

const field = {
  type: "object",
  required: ["name", "kind"],
  properties: {
    name,
    kind: name,
    column: optionalString,
    primaryKey: optionalBoolean,
    null: optionalBoolean,
    unique: optionalBoolean,
    dbIndex: optionalBoolean,
    maxLength: optionalCount,
    maxDigits: optionalCount,
    decimalPlaces: optionalCount,
    choices: {
      type: ["array", "object", "null"],
      if: { type: "array" },
      then: {
        items: {
          type: "array",
          items: [choiceValue, { type: "string" }],
          minItems: 2,
          maxItems: 2,
        },
      },
      else: {
        if: { type: "object" },
        then: { required: ["enum"], properties: { enum: name } },
      },
    },
    to: optionalString,
    onDelete: optionalString,
    relatedName: optionalString,
    toField: optionalString,
    through: optionalString,
    throughTable: optionalString,
  },
} as const;

const model = {
  type: "object",
  required: ["app", "name"],
  properties: {
    app: name,
    name,
    table: optionalString,
    abstract: optionalBoolean,
    proxy: optionalBoolean,
    managed: optionalBoolean,
    module: optionalString,
    uniqueTogether: {
      type: ["array", "null"],
      items: { type: "array", items: { type: "string" } },
    },
    fields: { type: ["array", "null"], items: field },
  },
} as const;

const enumDeclaration = {
  type: "object",
  required: ["members"],
  properties: {
    module: optionalString,
    members: {
      type: "object",
      additionalProperties: {
        if: { type: "object" },
        then: {
          required: ["value"],
          properties: { value: choiceValue, label: optionalString },
        },
        else: choiceValue,
      },
    },
  },
} as const;

export const MANIFEST_SCHEMA = {
  type: "object",
  required: ["models"],
  properties: {
    defaultAutoField: optionalString,
    enums: { type: ["object", "null"], additionalProperties: enumDeclaration },
    models: { type: "array", items: model },
  },
} as const;
