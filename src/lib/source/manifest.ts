/**
 * Schema manifest - declared source models read from YAML or JSON
 */

import { readFileSync } from "node:fs";
import { extname } from "node:path";
import { Ajv, type ErrorObject } from "ajv";
import { parse as parseYaml } from "yaml";
import {
  ChoiceEnum,
  EnumMember,
  type Choice,
  type ChoiceValue,
  type SourceField,
  type SourceModel,
  type SourceModelMeta,
  type SourceRelation,
  type SourceSchema,
} from "../../types/source-schema.js";
import {
  currentTimestamp,
  emptyArray,
  emptyObject,
  uuid4,
  type DefaultFactory,
} from "../type-mapping/semantics.js";
import {
  MANIFEST_SCHEMA,
  type RawEnum,
  type RawField,
  type RawManifest,
  type RawModel,
} from "./manifest-schema.js";
import { FileIOError, SchemaError, errorMessage } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export const DEFAULT_AUTO_FIELD = "BigAutoField";
export const DEFAULT_ENUM_MODULE = "./enums.js";

export const RELATION_KINDS: ReadonlySet<string> = new Set([
  "ForeignKey",
  "OneToOneField",
  "ManyToManyField",
]);

export const DEFAULT_FACTORIES: Readonly<Record<string, DefaultFactory>> = {
  dict: emptyObject,
  list: emptyArray,
  uuid4,
  now: currentTimestamp,
};

export interface EnumDeclaration {
  module: string;
  members: Record<string, ChoiceValue | { value: ChoiceValue; label?: string }>;
}

export interface FieldDeclaration {
  name: string;
  kind: string;
  column?: string;
  primaryKey?: boolean;
  null?: boolean;
  unique?: boolean;
  dbIndex?: boolean;
  /** Present key means the field has a default, even when it is null. */
  default?: unknown;
  hasDefault: boolean;
  maxLength?: number;
  maxDigits?: number;
  decimalPlaces?: number;
  choices?: Choice[] | { enum: string };
  to?: string;
  onDelete?: string;
  relatedName?: string;
  toField?: string;
  through?: string;
  throughTable?: string;
}

export interface ModelDeclaration {
  app: string;
  name: string;
  table?: string;
  abstract?: boolean;
  proxy?: boolean;
  managed?: boolean;
  module?: string;
  uniqueTogether?: string[][];
  fields: FieldDeclaration[];
}

export interface SchemaManifest {
  defaultAutoField: string;
  enums: Record<string, EnumDeclaration>;
  models: ModelDeclaration[];
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const validateManifest = new Ajv({ allErrors: true, strict: false }).compile<RawManifest>(
  MANIFEST_SCHEMA,
);

/** `/models/0/fields/1` → `models[0].fields[1]` */
function errorLocation(instancePath: string): string {
  let location = "";
  for (const segment of instancePath.split("/").slice(1)) {
    const key = segment.replace(/~1/g, "/").replace(/~0/g, "~");
    location += /^\d+$/.test(key) ? `[${key}]` : location === "" ? key : `.${key}`;
  }
  return location === "" ? "document" : location;
}

/**
 * Leaf errors only: `if` reports its branch failures separately.
 */
function describeErrors(errors: readonly ErrorObject[]): string[] {
  return errors
    .filter((error) => error.keyword !== "if")
    .map((error) => `${errorLocation(error.instancePath)} ${error.message ?? error.keyword}`);
}

function toEnum(raw: RawEnum): EnumDeclaration {
  const members: EnumDeclaration["members"] = {};
  for (const [key, entry] of Object.entries(raw.members)) {
    if (typeof entry !== "object") {
      members[key] = entry;
    } else {
      members[key] =
        typeof entry.label === "string"
          ? { value: entry.value, label: entry.label }
          : { value: entry.value };
    }
  }
  return { module: raw.module ?? DEFAULT_ENUM_MODULE, members };
}

function toField(raw: RawField): FieldDeclaration {
  const choices = raw.choices ?? undefined;
  return {
    name: raw.name,
    kind: raw.kind,
    column: raw.column ?? undefined,
    primaryKey: raw.primaryKey ?? undefined,
    null: raw.null ?? undefined,
    unique: raw.unique ?? undefined,
    dbIndex: raw.dbIndex ?? undefined,
    hasDefault: "default" in raw,
    default: raw.default,
    maxLength: raw.maxLength ?? undefined,
    maxDigits: raw.maxDigits ?? undefined,
    decimalPlaces: raw.decimalPlaces ?? undefined,
    choices: Array.isArray(choices)
      ? choices.map(([value, label]): Choice => [value, label])
      : choices,
    to: raw.to ?? undefined,
    onDelete: raw.onDelete ?? undefined,
    relatedName: raw.relatedName ?? undefined,
    toField: raw.toField ?? undefined,
    through: raw.through ?? undefined,
    throughTable: raw.throughTable ?? undefined,
  };
}

function toModel(raw: RawModel): ModelDeclaration {
  return {
    app: raw.app,
    name: raw.name,
    table: raw.table ?? undefined,
    abstract: raw.abstract ?? undefined,
    proxy: raw.proxy ?? undefined,
    managed: raw.managed ?? undefined,
    module: raw.module ?? undefined,
    uniqueTogether: raw.uniqueTogether?.map((group) => [...group]),
    fields: (raw.fields ?? []).map(toField),
  };
}

/**
 * Validate an already-parsed manifest document against the manifest JSON
 * Schema. Every violation is reported in one SchemaError.
 */
export function parseSchemaManifest(data: unknown): SchemaManifest {
  if (!validateManifest(data)) {
    const errors = describeErrors(validateManifest.errors ?? []);
    throw new SchemaError(`Invalid schema manifest: ${errors.join("; ")}`, { errors });
  }

  const enums: Record<string, EnumDeclaration> = {};
  for (const [name, raw] of Object.entries(data.enums ?? {})) {
    enums[name] = toEnum(raw);
  }

  return {
    defaultAutoField: data.defaultAutoField ?? DEFAULT_AUTO_FIELD,
    enums,
    models: data.models.map(toModel),
  };
}

/**
 * Read and validate a manifest file (.json, .yaml or .yml).
 */
export function loadSchemaManifest(filePath: string): SchemaManifest {
  const extension = extname(filePath).toLowerCase();
  if (![".json", ".yaml", ".yml"].includes(extension)) {
    throw new FileIOError(
      `Unsupported schema file format: ${filePath}. Must be .json, .yaml, or .yml`,
      { filePath },
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read schema file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  let data: unknown;
  try {
    data = extension === ".json" ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new SchemaError(
      `Failed to parse schema file: ${filePath}: ${errorMessage(error)}`,
      { filePath },
      { cause: error },
    );
  }

  logger.debug("Schema manifest loaded", { filePath });
  return parseSchemaManifest(data);
}

// ---------------------------------------------------------------------------
// Building source models
// ---------------------------------------------------------------------------

/**
 * A model declared in a manifest.
 */
export class DeclaredModel implements SourceModel {
  private readonly fields: SourceField[] = [];

  constructor(public readonly meta: SourceModelMeta) {}

  addField(field: SourceField): void {
    this.fields.push(field);
  }

  getFields(): SourceField[] {
    return [...this.fields];
  }
}

/**
 * Models in declaration order.
 */
export class DeclaredSchema implements SourceSchema {
  constructor(private readonly models: readonly DeclaredModel[]) {}

  getModels(): DeclaredModel[] {
    return [...this.models];
  }

  getModel(label: string): DeclaredModel | undefined {
    return this.models.find((m) => `${m.meta.appLabel}.${m.meta.objectName}` === label);
  }
}

interface FieldShape {
  name: string;
  kind: string;
  column: string | null;
  concrete: boolean;
  manyToMany: boolean;
  reverse: boolean;
  relation: SourceRelation | null;
}

function makeField(
  model: SourceModel,
  shape: FieldShape,
  decl: Partial<FieldDeclaration>,
  resolved: { default: unknown; choices: readonly Choice[] | null },
): SourceField {
  return Object.freeze({
    ...shape,
    model,
    primaryKey: decl.primaryKey ?? false,
    null: decl.null ?? false,
    unique: decl.unique ?? false,
    dbIndex: decl.dbIndex ?? false,
    hasDefault: decl.hasDefault ?? false,
    default: resolved.default,
    maxLength: decl.maxLength ?? null,
    maxDigits: decl.maxDigits ?? null,
    decimalPlaces: decl.decimalPlaces ?? null,
    choices: resolved.choices,
  });
}

class ManifestBuilder {
  private readonly enums = new Map<string, ChoiceEnum>();
  private readonly models = new Map<string, DeclaredModel>();

  constructor(private readonly manifest: SchemaManifest) {
    for (const [name, decl] of Object.entries(manifest.enums)) {
      this.enums.set(name, new ChoiceEnum(name, decl.module, decl.members));
    }
  }

  build(): DeclaredSchema {
    const ordered: DeclaredModel[] = [];
    for (const decl of this.manifest.models) {
      const label = `${decl.app}.${decl.name}`;
      if (this.models.has(label)) {
        throw new SchemaError(`Duplicate model '${label}'`, { model: label });
      }
      const modelName = decl.name.toLowerCase();
      const model = new DeclaredModel(
        Object.freeze({
          appLabel: decl.app,
          objectName: decl.name,
          modelName,
          module: decl.module ?? `${decl.app}/models`,
          dbTable: decl.table ?? `${decl.app}_${modelName}`,
          abstract: decl.abstract ?? false,
          proxy: decl.proxy ?? false,
          managed: decl.managed ?? true,
          uniqueTogether: decl.uniqueTogether ?? [],
          pkName: decl.fields.find((f) => f.primaryKey)?.name ?? "id",
        }),
      );
      this.models.set(label, model);
      ordered.push(model);
    }

    // Forward fields first, so reverse fields land after a target's own.
    const reverse: Array<() => void> = [];
    this.manifest.models.forEach((decl, index) => {
      const model = ordered[index];
      if (model !== undefined) {
        this.addFields(model, decl, reverse);
      }
    });
    reverse.forEach((add) => add());

    logger.debug("Source schema built", { models: ordered.length });
    return new DeclaredSchema(ordered);
  }

  private resolveModel(reference: string, from: DeclaredModel, where: string): DeclaredModel {
    if (reference === "self") {
      return from;
    }
    const label = reference.includes(".") ? reference : `${from.meta.appLabel}.${reference}`;
    const model = this.models.get(label);
    if (model === undefined) {
      throw new SchemaError(`${where}: unknown related model '${reference}'`, {
        field: where,
        to: reference,
      });
    }
    return model;
  }

  private resolveEnum(name: string, where: string): ChoiceEnum {
    const enumType = this.enums.get(name);
    if (enumType === undefined) {
      throw new SchemaError(`${where}: unknown enum '${name}'`, { field: where, enum: name });
    }
    return enumType;
  }

  private resolveDefault(decl: FieldDeclaration, where: string): unknown {
    const value = decl.default;
    if (!decl.hasDefault || !isRecord(value)) {
      return value;
    }
    if (typeof value.enum === "string" && typeof value.member === "string") {
      const member = this.resolveEnum(value.enum, where).member(value.member);
      if (member === undefined) {
        throw new SchemaError(`${where}: enum '${value.enum}' has no member '${value.member}'`, {
          field: where,
          enum: value.enum,
          member: value.member,
        });
      }
      return member;
    }
    if (typeof value.factory === "string") {
      const factory = DEFAULT_FACTORIES[value.factory];
      if (factory === undefined) {
        throw new SchemaError(`${where}: unknown default factory '${value.factory}'`, {
          field: where,
          factory: value.factory,
        });
      }
      return factory;
    }
    return value;
  }

  private resolveChoices(
    decl: FieldDeclaration,
    defaultValue: unknown,
    where: string,
  ): readonly Choice[] | null {
    const choices = decl.choices;
    if (Array.isArray(choices)) {
      return choices.length > 0 ? choices : null;
    }
    if (choices !== undefined) {
      return this.resolveEnum(choices.enum, where).choices();
    }
    if (defaultValue instanceof EnumMember) {
      return defaultValue.enumType.choices();
    }
    return null;
  }

  private addFields(
    model: DeclaredModel,
    decl: ModelDeclaration,
    reverse: Array<() => void>,
  ): void {
    const label = `${decl.app}.${decl.name}`;
    const declared = [...decl.fields];
    if (!declared.some((f) => f.primaryKey)) {
      declared.unshift({
        name: "id",
        kind: this.manifest.defaultAutoField,
        primaryKey: true,
        hasDefault: false,
      });
    }

    const seen = new Set<string>();
    for (const field of declared) {
      const where = `${label}.${field.name}`;
      if (seen.has(field.name)) {
        throw new SchemaError(`Duplicate field '${where}'`, { field: where });
      }
      seen.add(field.name);

      const defaultValue = this.resolveDefault(field, where);
      const resolved = {
        default: field.hasDefault ? defaultValue : null,
        choices: this.resolveChoices(field, defaultValue, where),
      };

      if (!RELATION_KINDS.has(field.kind)) {
        model.addField(
          makeField(
            model,
            {
              name: field.name,
              kind: field.kind,
              column: field.column ?? field.name,
              concrete: true,
              manyToMany: false,
              reverse: false,
              relation: null,
            },
            field,
            resolved,
          ),
        );
        continue;
      }

      if (field.to === undefined) {
        throw new SchemaError(`${where}: relation fields need 'to'`, { field: where });
      }
      const target = this.resolveModel(field.to, model, where);
      const manyToMany = field.kind === "ManyToManyField";
      const through =
        field.through !== undefined ? this.resolveModel(field.through, model, where) : null;
      const relation: SourceRelation = Object.freeze({
        model: target,
        onDelete: field.onDelete ?? null,
        relatedName: field.relatedName ?? null,
        toField: field.toField ?? null,
        through,
        throughTable: manyToMany
          ? field.throughTable ?? through?.meta.dbTable ?? `${model.meta.dbTable}_${field.name}`
          : null,
      });

      model.addField(
        makeField(
          model,
          {
            name: field.name,
            kind: field.kind,
            column: manyToMany ? null : field.column ?? `${field.name}_id`,
            concrete: !manyToMany,
            manyToMany,
            reverse: false,
            relation,
          },
          field,
          resolved,
        ),
      );

      if (field.relatedName !== "+") {
        reverse.push(() => this.addReverseField(model, target, field, manyToMany));
      }
    }
  }

  private addReverseField(
    owner: DeclaredModel,
    target: DeclaredModel,
    field: FieldDeclaration,
    manyToMany: boolean,
  ): void {
    const accessor =
      field.relatedName ??
      (field.kind === "OneToOneField" ? owner.meta.modelName : `${owner.meta.modelName}_set`);
    target.addField(
      makeField(
        target,
        {
          name: accessor,
          kind: field.kind,
          column: null,
          concrete: false,
          manyToMany,
          reverse: true,
          relation: Object.freeze({
            model: owner,
            onDelete: null,
            relatedName: field.name,
            toField: null,
            through: null,
            throughTable: null,
          }),
        },
        { null: true },
        { default: null, choices: null },
      ),
    );
  }
}

/**
 * Turn a validated manifest into source models.
 */
export function buildSourceSchema(manifest: SchemaManifest): DeclaredSchema {
  return new ManifestBuilder(manifest).build();
}

/**
 * Read, validate and build in one step.
 */
export function loadSourceSchema(filePath: string): DeclaredSchema {
  return buildSourceSchema(loadSchemaManifest(filePath));
}
