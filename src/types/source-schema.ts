/**
 * Source schema contract
 *
 * The mirror never talks to the source framework directly; it reads models
 * through these interfaces. `buildSourceSchema()` produces them from a
 * declared manifest, and any other framework adapter can implement them.
 */

export type ChoiceValue = string | number;

/**
 * A `[value, label]` pair. Frameworks often normalize enum-backed choices
 * down to these, losing the enum itself.
 */
export type Choice = readonly [ChoiceValue, string];

export type EnumValueType = "integer" | "string";

/**
 * One member of a {@link ChoiceEnum}. Source defaults that point at an enum
 * member carry this object, which is how the backing enum is recovered.
 */
export class EnumMember {
  constructor(
    public readonly enumType: ChoiceEnum,
    public readonly name: string,
    public readonly value: ChoiceValue,
    public readonly label: string,
  ) {}
}

/**
 * Strongly-typed enumeration declared next to the source models.
 */
export class ChoiceEnum {
  readonly valueType: EnumValueType;
  private readonly byName = new Map<string, EnumMember>();

  constructor(
    public readonly name: string,
    public readonly module: string,
    members: Record<string, ChoiceValue | { value: ChoiceValue; label?: string }>,
  ) {
    for (const [key, entry] of Object.entries(members)) {
      const value = typeof entry === "object" ? entry.value : entry;
      const label = typeof entry === "object" && entry.label ? entry.label : key;
      this.byName.set(key, new EnumMember(this, key, value, label));
    }
    this.valueType = this.members().every((m) => typeof m.value === "number")
      ? "integer"
      : "string";
  }

  member(name: string): EnumMember | undefined {
    return this.byName.get(name);
  }

  members(): EnumMember[] {
    return Array.from(this.byName.values());
  }

  values(): ChoiceValue[] {
    return this.members().map((m) => m.value);
  }

  choices(): Choice[] {
    return this.members().map((m) => [m.value, m.label] as const);
  }
}

export interface SourceRelation {
  /** Target model. An identity handle, not owned by the field. */
  readonly model: SourceModel | null;
  /** Deletion behaviour tag, e.g. `CASCADE`, `PROTECT`, `DO_NOTHING`. */
  readonly onDelete: string | null;
  readonly relatedName: string | null;
  /** Referenced field on the target; the target's primary key when null. */
  readonly toField: string | null;
  readonly through: SourceModel | null;
  readonly throughTable: string | null;
}

export interface SourceField {
  readonly name: string;
  /** Field kind tag, e.g. `CharField`, `ForeignKey`. */
  readonly kind: string;
  /** Model that declares the field. */
  readonly model: SourceModel;
  /** Physical column; null for fields without one (many-to-many, reverse). */
  readonly column: string | null;
  readonly concrete: boolean;
  readonly manyToMany: boolean;
  /** Reverse side of a relation declared on another model. */
  readonly reverse: boolean;
  readonly primaryKey: boolean;
  readonly null: boolean;
  readonly unique: boolean;
  readonly dbIndex: boolean;
  readonly hasDefault: boolean;
  readonly default: unknown;
  readonly maxLength: number | null;
  readonly maxDigits: number | null;
  readonly decimalPlaces: number | null;
  readonly choices: readonly Choice[] | null;
  readonly relation: SourceRelation | null;
}

export interface SourceModelMeta {
  readonly appLabel: string;
  /** Declared class name, e.g. `BlogPost`. */
  readonly objectName: string;
  /** Lower-cased model name, e.g. `blogpost`. */
  readonly modelName: string;
  /** Module the declaration lives in; enum imports in generated code point here. */
  readonly module: string;
  readonly dbTable: string;
  readonly abstract: boolean;
  readonly proxy: boolean;
  readonly managed: boolean;
  readonly uniqueTogether: readonly (readonly string[])[];
  readonly pkName: string | null;
}

export interface SourceModel {
  readonly meta: SourceModelMeta;
  getFields(): readonly SourceField[];
}

/**
 * Registry of every declared model, in declaration order.
 */
export interface SourceSchema {
  getModels(): readonly SourceModel[];
}

export function modelLabel(model: SourceModel): string {
  return `${model.meta.appLabel}.${model.meta.objectName}`;
}
