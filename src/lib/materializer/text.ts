/**
 * Text renderer - emits drizzle table declarations as TypeScript source
 */

import type { SourceModel } from "../../types/source-schema.js";
import type { ModelPlan, ModelRenderer } from "../generator/types.js";
import {
  renderFieldSource,
  renderRelationSource,
} from "../type-mapping/sources.js";
import { PG_CORE } from "../type-mapping/semantics.js";
import type {
  ImportSpec,
  RelationDescriptor,
} from "../type-mapping/types.js";
import { planFields, retainUniqueTogether } from "./fields.js";
import type { ModelSourceResult } from "./types.js";

export const GENERATED_HEADER =
  "// Auto-generated by schema-mirror. Do not edit manually.";

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

function propertyKey(name: string): string {
  return IDENTIFIER.test(name) ? name : JSON.stringify(name);
}

function propertyAccess(target: string, name: string): string {
  return IDENTIFIER.test(name) ? `${target}.${name}` : `${target}[${JSON.stringify(name)}]`;
}

/**
 * Module specifier of the generated module for an app.
 */
export function appModulePath(appLabel: string): string {
  return `./${appLabel}.js`;
}

function renderDescriptor(descriptor: RelationDescriptor): string {
  const relatedName =
    descriptor.relatedName === false ? "false" : JSON.stringify(descriptor.relatedName);
  const through = descriptor.through === null ? "null" : JSON.stringify(descriptor.through);
  return (
    `{ kind: ${JSON.stringify(descriptor.kind)}, target: ${JSON.stringify(descriptor.target)}, ` +
    `references: ${JSON.stringify(descriptor.references)}, onDelete: ${JSON.stringify(descriptor.onDelete)}, ` +
    `relatedName: ${relatedName}, through: ${through} }`
  );
}

/**
 * Render one model as source text, or null when no data field converts.
 */
export function renderModelSource(
  model: ModelPlan,
  classNames: ReadonlyMap<SourceModel, string>,
  appName: string,
): ModelSourceResult | null {
  const appLabel = model.info.appLabel;
  const imports: ImportSpec[] = [{ module: PG_CORE, name: "pgTable" }];
  const preamble: string[] = [];
  const lines: string[] = [];
  const relations: Array<[string, RelationDescriptor]> = [];
  const columns = new Set<string>();
  const fieldNames: string[] = [];
  let dataFields = 0;

  for (const plan of planFields(model, classNames)) {
    const info = plan.info;
    if (plan.kind === "data") {
      const source = renderFieldSource(info);
      if (source === null) {
        lines.push(`  // Skipped unsupported field: ${info.name}`);
        continue;
      }
      imports.push(...source.imports);
      preamble.push(...(source.preamble ?? []));
      const comment = source.comment ? ` // ${source.comment}` : "";
      lines.push(`  ${propertyKey(info.name)}: ${source.expression},${comment}`);
      columns.add(info.name);
      fieldNames.push(info.name);
      dataFields++;
      continue;
    }

    const rendered = renderRelationSource(info, plan.targetClassName);
    if (rendered === null) {
      continue;
    }
    relations.push([info.name, rendered.descriptor]);
    fieldNames.push(info.name);
    if (rendered.source === null) {
      continue;
    }
    imports.push(...rendered.source.imports);
    preamble.push(...(rendered.source.preamble ?? []));
    if (plan.target.meta.appLabel !== appLabel) {
      imports.push({
        module: appModulePath(plan.target.meta.appLabel),
        name: plan.targetClassName,
      });
    }
    lines.push(`  ${propertyKey(info.name)}: ${rendered.source.expression},`);
    columns.add(info.name);
  }

  if (dataFields === 0) {
    return null;
  }

  const uniqueTogether = retainUniqueTogether(model, columns);
  const table = JSON.stringify(model.info.dbTable);
  const code: string[] = [`export const ${model.className} = pgTable(${table}, {`, ...lines];
  if (uniqueTogether.length > 0) {
    imports.push({ module: PG_CORE, name: "unique" });
    const constraints = uniqueTogether.map(
      (group) =>
        `unique().on(${group.map((name) => propertyAccess("table", name)).join(", ")})`,
    );
    code.push(`}, (table) => [${constraints.join(", ")}]);`);
  } else {
    code.push("});");
  }

  code.push("");
  code.push(`export const ${model.className}Meta = {`);
  code.push(`  table: ${table},`);
  code.push(`  app: ${JSON.stringify(appName)},`);
  code.push(`  uniqueTogether: ${JSON.stringify(uniqueTogether)},`);
  if (relations.length === 0) {
    code.push("  relations: {},");
  } else {
    code.push("  relations: {");
    for (const [name, descriptor] of relations) {
      code.push(`    ${propertyKey(name)}: ${renderDescriptor(descriptor)},`);
    }
    code.push("  },");
  }
  code.push("} as const;");

  return {
    className: model.className,
    label: model.label,
    appLabel,
    code: code.join("\n"),
    imports,
    preamble,
    fieldNames,
  };
}

/**
 * Round factory for `materializeModels`. Text rendering keeps no state
 * between models.
 */
export function textRenderer(appName: string): () => ModelRenderer<ModelSourceResult> {
  return () => (model, classNames) => renderModelSource(model, classNames, appName);
}

/**
 * Merge imports per module: sorted modules, sorted names, `type` only when
 * every use of the name is type-only.
 */
export function renderImports(imports: readonly ImportSpec[]): string[] {
  const byModule = new Map<string, Map<string, boolean>>();
  for (const spec of imports) {
    const names = byModule.get(spec.module) ?? new Map<string, boolean>();
    const typeOnly = spec.typeOnly === true && (names.get(spec.name) ?? true);
    names.set(spec.name, typeOnly);
    byModule.set(spec.module, names);
  }

  return [...byModule.keys()].sort().map((module) => {
    const names = byModule.get(module) ?? new Map<string, boolean>();
    const specifiers = [...names.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([name, typeOnly]) => (typeOnly ? `type ${name}` : name));
    return `import { ${specifiers.join(", ")} } from ${JSON.stringify(module)};`;
  });
}

/**
 * Assemble one generated module from the models of a single app, in the
 * order given.
 */
export function renderAppModule(models: readonly ModelSourceResult[]): string {
  const imports = renderImports(models.flatMap((m) => m.imports));
  const preamble = [...new Set(models.flatMap((m) => m.preamble))];

  const sections: string[] = [GENERATED_HEADER];
  if (imports.length > 0) {
    sections.push(imports.join("\n"));
  }
  sections.push(...preamble);
  sections.push(...models.map((m) => m.code));
  return `${sections.join("\n\n")}\n`;
}
