/**
 * Live renderer - builds drizzle tables in memory
 */

import { getTableColumns } from "drizzle-orm";
import { PgColumn, pgTable, unique } from "drizzle-orm/pg-core";
import type { SourceModel } from "../../types/source-schema.js";
import type { ModelPlan, ModelRenderer } from "../generator/types.js";
import {
  convertField,
  convertRelationField,
} from "../type-mapping/columns.js";
import type {
  ColumnBuilder,
  RelationDescriptor,
} from "../type-mapping/types.js";
import { planFields, retainUniqueTogether } from "./fields.js";
import type { MirrorModel } from "./types.js";
import { SchemaError } from "../../utils/errors.js";

/**
 * Tables built in one Pass-2 round, by class name. Relation columns resolve
 * their targets here lazily, so declaration order does not matter.
 */
export class LiveRound {
  private readonly models = new Map<string, MirrorModel>();

  add(model: MirrorModel): void {
    this.models.set(model.className, model);
  }

  get(className: string): MirrorModel | undefined {
    return this.models.get(className);
  }

  /**
   * Deferred lookup of `<className>.<key>`.
   */
  column(className: string, key: string): () => PgColumn {
    return () => {
      const target = this.models.get(className);
      if (target === undefined) {
        throw new SchemaError(`Table ${className} was not materialized`, {
          className,
        });
      }
      const columns: Record<string, unknown> = getTableColumns(target.table);
      const column = columns[key];
      if (!(column instanceof PgColumn)) {
        throw new SchemaError(`Table ${className} has no column '${key}'`, {
          className,
          column: key,
        });
      }
      return column;
    };
  }
}

/**
 * Build the live mirror of one model, or null when no data field converts.
 */
export function buildMirrorModel(
  model: ModelPlan,
  classNames: ReadonlyMap<SourceModel, string>,
  round: LiveRound,
  appName: string,
): MirrorModel | null {
  const columns: Record<string, ColumnBuilder> = {};
  const relations: Record<string, RelationDescriptor> = {};
  const fieldNames: string[] = [];
  let dataFields = 0;

  for (const plan of planFields(model, classNames)) {
    const info = plan.info;
    if (plan.kind === "data") {
      const column = convertField(info);
      if (column === null) {
        continue;
      }
      columns[info.name] = column;
      fieldNames.push(info.name);
      dataFields++;
      continue;
    }

    const converted = convertRelationField(info, {
      className: plan.targetClassName,
      column: round.column(plan.targetClassName, info.relatedFieldName ?? "id"),
    });
    if (converted === null) {
      continue;
    }
    relations[info.name] = converted.descriptor;
    if (converted.column !== null) {
      columns[info.name] = converted.column;
    }
    fieldNames.push(info.name);
  }

  if (dataFields === 0) {
    return null;
  }

  const uniqueTogether = retainUniqueTogether(model, new Set(Object.keys(columns)));
  const table = pgTable(model.info.dbTable, columns, (t) =>
    uniqueTogether.flatMap((group) => {
      const [first, ...rest] = group.map((name) => t[name]);
      return first === undefined ? [] : [unique().on(first, ...rest)];
    }),
  );

  const mirror: MirrorModel = {
    className: model.className,
    label: model.label,
    table,
    meta: {
      table: model.info.dbTable,
      app: appName,
      uniqueTogether,
      relations,
    },
    fieldNames,
  };
  round.add(mirror);
  return mirror;
}

/**
 * Round factory for `materializeModels`.
 */
export function liveRenderer(appName: string): () => ModelRenderer<MirrorModel> {
  return () => {
    const round = new LiveRound();
    return (model, classNames) => buildMirrorModel(model, classNames, round, appName);
  };
}
