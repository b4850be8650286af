/**
 * Mirror module - ties generation, registry and connections together
 */

import type { NodePgDatabase } from "drizzle-orm/node-postgres";
import type { MirrorConfig } from "../../types/config.js";
import type { SourceSchema } from "../../types/source-schema.js";
import { buildTargetConfig } from "../connection/config.js";
import { InitGate } from "../connection/gate.js";
import type { Connector } from "../connection/types.js";
import {
  materializeModels,
  planModels,
} from "../generator/index.js";
import type { GenerationPlan, SkippedModel } from "../generator/types.js";
import { liveRenderer } from "../materializer/live.js";
import { renderAppModule, textRenderer } from "../materializer/text.js";
import type { MirrorModel, ModelSourceResult } from "../materializer/types.js";
import { ModelRegistry } from "../registry/index.js";
import { loadMirrorConfig } from "../../utils/config-loader.js";
import { logger } from "../../utils/logger.js";

export interface SchemaMirrorOptions {
  config?: Partial<MirrorConfig>;
  /** Opens target connections; node-postgres when omitted. */
  connect?: Connector;
}

export interface GenerateOptions {
  /** Only these source namespaces. */
  appLabels?: readonly string[] | null;
}

export interface MirrorResult {
  models: MirrorModel[];
  skipped: SkippedModel[];
  failed: SkippedModel[];
}

export interface GeneratedModule {
  appLabel: string;
  fileName: string;
  content: string;
  /** Class names, in declaration order. */
  models: string[];
}

export interface SourceResult {
  modules: GeneratedModule[];
  skipped: SkippedModel[];
  failed: SkippedModel[];
}

/**
 * One mirror of a source schema: owns its registry and its init gate.
 */
export class SchemaMirror {
  readonly config: MirrorConfig;
  readonly registry = new ModelRegistry();
  readonly gate: InitGate;

  constructor(options: SchemaMirrorOptions = {}) {
    this.config = loadMirrorConfig(options.config);
    this.gate = new InitGate(buildTargetConfig(this.config), options.connect);
  }

  plan(schema: SourceSchema, options: GenerateOptions = {}): GenerationPlan {
    return planModels(schema, {
      includeModels: this.config.includeModels,
      excludeModels: this.config.excludeModels,
      appLabels: options.appLabels,
      classNameSuffix: this.config.classNameSuffix,
      fieldKindMap: this.config.fieldKindMap,
    });
  }

  /**
   * Build live mirrors for every eligible model and register them. The
   * registry is rebuilt from scratch on every call.
   */
  mirror(schema: SourceSchema, options: GenerateOptions = {}): MirrorResult {
    const plan = this.plan(schema, options);
    const result = materializeModels(plan, liveRenderer(this.config.appName));

    this.registry.clear();
    for (const { model, result: mirror } of result.rendered) {
      this.registry.register(model.info.identity, mirror, model.label);
    }

    logger.info("Mirrored models", {
      models: result.rendered.length,
      skipped: plan.skipped.length,
      failed: result.failed.length,
    });
    return {
      models: result.rendered.map((r) => r.result),
      skipped: plan.skipped,
      failed: result.failed,
    };
  }

  /**
   * Render every eligible model as source text, one module per app.
   */
  generateSource(schema: SourceSchema, options: GenerateOptions = {}): SourceResult {
    const plan = this.plan(schema, options);
    const result = materializeModels(plan, textRenderer(this.config.appName));

    const byApp = new Map<string, ModelSourceResult[]>();
    for (const { result: source } of result.rendered) {
      const models = byApp.get(source.appLabel) ?? [];
      models.push(source);
      byApp.set(source.appLabel, models);
    }

    const modules = Array.from(byApp, ([appLabel, models]) => ({
      appLabel,
      fileName: `${appLabel}.ts`,
      content: renderAppModule(models),
      models: models.map((m) => m.className),
    }));
    return { modules, skipped: plan.skipped, failed: result.failed };
  }

  /**
   * Drizzle database for a connection alias, opening connections on first
   * use.
   */
  async db(alias = "default"): Promise<NodePgDatabase> {
    await this.gate.ensureInitialized();
    return this.gate.getConnection(alias).db;
  }

  async close(): Promise<void> {
    await this.gate.close();
  }
}
