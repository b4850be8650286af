/**
 * Registry module - bidirectional source ↔ mirror lookup
 */

import type { SourceModel } from "../../types/source-schema.js";
import type { MirrorModel } from "../materializer/types.js";

export interface RegistryEntry {
  source: SourceModel;
  target: MirrorModel;
  label: string;
}

/**
 * Source → mirror and mirror → source are kept as exact inverses, with the
 * `app.ObjectName` label as a unique secondary key. Owned by one
 * SchemaMirror; nothing here is process-global.
 */
export class ModelRegistry {
  private readonly targets = new Map<SourceModel, MirrorModel>();
  private readonly sources = new Map<MirrorModel, SourceModel>();
  private readonly byLabel = new Map<string, RegistryEntry>();
  private readonly labels = new Map<SourceModel, string>();

  /**
   * Register a pair. Any earlier pair sharing the source, the target or the
   * label is removed first.
   */
  register(source: SourceModel, target: MirrorModel, label: string): void {
    this.unregister(source);
    const previousSource = this.sources.get(target);
    if (previousSource !== undefined) {
      this.unregister(previousSource);
    }
    const previousEntry = this.byLabel.get(label);
    if (previousEntry !== undefined) {
      this.unregister(previousEntry.source);
    }

    this.targets.set(source, target);
    this.sources.set(target, source);
    this.byLabel.set(label, { source, target, label });
    this.labels.set(source, label);
  }

  private unregister(source: SourceModel): void {
    const target = this.targets.get(source);
    if (target !== undefined) {
      this.sources.delete(target);
    }
    const label = this.labels.get(source);
    if (label !== undefined) {
      this.byLabel.delete(label);
    }
    this.targets.delete(source);
    this.labels.delete(source);
  }

  getTarget(source: SourceModel): MirrorModel | undefined {
    return this.targets.get(source);
  }

  getSource(target: MirrorModel): SourceModel | undefined {
    return this.sources.get(target);
  }

  getByLabel(label: string): RegistryEntry | undefined {
    return this.byLabel.get(label);
  }

  getAllTargets(): MirrorModel[] {
    return Array.from(this.targets.values());
  }

  getAllMappings(): RegistryEntry[] {
    return Array.from(this.byLabel.values());
  }

  isRegistered(source: SourceModel): boolean {
    return this.targets.has(source);
  }

  get size(): number {
    return this.targets.size;
  }

  clear(): void {
    this.targets.clear();
    this.sources.clear();
    this.byLabel.clear();
    this.labels.clear();
  }
}
