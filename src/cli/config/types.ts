/**
 * CLI configuration types
 */

import type { MirrorConfig } from "../../types/config.js";

/**
 * Configuration file contents; any key may be left out.
 */
export type MirrorConfigFile = Partial<MirrorConfig>;

/**
 * Options of the `generate` command (from commander)
 */
export interface GenerateCommandOptions {
  schema: string;
  config?: string;
  outputDir: string;
  appLabel?: string[];
  appName?: string;
  include?: string[];
  exclude?: string[];
  logLevel?: string;
}

/**
 * JSON summary printed by `generate`
 */
export interface GenerateSummary {
  status: "success";
  phase: "generate";
  models: string[];
  skipped: Array<{ label: string; reason: string }>;
  files: string[];
}
