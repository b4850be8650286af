/**
 * Configuration types for schema-mirror
 */

import type { LogLevel } from "../utils/logger.js";

/**
 * Target connection kinds drizzle can be bootstrapped with.
 */
export type TargetDriver = "node-postgres";

export const TARGET_DRIVERS: readonly TargetDriver[] = ["node-postgres"];

/**
 * DatabaseConfig - one physical database as the source framework sees it
 */
export interface DatabaseConfig {
  engine: string;
  name?: string;
  host?: string;
  port?: number | string;
  user?: string;
  password?: string;
}

/**
 * PoolOverrides - node-postgres pool settings applied per connection alias
 */
export interface PoolOverrides {
  max?: number;
  min?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
  ssl?: boolean;
  application_name?: string;
}

/**
 * MirrorConfig - everything the mirror reads at startup
 */
export interface MirrorConfig {
  /** `null` mirrors every model; `[]` mirrors none. */
  includeModels: string[] | null;
  /** Glob patterns over `app.Model` labels; always wins over includeModels. */
  excludeModels: string[] | null;
  /** Extra or replacement source engine → target driver entries. */
  engineMap: Record<string, TargetDriver>;
  /** Routes custom source kinds to a kind that has a converter. */
  fieldKindMap: Record<string, string>;
  connectionPool: Record<string, PoolOverrides>;
  databases: Record<string, DatabaseConfig>;
  /** Target namespace recorded in every mirror's metadata block. */
  appName: string;
  classNameSuffix: string;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: MirrorConfig = {
  includeModels: null,
  excludeModels: null,
  engineMap: {},
  fieldKindMap: {},
  connectionPool: {},
  databases: {},
  appName: "mirror",
  classNameSuffix: "Table",
  logLevel: "warn",
};
