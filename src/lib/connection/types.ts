/**
 * Connection module types
 */

import type { NodePgDatabase } from "drizzle-orm/node-postgres";
import type { PoolOverrides, TargetDriver } from "../../types/config.js";

/**
 * Resolved settings for one connection alias.
 */
export interface TargetConnectionConfig extends PoolOverrides {
  alias: string;
  driver: TargetDriver;
  host: string;
  port: number;
  database: string;
  user?: string;
  password?: string;
}

/**
 * Everything the gate needs to bootstrap the target connections.
 */
export interface TargetConfig {
  connections: Record<string, TargetConnectionConfig>;
  /** Target namespace the mirrored tables are registered under. */
  appName: string;
}

/**
 * An open target connection.
 */
export interface MirrorConnection {
  alias: string;
  db: NodePgDatabase;
  close(): Promise<void>;
}

/**
 * Opens one connection. Swapped for a fake in tests.
 */
export type Connector = (config: TargetConnectionConfig) => Promise<MirrorConnection>;
