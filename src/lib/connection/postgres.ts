/**
 * node-postgres connector: one pg Pool per alias, wrapped by drizzle
 */

import pg from "pg";
import { drizzle } from "drizzle-orm/node-postgres";
import type { Connector, TargetConnectionConfig } from "./types.js";
import { logger } from "../../utils/logger.js";

const ALREADY_ENDED = "Called end on pool more than once";

export function poolOptions(config: TargetConnectionConfig): pg.PoolConfig {
  return {
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    max: config.max,
    min: config.min,
    idleTimeoutMillis: config.idleTimeoutMillis,
    connectionTimeoutMillis: config.connectionTimeoutMillis,
    ssl: config.ssl,
    application_name: config.application_name,
  };
}

/**
 * End a pool; a pool that was already ended counts as closed.
 */
export async function closePool(pool: pg.Pool, alias: string): Promise<void> {
  try {
    await pool.end();
  } catch (error) {
    if (error instanceof Error && error.message.includes(ALREADY_ENDED)) {
      logger.debug("Pool already closed", { alias });
      return;
    }
    throw error;
  }
}

/**
 * Open a pool and check it with a round trip before handing it out.
 */
export const connectPostgres: Connector = async (config) => {
  const pool = new pg.Pool(poolOptions(config));
  try {
    await pool.query("select 1");
  } catch (error) {
    await closePool(pool, config.alias);
    throw error;
  }

  logger.info("Connected", {
    alias: config.alias,
    host: config.host,
    database: config.database,
  });
  return {
    alias: config.alias,
    db: drizzle(pool),
    close: () => closePool(pool, config.alias),
  };
};
