/**
 * Target connection configuration built from the source database settings
 */

import type {
  DatabaseConfig,
  MirrorConfig,
  TargetDriver,
} from "../../types/config.js";
import type { TargetConfig, TargetConnectionConfig } from "./types.js";
import { ConfigError, UnsupportedBackendError } from "../../utils/errors.js";

export const DEFAULT_ENGINE_MAP: Readonly<Record<string, TargetDriver>> = {
  postgresql: "node-postgres",
  postgres: "node-postgres",
  "django.db.backends.postgresql": "node-postgres",
};

export const DEFAULT_HOST = "localhost";
export const DEFAULT_PORT = 5432;

function parsePort(alias: string, port: DatabaseConfig["port"]): number {
  if (port === undefined || port === "") {
    return DEFAULT_PORT;
  }
  const parsed = typeof port === "number" ? port : Number.parseInt(port, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`Invalid port for database '${alias}': ${String(port)}`, {
      alias,
      port,
    });
  }
  return parsed;
}

/**
 * Translate every configured database into a target connection.
 *
 * @throws UnsupportedBackendError when an engine has no target driver
 */
export function buildTargetConfig(
  config: Pick<MirrorConfig, "databases" | "engineMap" | "connectionPool" | "appName">,
): TargetConfig {
  const engineMap: Record<string, TargetDriver> = {
    ...DEFAULT_ENGINE_MAP,
    ...config.engineMap,
  };

  const connections: Record<string, TargetConnectionConfig> = {};
  for (const [alias, database] of Object.entries(config.databases)) {
    const driver = engineMap[database.engine];
    if (driver === undefined) {
      const supported = Object.keys(engineMap).sort();
      throw new UnsupportedBackendError(
        `Database '${alias}' uses unsupported engine '${database.engine}'. Supported engines: ${supported.join(", ")}`,
        { alias, engine: database.engine, supported },
      );
    }

    connections[alias] = {
      alias,
      driver,
      host: database.host || DEFAULT_HOST,
      port: parsePort(alias, database.port),
      database: database.name ?? "",
      ...(database.user !== undefined ? { user: database.user } : {}),
      ...(database.password !== undefined ? { password: database.password } : {}),
      ...config.connectionPool[alias],
    };
  }

  return { connections, appName: config.appName };
}
