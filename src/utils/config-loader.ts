/**
 * Configuration loader for MirrorConfig
 */

import {
  DEFAULT_CONFIG,
  TARGET_DRIVERS,
  type DatabaseConfig,
  type MirrorConfig,
  type PoolOverrides,
  type TargetDriver,
} from "../types/config.js";
import { ConfigError } from "./errors.js";
import { isLogLevel, logger } from "./logger.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isTargetDriver(value: unknown): value is TargetDriver {
  return TARGET_DRIVERS.some((driver) => driver === value);
}

function stringList(value: unknown, key: string): string[] | null {
  if (value === null) {
    return null;
  }
  if (!Array.isArray(value)) {
    throw new ConfigError(`'${key}' must be a list of patterns or null`, { key });
  }
  return value.map((entry: unknown) => {
    if (typeof entry !== "string") {
      throw new ConfigError(`'${key}' entries must be strings`, { key });
    }
    return entry;
  });
}

function stringMap(value: unknown, key: string): Record<string, string> {
  if (!isRecord(value)) {
    throw new ConfigError(`'${key}' must be a mapping`, { key });
  }
  const result: Record<string, string> = {};
  for (const [name, entry] of Object.entries(value)) {
    if (typeof entry !== "string") {
      throw new ConfigError(`'${key}.${name}' must be a string`, { key, name });
    }
    result[name] = entry;
  }
  return result;
}

function engineMap(value: unknown): Record<string, TargetDriver> {
  const result: Record<string, TargetDriver> = {};
  for (const [engine, driver] of Object.entries(stringMap(value, "engineMap"))) {
    if (!isTargetDriver(driver)) {
      throw new ConfigError(
        `'engineMap.${engine}' names unknown driver '${driver}'. Known drivers: ${TARGET_DRIVERS.join(", ")}`,
        { engine, driver },
      );
    }
    result[engine] = driver;
  }
  return result;
}

function optionalNumber(record: Record<string, unknown>, key: string, where: string): number | undefined {
  const value = record[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number" || Number.isNaN(value)) {
    throw new ConfigError(`'${where}.${key}' must be a number`, { key: `${where}.${key}` });
  }
  return value;
}

function optionalText(record: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = record[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ConfigError(`'${where}.${key}' must be a string`, { key: `${where}.${key}` });
  }
  return value;
}

function poolOverrides(value: unknown): Record<string, PoolOverrides> {
  if (!isRecord(value)) {
    throw new ConfigError("'connectionPool' must be a mapping", { key: "connectionPool" });
  }
  const result: Record<string, PoolOverrides> = {};
  for (const [alias, raw] of Object.entries(value)) {
    const where = `connectionPool.${alias}`;
    if (!isRecord(raw)) {
      throw new ConfigError(`'${where}' must be a mapping`, { key: where });
    }
    if (raw.ssl !== undefined && typeof raw.ssl !== "boolean") {
      throw new ConfigError(`'${where}.ssl' must be a boolean`, { key: `${where}.ssl` });
    }
    result[alias] = {
      max: optionalNumber(raw, "max", where),
      min: optionalNumber(raw, "min", where),
      idleTimeoutMillis: optionalNumber(raw, "idleTimeoutMillis", where),
      connectionTimeoutMillis: optionalNumber(raw, "connectionTimeoutMillis", where),
      ssl: raw.ssl,
      application_name: optionalText(raw, "application_name", where),
    };
  }
  return result;
}

function databases(value: unknown): Record<string, DatabaseConfig> {
  if (!isRecord(value)) {
    throw new ConfigError("'databases' must be a mapping", { key: "databases" });
  }
  const result: Record<string, DatabaseConfig> = {};
  for (const [alias, raw] of Object.entries(value)) {
    const where = `databases.${alias}`;
    if (!isRecord(raw) || typeof raw.engine !== "string") {
      throw new ConfigError(`'${where}' needs an 'engine'`, { key: where });
    }
    const port = raw.port;
    if (port !== undefined && typeof port !== "number" && typeof port !== "string") {
      throw new ConfigError(`'${where}.port' must be a number or string`, { key: `${where}.port` });
    }
    result[alias] = {
      engine: raw.engine,
      name: optionalText(raw, "name", where),
      host: optionalText(raw, "host", where),
      port,
      user: optionalText(raw, "user", where),
      password: optionalText(raw, "password", where),
    };
  }
  return result;
}

/**
 * Validate a parsed configuration document. Unknown keys are ignored with
 * a warning.
 */
export function validateMirrorConfig(data: unknown): Partial<MirrorConfig> {
  if (data === null || data === undefined) {
    return {};
  }
  if (!isRecord(data)) {
    throw new ConfigError("Configuration must be a mapping");
  }

  const config: Partial<MirrorConfig> = {};
  for (const [key, value] of Object.entries(data)) {
    switch (key) {
      case "includeModels":
        config.includeModels = stringList(value, key);
        break;
      case "excludeModels":
        config.excludeModels = stringList(value, key);
        break;
      case "engineMap":
        config.engineMap = engineMap(value);
        break;
      case "fieldKindMap":
        config.fieldKindMap = stringMap(value, key);
        break;
      case "connectionPool":
        config.connectionPool = poolOverrides(value);
        break;
      case "databases":
        config.databases = databases(value);
        break;
      case "appName":
      case "classNameSuffix":
        if (typeof value !== "string") {
          throw new ConfigError(`'${key}' must be a string`, { key });
        }
        config[key] = value;
        break;
      case "logLevel":
        if (!isLogLevel(value)) {
          throw new ConfigError(`'logLevel' must be one of error, warn, info, debug`, { key });
        }
        config.logLevel = value;
        break;
      default:
        logger.warn(`Ignoring unknown configuration key '${key}'`);
    }
  }
  return config;
}

/**
 * Merge configuration layers over the defaults. Later layers win, key by
 * key; undefined values do not override.
 */
export function loadMirrorConfig(
  ...layers: Array<Partial<MirrorConfig> | undefined>
): MirrorConfig {
  const merged: MirrorConfig = { ...DEFAULT_CONFIG };
  for (const layer of layers) {
    if (layer === undefined) {
      continue;
    }
    const defined = Object.fromEntries(
      Object.entries(layer).filter(([, value]) => value !== undefined),
    );
    Object.assign(merged, defined);
  }

  if (merged.appName.length === 0) {
    throw new ConfigError("'appName' must not be empty", { key: "appName" });
  }
  return merged;
}
