/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import type { MirrorConfigFile } from "./types.js";
import { validateMirrorConfig } from "../../utils/config-loader.js";
import { ConfigError, errorMessage } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): MirrorConfigFile {
  logger.info("Parsing configuration file", { filePath });

  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");
  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
      { filePath },
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  let data: unknown;
  try {
    data = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse config file: ${filePath}: ${errorMessage(error)}`,
      { filePath },
      { cause: error },
    );
  }

  const config = validateMirrorConfig(data);
  logger.info("Configuration file parsed successfully", {
    keys: Object.keys(config),
  });
  return config;
}
