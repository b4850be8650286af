import { Command } from "commander";
import { mkdirSync, writeFileSync } from "fs";
import { join, resolve } from "path";
import { SchemaMirror } from "../../lib/mirror/index.js";
import { loadSourceSchema } from "../../lib/source/manifest.js";
import type { MirrorConfig } from "../../types/config.js";
import {
  FileIOError,
  SchemaMirrorError,
  ErrorCode,
  errorMessage,
} from "../../utils/errors.js";
import { isLogLevel, logger } from "../../utils/logger.js";
import { loadMirrorConfig } from "../../utils/config-loader.js";

import { parseConfigFile } from "../config/parser.js";
import type {
  GenerateCommandOptions,
  GenerateSummary,
  MirrorConfigFile,
} from "../config/types.js";

/**
 * Merge CLI options with config file (CLI options take precedence)
 */
export function mergeGenerateConfig(
  options: GenerateCommandOptions,
  configFile?: MirrorConfigFile,
): MirrorConfig {
  const cliConfig: Partial<MirrorConfig> = {
    appName: options.appName,
    includeModels: options.include,
    excludeModels: options.exclude,
    logLevel: isLogLevel(options.logLevel) ? options.logLevel : undefined,
  };
  return loadMirrorConfig(configFile, cliConfig);
}

/**
 * Write one module per app into the output directory.
 */
export function runGenerate(options: GenerateCommandOptions): GenerateSummary {
  const configFile = options.config ? parseConfigFile(options.config) : undefined;
  const config = mergeGenerateConfig(options, configFile);
  logger.setLevel(config.logLevel);

  const schema = loadSourceSchema(options.schema);
  const mirror = new SchemaMirror({ config });
  const result = mirror.generateSource(schema, { appLabels: options.appLabel });

  const outputDir = resolve(options.outputDir);
  const files: string[] = [];
  try {
    mkdirSync(outputDir, { recursive: true });
    for (const module of result.modules) {
      const filePath = join(outputDir, module.fileName);
      writeFileSync(filePath, module.content, "utf-8");
      logger.info("Wrote module", { filePath, models: module.models.length });
      files.push(filePath);
    }
  } catch (error) {
    throw new FileIOError(
      `Failed to write generated modules to ${outputDir}`,
      { outputDir },
      { cause: error },
    );
  }

  return {
    status: "success",
    phase: "generate",
    models: result.modules.flatMap((m) => m.models),
    skipped: [...result.skipped, ...result.failed],
    files,
  };
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Create generate command
 * @returns Commander Command
 */
export function createGenerateCommand(): Command {
  return new Command("generate")
    .description("Generate drizzle table modules from a source schema manifest")
    .requiredOption("--schema <path>", "Path to the schema manifest (JSON/YAML)")
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .option("--output-dir <dir>", "Directory for the generated modules", "./generated")
    .option("--app-label <label>", "Only generate this app (repeatable)", collect)
    .option("--app-name <name>", "Target namespace recorded in each table's metadata")
    .option("--include <pattern>", "Model label glob to include (repeatable)", collect)
    .option("--exclude <pattern>", "Model label glob to exclude (repeatable)", collect)
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug")
    .action((opts: GenerateCommandOptions) => {
      try {
        const summary = runGenerate(opts);
        console.log(JSON.stringify(summary, null, 2));
      } catch (error) {
        const failure =
          error instanceof SchemaMirrorError
            ? error
            : new SchemaMirrorError(ErrorCode.GENERAL_ERROR, errorMessage(error), undefined, {
                cause: error,
              });
        logger.error("Generate command error", { error: failure.message });
        console.error(JSON.stringify(failure.toResponse("generate"), null, 2));
        process.exit(1);
      }
    });
}
