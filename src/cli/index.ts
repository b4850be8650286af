#!/usr/bin/env node

/**
 * schema-mirror CLI - generate drizzle table modules from source models
 */

import { Command } from "commander";
import { createGenerateCommand } from "./commands/generate.js";
import { errorMessage } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

const pkg = {
  name: "schema-mirror",
  version: "0.1.0",
  description: "Mirror source ORM models as drizzle pg-core tables",
};

/**
 * Main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program.name(pkg.name).description(pkg.description).version(pkg.version);
  program.addCommand(createGenerateCommand());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = errorMessage(error);
  logger.error("Unexpected error", { error: message });
  console.error(
    JSON.stringify(
      {
        status: "error",
        error: {
          code: "UNEXPECTED_ERROR",
          message,
        },
      },
      null,
      2,
    ),
  );
  process.exit(1);
});
