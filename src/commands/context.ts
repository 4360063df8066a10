import type { Command } from "commander";
import chalk from "chalk";
import { resolveConfigDir } from "../utils/config.js";
import { GuidelineEngine } from "../utils/engine.js";
import { errorMessage } from "../utils/errors.js";
import { outputJsonError } from "../utils/json-output.js";
import { ConsoleLogger } from "../utils/logger.js";

export interface GlobalOptions {
  json: boolean;
  verbose: boolean;
  configDir: string;
}

export function globalOptions(program: Command): GlobalOptions {
  const opts = program.opts<{ json?: boolean; verbose?: boolean; config?: string }>();
  return {
    json: opts.json === true,
    verbose: opts.verbose === true,
    configDir: resolveConfigDir(opts.config),
  };
}

export function createEngine(options: GlobalOptions): GuidelineEngine {
  return new GuidelineEngine({
    configPath: options.configDir,
    logger: new ConsoleLogger({ verbose: options.verbose }),
  });
}

export function reportError(command: string, err: unknown, jsonMode: boolean): void {
  if (jsonMode) {
    outputJsonError(command, err);
  } else {
    console.error(chalk.red(`Error: ${errorMessage(err)}`));
  }
  process.exitCode = 1;
}
