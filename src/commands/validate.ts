import { Command } from "commander";
import chalk from "chalk";
import { formatValidation } from "../utils/format.js";
import { outputJson } from "../utils/json-output.js";
import { createEngine, globalOptions, reportError } from "./context.js";

export function registerValidateCommand(program: Command): void {
  program
    .command("validate")
    .description("Validate external configuration files")
    .action(async () => {
      const options = globalOptions(program);

      try {
        const report = await createEngine(options).validate();

        if (options.json) {
          outputJson({
            success: report.valid,
            command: "validate",
            ...report,
          });
        } else {
          for (const line of formatValidation(report)) {
            console.error(line.startsWith("error") ? chalk.red(line) : chalk.yellow(line));
          }
          const summary = `${report.errors.length} errors, ${report.warnings.length + report.performance.length} warnings`;
          console.log(report.valid ? chalk.green(summary) : chalk.red(summary));
        }

        if (!report.valid) {
          process.exitCode = 1;
        }
      } catch (err) {
        reportError("validate", err, options.json);
      }
    });
}
