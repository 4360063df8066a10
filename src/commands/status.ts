import { Command } from "commander";
import chalk from "chalk";
import { formatStatus } from "../utils/format.js";
import { outputJson } from "../utils/json-output.js";
import { createEngine, globalOptions, reportError } from "./context.js";

export function registerStatusCommand(program: Command): void {
  program
    .command("status")
    .description("Show what external configuration loaded")
    .action(async () => {
      const options = globalOptions(program);

      try {
        const status = await createEngine(options).status();

        if (options.json) {
          outputJson({ success: true, command: "status", ...status });
          return;
        }

        const text = formatStatus(status);
        if (status.health === "error") {
          console.log(chalk.red(text));
        } else if (status.health === "warning") {
          console.log(chalk.yellow(text));
        } else {
          console.log(text);
        }
      } catch (err) {
        reportError("status", err, options.json);
      }
    });
}
