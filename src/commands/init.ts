import { existsSync } from "node:fs";
import { Command } from "commander";
import chalk from "chalk";
import { initConfigDir } from "../utils/config.js";
import { outputJson } from "../utils/json-output.js";
import { globalOptions, reportError } from "./context.js";

export function registerInitCommand(program: Command): void {
  program
    .command("init")
    .description("Create the external configuration directory")
    .action(async () => {
      const options = globalOptions(program);
      const alreadyExists = existsSync(options.configDir);

      try {
        const result = await initConfigDir(options.configDir);

        if (options.json) {
          outputJson({
            success: true,
            command: "init",
            path: result.path,
            created: result.created,
          });
        } else if (alreadyExists) {
          console.log(
            chalk.green(`Updated ${result.path}, filled in ${result.created.length} missing artifacts.`),
          );
        } else {
          console.log(chalk.green(`Initialized ${result.path}`));
        }
      } catch (err) {
        reportError("init", err, options.json);
      }
    });
}
