import { Command } from "commander";
import chalk from "chalk";
import { generateCssVariables } from "../utils/brand.js";
import { outputJson } from "../utils/json-output.js";
import { createEngine, globalOptions, reportError } from "./context.js";

export function registerBrandCommand(program: Command): void {
  program
    .command("brand")
    .description("Print the loaded brand profile as CSS custom properties")
    .action(async () => {
      const options = globalOptions(program);

      try {
        const { external } = await createEngine(options).current();
        const brand = external.brand;

        if (!brand) {
          if (options.json) {
            outputJson({ success: true, command: "brand", brand: null, css: null });
          } else {
            console.log(chalk.yellow(`No brand profile loaded from ${external.config_path}.`));
          }
          return;
        }

        const css = generateCssVariables(brand);
        if (options.json) {
          outputJson({ success: true, command: "brand", brand, css });
        } else {
          console.log(css);
        }
      } catch (err) {
        reportError("brand", err, options.json);
      }
    });
}
