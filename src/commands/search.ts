import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { formatSearchResponse } from "../utils/format.js";
import { outputJson } from "../utils/json-output.js";
import { createEngine, globalOptions, reportError } from "./context.js";

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return limit;
}

export function registerSearchCommand(program: Command): void {
  program
    .command("search")
    .argument("<query>", "search text")
    .description("Search design guidelines across domains or a stack")
    .option("-d, --domain <domain>", "search this domain instead of detecting one")
    .option("-s, --stack <stack>", "search a stack's guidelines")
    .option("-n, --limit <n>", "maximum number of results", parseLimit)
    .option("--no-brand", "skip brand post-processing")
    .action(
      async (
        query: string,
        options: { domain?: string; stack?: string; limit?: number; brand: boolean },
      ) => {
        const global = globalOptions(program);

        try {
          const engine = createEngine(global);
          const response = await engine.search({
            text: query,
            domain: options.domain,
            stack: options.stack,
            limit: options.limit,
            applyBrand: options.brand,
          });

          if (global.json) {
            outputJson({ success: true, command: "search", ...response });
          } else if (response.count === 0) {
            console.log(chalk.yellow(`No guidelines matching "${query}" in ${response.domain}.`));
          } else {
            console.log(formatSearchResponse(response));
          }
        } catch (err) {
          reportError("search", err, global.json);
        }
      },
    );
}
