import { Command } from "commander";
import { formatTables } from "../utils/format.js";
import { outputJson } from "../utils/json-output.js";
import { createEngine, globalOptions, reportError } from "./context.js";

export function registerDomainsCommand(program: Command): void {
  program
    .command("domains")
    .description("List searchable domains and stacks")
    .action(async () => {
      const options = globalOptions(program);

      try {
        const listing = await createEngine(options).tables();
        if (options.json) {
          outputJson({ success: true, command: "domains", ...listing });
        } else {
          console.log(formatTables(listing));
        }
      } catch (err) {
        reportError("domains", err, options.json);
      }
    });
}
