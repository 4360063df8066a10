#!/usr/bin/env node

import { Command } from "commander";
import { registerInitCommand } from "./commands/init.js";
import { registerSearchCommand } from "./commands/search.js";
import { registerStatusCommand } from "./commands/status.js";
import { registerValidateCommand } from "./commands/validate.js";
import { registerDomainsCommand } from "./commands/domains.js";
import { registerBrandCommand } from "./commands/brand.js";

const program = new Command();

program
  .name("swatchbook")
  .description("Search design guidelines, with your project's overrides and brand applied")
  .version("0.1.0")
  .option("--json", "Output as JSON")
  .option("--verbose", "Show debug diagnostics on stderr")
  .option("--config <dir>", "External configuration directory (default: .swatchbook)");

registerInitCommand(program);
registerSearchCommand(program);
registerStatusCommand(program);
registerValidateCommand(program);
registerDomainsCommand(program);
registerBrandCommand(program);

program.parse();
