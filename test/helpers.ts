import { Command } from "commander";
import type { GuidelineRecord } from "../src/schemas/record.js";

export function makeRecord(
  id: string,
  searchFields: string[],
  overrides: Partial<GuidelineRecord> = {},
): GuidelineRecord {
  return {
    id,
    domain: "style",
    kind: "domain",
    search_fields: searchFields,
    output_fields: {},
    origin: "builtin",
    priority_boost: 0,
    ...overrides,
  };
}

/** Run one registered command through commander, the way src/cli.ts wires it. */
export async function runCommand(register: (program: Command) => void, args: string[]): Promise<void> {
  const program = new Command()
    .option("--json")
    .option("--verbose")
    .option("--config <dir>")
    .exitOverride()
    .configureOutput({ writeErr: () => {}, writeOut: () => {} });
  register(program);
  await program.parseAsync(["node", "swatchbook", ...args]);
}
