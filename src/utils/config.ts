import { writeFile, mkdir } from "node:fs/promises";
import { existsSync } from "node:fs";
import { isAbsolute, join, resolve } from "node:path";
import yaml from "js-yaml";
import type { Manifest } from "../schemas/config.js";
import { DEFAULT_MANIFEST } from "../schemas/config.js";
import {
  BRAND_DIR,
  DOMAINS_DIR,
  MANIFEST_FILES,
  REASONING_DIR,
  STACKS_DIR,
} from "./external-config.js";

const CONFIG_DIR = ".swatchbook";
const MANIFEST_FILE = "config.yaml";

export const CONFIG_README = `# .swatchbook/

Project overrides for swatchbook's design-guideline search.

## Layout

- \`config.yaml\`      - Manifest: enable flags, table selection, limits
- \`domains/*.csv\`    - Extra or overriding rows per domain (file name = domain)
- \`stacks/*.csv\`     - Extra or overriding rows per stack (file name = stack)
- \`brand/brand.json\` - Brand colors, fonts and style preferences
- \`reasoning/*.json\` - Rules that boost results for matching queries

JSON tables (\`*.json\`) are accepted next to CSV files.

## Key Commands

- \`swatchbook status\`    - Show what loaded and any problems
- \`swatchbook validate\`  - Check every file and exit non-zero on errors
- \`swatchbook search\`    - Search guidelines with these overrides applied
`;

export function getConfigDir(cwd: string = process.cwd()): string {
  return join(cwd, CONFIG_DIR);
}

/** `--config` wins; relative paths resolve against `cwd`. */
export function resolveConfigDir(option: string | undefined, cwd: string = process.cwd()): string {
  if (!option) return getConfigDir(cwd);
  return isAbsolute(option) ? option : resolve(cwd, option);
}

export function getManifestPath(configDir: string): string {
  return join(configDir, MANIFEST_FILE);
}

export function hasManifest(configDir: string): boolean {
  return MANIFEST_FILES.some((name) => existsSync(join(configDir, name)));
}

export function renderManifest(manifest: Manifest = DEFAULT_MANIFEST): string {
  return yaml.dump(manifest, { lineWidth: -1 });
}

export interface InitResult {
  path: string;
  /** Paths created by this call, relative to the config directory. */
  created: string[];
}

export async function initConfigDir(configDir: string): Promise<InitResult> {
  const created: string[] = [];

  for (const dir of ["", DOMAINS_DIR, STACKS_DIR, BRAND_DIR, REASONING_DIR]) {
    const path = join(configDir, dir);
    if (!existsSync(path)) {
      await mkdir(path, { recursive: true });
      created.push(dir === "" ? "." : `${dir}/`);
    }
  }

  // Only write a manifest if none exists - preserve user customizations
  if (!hasManifest(configDir)) {
    await writeFile(getManifestPath(configDir), renderManifest(), "utf-8");
    created.push(MANIFEST_FILE);
  }

  const readmePath = join(configDir, "README.md");
  if (!existsSync(readmePath)) {
    await writeFile(readmePath, CONFIG_README, "utf-8");
    created.push("README.md");
  }

  return { path: configDir, created };
}
