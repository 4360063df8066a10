import { createHash } from "node:crypto";
import { stat } from "node:fs/promises";
import { isNotFound } from "./errors.js";

/**
 * Hash of path, mtime and size for each file. Missing files hash as missing,
 * so creating or deleting one changes the fingerprint.
 */
export async function fingerprintFiles(paths: Iterable<string>): Promise<string> {
  const hash = createHash("sha256");
  for (const path of [...new Set(paths)].sort()) {
    hash.update(path);
    try {
      const info = await stat(path);
      hash.update(`\0${info.mtimeMs}\0${info.size}\n`);
    } catch (err) {
      if (!isNotFound(err)) throw err;
      hash.update("\0missing\n");
    }
  }
  return hash.digest("hex").slice(0, 16);
}
