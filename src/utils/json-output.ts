import { SwatchbookError, errorMessage } from "./errors.js";

export interface JsonResult {
  success: boolean;
  command: string;
  [key: string]: unknown;
}

export function outputJson(result: JsonResult): void {
  console.log(JSON.stringify(result, null, 2));
}

export function outputJsonError(command: string, err: unknown): void {
  const code = err instanceof SwatchbookError ? err.code : undefined;
  console.error(
    JSON.stringify({ success: false, command, error: errorMessage(err), ...(code ? { code } : {}) }, null, 2),
  );
}
