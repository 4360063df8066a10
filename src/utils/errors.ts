import type { TableKind } from "../schemas/record.js";

export type SwatchbookErrorCode =
  | "UNKNOWN_DOMAIN"
  | "NO_DOMAIN_CONFIGURED"
  | "INVALID_QUERY"
  | "INVALID_CATALOG";

export class SwatchbookError extends Error {
  readonly code: SwatchbookErrorCode;

  constructor(code: SwatchbookErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Raised for a single query whose table has no records. Never fatal to the process.
 */
export class UnknownDomainError extends SwatchbookError {
  readonly domain: string;
  readonly kind: TableKind;
  readonly available: string[];

  constructor(domain: string, kind: TableKind, available: string[]) {
    const label = kind === "stack" ? "stack" : "domain";
    super(
      "UNKNOWN_DOMAIN",
      `Unknown ${label} "${domain}". Available: ${available.join(", ") || "(none)"}`,
    );
    this.domain = domain;
    this.kind = kind;
    this.available = available;
  }
}

export class NoDomainConfiguredError extends SwatchbookError {
  constructor() {
    super("NO_DOMAIN_CONFIGURED", "No domains are configured; the domain keyword table is empty.");
  }
}

export class InvalidQueryError extends SwatchbookError {
  constructor(message: string) {
    super("INVALID_QUERY", message);
  }
}

export class InvalidCatalogError extends SwatchbookError {
  readonly path: string;

  constructor(path: string, message: string) {
    super("INVALID_CATALOG", `Invalid catalog ${path}: ${message}`);
    this.path = path;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
