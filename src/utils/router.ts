import { containsPhrase, tokenize } from "./bm25.js";
import { NoDomainConfiguredError, UnknownDomainError } from "./errors.js";

export interface DomainMatch {
  domain: string;
  matches: number;
}

/**
 * Picks a domain for queries that do not name one, by counting keyword hits.
 * Table order matters: among equally scored domains the earliest wins.
 */
export class DomainRouter {
  private readonly table: Map<string, string[][]>;
  readonly defaultDomain: string;

  constructor(keywords: Map<string, string[]>, defaultDomain: string) {
    this.table = new Map();
    for (const [domain, words] of keywords) {
      const phrases = words.map((word) => tokenize(word)).filter((tokens) => tokens.length > 0);
      this.table.set(domain, phrases);
    }
    this.defaultDomain = defaultDomain;
  }

  get domains(): string[] {
    return [...this.table.keys()];
  }

  has(domain: string): boolean {
    return this.table.has(domain);
  }

  /** Keyword hit counts per domain, in table order. */
  rank(text: string): DomainMatch[] {
    const tokens = tokenize(text);
    const ranked: DomainMatch[] = [];
    for (const [domain, phrases] of this.table) {
      let matches = 0;
      for (const phrase of phrases) {
        if (containsPhrase(tokens, phrase)) matches++;
      }
      ranked.push({ domain, matches });
    }
    return ranked;
  }

  resolve(text: string, declared?: string): string {
    if (this.table.size === 0) {
      throw new NoDomainConfiguredError();
    }
    if (declared !== undefined) {
      if (this.table.has(declared)) return declared;
      throw new UnknownDomainError(declared, "domain", this.domains);
    }

    let best: DomainMatch | null = null;
    for (const match of this.rank(text)) {
      if (!best || match.matches > best.matches) best = match;
    }
    if (!best || best.matches === 0) {
      return this.defaultDomain;
    }
    return best.domain;
  }
}
