import _Ajv from "ajv";
const Ajv = _Ajv.default ?? _Ajv;
import type { ReasoningRule } from "../schemas/config.js";
import type { ValidationIssue } from "../schemas/record.js";
import { reasoningRuleSchema } from "../schemas/reasoning-schema.js";
import type { SearchResult } from "../schemas/search.js";
import { containsPhrase, tokenize } from "./bm25.js";
import { isObject } from "./records.js";

type RawRule = Omit<ReasoningRule, "source">;

export interface ParsedRules {
  rules: ReasoningRule[];
  issues: ValidationIssue[];
}

/**
 * Read rules from a parsed rule file: either an array of rules or
 * `{ rules: [...] }`. Invalid rules are skipped one by one.
 */
export function parseReasoningRules(raw: unknown, file: string): ParsedRules {
  const list = Array.isArray(raw) ? raw : isObject(raw) && Array.isArray(raw.rules) ? raw.rules : null;
  if (!list) {
    return {
      rules: [],
      issues: [{ file, message: "Expected an array of rules or an object with a rules array", severity: "error" }],
    };
  }

  const ajv = new Ajv({ allErrors: true });
  const validate = ajv.compile<RawRule>(reasoningRuleSchema);
  const rules: ReasoningRule[] = [];
  const issues: ValidationIssue[] = [];

  list.forEach((item: unknown, index: number) => {
    if (!validate(item)) {
      const details = (validate.errors ?? []).map((err) => `${err.instancePath} ${err.message}`).join("; ");
      issues.push({ file, row: index + 1, message: `Invalid rule: ${details}`, severity: "error" });
      return;
    }
    rules.push({
      name: item.name,
      when: {
        terms: item.when.terms.map((term) => term.toLowerCase()),
        ...(item.when.domains ? { domains: [...item.when.domains] } : {}),
      },
      prefer: [...item.prefer],
      boost: item.boost,
      ...(item.note ? { note: item.note } : {}),
      source: file,
    });
  });

  return { rules, issues };
}

export function ruleApplies(rule: ReasoningRule, queryTokens: string[], table: string): boolean {
  if (rule.when.domains && !rule.when.domains.includes(table)) return false;
  if (rule.when.terms.length === 0) return true;
  return rule.when.terms.some((term) => containsPhrase(queryTokens, tokenize(term)));
}

/**
 * Apply rules in order. A matching rule adds its boost to every result that
 * mentions one of its preferred terms. Order is left to the caller.
 */
export function applyReasoningRules(
  results: readonly SearchResult[],
  rules: readonly ReasoningRule[],
  queryText: string,
  table: string,
): SearchResult[] {
  const queryTokens = tokenize(queryText);
  const active = rules.filter((rule) => ruleApplies(rule, queryTokens, table));
  if (active.length === 0) return [...results];

  return results.map((result) => {
    const textTokens = tokenize(
      [result.id, ...Object.values(result.output_fields).map((v) => (Array.isArray(v) ? v.join(" ") : v))].join(" "),
    );
    let score = result.score;
    const notes = [...(result.notes ?? [])];
    for (const rule of active) {
      if (!rule.prefer.some((term) => containsPhrase(textTokens, tokenize(term)))) continue;
      score += rule.boost;
      notes.push(rule.note ?? `Preferred by rule "${rule.name}"`);
    }
    if (score === result.score && notes.length === (result.notes ?? []).length) return result;
    return { ...result, score, notes };
  });
}
