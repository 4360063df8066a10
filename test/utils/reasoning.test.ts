import { describe, it, expect } from "vitest";
import { applyReasoningRules, parseReasoningRules, ruleApplies } from "../../src/utils/reasoning.js";
import type { ReasoningRule } from "../../src/schemas/config.js";
import type { SearchResult } from "../../src/schemas/search.js";

function result(id: string, score: number, output: SearchResult["output_fields"] = {}): SearchResult {
  return { id, domain: "color", kind: "domain", origin: "builtin", output_fields: output, score, exact: false };
}

const trust: ReasoningRule = {
  name: "Fintech trust",
  when: { terms: ["fintech", "bank"], domains: ["color"] },
  prefer: ["trust"],
  boost: 2,
  source: "reasoning/rules.json",
};

describe("parseReasoningRules", () => {
  it("accepts { rules: [...] } and lower-cases terms", () => {
    const { rules, issues } = parseReasoningRules(
      { rules: [{ name: "Calm", when: { terms: ["Wellness"] }, prefer: ["soft"], boost: 1, note: "Calm palettes" }] },
      "reasoning/calm.json",
    );
    expect(issues).toEqual([]);
    expect(rules).toEqual([
      {
        name: "Calm",
        when: { terms: ["wellness"] },
        prefer: ["soft"],
        boost: 1,
        note: "Calm palettes",
        source: "reasoning/calm.json",
      },
    ]);
  });

  it("rejects a file that is neither a list nor a rules object", () => {
    expect(parseReasoningRules("nope", "r.json").issues).toEqual([
      { file: "r.json", message: "Expected an array of rules or an object with a rules array", severity: "error" },
    ]);
  });
});

describe("ruleApplies", () => {
  it("needs a query term and a listed domain", () => {
    expect(ruleApplies(trust, ["fintech", "app"], "color")).toBe(true);
    expect(ruleApplies(trust, ["fintech", "app"], "style")).toBe(false);
    expect(ruleApplies(trust, ["gaming"], "color")).toBe(false);
  });

  it("applies everywhere when terms are empty", () => {
    expect(ruleApplies({ ...trust, when: { terms: [] } }, [], "style")).toBe(true);
  });
});

describe("applyReasoningRules", () => {
  it("boosts results mentioning a preferred term and adds a note", () => {
    const out = applyReasoningRules(
      [result("SaaS", 1, { Notes: "fast" }), result("Fintech", 1.5, { Keywords: ["secure", "trust"] })],
      [trust],
      "fintech palette",
      "color",
    );
    expect(out.map((r) => [r.id, r.score, r.notes])).toEqual([
      ["SaaS", 1, undefined],
      ["Fintech", 3.5, ['Preferred by rule "Fintech trust"']],
    ]);
  });

  it("uses the rule's own note", () => {
    const [out] = applyReasoningRules([result("Fintech", 0, { Notes: "trust" })], [{ ...trust, note: "Trust first" }], "bank", "color");
    expect(out.notes).toEqual(["Trust first"]);
  });

  it("returns the results as they were when no rule applies", () => {
    const input = [result("SaaS", 1, { Notes: "trust" })];
    expect(applyReasoningRules(input, [trust], "gaming", "color")).toEqual(input);
  });
});
