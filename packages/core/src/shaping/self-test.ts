/**
 * Post-apply self-test: compares what the backends report against what was
 * compiled.
 *
 * @module shaping/self-test
 */

import type { ShapingInspector } from "./backend.js";
import type { ClassTree, FilterRule, RuleSet } from "./types.js";

export interface SelfTestCheck {
  readonly name: string;
  readonly ok: boolean;
  readonly detail: string;
}

export interface SelfTestReport {
  readonly passed: boolean;
  readonly checks: readonly SelfTestCheck[];
}

function countLines(text: string, pattern: RegExp): number {
  return text.split(/\r?\n/).filter((line) => pattern.test(line.trim())).length;
}

async function check(
  name: string,
  describe: () => Promise<string>,
  evaluate: (output: string) => { ok: boolean; detail: string }
): Promise<SelfTestCheck> {
  let output: string;
  try {
    output = await describe();
  } catch (error) {
    return { name, ok: false, detail: error instanceof Error ? error.message : String(error) };
  }
  return { name, ...evaluate(output) };
}

export async function runSelfTest(
  tree: ClassTree,
  filters: readonly FilterRule[],
  ruleSet: RuleSet,
  inspector: ShapingInspector
): Promise<SelfTestReport> {
  // Root class plus one per tier
  const expectedClasses = tree.tiers.length + 1;

  const checks = [
    await check("root qdisc", () => inspector.describeQdiscs(), (output) => {
      const ok = countLines(output, /^qdisc hfsc /) > 0;
      return { ok, detail: ok ? "hfsc root qdisc present" : "no hfsc qdisc found" };
    }),
    await check("classes", () => inspector.describeClasses(), (output) => {
      const found = countLines(output, /^class hfsc /);
      return { ok: found >= expectedClasses, detail: `${found} of ${expectedClasses} classes` };
    }),
    await check("filters", () => inspector.describeFilters(), (output) => {
      const found = countLines(output, /\bfw\b.*\bclassid\b/);
      return { ok: found >= filters.length, detail: `${found} of ${filters.length} mark filters` };
    }),
    await check("mark rules", () => inspector.describeMarkRules(), (output) => {
      const found = countLines(output, /^MARK\s/);
      const expected = ruleSet.rules.length;
      return { ok: found >= expected, detail: `${found} of ${expected} mark rules` };
    }),
  ];

  return { passed: checks.every((entry) => entry.ok), checks };
}
