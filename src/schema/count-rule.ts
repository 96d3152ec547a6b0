/**
 * Cardinality rules for the number of inputs or outputs of an operator.
 *
 * Exactly one representation is active per side; setting a new one replaces
 * the old one outright. An exact count is stored as a range with min === max.
 */

export type CountPredicate = (count: number) => boolean;

export type CountRule =
  | { kind: "any" }
  | { kind: "range"; min: number; max: number }
  | { kind: "set"; allowed: ReadonlySet<number> }
  | { kind: "predicate"; test: CountPredicate };

/**
 * Arguments accepted by `setInputCount` / `setOutputCount`:
 * an exact count, an inclusive [min, max] pair, an allowed set, or a predicate.
 */
export type CountRuleSpec =
  | [exact: number]
  | [min: number, max: number]
  | [allowed: Iterable<number>]
  | [test: CountPredicate];

export const ANY_COUNT: CountRule = { kind: "any" };

export function countRuleFrom(spec: CountRuleSpec): CountRule {
  if (spec.length === 2) {
    const [min, max] = spec;
    return rangeRule(min, max);
  }
  const [value] = spec;
  if (typeof value === "number") {
    return rangeRule(value, value);
  }
  if (typeof value === "function") {
    return { kind: "predicate", test: value };
  }
  return { kind: "set", allowed: new Set(value) };
}

function rangeRule(min: number, max: number): CountRule {
  if (!(min >= 0) || !(max >= min)) {
    throw new Error(`Invalid count range [${min}, ${max}]`);
  }
  return { kind: "range", min, max };
}

export function acceptsCount(rule: CountRule, count: number): boolean {
  switch (rule.kind) {
    case "any":
      return true;
    case "range":
      return count >= rule.min && count <= rule.max;
    case "set":
      return rule.allowed.has(count);
    case "predicate":
      return rule.test(count);
  }
}

export function describeCountRule(rule: CountRule): string {
  switch (rule.kind) {
    case "any":
      return "any number";
    case "range":
      if (rule.min === rule.max) return `exactly ${rule.min}`;
      if (rule.max === Number.POSITIVE_INFINITY) return `at least ${rule.min}`;
      return `between ${rule.min} and ${rule.max}`;
    case "set":
      return `one of {${[...rule.allowed].sort((a, b) => a - b).join(", ")}}`;
    case "predicate":
      return "checked by a custom rule";
  }
}
