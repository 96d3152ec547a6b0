/**
 * In-place aliasing relations over (input index, output index) pairs.
 */

export type InplacePredicate = (inputIndex: number, outputIndex: number) => boolean;

export type InplacePair = readonly [inputIndex: number, outputIndex: number];

export type InplaceRule =
  | { kind: "none" }
  | { kind: "oneToOne" }
  | { kind: "pairs"; pairs: readonly InplacePair[] }
  | { kind: "predicate"; test: InplacePredicate };

export const NO_INPLACE: InplaceRule = { kind: "none" };

export function inplaceRuleFrom(
  spec: InplacePredicate | Iterable<InplacePair>,
): InplaceRule {
  if (typeof spec === "function") {
    return { kind: "predicate", test: spec };
  }
  const pairs: InplacePair[] = [];
  for (const [input, output] of spec) {
    if (!pairs.some(([i, o]) => i === input && o === output)) {
      pairs.push([input, output]);
    }
  }
  return { kind: "pairs", pairs };
}

export function inplaceHolds(
  rule: InplaceRule,
  inputIndex: number,
  outputIndex: number,
): boolean {
  switch (rule.kind) {
    case "none":
      return false;
    case "oneToOne":
      return inputIndex === outputIndex;
    case "pairs":
      return rule.pairs.some(([i, o]) => i === inputIndex && o === outputIndex);
    case "predicate":
      return rule.test(inputIndex, outputIndex);
  }
}

export function describeInplaceRule(rule: InplaceRule): string {
  switch (rule.kind) {
    case "none":
      return "none";
    case "oneToOne":
      return "input i with output i";
    case "pairs":
      return rule.pairs.map(([i, o]) => `(${i}, ${o})`).join(", ");
    case "predicate":
      return "checked by a custom rule";
  }
}
