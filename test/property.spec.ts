import fc from "fast-check";
import { describe, expect, it } from "vitest";
import {
  acceptsCount,
  countRuleFrom,
  OpSchema,
  type InplacePair,
} from "../src";
import { makeOp } from "./helpers/operators";

const countArb = fc.integer({ min: 0, max: 12 });

describe("count rule properties", () => {
  it("a range accepts exactly the counts between its bounds", () => {
    fc.assert(
      fc.property(countArb, countArb, countArb, (a, b, n) => {
        const min = Math.min(a, b);
        const max = Math.max(a, b);
        expect(acceptsCount(countRuleFrom([min, max]), n)).toBe(n >= min && n <= max);
      }),
    );
  });

  it("an exact count behaves like the range [n, n]", () => {
    fc.assert(
      fc.property(countArb, countArb, (exact, n) => {
        expect(acceptsCount(countRuleFrom([exact]), n)).toBe(
          acceptsCount(countRuleFrom([exact, exact]), n),
        );
      }),
    );
  });

  it("a set accepts only its members", () => {
    fc.assert(
      fc.property(fc.array(countArb, { maxLength: 6 }), countArb, (allowed, n) => {
        expect(acceptsCount(countRuleFrom([allowed]), n)).toBe(allowed.includes(n));
      }),
    );
  });

  it("the last input count rule set wins", () => {
    fc.assert(
      fc.property(countArb, countArb, countArb, (first, second, n) => {
        const schema = new OpSchema("TestOp").setInputCount(first).setInputCount(second);
        expect(schema.verify(makeOp(n, 0))).toBe(n === second);
      }),
    );
  });
});

describe("in-place properties", () => {
  it("one-to-one aliasing holds only on the diagonal", () => {
    fc.assert(
      fc.property(countArb, countArb, (input, output) => {
        const schema = new OpSchema("TestOp").allowOneToOneInplace();
        expect(schema.isInplaceAllowed(input, output)).toBe(input === output);
      }),
    );
  });

  it("explicit pairs hold exactly for the listed pairs", () => {
    const pairArb = fc.tuple(countArb, countArb);
    fc.assert(
      fc.property(fc.array(pairArb, { maxLength: 5 }), pairArb, (pairs, [input, output]) => {
        const listed: InplacePair[] = pairs;
        const schema = new OpSchema("TestOp").enforceInplace(listed);
        const expected = pairs.some(([i, o]) => i === input && o === output);
        expect(schema.isInplaceEnforced(input, output)).toBe(expected);
      }),
    );
  });
});

describe("output calculator properties", () => {
  it("accepts exactly as many outputs as inputs under the identity calculator", () => {
    fc.assert(
      fc.property(countArb, countArb, (numInputs, numOutputs) => {
        const schema = new OpSchema("TestOp").sameNumberOfOutputsAsInputs();
        expect(schema.calculateOutputCount(numInputs)).toBe(numInputs);
        expect(schema.verify(makeOp(numInputs, numOutputs))).toBe(numInputs === numOutputs);
      }),
    );
  });
});
