import { describe, expect, it } from "vitest";
import { formatSchema, OpSchema, OpSchemaRegistry, renderSchemaDocs } from "../src";

describe("formatSchema", () => {
  it("lists rules, tensors, documentation and source location", () => {
    const schema = new OpSchema("Sum", "elementwise_sum.ts", 42)
      .setInputCount(1, Number.POSITIVE_INFINITY)
      .setOutputCount(1)
      .allowInplace([[0, 0]])
      .allowInputsAcrossDevices()
      .describeInput(0, "data_0", "First input.")
      .describeOutput(0, "sum", "Output.")
      .setDoc("\nElementwise sum.\n");

    expect(formatSchema(schema)).toBe(
      [
        "Operator Sum",
        "Input count: at least 1",
        "Output count: exactly 1",
        "In-place allowed: (0, 0)",
        "Inputs can cross devices",
        "Inputs:",
        "  0, data_0 : First input.",
        "Outputs:",
        "  0, sum : Output.",
        "",
        "Elementwise sum.",
        "",
        "Defined at elementwise_sum.ts:42",
      ].join("\n"),
    );
  });

  it("fills in placeholders for an unconfigured schema", () => {
    expect(formatSchema(new OpSchema("Noop"))).toBe(
      [
        "Operator Noop",
        "Input count: any number",
        "Output count: any number",
        "Inputs:",
        "  (no explicit description available)",
        "Outputs:",
        "  (no explicit description available)",
        "",
        "(no documentation yet)",
        "",
      ].join("\n"),
    );
  });

  it("shows arguments, computed counts and tensor-free sides", () => {
    const schema = new OpSchema("Fill", "fill.ts", 3)
      .setInputCount(0)
      .setOutputCount(1, 2)
      .setJointInputOutputRule(() => true)
      .sameNumberOfOutputsAsInputs()
      .enforceOneToOneInplace()
      .describeArgument("value", "Fill value.", { required: true })
      .describeArgument("dtype", "Element type.")
      .setDoc("Fills a tensor.");

    expect(formatSchema(schema)).toBe(
      [
        "Operator Fill",
        "Input count: exactly 0",
        "Output count: between 1 and 2",
        "Input/output count combination: checked by a custom rule",
        "Output count is computed from the input count",
        "In-place enforced: input i with output i",
        "Arguments:",
        "  value (required) : Fill value.",
        "  dtype : Element type.",
        "No inputs",
        "Outputs:",
        "  (no explicit description available)",
        "",
        "Fills a tensor.",
        "",
        "Defined at fill.ts:3",
      ].join("\n"),
    );
  });
});

describe("renderSchemaDocs", () => {
  it("renders public schemas in type order", () => {
    const registry = new OpSchemaRegistry();
    registry
      .createSchema("Zeta", "zeta.ts", 1)
      .setInputCount(1)
      .setOutputCount(1)
      .setDoc("Last one.")
      .describeInput(0, "x", "Input.")
      .describeOutput(0, "y", "Output.");
    registry.createSchema("Hidden", "hidden.ts", 1).markPrivate();
    registry
      .createSchema("Alpha", "alpha.ts", 1)
      .setInputCount(2)
      .describeArgument("axis", "Axis to use.", { required: true });

    expect(renderSchemaDocs(registry)).toBe(
      [
        "# Operators",
        "",
        "## Alpha",
        "",
        "- Input count: exactly 2\n- Output count: any number",
        "",
        "**Arguments**\n- `axis` (required): Axis to use.",
        "",
        "## Zeta",
        "",
        "Last one.",
        "",
        "- Input count: exactly 1\n- Output count: exactly 1",
        "",
        "**Inputs**\n- 0 `x`: Input.",
        "",
        "**Outputs**\n- 0 `y`: Output.",
        "",
      ].join("\n"),
    );
  });

  it("renders only the heading for an empty registry", () => {
    expect(renderSchemaDocs(new OpSchemaRegistry())).toBe("# Operators\n");
  });
});
