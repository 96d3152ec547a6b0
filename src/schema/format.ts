import { describeCountRule } from "./count-rule";
import { describeInplaceRule } from "./inplace-rule";
import type { ReadonlyOpSchema, TensorDoc } from "./op-schema";
import type { OpSchemaRegistry } from "./registry";

function takesNoTensors(schema: ReadonlyOpSchema, side: "inputs" | "outputs"): boolean {
  const rule = side === "inputs" ? schema.inputCountRule : schema.outputCountRule;
  return rule.kind === "range" && rule.max === 0;
}

function ruleSummary(schema: ReadonlyOpSchema): string[] {
  const lines = [
    `Input count: ${describeCountRule(schema.inputCountRule)}`,
    `Output count: ${describeCountRule(schema.outputCountRule)}`,
  ];
  if (schema.hasJointRule) {
    lines.push("Input/output count combination: checked by a custom rule");
  }
  if (schema.hasOutputCalculator) {
    lines.push("Output count is computed from the input count");
  }
  if (schema.inplaceAllowedRule.kind !== "none") {
    lines.push(`In-place allowed: ${describeInplaceRule(schema.inplaceAllowedRule)}`);
  }
  if (schema.inplaceEnforcedRule.kind !== "none") {
    lines.push(`In-place enforced: ${describeInplaceRule(schema.inplaceEnforcedRule)}`);
  }
  if (schema.inputsCanCrossDevices) {
    lines.push("Inputs can cross devices");
  }
  return lines;
}

function tensorLines(docs: readonly TensorDoc[]): string[] {
  if (docs.length === 0) {
    return ["  (no explicit description available)"];
  }
  return docs.map((doc) => `  ${doc.index}, ${doc.name} : ${doc.description}`);
}

/**
 * Plain-text description of a schema: its rules, then its documentation and
 * where it was registered.
 */
export function formatSchema(schema: ReadonlyOpSchema): string {
  const lines = [`Operator ${schema.type}`, ...ruleSummary(schema)];

  if (schema.args.length > 0) {
    lines.push("Arguments:");
    for (const arg of schema.args) {
      const flag = arg.required ? " (required)" : "";
      lines.push(`  ${arg.name}${flag} : ${arg.description}`);
    }
  }

  if (takesNoTensors(schema, "inputs")) {
    lines.push("No inputs");
  } else {
    lines.push("Inputs:", ...tensorLines(schema.inputs));
  }
  if (takesNoTensors(schema, "outputs")) {
    lines.push("No outputs");
  } else {
    lines.push("Outputs:", ...tensorLines(schema.outputs));
  }

  lines.push("", schema.doc?.trim() || "(no documentation yet)", "");
  if (schema.line > 0) {
    lines.push(`Defined at ${schema.file}:${schema.line}`);
  }
  return lines.join("\n");
}

/**
 * Markdown reference for every public schema in `registry`, ordered by type.
 */
export function renderSchemaDocs(registry: OpSchemaRegistry): string {
  const sections = registry
    .schemas()
    .filter((schema) => !schema.isPrivate)
    .sort((a, b) => (a.type < b.type ? -1 : a.type > b.type ? 1 : 0))
    .map(renderSection);
  return ["# Operators", ...sections].join("\n\n") + "\n";
}

function renderSection(schema: ReadonlyOpSchema): string {
  const parts = [`## ${schema.type}`];
  const doc = schema.doc?.trim();
  if (doc) parts.push(doc);
  parts.push(ruleSummary(schema).map((line) => `- ${line}`).join("\n"));

  if (schema.args.length > 0) {
    parts.push(
      [
        "**Arguments**",
        ...schema.args.map(
          (arg) =>
            `- \`${arg.name}\`${arg.required ? " (required)" : ""}: ${arg.description}`,
        ),
      ].join("\n"),
    );
  }
  if (schema.inputs.length > 0) {
    parts.push(
      [
        "**Inputs**",
        ...schema.inputs.map((doc) => `- ${doc.index} \`${doc.name}\`: ${doc.description}`),
      ].join("\n"),
    );
  }
  if (schema.outputs.length > 0) {
    parts.push(
      [
        "**Outputs**",
        ...schema.outputs.map((doc) => `- ${doc.index} \`${doc.name}\`: ${doc.description}`),
      ].join("\n"),
    );
  }
  return parts.join("\n\n");
}
