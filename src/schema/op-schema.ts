/**
 * OpSchema — the declared interface of one operator type.
 *
 * A schema is configured once, through its chainable builder methods, while
 * its operator type registers. After that it only answers queries: whether a
 * concrete operator satisfies its rules, and what an operator's outputs,
 * placement and cost would be, without running it.
 *
 * Every optional rule has a total default, so queries are always callable on a
 * minimally configured schema:
 * - cardinality and joint rules accept everything;
 * - no in-place aliasing is allowed or enforced;
 * - tensor inference marks every output as unknown;
 * - device inference places everything on the operator's own device;
 * - cost inference throws `CostInferenceUnavailableError`.
 */

import { verifyLoggingEnabled } from "../core/config";
import {
  copyDevice,
  defaultDevice,
  type DeviceOption,
} from "../core/device";
import { hasArgument, type OperatorDef, operatorLabel } from "../core/operator";
import {
  cloneTensorShape,
  createTensorShape,
  type DataType,
  type TensorShape,
  unknownTensorShape,
} from "../core/shape";
import {
  ANY_COUNT,
  acceptsCount,
  type CountRule,
  type CountRuleSpec,
  countRuleFrom,
  describeCountRule,
} from "./count-rule";
import {
  CostInferenceUnavailableError,
  SealedSchemaError,
  ShapeInferenceError,
} from "./errors";
import {
  type InplacePair,
  type InplacePredicate,
  type InplaceRule,
  inplaceHolds,
  inplaceRuleFrom,
  NO_INPLACE,
} from "./inplace-rule";

/** Returned by `calculateOutputCount` when no calculator is registered. */
export const CANNOT_COMPUTE_NUM_OUTPUTS = -1;

export type Cost = {
  /** Floating point operations */
  flops: number;
  /** Total memory traffic in bytes */
  bytesMoved: number;
};

export type DevicePlacement = {
  inputs: DeviceOption[];
  outputs: DeviceOption[];
};

export type TensorInferenceFunction = (
  def: OperatorDef,
  inputs: readonly TensorShape[],
) => TensorShape[];

export type CostInferenceFunction = (
  def: OperatorDef,
  inputs: readonly TensorShape[],
) => Cost;

export type DeviceInferenceFunction = (def: OperatorDef) => DevicePlacement;

export type JointCountPredicate = (inputCount: number, outputCount: number) => boolean;

export type OutputCalculator = (inputCount: number) => number;

export type ArgumentDoc = {
  name: string;
  description: string;
  required: boolean;
};

export type TensorDoc = {
  index: number;
  name: string;
  description: string;
};

export type SchemaRule =
  | "missing_schema"
  | "input_count"
  | "output_count"
  | "joint_count"
  | "output_calculator"
  | "inplace_not_allowed"
  | "inplace_not_enforced"
  | "missing_argument";

export type SchemaViolation = {
  rule: SchemaRule;
  message: string;
};

/**
 * Query-only view of a schema, as handed out by the registry.
 */
export interface ReadonlyOpSchema {
  readonly type: string;
  readonly file: string;
  readonly line: number;
  readonly doc: string | undefined;
  readonly args: readonly ArgumentDoc[];
  readonly inputs: readonly TensorDoc[];
  readonly outputs: readonly TensorDoc[];
  readonly isPrivate: boolean;
  readonly inputsCanCrossDevices: boolean;
  readonly inputCountRule: CountRule;
  readonly outputCountRule: CountRule;
  readonly inplaceAllowedRule: InplaceRule;
  readonly inplaceEnforcedRule: InplaceRule;
  readonly hasJointRule: boolean;
  readonly hasOutputCalculator: boolean;
  readonly hasTensorInference: boolean;
  readonly hasCostInference: boolean;
  readonly hasDeviceInference: boolean;
  readonly isSealed: boolean;

  verify(def: OperatorDef): boolean;
  check(def: OperatorDef): SchemaViolation | null;
  calculateOutputCount(inputCount: number): number;
  isInplaceAllowed(inputIndex: number, outputIndex: number): boolean;
  isInplaceEnforced(inputIndex: number, outputIndex: number): boolean;
  inferTensor(def: OperatorDef, inputs: readonly TensorShape[]): TensorShape[];
  inferCost(def: OperatorDef, inputs: readonly TensorShape[]): Cost;
  inferDevice(def: OperatorDef): DevicePlacement;
}

function unknownOutputs(def: OperatorDef): TensorShape[] {
  return def.outputs.map(() => unknownTensorShape());
}

function operatorDevicePlacement(def: OperatorDef): DevicePlacement {
  const device = def.device ?? defaultDevice();
  return {
    inputs: def.inputs.map(() => copyDevice(device)),
    outputs: def.outputs.map(() => copyDevice(device)),
  };
}

function requireInput(
  type: string,
  inputs: readonly TensorShape[],
  index: number,
): TensorShape {
  if (index < 0 || index >= inputs.length) {
    throw new ShapeInferenceError(
      `${type} infers outputs from input ${index}, but ${inputs.length} input shapes were given`,
    );
  }
  return inputs[index];
}

export class OpSchema implements ReadonlyOpSchema {
  private docText: string | undefined;
  private readonly argDocs: ArgumentDoc[] = [];
  private readonly inputDocs: TensorDoc[] = [];
  private readonly outputDocs: TensorDoc[] = [];
  private privateOp = false;
  private crossDeviceInputs = false;
  private sealed = false;

  private inputRule: CountRule = ANY_COUNT;
  private outputRule: CountRule = ANY_COUNT;
  private jointRule: JointCountPredicate | null = null;
  private outputCalculator: OutputCalculator | null = null;
  private inplaceAllowed: InplaceRule = NO_INPLACE;
  private inplaceEnforced: InplaceRule = NO_INPLACE;

  private tensorInference: TensorInferenceFunction | null = null;
  private costInference: CostInferenceFunction | null = null;
  private deviceInference: DeviceInferenceFunction | null = null;

  constructor(
    readonly type: string,
    readonly file: string = "unknown",
    readonly line: number = 0,
  ) {}

  // ==========================================================================
  // Verification
  // ==========================================================================

  verify(def: OperatorDef): boolean {
    return this.check(def) === null;
  }

  /**
   * Like `verify`, but names the first rule the operator breaks.
   */
  check(def: OperatorDef): SchemaViolation | null {
    const violation = this.findViolation(def);
    if (violation && verifyLoggingEnabled()) {
      console.warn(`[opschema] ${violation.message}`);
    }
    return violation;
  }

  private findViolation(def: OperatorDef): SchemaViolation | null {
    const label = operatorLabel(def);
    const numInputs = def.inputs.length;
    const numOutputs = def.outputs.length;

    if (!acceptsCount(this.inputRule, numInputs)) {
      return {
        rule: "input_count",
        message: `${label}: input size ${numInputs} not allowed, expected ${describeCountRule(this.inputRule)}`,
      };
    }
    if (!acceptsCount(this.outputRule, numOutputs)) {
      return {
        rule: "output_count",
        message: `${label}: output size ${numOutputs} not allowed, expected ${describeCountRule(this.outputRule)}`,
      };
    }
    if (this.jointRule && !this.jointRule(numInputs, numOutputs)) {
      return {
        rule: "joint_count",
        message: `${label}: combination of input size ${numInputs} and output size ${numOutputs} not allowed`,
      };
    }

    if (this.outputCalculator) {
      const expected = this.outputCalculator(numInputs);
      if (expected !== CANNOT_COMPUTE_NUM_OUTPUTS && expected !== numOutputs) {
        return {
          rule: "output_calculator",
          message: `${label}: output size ${numOutputs} does not match the ${expected} outputs computed from ${numInputs} inputs`,
        };
      }
    }

    for (let inIdx = 0; inIdx < numInputs; inIdx += 1) {
      for (let outIdx = 0; outIdx < numOutputs; outIdx += 1) {
        const sameBlob = def.inputs[inIdx] === def.outputs[outIdx];
        const enforced = inplaceHolds(this.inplaceEnforced, inIdx, outIdx);
        if (
          sameBlob &&
          !enforced &&
          !inplaceHolds(this.inplaceAllowed, inIdx, outIdx)
        ) {
          return {
            rule: "inplace_not_allowed",
            message: `${label}: input ${inIdx} and output ${outIdx} (${def.inputs[inIdx]}) are in-place, which ${this.type} does not support`,
          };
        }
        if (!sameBlob && enforced) {
          return {
            rule: "inplace_not_enforced",
            message: `${label}: input ${inIdx} (${def.inputs[inIdx]}) and output ${outIdx} (${def.outputs[outIdx]}) must be in-place for ${this.type}`,
          };
        }
      }
    }

    for (const arg of this.argDocs) {
      if (arg.required && !hasArgument(def, arg.name)) {
        return {
          rule: "missing_argument",
          message: `${label}: required argument "${arg.name}" is missing`,
        };
      }
    }

    return null;
  }

  // ==========================================================================
  // Cardinality
  // ==========================================================================

  /**
   * Sets the allowed number of inputs: an exact count, an inclusive
   * `[min, max]` range (`max` may be `Infinity`), a set of allowed counts, or
   * a predicate. Replaces any rule set before.
   */
  setInputCount(...spec: CountRuleSpec): this {
    this.assertMutable("setInputCount");
    this.inputRule = countRuleFrom(spec);
    return this;
  }

  /**
   * Sets the allowed number of outputs. Same forms as `setInputCount`.
   */
  setOutputCount(...spec: CountRuleSpec): this {
    this.assertMutable("setOutputCount");
    this.outputRule = countRuleFrom(spec);
    return this;
  }

  setJointInputOutputRule(rule: JointCountPredicate): this {
    this.assertMutable("setJointInputOutputRule");
    this.jointRule = rule;
    return this;
  }

  setOutputCalculator(calculator: OutputCalculator): this {
    this.assertMutable("setOutputCalculator");
    this.outputCalculator = calculator;
    return this;
  }

  sameNumberOfOutputsAsInputs(): this {
    return this.setOutputCalculator((inputCount) => inputCount);
  }

  calculateOutputCount(inputCount: number): number {
    return this.outputCalculator
      ? this.outputCalculator(inputCount)
      : CANNOT_COMPUTE_NUM_OUTPUTS;
  }

  get inputCountRule(): CountRule {
    return this.inputRule;
  }

  get outputCountRule(): CountRule {
    return this.outputRule;
  }

  get hasJointRule(): boolean {
    return this.jointRule !== null;
  }

  get hasOutputCalculator(): boolean {
    return this.outputCalculator !== null;
  }

  // ==========================================================================
  // In-place aliasing
  // ==========================================================================

  allowInplace(rule: InplacePredicate | Iterable<InplacePair>): this {
    this.assertMutable("allowInplace");
    this.inplaceAllowed = inplaceRuleFrom(rule);
    return this;
  }

  allowOneToOneInplace(): this {
    this.assertMutable("allowOneToOneInplace");
    this.inplaceAllowed = { kind: "oneToOne" };
    return this;
  }

  enforceInplace(rule: InplacePredicate | Iterable<InplacePair>): this {
    this.assertMutable("enforceInplace");
    this.inplaceEnforced = inplaceRuleFrom(rule);
    return this;
  }

  enforceOneToOneInplace(): this {
    this.assertMutable("enforceOneToOneInplace");
    this.inplaceEnforced = { kind: "oneToOne" };
    return this;
  }

  isInplaceAllowed(inputIndex: number, outputIndex: number): boolean {
    return inplaceHolds(this.inplaceAllowed, inputIndex, outputIndex);
  }

  isInplaceEnforced(inputIndex: number, outputIndex: number): boolean {
    return inplaceHolds(this.inplaceEnforced, inputIndex, outputIndex);
  }

  get inplaceAllowedRule(): InplaceRule {
    return this.inplaceAllowed;
  }

  get inplaceEnforcedRule(): InplaceRule {
    return this.inplaceEnforced;
  }

  // ==========================================================================
  // Tensor type and shape inference
  // ==========================================================================

  setTensorInferenceFunction(fn: TensorInferenceFunction): this {
    this.assertMutable("setTensorInferenceFunction");
    this.tensorInference = fn;
    return this;
  }

  /**
   * Output i has the type and shape of input i. Outputs without a matching
   * input are unknown.
   */
  identicalTypeAndShape(): this {
    return this.setTensorInferenceFunction((def, inputs) =>
      def.outputs.map((_, i) =>
        i < inputs.length ? cloneTensorShape(inputs[i]) : unknownTensorShape(),
      ),
    );
  }

  identicalTypeAndShapeOfInput(inputIndex: number): this {
    return this.setTensorInferenceFunction((def, inputs) => {
      const source = requireInput(this.type, inputs, inputIndex);
      return def.outputs.map(() => cloneTensorShape(source));
    });
  }

  /**
   * Every output is 1-D, with length equal to dimension `dim` of input
   * `inputIndex`, and takes that input's element type.
   */
  identicalTypeAndShapeOfInputDim(inputIndex: number, dim: number): this {
    return this.setTensorInferenceFunction((def, inputs) => {
      const source = requireInput(this.type, inputs, inputIndex);
      if (source.unknownShape) {
        return def.outputs.map(() => unknownTensorShape());
      }
      if (dim < 0 || dim >= source.dims.length) {
        throw new ShapeInferenceError(
          `${this.type} reads dimension ${dim} of input ${inputIndex}, which has rank ${source.dims.length}`,
        );
      }
      return def.outputs.map(() =>
        createTensorShape([source.dims[dim]], source.dataType),
      );
    });
  }

  /**
   * Output i has the dims of input i, with the element type forced to
   * `dataType`.
   */
  scalarType(dataType: DataType): this {
    return this.setTensorInferenceFunction((def, inputs) =>
      def.outputs.map((_, i) => {
        if (i >= inputs.length) {
          return { dims: [], dataType, unknownShape: true };
        }
        const input = inputs[i];
        return {
          dims: input.dims.slice(),
          dataType,
          unknownShape: input.unknownShape,
        };
      }),
    );
  }

  inferTensor(def: OperatorDef, inputs: readonly TensorShape[]): TensorShape[] {
    return (this.tensorInference ?? unknownOutputs)(def, inputs);
  }

  get hasTensorInference(): boolean {
    return this.tensorInference !== null;
  }

  // ==========================================================================
  // Cost inference
  // ==========================================================================

  setCostInferenceFunction(fn: CostInferenceFunction): this {
    this.assertMutable("setCostInferenceFunction");
    this.costInference = fn;
    return this;
  }

  inferCost(def: OperatorDef, inputs: readonly TensorShape[]): Cost {
    if (!this.costInference) {
      throw new CostInferenceUnavailableError(this.type);
    }
    return this.costInference(def, inputs);
  }

  get hasCostInference(): boolean {
    return this.costInference !== null;
  }

  // ==========================================================================
  // Device inference
  // ==========================================================================

  setDeviceInferenceFunction(fn: DeviceInferenceFunction): this {
    this.assertMutable("setDeviceInferenceFunction");
    this.deviceInference = fn;
    return this;
  }

  inferDevice(def: OperatorDef): DevicePlacement {
    return (this.deviceInference ?? operatorDevicePlacement)(def);
  }

  get hasDeviceInference(): boolean {
    return this.deviceInference !== null;
  }

  // ==========================================================================
  // Documentation
  // ==========================================================================

  setDoc(doc: string): this {
    this.assertMutable("setDoc");
    this.docText = doc;
    return this;
  }

  describeArgument(
    name: string,
    description: string,
    options?: { required?: boolean },
  ): this {
    this.assertMutable("describeArgument");
    upsert(this.argDocs, (arg) => arg.name === name, {
      name,
      description,
      required: options?.required ?? false,
    });
    return this;
  }

  describeInput(index: number, name: string, description: string): this {
    this.assertMutable("describeInput");
    upsert(this.inputDocs, (doc) => doc.index === index, { index, name, description });
    return this;
  }

  describeOutput(index: number, name: string, description: string): this {
    this.assertMutable("describeOutput");
    upsert(this.outputDocs, (doc) => doc.index === index, { index, name, description });
    return this;
  }

  /** Leave this operator out of generated documentation. */
  markPrivate(): this {
    this.assertMutable("markPrivate");
    this.privateOp = true;
    return this;
  }

  allowInputsAcrossDevices(): this {
    this.assertMutable("allowInputsAcrossDevices");
    this.crossDeviceInputs = true;
    return this;
  }

  /**
   * Hands this schema to `populate`, so shared helpers can configure many
   * similar operators without repeating builder chains.
   */
  populateUsing(populate: (schema: OpSchema) => void): this {
    this.assertMutable("populateUsing");
    populate(this);
    return this;
  }

  get doc(): string | undefined {
    return this.docText;
  }

  get args(): readonly ArgumentDoc[] {
    return this.argDocs;
  }

  get inputs(): readonly TensorDoc[] {
    return this.inputDocs;
  }

  get outputs(): readonly TensorDoc[] {
    return this.outputDocs;
  }

  get isPrivate(): boolean {
    return this.privateOp;
  }

  get inputsCanCrossDevices(): boolean {
    return this.crossDeviceInputs;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Ends the configuration phase: every builder method throws afterwards.
   */
  seal(): ReadonlyOpSchema {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  private assertMutable(method: string): void {
    if (this.sealed) {
      throw new SealedSchemaError(
        `Cannot call ${method}() on schema ${this.type}: it is sealed`,
      );
    }
  }
}

function upsert<T>(items: T[], matches: (item: T) => boolean, next: T): void {
  const index = items.findIndex(matches);
  if (index === -1) {
    items.push(next);
  } else {
    items[index] = next;
  }
}
