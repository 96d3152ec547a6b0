import {
  type Cost,
  elementByteSize,
  type OpSchema,
  registerSchema,
  ShapeInferenceError,
  sizeOf,
  type TensorShape,
} from "../../src";

/**
 * Cost of an op that touches every element of its first input once per
 * input and output.
 */
export function elementwiseCost(
  type: string,
  inputs: readonly TensorShape[],
  numOutputs: number,
  flopsPerElement: number,
): Cost {
  const first = inputs[0];
  if (!first || first.unknownShape) {
    throw new ShapeInferenceError(`${type} cost needs a known shape for input 0`);
  }
  const numel = sizeOf(first.dims);
  const bytes = elementByteSize(first.dataType) ?? 0;
  return {
    flops: numel * flopsPerElement,
    bytesMoved: numel * bytes * (inputs.length + numOutputs),
  };
}

/**
 * Shared configuration for one-input, one-output elementwise ops.
 */
export function unaryElementwise(type: string, formula: string) {
  return (schema: OpSchema): void => {
    schema
      .setInputCount(1)
      .setOutputCount(1)
      .allowOneToOneInplace()
      .identicalTypeAndShape()
      .setCostInferenceFunction((def, inputs) =>
        elementwiseCost(type, inputs, def.outputs.length, 1),
      )
      .setDoc(
        `${type} takes one input tensor and produces one output tensor of the same shape and type, computing ${formula} elementwise.`,
      )
      .describeInput(0, "X", "Input tensor.")
      .describeOutput(0, "Y", `Input tensor with ${type} applied.`);
  };
}

registerSchema("Sum")
  .setInputCount(1, Number.POSITIVE_INFINITY)
  .setOutputCount(1)
  .allowInplace([[0, 0]])
  .allowInputsAcrossDevices()
  .identicalTypeAndShapeOfInput(0)
  .setCostInferenceFunction((def, inputs) =>
    elementwiseCost("Sum", inputs, def.outputs.length, inputs.length - 1),
  )
  .setDoc(
    `
Elementwise sum of all input tensors. Every input and the output share one
shape and element type. The output may alias the first input, in which case
the other inputs are accumulated into it.
`,
  )
  .describeInput(0, "data_0", "First input tensor. May be updated in place.")
  .describeOutput(0, "sum", "Output tensor, same shape as the inputs.");

registerSchema("Relu").populateUsing(unaryElementwise("Relu", "y = max(0, x)"));
registerSchema("Sigmoid").populateUsing(
  unaryElementwise("Sigmoid", "y = 1 / (1 + exp(-x))"),
);
registerSchema("Tanh").populateUsing(unaryElementwise("Tanh", "y = tanh(x)"));
