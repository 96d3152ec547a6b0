import {
  getStringArgument,
  isDataType,
  registerSchema,
  ShapeInferenceError,
  unknownTensorShape,
} from "../../src";

registerSchema("Cast")
  .setInputCount(1)
  .setOutputCount(1)
  .setTensorInferenceFunction((def, inputs) => {
    const to = getStringArgument(def, "to");
    if (to === undefined || !isDataType(to)) {
      throw new ShapeInferenceError(`Cast has no valid "to" argument: ${String(to)}`);
    }
    const input = inputs[0] ?? unknownTensorShape();
    return def.outputs.map(() => ({
      dims: input.dims.slice(),
      dataType: to,
      unknownShape: input.unknownShape,
    }));
  })
  .setDoc("Converts the elements of the input tensor to another element type.")
  .describeArgument("to", "Element type of the output tensor.", { required: true })
  .describeInput(0, "input", "Input tensor.")
  .describeOutput(0, "output", "Input tensor converted to the requested type.");
