import {
  copyDevice,
  defaultDevice,
  type DeviceOption,
  type OperatorDef,
  registerSchema,
} from "../../src";

function gpuDevice(def: OperatorDef): DeviceOption {
  const device = def.device;
  return device && device.deviceType === "webgpu"
    ? copyDevice(device)
    : { deviceType: "webgpu", deviceId: 0 };
}

registerSchema("CopyCPUToGPU")
  .setInputCount(1)
  .setOutputCount(1)
  .identicalTypeAndShape()
  .allowInputsAcrossDevices()
  .setDeviceInferenceFunction((def) => ({
    inputs: [defaultDevice()],
    outputs: [gpuDevice(def)],
  }))
  .setDoc("Copies a tensor from host memory to the operator's GPU.")
  .describeInput(0, "input", "Tensor in host memory.")
  .describeOutput(0, "output", "Copy of the input on the GPU.");

registerSchema("CopyGPUToCPU")
  .setInputCount(1)
  .setOutputCount(1)
  .identicalTypeAndShape()
  .allowInputsAcrossDevices()
  .setDeviceInferenceFunction((def) => ({
    inputs: [gpuDevice(def)],
    outputs: [defaultDevice()],
  }))
  .setDoc("Copies a tensor from the operator's GPU to host memory.")
  .describeInput(0, "input", "Tensor on the GPU.")
  .describeOutput(0, "output", "Copy of the input in host memory.");
