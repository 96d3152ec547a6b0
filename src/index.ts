export * from "./schema";
export { type CallSite, captureCallSite } from "./core/call-site";
export { setVerifyLogging, verifyLoggingEnabled } from "./core/config";
export {
  copyDevice,
  defaultDevice,
  type DeviceKind,
  type DeviceOption,
  devicesEqual,
  formatDevice,
} from "./core/device";
export {
  type Argument,
  type ArgumentValue,
  getArgument,
  getStringArgument,
  hasArgument,
  type OperatorDef,
  operatorLabel,
} from "./core/operator";
export {
  cloneTensorShape,
  createTensorShape,
  type DataType,
  elementByteSize,
  getDimsVector,
  isDataType,
  shapesEqual,
  sizeOf,
  type TensorShape,
  unknownTensorShape,
} from "./core/shape";
