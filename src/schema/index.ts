export {
  ANY_COUNT,
  acceptsCount,
  type CountPredicate,
  type CountRule,
  type CountRuleSpec,
  countRuleFrom,
  describeCountRule,
} from "./count-rule";
export {
  CostInferenceUnavailableError,
  DuplicateSchemaError,
  MissingSchemaError,
  SealedRegistryError,
  SealedSchemaError,
  ShapeInferenceError,
} from "./errors";
export { formatSchema, renderSchemaDocs } from "./format";
export {
  describeInplaceRule,
  type InplacePair,
  type InplacePredicate,
  type InplaceRule,
  inplaceHolds,
  inplaceRuleFrom,
  NO_INPLACE,
} from "./inplace-rule";
export {
  type ArgumentDoc,
  CANNOT_COMPUTE_NUM_OUTPUTS,
  type Cost,
  type CostInferenceFunction,
  type DeviceInferenceFunction,
  type DevicePlacement,
  type JointCountPredicate,
  OpSchema,
  type OutputCalculator,
  type ReadonlyOpSchema,
  type SchemaRule,
  type SchemaViolation,
  type TensorDoc,
  type TensorInferenceFunction,
} from "./op-schema";
export {
  defaultSchemaRegistry,
  inferOperatorDevices,
  lookupSchema,
  OpSchemaRegistry,
  registerSchema,
  sealSchemaRegistry,
  verifyOperator,
} from "./registry";
