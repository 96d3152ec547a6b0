import type { CallSite } from "../core/call-site";

/**
 * A second registration for an operator type that already has a schema.
 * This is an authoring mistake, not a runtime condition: hosts are expected
 * to let it terminate startup.
 */
export class DuplicateSchemaError extends Error {
  name = "DuplicateSchemaError";
  readonly fatal = true;

  constructor(
    readonly type: string,
    readonly attempted: CallSite,
    readonly existing: CallSite,
  ) {
    super(
      `Trying to register schema with name ${type} from file ${attempted.file} line ${attempted.line}, ` +
        `but it is already registered from file ${existing.file} line ${existing.line}`,
    );
  }
}

export class SealedRegistryError extends Error {
  name = "SealedRegistryError";
}

export class SealedSchemaError extends Error {
  name = "SealedSchemaError";
}

export class MissingSchemaError extends Error {
  name = "MissingSchemaError";

  constructor(readonly type: string) {
    super(`No schema registered for operator type: ${type}`);
  }
}

export class CostInferenceUnavailableError extends Error {
  name = "CostInferenceUnavailableError";

  constructor(readonly type: string) {
    super(`No cost inference function registered for ${type}`);
  }
}

export class ShapeInferenceError extends Error {
  name = "ShapeInferenceError";
}
