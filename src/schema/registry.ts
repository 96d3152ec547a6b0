/**
 * Operator schema registry.
 *
 * Two phases: during startup each operator type calls `createSchema` exactly
 * once and configures the returned builder; afterwards the registry is only
 * read. Nothing here locks. Registration must finish before lookups from
 * other workers begin, and `seal()` makes that boundary explicit.
 */

import { type CallSite, captureCallSite } from "../core/call-site";
import type { OperatorDef } from "../core/operator";
import {
  DuplicateSchemaError,
  MissingSchemaError,
  SealedRegistryError,
} from "./errors";
import {
  type DevicePlacement,
  OpSchema,
  type ReadonlyOpSchema,
  type SchemaViolation,
} from "./op-schema";

const UNKNOWN_SITE: CallSite = { file: "unknown", line: 0 };

export class OpSchemaRegistry {
  private readonly entries = new Map<string, OpSchema>();
  private sealed = false;

  /**
   * Creates the schema for `type` and returns it for configuration.
   *
   * When `file` and `line` are omitted, the caller's stack frame is recorded.
   * A second registration of the same type throws `DuplicateSchemaError`,
   * naming both registration sites.
   */
  createSchema(type: string, file?: string, line?: number): OpSchema {
    const site =
      file !== undefined
        ? { file, line: line ?? 0 }
        : (captureCallSite(this.createSchema) ?? UNKNOWN_SITE);
    if (this.sealed) {
      throw new SealedRegistryError(
        `Cannot register schema ${type} from file ${site.file} line ${site.line}: the registry is sealed`,
      );
    }
    const existing = this.entries.get(type);
    if (existing) {
      const error = new DuplicateSchemaError(type, site, {
        file: existing.file,
        line: existing.line,
      });
      console.error(`[opschema] ${error.message}`);
      throw error;
    }
    const schema = new OpSchema(type, site.file, site.line);
    this.entries.set(type, schema);
    return schema;
  }

  lookup(type: string): ReadonlyOpSchema | undefined {
    return this.entries.get(type);
  }

  has(type: string): boolean {
    return this.entries.has(type);
  }

  types(): string[] {
    return [...this.entries.keys()];
  }

  schemas(): ReadonlyOpSchema[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Ends the registration phase. Further `createSchema` calls throw, and so
   * does any builder method on an already registered schema.
   */
  seal(): void {
    this.sealed = true;
    for (const schema of this.entries.values()) {
      schema.seal();
    }
  }

  get isSealed(): boolean {
    return this.sealed;
  }
}

// ============================================================================
// Process-wide registry
// ============================================================================

export const defaultSchemaRegistry = new OpSchemaRegistry();

/**
 * Registers the schema for an operator type in the process-wide registry.
 * Meant to run once per type at module load, chained with builder calls:
 *
 * ```ts
 * registerSchema("Sum")
 *   .setInputCount(1, Infinity)
 *   .setOutputCount(1)
 *   .allowInplace([[0, 0]])
 *   .identicalTypeAndShapeOfInput(0);
 * ```
 */
export function registerSchema(
  type: string,
  file?: string,
  line?: number,
): OpSchema {
  const site =
    file !== undefined
      ? { file, line: line ?? 0 }
      : (captureCallSite(registerSchema) ?? UNKNOWN_SITE);
  return defaultSchemaRegistry.createSchema(type, site.file, site.line);
}

export function lookupSchema(type: string): ReadonlyOpSchema | undefined {
  return defaultSchemaRegistry.lookup(type);
}

export function sealSchemaRegistry(): void {
  defaultSchemaRegistry.seal();
}

/**
 * Required placement of an operator's inputs and outputs, as declared by the
 * schema of its type. Throws `MissingSchemaError` for unregistered types.
 */
export function inferOperatorDevices(
  def: OperatorDef,
  registry: OpSchemaRegistry = defaultSchemaRegistry,
): DevicePlacement {
  const schema = registry.lookup(def.type);
  if (!schema) {
    throw new MissingSchemaError(def.type);
  }
  return schema.inferDevice(def);
}

/**
 * First rule `def` breaks, or null. Unregistered types are reported as a
 * `missing_schema` violation rather than thrown.
 */
export function verifyOperator(
  def: OperatorDef,
  registry: OpSchemaRegistry = defaultSchemaRegistry,
): SchemaViolation | null {
  const schema = registry.lookup(def.type);
  if (!schema) {
    return {
      rule: "missing_schema",
      message: `No schema registered for operator type: ${def.type}`,
    };
  }
  return schema.check(def);
}
