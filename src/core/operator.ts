import type { DeviceOption } from "./device";

export type ArgumentValue = number | string | number[] | string[];

export type Argument = {
  name: string;
  value: ArgumentValue;
};

/**
 * A concrete use of an operator type: bound input/output names, arguments and
 * an optional placement. Treated as immutable value data.
 */
export type OperatorDef = {
  type: string;
  /** Instance name, used only in diagnostics */
  name?: string;
  inputs: readonly string[];
  outputs: readonly string[];
  args?: readonly Argument[];
  device?: DeviceOption;
  engine?: string;
};

export function getArgument(
  def: OperatorDef,
  name: string,
): ArgumentValue | undefined {
  return def.args?.find((arg) => arg.name === name)?.value;
}

export function hasArgument(def: OperatorDef, name: string): boolean {
  return getArgument(def, name) !== undefined;
}

export function getStringArgument(
  def: OperatorDef,
  name: string,
): string | undefined {
  const value = getArgument(def, name);
  return typeof value === "string" ? value : undefined;
}

export function operatorLabel(def: OperatorDef): string {
  return def.name ? `${def.type} "${def.name}"` : def.type;
}
