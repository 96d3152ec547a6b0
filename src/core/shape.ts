/**
 * Tensor shape descriptors and pure shape utility functions.
 *
 * A shape descriptor describes a tensor without its data. Zero dependencies,
 * importable from any layer.
 */

export type DataType =
  | "undefined"
  | "float"
  | "int32"
  | "byte"
  | "string"
  | "bool"
  | "uint8"
  | "int8"
  | "uint16"
  | "int16"
  | "int64"
  | "float16"
  | "double";

export type TensorShape = {
  dims: number[];
  dataType: DataType;
  /** True when nothing is known about dims or element type */
  unknownShape: boolean;
};

const ELEMENT_BYTES: Record<DataType, number | null> = {
  undefined: null,
  float: 4,
  int32: 4,
  byte: 1,
  string: null,
  bool: 1,
  uint8: 1,
  int8: 1,
  uint16: 2,
  int16: 2,
  int64: 8,
  float16: 2,
  double: 8,
};

export function isDataType(value: string): value is DataType {
  return Object.hasOwn(ELEMENT_BYTES, value);
}

export function createTensorShape(
  dims: readonly number[],
  dataType: DataType,
): TensorShape {
  return { dims: dims.slice(), dataType, unknownShape: false };
}

export function unknownTensorShape(): TensorShape {
  return { dims: [], dataType: "undefined", unknownShape: true };
}

export function cloneTensorShape(shape: TensorShape): TensorShape {
  return {
    dims: shape.dims.slice(),
    dataType: shape.dataType,
    unknownShape: shape.unknownShape,
  };
}

export function getDimsVector(shape: TensorShape): number[] {
  return shape.dims.slice();
}

export function sizeOf(dims: readonly number[]): number {
  return dims.reduce((acc, dim) => acc * dim, 1);
}

export function shapesEqual(a: readonly number[], b: readonly number[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i += 1) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Bytes per element, or null for element types without a fixed width.
 */
export function elementByteSize(dataType: DataType): number | null {
  return ELEMENT_BYTES[dataType];
}
