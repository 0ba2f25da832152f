import type { Index, Shape } from "./shape.js";
import { sameShape, shapeSize } from "./shape.js";
import type { ScalarType } from "./types.js";

export type Scalar = number | bigint;

export type NumberStorage =
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array;

export type BigIntStorage = BigInt64Array | BigUint64Array;

export type ScalarStorage = NumberStorage | BigIntStorage;

const allocate = (type: ScalarType, length: number): ScalarStorage => {
  switch (type) {
    case "int16":
      return new Int16Array(length);
    case "uint16":
      return new Uint16Array(length);
    case "int32":
      return new Int32Array(length);
    case "uint32":
      return new Uint32Array(length);
    case "int64":
      return new BigInt64Array(length);
    case "uint64":
      return new BigUint64Array(length);
    case "float32":
      return new Float32Array(length);
    case "float64":
      return new Float64Array(length);
  }
};

const isBigIntStorage = (data: ScalarStorage): data is BigIntStorage =>
  data instanceof BigInt64Array || data instanceof BigUint64Array;

const rowMajorStrides = (shape: Shape): number[] => {
  const strides = new Array<number>(shape.length);
  let stride = 1;
  for (let i = shape.length - 1; i >= 0; i -= 1) {
    strides[i] = stride;
    stride *= shape[i];
  }
  return strides;
};

/**
 * Dense numeric array stored row-major (last axis contiguous) in a typed
 * array matching its scalar type. 64-bit integer types hold bigints.
 */
export class NdArray {
  readonly type: ScalarType;
  readonly shape: Shape;
  readonly data: ScalarStorage;
  private readonly strides: number[];

  private constructor(type: ScalarType, shape: Shape, data: ScalarStorage) {
    this.type = type;
    this.shape = [...shape];
    this.data = data;
    this.strides = rowMajorStrides(shape);
  }

  static zeros(type: ScalarType, shape: Shape): NdArray {
    return new NdArray(type, shape, allocate(type, shapeSize(shape)));
  }

  static from(type: ScalarType, shape: Shape, values: ArrayLike<Scalar>): NdArray {
    const size = shapeSize(shape);
    if (values.length !== size) {
      throw new RangeError(
        `Expected ${size} values for shape [${shape.join(", ")}], got ${values.length}`
      );
    }
    const array = NdArray.zeros(type, shape);
    for (let i = 0; i < size; i += 1) {
      array.setAt(i, values[i]);
    }
    return array;
  }

  get size(): number {
    return this.data.length;
  }

  offsetOf(index: Index): number {
    if (index.length !== this.shape.length) {
      throw new RangeError(
        `Index has ${index.length} positions, array has ${this.shape.length} dimensions`
      );
    }
    let offset = 0;
    for (let i = 0; i < index.length; i += 1) {
      const position = index[i];
      if (!Number.isInteger(position) || position < 0 || position >= this.shape[i]) {
        throw new RangeError(`Index [${index.join(", ")}] out of bounds for shape [${this.shape.join(", ")}]`);
      }
      offset += position * this.strides[i];
    }
    return offset;
  }

  /** Values in storage order. */
  values(): Scalar[] {
    const values: Scalar[] = [];
    for (const value of this.data) {
      values.push(value);
    }
    return values;
  }

  get(index: Index): Scalar {
    return this.data[this.offsetOf(index)];
  }

  set(index: Index, value: Scalar): void {
    this.setAt(this.offsetOf(index), value);
  }

  setAt(offset: number, value: Scalar): void {
    if (isBigIntStorage(this.data)) {
      this.data[offset] = typeof value === "bigint" ? value : BigInt(value);
    } else {
      this.data[offset] = Number(value);
    }
  }

  equals(other: NdArray): boolean {
    if (this.type !== other.type || !sameShape(this.shape, other.shape)) {
      return false;
    }
    for (let i = 0; i < this.data.length; i += 1) {
      if (!Object.is(this.data[i], other.data[i])) {
        return false;
      }
    }
    return true;
  }
}
