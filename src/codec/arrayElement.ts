import { IndexSequencer } from "../array/indexSequencer.js";
import { NdArray } from "../array/ndarray.js";
import type { Scalar } from "../array/ndarray.js";
import type { DimensionList, Shape } from "../array/shape.js";
import { dimensionsFromShape, resolveShape, sameShape } from "../array/shape.js";
import type { ScalarType, StorageKind } from "../array/types.js";
import { classify, nameFor, storageScalarType } from "../array/types.js";
import type { Attributes } from "../document/element.js";
import { Element } from "../document/element.js";
import { Dim, Stream, TagName } from "../document/elements.js";
import { ElementError } from "../document/errors.js";
import type { TextSink } from "../document/output.js";
import { INDENT } from "../document/output.js";
import { Tokenizer } from "../tokenizer/tokenizer.js";

/**
 * Load state of an Array element's values.
 *
 * - `empty`: no stream text seen yet, nothing allocated.
 * - `allocated`: buffer sized and zero-filled, `cursor` points at the next slot.
 * - `complete`: the stream has ended or the buffer was attached directly.
 */
export type ArrayContents =
  | { status: "empty" }
  | { status: "allocated"; data: NdArray; cursor: IndexSequencer }
  | { status: "complete"; data: NdArray };

export type ArrayStreamOptions = {
  /** Reject streams that supply fewer values than the shape holds. */
  strict?: boolean;
};

export const formatScalar = (value: Scalar): string => {
  if (typeof value === "bigint") {
    return value.toString();
  }
  return Object.is(value, -0) ? "-0" : String(value);
};

export class ArrayElement extends Element {
  readonly scalarType: ScalarType;
  readonly storageKind: StorageKind;
  private state: ArrayContents = { status: "empty" };

  constructor(attributes: Attributes = {}) {
    super(TagName.Array, attributes);
    const type = this.getAttribute("Type");
    this.storageKind = classify(type);
    this.scalarType = storageScalarType(type);
  }

  get name(): string {
    return this.getAttribute("Name");
  }

  get contents(): ArrayContents {
    return this.state;
  }

  get array(): NdArray {
    if (this.state.status !== "complete") {
      throw new ElementError("InvalidStructure", `Array "${this.name}" has not been loaded`);
    }
    return this.state.data;
  }

  /** Declared sizes of the Dim children, in document order. */
  dimensions(): DimensionList {
    return this.getChildrenByTagName(TagName.Dim).map((child) => {
      if (!(child instanceof Dim)) {
        throw new ElementError("InvalidStructure", `Array "${this.name}" has an unrecognized Dim child`);
      }
      return child.size;
    });
  }

  getShape(): Shape {
    return resolveShape(this.dimensions());
  }

  get stream(): ArrayStream {
    const stream = this.childNodes.find((child): child is ArrayStream => child instanceof ArrayStream);
    if (!stream) {
      throw new ElementError("InvalidStructure", `Array "${this.name}" has no Stream`);
    }
    return stream;
  }

  /** Moves from empty to allocated on the first chunk of stream text. */
  beginFill(): { data: NdArray; cursor: IndexSequencer } {
    switch (this.state.status) {
      case "allocated":
        return this.state;
      case "complete":
        throw new ElementError("InvalidStructure", `Array "${this.name}" is already complete`);
      case "empty": {
        const shape = this.getShape();
        const allocated = {
          status: "allocated" as const,
          data: NdArray.zeros(this.scalarType, shape),
          cursor: new IndexSequencer(shape),
        };
        this.state = allocated;
        return allocated;
      }
    }
  }

  store(token: Scalar): void {
    const { data, cursor } = this.beginFill();
    const step = cursor.next();
    if (step.done) {
      throw new ElementError("ArrayOverflow", `too many values in Array "${this.name}"`);
    }
    data.set(step.value, token);
  }

  completeFill({ strict = false }: ArrayStreamOptions = {}): void {
    if (this.state.status !== "allocated") {
      throw new ElementError("InvalidStructure", `Array "${this.name}" received no stream data`);
    }
    if (strict && this.state.cursor.hasNext()) {
      throw new ElementError("ArrayUnderflow", `too few values in Array "${this.name}"`);
    }
    this.state = { status: "complete", data: this.state.data };
  }

  /** Attaches values directly, bypassing the stream. */
  attach(array: NdArray): void {
    if (array.type !== this.scalarType) {
      throw new ElementError(
        "InvalidStructure",
        `Array "${this.name}" holds ${this.scalarType}, got ${array.type}`
      );
    }
    const shape = this.getShape();
    if (!sameShape(shape, array.shape)) {
      throw new ElementError(
        "InvalidStructure",
        `Array "${this.name}" has shape [${shape.join(", ")}], got [${array.shape.join(", ")}]`
      );
    }
    this.state = { status: "complete", data: array };
  }

  override appendData(text: string): void {
    // Only whitespace between children is expected here.
    if (text.trim().length > 0) {
      super.appendData(text);
    }
  }

  override unlink(): void {
    super.unlink();
    this.state = { status: "empty" };
  }
}

/**
 * Stream child of an Array. Parses its delimited text straight into the parent
 * array's buffer and writes the buffer back out in the same layout.
 */
export class ArrayStream extends Stream {
  readonly tokenizer: Tokenizer;
  private readonly options: ArrayStreamOptions;

  constructor(attributes: Attributes = {}, options: ArrayStreamOptions = {}) {
    super(attributes);
    this.tokenizer = new Tokenizer(this.delimiter);
    this.options = options;
  }

  private get owner(): ArrayElement {
    const parent: Element | null = this.parentNode;
    if (!(parent instanceof ArrayElement)) {
      throw new ElementError("InvalidStructure", "Array Stream must be a child of an Array");
    }
    return parent;
  }

  override appendData(text: string): void {
    const owner = this.owner;
    if (owner.contents.status === "empty") {
      this.tokenizer.setType(owner.scalarType);
    }
    owner.beginFill();
    for (const token of this.tokenizer.feed(text)) {
      owner.store(token);
    }
  }

  /** The tokenizer withholds the last token until it sees a delimiter. */
  override endElement(): void {
    this.appendData(this.delimiter);
    this.owner.completeFill(this.options);
  }

  override unlink(): void {
    this.tokenizer.reset();
    super.unlink();
  }

  override write(sink: TextSink, indent = ""): void {
    const array = this.owner.array;
    const delimiter = this.delimiter;
    const lineStart = indent + INDENT;
    const indices = new IndexSequencer(array.shape);

    sink.write(`${this.startTag(indent)}\n`);
    let step = indices.next();
    if (!step.done) {
      sink.write(lineStart);
    }
    while (!step.done) {
      sink.write(formatScalar(array.get(step.value)));
      step = indices.next();
      if (step.done) {
        break;
      }
      sink.write(delimiter);
      if (step.value.length > 0 && step.value[0] === 0) {
        sink.write(`\n${lineStart}`);
      }
    }
    sink.write("\n");
    sink.write(`${this.endTag(indent)}\n`);
  }
}

export type FromArrayOptions = {
  dimNames?: readonly string[];
  delimiter?: string;
};

/** Builds an Array subtree around an in-memory array. */
export const fromArray = (
  name: string,
  array: NdArray,
  { dimNames, delimiter = " " }: FromArrayOptions = {}
): ArrayElement => {
  const element = new ArrayElement({ Name: name, Type: nameFor(array.type) });
  const dimensions = dimensionsFromShape(array.shape);
  if (dimNames && dimNames.length !== dimensions.length) {
    throw new RangeError(`Expected ${dimensions.length} dimension names, got ${dimNames.length}`);
  }
  dimensions.forEach((size, i) => {
    const dim = element.appendChild(new Dim(dimNames ? { Name: dimNames[i] } : {}));
    dim.size = size;
  });
  element.appendChild(new ArrayStream({ Type: "Local", Delimiter: delimiter }));
  element.attach(array);
  return element;
};
