import type { Scalar } from "../array/ndarray.js";
import type { ScalarType } from "../array/types.js";
import { isBigIntScalar, kindOf } from "../array/types.js";

export class TokenizerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TokenizerError";
  }
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL_FLOAT_PATTERN = /^([+-]?)(inf|infinity|nan)$/i;

type Boundary = {
  start: number;
  end: number;
};

/**
 * Splits delimited text into scalar tokens as it arrives. Text after the last
 * delimiter seen so far is held back, since the next chunk may continue it;
 * feed one more delimiter at the end of input to release it. With a
 * whitespace delimiter any run of whitespace separates two values; otherwise
 * only the final field may be empty.
 */
export class Tokenizer {
  readonly delimiter: string;
  private readonly whitespacePattern: RegExp | null;
  private type: ScalarType = "float64";
  private pending = "";
  // An empty field is only valid as the last one, so it is held until more text
  // shows whether anything follows it.
  private emptyField = false;

  constructor(delimiter: string) {
    if (delimiter.length === 0) {
      throw new TokenizerError("Delimiter must not be empty");
    }
    this.delimiter = delimiter;
    this.whitespacePattern = delimiter.trim().length === 0 ? /\s+/g : null;
  }

  setType(type: ScalarType): void {
    this.type = type;
  }

  get scalarType(): ScalarType {
    return this.type;
  }

  /** Text received but not yet terminated by a delimiter. */
  get remainder(): string {
    return this.pending;
  }

  reset(): void {
    this.pending = "";
    this.emptyField = false;
  }

  *feed(text: string): Generator<Scalar, void, undefined> {
    this.pending += text;
    let position = 0;
    try {
      for (;;) {
        const boundary = this.findBoundary(position);
        if (!boundary) {
          return;
        }
        const raw = this.pending.slice(position, boundary.start).trim();
        position = boundary.end;
        if (this.emptyField) {
          throw new TokenizerError("Empty value between delimiters");
        }
        if (raw.length > 0) {
          yield this.cast(raw);
        } else if (!this.whitespacePattern) {
          this.emptyField = true;
        }
      }
    } finally {
      this.pending = this.pending.slice(position);
    }
  }

  cast(token: string): Scalar {
    if (kindOf(this.type) === "integer") {
      if (!INTEGER_PATTERN.test(token)) {
        throw new TokenizerError(`Cannot parse "${token}" as ${this.type}`);
      }
      return isBigIntScalar(this.type) ? BigInt(token) : Number(token);
    }

    if (FLOAT_PATTERN.test(token)) {
      return Number(token);
    }
    const special = SPECIAL_FLOAT_PATTERN.exec(token);
    if (special) {
      if (special[2].toLowerCase() === "nan") {
        return Number.NaN;
      }
      return special[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
    }
    throw new TokenizerError(`Cannot parse "${token}" as ${this.type}`);
  }

  private findBoundary(from: number): Boundary | undefined {
    if (this.whitespacePattern) {
      this.whitespacePattern.lastIndex = from;
      const match = this.whitespacePattern.exec(this.pending);
      return match ? { start: match.index, end: match.index + match[0].length } : undefined;
    }
    const start = this.pending.indexOf(this.delimiter, from);
    return start === -1 ? undefined : { start, end: start + this.delimiter.length };
  }
}
