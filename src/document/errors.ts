export type ElementErrorKind =
  | "UnknownType"
  | "ArrayOverflow"
  | "ArrayUnderflow"
  | "MalformedDimension"
  | "InvalidStructure";

/**
 * Raised while building or reading a document tree. The `kind` identifies the
 * failure so callers can tell a bad declaration from a bad payload without
 * matching on messages.
 */
export class ElementError extends Error {
  readonly kind: ElementErrorKind;

  constructor(kind: ElementErrorKind, message: string) {
    super(message);
    this.name = "ElementError";
    this.kind = kind;
  }
}

export const isElementError = (error: unknown, kind?: ElementErrorKind): error is ElementError =>
  error instanceof ElementError && (kind === undefined || error.kind === kind);
