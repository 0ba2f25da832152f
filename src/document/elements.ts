import type { Attributes } from "./element.js";
import { Element } from "./element.js";
import { ElementError } from "./errors.js";
import type { TextSink } from "./output.js";

export const TagName = {
  LigoLw: "LIGO_LW",
  Array: "Array",
  Dim: "Dim",
  Stream: "Stream",
} as const;

export const XML_DECLARATION = "<?xml version='1.0' encoding='utf-8' ?>";
export const DOCTYPE =
  '<!DOCTYPE LIGO_LW SYSTEM "http://ldas-sw.ligo.caltech.edu/doc/ligolwAPI/html/ligolw_dtd.txt">';

const DIMENSION_PATTERN = /^\d+$/;

export class LigoLw extends Element {
  constructor(attributes: Attributes = {}) {
    super(TagName.LigoLw, attributes);
  }
}

/** One axis of an Array; the character data is the axis length. */
export class Dim extends Element {
  constructor(attributes: Attributes = {}) {
    super(TagName.Dim, attributes);
  }

  get size(): number {
    const text = this.pcdata.trim();
    if (!DIMENSION_PATTERN.test(text)) {
      const name = this.getAttribute("Name");
      throw new ElementError(
        "MalformedDimension",
        `Dim${name ? ` "${name}"` : ""} has invalid size "${text}"`
      );
    }
    return Number(text);
  }

  set size(value: number) {
    if (!Number.isInteger(value) || value < 0) {
      throw new ElementError("MalformedDimension", `Invalid dimension size ${value}`);
    }
    this.pcdata = String(value);
  }
}

export class Stream extends Element {
  constructor(attributes: Attributes = {}) {
    super(TagName.Stream, attributes);
  }

  get delimiter(): string {
    return this.getAttribute("Delimiter") || ",";
  }
}

/** Root of a parsed document; holds the top-level element. */
export class Document extends Element {
  constructor() {
    super("#document");
  }

  override write(sink: TextSink): void {
    sink.write(`${XML_DECLARATION}\n${DOCTYPE}\n`);
    for (const child of this.childNodes) {
      child.write(sink, "");
    }
  }
}
