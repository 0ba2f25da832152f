import type { Readable } from "node:stream";
import { DocumentBuilder } from "../document/builder.js";
import type { Attributes, Element } from "../document/element.js";
import type { Document } from "../document/elements.js";
import { StringSink } from "../document/output.js";
import { parseDocumentStream, parseDocumentString } from "../parser/documentParser.js";
import type { ArrayStreamOptions } from "./arrayElement.js";
import { ArrayElement, ArrayStream } from "./arrayElement.js";

export type ParseOptions = ArrayStreamOptions;

/**
 * Document builder that loads Array payloads into typed arrays instead of
 * keeping their Stream text.
 */
export class ArrayDocumentBuilder extends DocumentBuilder {
  constructor(private readonly options: ParseOptions = {}) {
    super();
  }

  protected override startArray(attributes: Attributes): Element {
    return new ArrayElement(attributes);
  }

  protected override startStream(attributes: Attributes): Element {
    if (this.current instanceof ArrayElement) {
      return new ArrayStream(attributes, this.options);
    }
    return super.startStream(attributes);
  }
}

export const readDocument = (text: string, options: ParseOptions = {}): Document => {
  const builder = new ArrayDocumentBuilder(options);
  parseDocumentString(text, builder);
  return builder.document;
};

export const readDocumentStream = async (
  readable: Readable,
  options: ParseOptions = {}
): Promise<Document> => {
  const builder = new ArrayDocumentBuilder(options);
  await parseDocumentStream(readable, builder);
  return builder.document;
};

export const writeDocument = (document: Element): string => {
  const sink = new StringSink();
  document.write(sink);
  return sink.toString();
};
