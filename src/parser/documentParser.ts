import { StringDecoder } from "node:string_decoder";
import { Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { Readable } from "node:stream";
import { SaxesParser } from "saxes";
import type { ContentHandler } from "../document/builder.js";
import type { Attributes } from "../document/element.js";

const attributeValue = (value: unknown): string => {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "object" && value !== null && "value" in value && typeof value.value === "string") {
    return value.value;
  }
  return "";
};

const toAttributes = (raw: Readonly<Record<string, unknown>>): Attributes => {
  const attributes: Record<string, string> = {};
  for (const [name, value] of Object.entries(raw)) {
    attributes[name] = attributeValue(value);
  }
  return attributes;
};

/**
 * Wires a saxes parser to a content handler. Errors raised by the handler
 * propagate out of `parser.write`.
 */
export const createXmlReader = (handler: ContentHandler): SaxesParser => {
  const parser = new SaxesParser();
  parser.on("opentag", (tag) => handler.startElement(tag.name, toAttributes(tag.attributes)));
  parser.on("text", (text) => handler.characters(text));
  parser.on("cdata", (text) => handler.characters(text));
  parser.on("closetag", (tag) => handler.endElement(tag.name));
  return parser;
};

const createParserSink = (parser: SaxesParser): Writable => {
  const decoder = new StringDecoder("utf8");
  return new Writable({
    decodeStrings: false,
    write(chunk: unknown, _encoding, callback) {
      try {
        parser.write(Buffer.isBuffer(chunk) ? decoder.write(chunk) : String(chunk));
        callback();
      } catch (error) {
        callback(error instanceof Error ? error : new Error(String(error)));
      }
    },
    final(callback) {
      try {
        const tail = decoder.end();
        if (tail) {
          parser.write(tail);
        }
        parser.close();
        callback();
      } catch (error) {
        callback(error instanceof Error ? error : new Error(String(error)));
      }
    },
  });
};

export const createDocumentParser = (
  handler: ContentHandler
): { parser: SaxesParser; sink: Writable } => {
  const parser = createXmlReader(handler);
  return { parser, sink: createParserSink(parser) };
};

export const parseDocumentStream = async (
  readable: Readable,
  handler: ContentHandler
): Promise<void> => {
  const { sink } = createDocumentParser(handler);
  await pipeline(readable, sink);
};

export const parseDocumentString = (text: string, handler: ContentHandler): void => {
  const parser = createXmlReader(handler);
  parser.write(text);
  parser.close();
};
