import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { ParseOptions } from "../codec/handler.js";
import { ArrayDocumentBuilder } from "../codec/handler.js";
import type { Element } from "../document/element.js";
import type { Document } from "../document/elements.js";
import { ElementError } from "../document/errors.js";
import { StringSink } from "../document/output.js";
import { createDocumentParser } from "../parser/documentParser.js";
import { TokenizerError } from "../tokenizer/tokenizer.js";
import { compressorFor, createReadStream, createWriteStream, decompressorFor } from "./streams.js";

export type LoadOptions = ParseOptions & {
  signal?: AbortSignal;
};

export type SaveOptions = {
  signal?: AbortSignal;
};

// Codec errors already name the array at fault and keep their kind.
const withContext = (message: string) => (error: unknown): never => {
  if (error instanceof ElementError || error instanceof TokenizerError) {
    throw error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  throw new Error(`${message}: ${detail}`, { cause: error });
};

/** Reads a document from disk, gunzipping files whose name ends in `.gz`. */
export const loadDocument = async (path: string, options: LoadOptions = {}): Promise<Document> => {
  const { signal, ...parseOptions } = options;
  const builder = new ArrayDocumentBuilder(parseOptions);
  const { sink } = createDocumentParser(builder);
  const source = createReadStream(path, signal);
  const gunzip = decompressorFor(path);

  const done = gunzip ? pipeline(source, gunzip, sink) : pipeline(source, sink);
  await done.catch(withContext(`Failed to read input file "${path}"`));
  return builder.document;
};

/** Writes a document to disk, gzipping it when the name ends in `.gz`. */
export const saveDocument = async (
  document: Element,
  path: string,
  options: SaveOptions = {}
): Promise<void> => {
  const text = new StringSink();
  document.write(text);

  const source = Readable.from(text.chunks);
  const target = createWriteStream(path, options.signal);
  const gzip = compressorFor(path);

  const done = gzip ? pipeline(source, gzip, target) : pipeline(source, target);
  await done.catch(withContext(`Failed to write output file "${path}"`));
};
