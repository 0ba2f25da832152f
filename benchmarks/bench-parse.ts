import { NdArray } from "../src/array/ndarray.js";
import { fromArray } from "../src/codec/arrayElement.js";
import { getArrayByName } from "../src/codec/names.js";
import { readDocument, writeDocument } from "../src/codec/handler.js";
import { LigoLw, Document } from "../src/document/elements.js";

const ROWS = 2000;
const COLUMNS = 512;

function buildDocument(): Document {
  const values = new Float64Array(ROWS * COLUMNS);
  for (let i = 0; i < values.length; i++) {
    values[i] = Math.sin(i) * 1e3;
  }
  const document = new Document();
  const root = document.appendChild(new LigoLw());
  root.appendChild(fromArray("bench:samples:array", NdArray.from("float64", [ROWS, COLUMNS], values)));
  return document;
}

async function main() {
  console.log("Starting benchmark...");
  const text = writeDocument(buildDocument());
  console.log(`Document size: ${(text.length / 1024 / 1024).toFixed(1)} MiB`);

  const start = process.hrtime.bigint();
  const document = readDocument(text);
  const end = process.hrtime.bigint();

  const array = getArrayByName(document, "samples").array;
  const duration = Number(end - start) / 1e9;
  console.log(`Parsed ${array.size} values in ${duration.toFixed(3)}s`);
  console.log(`Throughput: ${(array.size / duration).toFixed(0)} values/s`);
}

main().catch(console.error);
