#!/usr/bin/env node
import type { NdArray, Scalar } from "../array/ndarray.js";
import type { ArrayElement } from "../codec/arrayElement.js";
import { formatScalar } from "../codec/arrayElement.js";
import { getAllArrays, getArraysByName } from "../codec/names.js";
import { loadDocument, saveDocument } from "../io/documents.js";

const args = process.argv.slice(2);
const consumedArgs = new Set<number>();

const readFlagValue = (flag: string): string | undefined => {
  const index = args.indexOf(flag);
  if (index === -1) {
    return undefined;
  }

  consumedArgs.add(index);
  const value = args[index + 1];
  if (value) {
    consumedArgs.add(index + 1);
  }
  return value;
};

const readFlag = (flag: string): boolean => {
  const index = args.indexOf(flag);
  if (index === -1) {
    return false;
  }
  consumedArgs.add(index);
  return true;
};

const inputFlag = readFlagValue("--input");
const outputPath = readFlagValue("--output");
const nameFilter = readFlagValue("--name");
const strict = readFlag("--strict");
const positionalArgs = args.filter(
  (value, index) => !consumedArgs.has(index) && !value.startsWith("--")
);

const inputPath = inputFlag ?? positionalArgs[0];

if (!inputPath) {
  console.error(
    "Usage: lw-array <input.xml> [--output <output.xml>] [--name <array name>] [--strict] " +
      "or lw-array --input <input.xml> ..."
  );
  process.exit(1);
}

const abortController = new AbortController();

process.on("SIGINT", () => {
  if (!abortController.signal.aborted) {
    console.error("Aborting: received SIGINT.");
    abortController.abort();
  }
});

type Range = { min: Scalar; max: Scalar } | undefined;

const valueRange = (array: NdArray): Range => {
  let range: Range;
  for (const value of array.data) {
    if (typeof value === "number" && Number.isNaN(value)) {
      continue;
    }
    if (!range) {
      range = { min: value, max: value };
      continue;
    }
    if (value < range.min) range.min = value;
    if (value > range.max) range.max = value;
  }
  return range;
};

const describeArray = (element: ArrayElement): void => {
  const array = element.array;
  const range = valueRange(array);
  console.log(`  ${element.name || "(unnamed)"}`);
  console.log(`    Type:       ${element.getAttribute("Type")}`);
  console.log(`    Dimensions: [${element.dimensions().join(", ")}]`);
  console.log(`    Elements:   ${array.size}`);
  if (range) {
    console.log(`    Min:        ${formatScalar(range.min)}`);
    console.log(`    Max:        ${formatScalar(range.max)}`);
  }
};

const run = async (): Promise<void> => {
  try {
    console.log(`Input document: ${inputPath}`);
    const document = await loadDocument(inputPath, { strict, signal: abortController.signal });

    const arrays = nameFilter ? getArraysByName(document, nameFilter) : getAllArrays(document);
    console.log(`Arrays: ${arrays.length}`);
    for (const element of arrays) {
      describeArray(element);
    }

    if (outputPath) {
      await saveDocument(document, outputPath, { signal: abortController.signal });
      console.log(`Success: document written to ${outputPath}`);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(message);
    process.exitCode = 1;
  }
};

void run();
