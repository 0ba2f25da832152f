import { mkdtemp, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { getArrayByName } from "../codec/names.js";
import { loadDocument, saveDocument } from "../io/documents.js";

const INPUT = [
  "<?xml version='1.0' encoding='utf-8' ?>",
  '<!DOCTYPE LIGO_LW SYSTEM "http://ldas-sw.ligo.caltech.edu/doc/ligolwAPI/html/ligolw_dtd.txt">',
  '<LIGO_LW Name="psd">',
  '\t<Param Name="epoch" Type="real_8">0</Param>',
  '\t<Array Name="H1:psd:array" Type="int_8s">',
  '\t\t<Dim Name="frequency">2</Dim>',
  '\t\t<Dim Name="sample">3</Dim>',
  '\t\t<Stream Type="Local" Delimiter=" ">',
  "\t\t\t-9223372036854775808 0 9223372036854775807 ",
  "\t\t\t1 2 3",
  "\t\t</Stream>",
  "\t</Array>",
  "</LIGO_LW>",
  "",
].join("\n");

describe("end-to-end document round trip", () => {
  it("loads a document from disk and writes it back identically", async () => {
    const tempDir = await mkdtemp(path.join(tmpdir(), "lw-array-"));
    const inputPath = path.join(tempDir, "input.xml");
    const outputPath = path.join(tempDir, "output.xml.gz");
    const copyPath = path.join(tempDir, "copy.xml");

    await writeFile(inputPath, INPUT, "utf8");

    const document = await loadDocument(inputPath);
    const array = getArrayByName(document, "psd").array;
    expect(array.shape).toEqual([3, 2]);
    expect(array.get([0, 0])).toBe(-9223372036854775808n);
    expect(array.get([2, 0])).toBe(9223372036854775807n);
    expect(array.get([0, 1])).toBe(1n);

    await saveDocument(document, outputPath);
    const reloaded = await loadDocument(outputPath);
    expect(getArrayByName(reloaded, "psd").array.equals(array)).toBe(true);

    await saveDocument(reloaded, copyPath);
    expect(await readFile(copyPath, "utf8")).toBe(INPUT);
  });
});
