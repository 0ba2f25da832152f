import { Readable } from "node:stream";
import { describe, expect, it } from "vitest";
import type { ContentHandler } from "../document/builder.js";
import type { Attributes } from "../document/element.js";
import { parseDocumentStream, parseDocumentString } from "./documentParser.js";

type Event =
  | { type: "start"; name: string; attributes: Attributes }
  | { type: "text"; value: string }
  | { type: "end"; name: string };

class RecordingHandler implements ContentHandler {
  readonly events: Event[] = [];

  startElement(name: string, attributes: Attributes): void {
    this.events.push({ type: "start", name, attributes });
  }

  characters(text: string): void {
    this.events.push({ type: "text", value: text });
  }

  endElement(name: string): void {
    this.events.push({ type: "end", name });
  }

  text(): string {
    return this.events.map((event) => (event.type === "text" ? event.value : "")).join("");
  }
}

describe("document parser", () => {
  it("emits the expected sequence for a small document", () => {
    const handler = new RecordingHandler();
    parseDocumentString('<LIGO_LW><Dim Name="x">3</Dim></LIGO_LW>', handler);

    expect(handler.events).toEqual([
      { type: "start", name: "LIGO_LW", attributes: {} },
      { type: "start", name: "Dim", attributes: { Name: "x" } },
      { type: "text", value: "3" },
      { type: "end", name: "Dim" },
      { type: "end", name: "LIGO_LW" },
    ]);
  });

  it("decodes entities in text and attributes", () => {
    const handler = new RecordingHandler();
    parseDocumentString('<Stream Delimiter="&#9;">1&amp;2</Stream>', handler);

    expect(handler.events[0]).toEqual({ type: "start", name: "Stream", attributes: { Delimiter: "\t" } });
    expect(handler.text()).toBe("1&2");
  });

  it("accepts input split at arbitrary points", async () => {
    const handler = new RecordingHandler();
    await parseDocumentStream(
      Readable.from(['<LIGO_LW><St', 'ream Delimiter=",">1,2', ",3</Stream></LIGO_LW>"]),
      handler
    );

    expect(handler.text()).toBe("1,2,3");
    expect(handler.events.at(-1)).toEqual({ type: "end", name: "LIGO_LW" });
  });

  it("decodes multi-byte characters split across buffers", async () => {
    const bytes = Buffer.from("<Comment>é</Comment>", "utf8");
    const cut = bytes.indexOf(0xc3) + 1;
    const handler = new RecordingHandler();
    await parseDocumentStream(Readable.from([bytes.subarray(0, cut), bytes.subarray(cut)]), handler);

    expect(handler.text()).toBe("é");
  });

  it("rejects malformed XML", async () => {
    await expect(parseDocumentStream(Readable.from(["<a><b></a>"]), new RecordingHandler())).rejects.toThrow();
    await expect(parseDocumentStream(Readable.from(["<a>"]), new RecordingHandler())).rejects.toThrow();
  });
});
