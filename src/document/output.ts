export const INDENT = "\t";

export interface TextSink {
  write(text: string): void;
}

export class StringSink implements TextSink {
  readonly chunks: string[] = [];

  write(text: string): void {
    this.chunks.push(text);
  }

  toString(): string {
    return this.chunks.join("");
  }
}

const XML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  // Literal whitespace in attribute values is normalized to spaces by readers.
  "\t": "&#9;",
  "\n": "&#10;",
  "\r": "&#13;",
};

export const escapeAttribute = (value: string): string =>
  value.replace(/[&<>"\t\n\r]/g, (char) => XML_ESCAPES[char]);

export const escapeText = (value: string): string =>
  value.replace(/[&<>]/g, (char) => XML_ESCAPES[char]);
