import { ElementError } from "./errors.js";
import type { TextSink } from "./output.js";
import { escapeAttribute, escapeText, INDENT } from "./output.js";

export type Attributes = Readonly<Record<string, string>>;

export type ElementFilter = (element: Element) => boolean;

/**
 * Node of an in-memory LIGO Light Weight document.
 *
 * Attributes keep their insertion order so documents are written back the way
 * they were read. Character data is collected into `pcdata` unless a subclass
 * overrides `appendData`.
 */
export class Element {
  readonly tagName: string;
  readonly childNodes: Element[] = [];
  parentNode: Element | null = null;
  pcdata = "";
  private readonly attributes = new Map<string, string>();

  constructor(tagName: string, attributes: Attributes = {}) {
    this.tagName = tagName;
    for (const [name, value] of Object.entries(attributes)) {
      this.attributes.set(name, value);
    }
  }

  getAttribute(name: string): string {
    return this.attributes.get(name) ?? "";
  }

  hasAttribute(name: string): boolean {
    return this.attributes.has(name);
  }

  setAttribute(name: string, value: string): void {
    this.attributes.set(name, value);
  }

  attributeEntries(): [string, string][] {
    return [...this.attributes.entries()];
  }

  appendChild<T extends Element>(child: T): T {
    if (child.parentNode) {
      child.parentNode.removeChild(child);
    }
    this.childNodes.push(child);
    child.parentNode = this;
    return child;
  }

  removeChild<T extends Element>(child: T): T {
    const position = this.childNodes.indexOf(child);
    if (position === -1) {
      throw new ElementError("InvalidStructure", `<${child.tagName}> is not a child of <${this.tagName}>`);
    }
    this.childNodes.splice(position, 1);
    child.parentNode = null;
    return child;
  }

  /** Receives a chunk of the element's character data. */
  appendData(text: string): void {
    this.pcdata += text;
  }

  /** Called once the element's end tag has been read. */
  endElement(): void {}

  /** Detaches the subtree and drops anything held on its behalf. */
  unlink(): void {
    if (this.parentNode) {
      this.parentNode.removeChild(this);
    }
    for (const child of [...this.childNodes]) {
      child.unlink();
    }
  }

  getElements(filter: ElementFilter): Element[] {
    const found: Element[] = [];
    for (const child of this.childNodes) {
      if (filter(child)) {
        found.push(child);
      }
      found.push(...child.getElements(filter));
    }
    return found;
  }

  getElementsByTagName(tagName: string): Element[] {
    return this.getElements((element) => element.tagName === tagName);
  }

  getChildrenByTagName(tagName: string): Element[] {
    return this.childNodes.filter((child) => child.tagName === tagName);
  }

  startTag(indent: string): string {
    const attributes = this.attributeEntries()
      .map(([name, value]) => ` ${name}="${escapeAttribute(value)}"`)
      .join("");
    return `${indent}<${this.tagName}${attributes}>`;
  }

  endTag(indent: string): string {
    return `${indent}</${this.tagName}>`;
  }

  write(sink: TextSink, indent = ""): void {
    const text = this.pcdata.trim();
    if (this.childNodes.length === 0) {
      sink.write(`${this.startTag(indent)}${escapeText(text)}${this.endTag("")}\n`);
      return;
    }
    sink.write(`${this.startTag(indent)}\n`);
    if (text.length > 0) {
      sink.write(`${indent}${INDENT}${escapeText(text)}\n`);
    }
    for (const child of this.childNodes) {
      child.write(sink, indent + INDENT);
    }
    sink.write(`${this.endTag(indent)}\n`);
  }
}
