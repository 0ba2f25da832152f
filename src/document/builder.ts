import type { Attributes } from "./element.js";
import { Element } from "./element.js";
import { Dim, Document, LigoLw, Stream, TagName } from "./elements.js";
import { ElementError } from "./errors.js";

export interface ContentHandler {
  startElement(name: string, attributes: Attributes): void;
  characters(text: string): void;
  endElement(name: string): void;
}

/**
 * Builds a document tree from parser events. Element construction goes through
 * one `start*` method per known tag so subclasses can substitute their own
 * element types for parts of the tree.
 */
export class DocumentBuilder implements ContentHandler {
  readonly document = new Document();
  protected current: Element = this.document;

  startElement(name: string, attributes: Attributes): void {
    const element = this.createElement(name, attributes);
    this.current.appendChild(element);
    this.current = element;
  }

  characters(text: string): void {
    this.current.appendData(text);
  }

  endElement(name: string): void {
    const element = this.current;
    if (element.tagName !== name) {
      throw new ElementError(
        "InvalidStructure",
        `Unexpected </${name}> while <${element.tagName}> is open`
      );
    }
    element.endElement();
    this.current = element.parentNode ?? this.document;
  }

  protected createElement(name: string, attributes: Attributes): Element {
    switch (name) {
      case TagName.LigoLw:
        return this.startLigoLw(attributes);
      case TagName.Array:
        return this.startArray(attributes);
      case TagName.Dim:
        return this.startDim(attributes);
      case TagName.Stream:
        return this.startStream(attributes);
      default:
        return new Element(name, attributes);
    }
  }

  protected startLigoLw(attributes: Attributes): Element {
    return new LigoLw(attributes);
  }

  protected startArray(attributes: Attributes): Element {
    return new Element(TagName.Array, attributes);
  }

  protected startDim(attributes: Attributes): Element {
    return new Dim(attributes);
  }

  /** `this.current` is still the parent when this runs. */
  protected startStream(attributes: Attributes): Element {
    return new Stream(attributes);
  }
}
