import type { Element } from "../document/element.js";
import { ElementError } from "../document/errors.js";
import { ArrayElement } from "./arrayElement.js";

// "<prefix>:<name>:array" or "<name>:array"; anything else is used as-is.
const ARRAY_NAME_PATTERN = /^(?:[a-z0-9_]+:)?(?<name>[a-z0-9_]+):array$/;

export const stripArrayName = (name: string): string =>
  ARRAY_NAME_PATTERN.exec(name)?.groups?.name ?? name;

export const compareArrayNames = (a: string, b: string): -1 | 0 | 1 => {
  const left = stripArrayName(a);
  const right = stripArrayName(b);
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
};

export const getAllArrays = (root: Element): ArrayElement[] =>
  root
    .getElements((element) => element instanceof ArrayElement)
    .filter((element): element is ArrayElement => element instanceof ArrayElement);

export const getArraysByName = (root: Element, name: string): ArrayElement[] =>
  getAllArrays(root).filter((element) => compareArrayNames(element.name, name) === 0);

export const getArrayByName = (root: Element, name: string): ArrayElement => {
  const matches = getArraysByName(root, name);
  if (matches.length !== 1) {
    throw new ElementError(
      "InvalidStructure",
      `Expected exactly one Array named "${name}", found ${matches.length}`
    );
  }
  return matches[0];
};
