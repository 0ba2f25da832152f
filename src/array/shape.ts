/**
 * Declared dimensions and storage shape.
 *
 * Dim elements list sizes slowest axis first as they appear in the document,
 * while the text payload varies the last declared dimension fastest. The
 * storage shape is the declaration reversed, so position 0 of a shape is the
 * fastest-varying axis of the payload.
 */

export type DimensionList = readonly number[];
export type Shape = readonly number[];
export type Index = readonly number[];

export const resolveShape = (dimensions: DimensionList): Shape => [...dimensions].reverse();

export const dimensionsFromShape = (shape: Shape): DimensionList => [...shape].reverse();

export const shapeSize = (shape: Shape): number =>
  shape.reduce((total, size) => total * size, 1);

export const sameShape = (a: Shape, b: Shape): boolean =>
  a.length === b.length && a.every((size, i) => size === b[i]);
