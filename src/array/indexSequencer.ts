import type { Index, Shape } from "./shape.js";

/**
 * Enumerates every index of a shape in odometer order: position 0 advances on
 * each step and carries into position 1 when it wraps, and so on. The sequence
 * is exhausted once the last position wraps, or immediately when any size is 0.
 *
 * A sequencer is single-pass; create a new one for each traversal.
 */
export class IndexSequencer implements IterableIterator<Index> {
  private readonly shape: Shape;
  private readonly index: number[];
  private exhausted: boolean;

  constructor(shape: Shape) {
    this.shape = [...shape];
    this.index = new Array<number>(shape.length).fill(0);
    this.exhausted = shape.includes(0);
  }

  hasNext(): boolean {
    return !this.exhausted;
  }

  next(): IteratorResult<Index, undefined> {
    if (this.exhausted) {
      return { done: true, value: undefined };
    }

    const value: Index = [...this.index];
    let carried = true;
    for (let i = 0; i < this.index.length; i += 1) {
      this.index[i] += 1;
      if (this.index[i] < this.shape[i]) {
        carried = false;
        break;
      }
      this.index[i] = 0;
    }
    // Every position wrapped (or there are none): that was the last index.
    if (carried) {
      this.exhausted = true;
    }
    return { done: false, value };
  }

  [Symbol.iterator](): IterableIterator<Index> {
    return this;
  }
}
