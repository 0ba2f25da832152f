import { describe, expect, it } from "vitest";
import { IndexSequencer } from "./indexSequencer.js";

describe("IndexSequencer", () => {
  it("advances position 0 fastest", () => {
    expect([...new IndexSequencer([2, 3])]).toEqual([
      [0, 0],
      [1, 0],
      [0, 1],
      [1, 1],
      [0, 2],
      [1, 2],
    ]);
  });

  it("reports exhaustion explicitly and stays exhausted", () => {
    const sequencer = new IndexSequencer([2]);
    expect(sequencer.hasNext()).toBe(true);
    expect(sequencer.next()).toEqual({ done: false, value: [0] });
    expect(sequencer.next()).toEqual({ done: false, value: [1] });
    expect(sequencer.hasNext()).toBe(false);
    expect(sequencer.next()).toEqual({ done: true, value: undefined });
    expect(sequencer.next()).toEqual({ done: true, value: undefined });
  });

  it("is immediately exhausted when a dimension is empty", () => {
    const sequencer = new IndexSequencer([3, 0, 2]);
    expect(sequencer.hasNext()).toBe(false);
    expect([...sequencer]).toEqual([]);
  });

  it("yields a single empty index for a shape without dimensions", () => {
    expect([...new IndexSequencer([])]).toEqual([[]]);
  });

  it("yields as many indices as the shape holds", () => {
    expect([...new IndexSequencer([3, 1, 4])]).toHaveLength(12);
  });

  it("returns independent index tuples", () => {
    const sequencer = new IndexSequencer([2, 2]);
    const first = sequencer.next();
    sequencer.next();
    expect(first.value).toEqual([0, 0]);
  });
});
