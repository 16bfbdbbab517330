import { describe, expect, it } from "vitest";
import { at, gridNode, osmWay } from "../testing/osm-fixtures.js";
import { findLoopSplitPositions, needsReversal, splitCircularWay } from "./circular-ways.js";

const never = () => false;

describe("splitCircularWay", () => {
  it("cuts an unconnected loop at its start and halfway round", () => {
    const way = osmWay(1, [1, 2, 3, 4, 1]);
    const loop = { start: 0, end: 4 };

    expect(splitCircularWay(way, never)).toEqual([
      { indices: [0, 1, 2], loop },
      { indices: [2, 3, 4], loop },
    ]);
  });

  it("cuts at a single connection and opposite it, wrapping past the closing node", () => {
    const way = osmWay(1, [1, 2, 3, 4, 5, 1]);
    const loop = { start: 0, end: 5 };

    expect(splitCircularWay(way, (i) => i === 1)).toEqual([
      { indices: [1, 2, 3], loop },
      { indices: [3, 4, 5, 1], loop },
    ]);
  });

  it("cuts at every connection", () => {
    const way = osmWay(1, [1, 2, 3, 4, 5, 1]);
    const loop = { start: 0, end: 5 };

    expect(splitCircularWay(way, (i) => i === 0 || i === 2)).toEqual([
      { indices: [0, 1, 2], loop },
      { indices: [2, 3, 4, 5], loop },
    ]);
  });

  it("wraps the last part when no cut lies on the loop start", () => {
    const way = osmWay(1, [1, 2, 3, 4, 5, 6, 1]);
    const loop = { start: 0, end: 6 };

    expect(splitCircularWay(way, (i) => i === 2 || i === 4)).toEqual([
      { indices: [2, 3, 4], loop },
      { indices: [4, 5, 6, 1, 2], loop },
    ]);
  });

  it("splits off the lead-up before a loop", () => {
    const way = osmWay(1, [1, 2, 3, 4, 2]);
    const loop = { start: 1, end: 4 };

    expect(splitCircularWay(way, never)).toEqual([
      { indices: [0, 1] },
      { indices: [1, 2], loop },
      { indices: [2, 3, 4], loop },
    ]);
  });

  it("keeps the remainder after a loop as a plain part", () => {
    const way = osmWay(1, [1, 2, 3, 1, 4]);
    const loop = { start: 0, end: 3 };

    expect(splitCircularWay(way, never)).toEqual([
      { indices: [0, 1], loop },
      { indices: [1, 2, 3], loop },
      { indices: [3, 4] },
    ]);
  });

  it("does not treat a repeated neighbour as a loop", () => {
    const way = osmWay(1, [1, 2, 2, 3]);

    expect(splitCircularWay(way, never)).toEqual([
      { indices: [0, 1] },
      { indices: [2, 3] },
    ]);
  });
});

describe("findLoopSplitPositions", () => {
  const loop = { start: 2, end: 8 };

  it("uses the opposite position for a single connection", () => {
    expect(findLoopSplitPositions(loop, (i) => i === 6)).toEqual([3, 6]);
  });

  it("ignores the closing position", () => {
    expect(findLoopSplitPositions(loop, (i) => i === 8)).toEqual([2, 5]);
  });
});

describe("needsReversal", () => {
  // north, east, south: clockwise seen from above
  const clockwiseRing = [
    at(gridNode(1, 0, 0)),
    at(gridNode(2, 0, 1)),
    at(gridNode(3, 1, 1)),
    at(gridNode(4, 1, 0)),
  ];

  it("keeps a ring drawn in the travel direction", () => {
    expect(needsReversal(clockwiseRing, "clockwise")).toBe(false);
  });

  it("reverses a ring drawn against the travel direction", () => {
    expect(needsReversal(clockwiseRing, "anticlockwise")).toBe(true);
    expect(needsReversal([...clockwiseRing].reverse(), "clockwise")).toBe(true);
  });
});
