/**
 * Structural helpers for OSM ways (loops, node availability).
 */

import type { OsmNode, OsmWay } from "./types.js";

/**
 * True when any node appears at least twice in a way of more than two
 * nodes. The circular part may be only a section of the way.
 */
export function isCircularWay(way: OsmWay): boolean {
  return way.refs.length > 2 && findIndicesOfFirstLoop(way, 0) !== undefined;
}

/**
 * Find the start and end index of the first circular section at or after
 * `startIndex`: the first pair of positions referencing the same node.
 */
export function findIndicesOfFirstLoop(
  way: OsmWay,
  startIndex: number
): [number, number] | undefined {
  for (let i = startIndex; i < way.refs.length; i++) {
    const nodeId = way.refs[i];
    for (let j = i + 1; j < way.refs.length; j++) {
      if (way.refs[j] === nodeId) return [i, j];
    }
  }
  return undefined;
}

/**
 * Ref positions from `start` to `end` inclusive.
 *
 * For a loop section (`loop` given) an end before the start wraps around:
 * the walk continues from the loop's closing position at the position
 * right after the loop start, which references the same node.
 */
export function refIndexRange(
  start: number,
  end: number,
  loop?: { start: number; end: number }
): number[] {
  const indices: number[] = [];
  if (end >= start) {
    for (let i = start; i <= end; i++) indices.push(i);
    return indices;
  }
  if (!loop) {
    throw new Error(`Ref range ${start}..${end} wraps around but no loop section was given`);
  }
  for (let i = start; i <= loop.end; i++) indices.push(i);
  for (let i = loop.start + 1; i <= end; i++) indices.push(i);
  return indices;
}

/** True when every node referenced by the way is available */
export function isAllWayNodesAvailable(
  way: OsmWay,
  nodes: ReadonlyMap<number, OsmNode>
): boolean {
  return way.refs.every((id) => nodes.has(id));
}
