/**
 * Splitting of circular OSM ways into link-sized parts.
 *
 * A link cannot start and end at the same node, so any way that visits a
 * node twice is cut into parts before it joins the network:
 *
 * - the lead-up before a loop and the remainder after it are plain parts
 * - the loop itself is cut where it meets the rest of the network; with
 *   fewer than two such connections it is cut at roughly opposite points
 *
 * The split is decided here purely from ref positions; building links from
 * the parts is up to the layer parser.
 */

import type { Location } from "@netweave/types";
import { isRingClockwise } from "../geo/geometry.js";
import type { CircularDirection } from "../ingestion/osm/tag-extractors.js";
import type { OsmWay } from "../ingestion/osm/types.js";
import { findIndicesOfFirstLoop, refIndexRange } from "../ingestion/osm/way-utils.js";

/** Ref positions of a loop section; refs at start and end are the same node */
export interface LoopSection {
  start: number;
  end: number;
}

export interface CircularWayPart {
  /** Ref positions in drawing order */
  indices: number[];
  /** Loop the part belongs to; undefined for lead-up and remainder parts */
  loop?: LoopSection;
}

/**
 * Cut a way containing one or more loops into parts.
 *
 * @param isConnection - true when the node at a ref position is already
 *   part of the network (in any layer)
 */
export function splitCircularWay(
  way: OsmWay,
  isConnection: (refIndex: number) => boolean
): CircularWayPart[] {
  const parts: CircularWayPart[] = [];
  const lastIndex = way.refs.length - 1;
  let start = 0;

  while (start < lastIndex) {
    const found = findIndicesOfFirstLoop(way, start);
    if (!found) {
      parts.push({ indices: refIndexRange(start, lastIndex) });
      break;
    }

    const [loopStart, loopEnd] = found;
    if (loopStart > start) {
      parts.push({ indices: refIndexRange(start, loopStart) });
    }
    // Same node twice in a row: nothing to split
    if (loopEnd - loopStart > 1) {
      const loop = { start: loopStart, end: loopEnd };
      for (const indices of splitLoop(loop, isConnection)) {
        parts.push({ indices, loop });
      }
    }
    start = loopEnd;
  }

  return parts;
}

/**
 * Positions at which a loop is cut, in ascending order.
 */
export function findLoopSplitPositions(
  loop: LoopSection,
  isConnection: (refIndex: number) => boolean
): number[] {
  const length = loop.end - loop.start;
  const half = Math.floor(length / 2);

  const connections: number[] = [];
  for (let i = loop.start; i < loop.end; i++) {
    if (isConnection(i)) connections.push(i);
  }

  if (connections.length >= 2) return connections;

  const first = connections[0] ?? loop.start;
  const opposite = loop.start + ((first - loop.start + half) % length);
  return [first, opposite].sort((a, b) => a - b);
}

function splitLoop(
  loop: LoopSection,
  isConnection: (refIndex: number) => boolean
): number[][] {
  const splits = findLoopSplitPositions(loop, isConnection);
  const parts: number[][] = [];

  for (let k = 0; k < splits.length - 1; k++) {
    const from = splits[k];
    const to = splits[k + 1];
    if (from !== undefined && to !== undefined) parts.push(refIndexRange(from, to));
  }

  const firstSplit = splits[0];
  const lastSplit = splits[splits.length - 1];
  if (firstSplit !== undefined && lastSplit !== undefined) {
    parts.push(
      firstSplit === loop.start
        ? refIndexRange(lastSplit, loop.end)
        : refIndexRange(lastSplit, firstSplit, loop)
    );
  }
  return parts;
}

/**
 * True when a loop drawn along `ring` must be reversed to run in the
 * given travel direction.
 */
export function needsReversal(
  ring: readonly Location[],
  travelDirection: CircularDirection
): boolean {
  return isRingClockwise(ring) !== (travelDirection === "clockwise");
}
