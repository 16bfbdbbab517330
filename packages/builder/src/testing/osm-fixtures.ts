/**
 * In-memory OSM fixtures for tests.
 *
 * Nodes sit on a small grid: x steps east, y steps north, one step being
 * 0.001 degrees (roughly 111 m north-south, 64 m east-west here).
 */

import type { Location } from "@netweave/types";
import type {
  OsmElement,
  OsmNode,
  OsmRelation,
  OsmRelationMember,
  OsmTags,
  OsmWay,
} from "../ingestion/osm/types.js";

export const BASE_LAT = 55;
export const BASE_LNG = 10;
export const GRID_STEP = 0.001;

/** OSM node at grid position (x, y) */
export function gridNode(id: number, x: number, y: number, tags?: OsmTags): OsmNode {
  return osmNode(id, BASE_LAT + y * GRID_STEP, BASE_LNG + x * GRID_STEP, tags);
}

export function osmNode(id: number, lat: number, lon: number, tags?: OsmTags): OsmNode {
  return { type: "node", id, lat, lon, ...(tags && { tags }) };
}

export function osmWay(
  id: number,
  refs: number[],
  tags: OsmTags = { highway: "residential" }
): OsmWay {
  return { type: "way", id, refs, tags };
}

export function osmRelation(
  id: number,
  members: OsmRelationMember[],
  tags: OsmTags
): OsmRelation {
  return { type: "relation", id, members, tags };
}

/** Location of a fixture node */
export function at(node: OsmNode): Location {
  return { lat: node.lat, lng: node.lon };
}

export function nodeTable(nodes: readonly OsmNode[]): Map<number, OsmNode> {
  return new Map(nodes.map((n) => [n.id, n]));
}

/** Stream elements the way a file or Overpass source would */
export async function* elementsOf(
  elements: readonly OsmElement[]
): AsyncGenerator<OsmElement> {
  for (const element of elements) {
    yield element;
  }
}
