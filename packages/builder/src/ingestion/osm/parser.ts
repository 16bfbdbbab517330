/**
 * OSM PBF file parser.
 *
 * Wraps osm-pbf-parser-node to stream OSM elements from a PBF file in file
 * order (nodes, then ways, then relations). Filtering is left to the
 * readers, which decide what is relevant per sweep.
 */

import { createOSMStream } from "osm-pbf-parser-node";
import type { OsmElement, OsmRelationMember } from "./types.js";

/**
 * Raw item from osm-pbf-parser-node.
 * The library's types are incomplete, so we define the shape here.
 */
interface RawOsmItem {
  type: "node" | "way" | "relation" | "header";
  id?: number;
  lat?: number;
  lon?: number;
  refs?: number[];
  members?: { type: string; ref: number; role: string }[];
  tags?: Record<string, string>;
}

/**
 * Options for parsing OSM PBF files.
 */
export interface ParseOptions {
  /** Element types to yield (default: all) */
  types?: readonly OsmElement["type"][];
}

/**
 * Parse an OSM PBF file in a single streaming pass.
 *
 * @param pbfPath - Path to the PBF file
 * @param options - Parsing options
 * @yields Nodes, ways and relations in file order
 */
export async function* parseOsmPbf(
  pbfPath: string,
  options: ParseOptions = {}
): AsyncGenerator<OsmElement> {
  const wanted = new Set(options.types ?? ["node", "way", "relation"]);

  for await (const rawItem of createOSMStream(pbfPath, { withTags: true })) {
    const item = rawItem as RawOsmItem;
    if (item.type === "header" || !wanted.has(item.type) || item.id === undefined) {
      continue;
    }
    const element = toOsmElement(item, item.id);
    if (element) yield element;
  }
}

function toOsmElement(item: RawOsmItem, id: number): OsmElement | undefined {
  const tags = item.tags && Object.keys(item.tags).length > 0 ? item.tags : undefined;
  switch (item.type) {
    case "node":
      if (item.lat === undefined || item.lon === undefined) return undefined;
      return { type: "node", id, lat: item.lat, lon: item.lon, ...(tags && { tags }) };
    case "way":
      if (!item.refs) return undefined;
      return { type: "way", id, refs: item.refs, ...(tags && { tags }) };
    case "relation":
      return {
        type: "relation",
        id,
        members: (item.members ?? []).flatMap(toMember),
        ...(tags && { tags }),
      };
    default:
      return undefined;
  }
}

function toMember(raw: { type: string; ref: number; role: string }): OsmRelationMember[] {
  if (raw.type === "node" || raw.type === "way" || raw.type === "relation") {
    return [{ type: raw.type, ref: raw.ref, role: raw.role }];
  }
  return [];
}

/** Element counts of a PBF file, without building anything */
export async function countPbfElements(
  pbfPath: string
): Promise<Record<OsmElement["type"], number>> {
  const counts: Record<OsmElement["type"], number> = { node: 0, way: 0, relation: 0 };
  for await (const rawItem of createOSMStream(pbfPath)) {
    const item = rawItem as RawOsmItem;
    if (item.type !== "header") counts[item.type]++;
  }
  return counts;
}
