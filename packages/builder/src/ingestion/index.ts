/**
 * Data ingestion module.
 *
 * Element sources for the readers. A source is either an iterable of
 * elements, read once and kept in memory, or a factory that streams the
 * elements again on every call (PBF files are swept twice without being
 * held in memory).
 *
 * Sources:
 * OSM PBF file | saved Overpass JSON | Overpass API -> OsmElement stream
 */

import { readFileSync } from "node:fs";
import type { BoundingBox } from "@netweave/types";
import { ReaderConfigError } from "../errors.js";
import { parseOsmPbf } from "./osm/parser.js";
import type { OsmElement } from "./osm/types.js";
import { fetchOverpassData, type OverpassOptions } from "./overpass/query.js";
import { isOverpassJson, parseOverpassResponse } from "./overpass/parser.js";

/** Elements in PBF order (nodes, ways, relations), or a way to stream them again */
export type OsmElementSource =
  | AsyncIterable<OsmElement>
  | (() => AsyncIterable<OsmElement>);

const PBF_EXTENSIONS = [".osm.pbf", ".pbf"];

/** True for file names the readers can open */
export function isSupportedOsmFile(path: string): boolean {
  const lower = path.toLowerCase();
  return lower.endsWith(".json") || PBF_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

/**
 * Source for an OSM file, picked by extension: `.osm.pbf`/`.pbf` are
 * streamed, `.json` is read as a saved Overpass response.
 */
export function osmFileSource(path: string): () => AsyncIterable<OsmElement> {
  if (!isSupportedOsmFile(path)) {
    throw new ReaderConfigError(
      `Unsupported OSM input '${path}': expected .osm.pbf, .pbf or .json`
    );
  }
  if (path.toLowerCase().endsWith(".json")) {
    const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
    if (!isOverpassJson(parsed)) {
      throw new ReaderConfigError(`${path} is not an Overpass JSON response`);
    }
    return () => parseOverpassResponse(parsed);
  }
  return () => parseOsmPbf(path);
}

/**
 * Fetch the elements of a bounding box from the Overpass API (through the
 * tile cache). The tile fetched may be larger than the requested box.
 */
export async function fetchOverpassElements(
  bbox: BoundingBox,
  options?: OverpassOptions
): Promise<{ elements: OsmElement[]; fetchedBbox: BoundingBox }> {
  const { data, fetchedBbox } = await fetchOverpassData(bbox, options);
  const elements: OsmElement[] = [];
  for await (const element of parseOverpassResponse(data)) {
    elements.push(element);
  }
  return { elements, fetchedBbox };
}

/** Source that can be swept any number of times */
export type ReplayableSource = () => AsyncIterable<OsmElement> | Iterable<OsmElement>;

/**
 * Make a source sweepable more than once. A factory is used as is; a plain
 * iterable is read into memory first.
 */
export async function toReplayableSource(source: OsmElementSource): Promise<ReplayableSource> {
  if (typeof source === "function") return source;
  const elements: OsmElement[] = [];
  for await (const element of source) elements.push(element);
  return () => elements;
}
