/**
 * @netweave/builder
 *
 * Reads OSM data into a multi-layer transport network and public
 * transport zoning.
 *
 * Pipeline:
 * 1. Stream OSM elements (PBF file, saved Overpass JSON or Overpass API)
 * 2. Read the network: ways -> links per layer, broken where ways meet
 * 3. Read the zoning on top of it: platforms, stops and stations ->
 *    transfer zones, groups and connectoids
 */

// Ingestion
export {
  osmFileSource,
  isSupportedOsmFile,
  fetchOverpassElements,
  toReplayableSource,
  type OsmElementSource,
  type ReplayableSource,
} from "./ingestion/index.js";

// OSM parsing
export * from "./ingestion/osm/index.js";

// Overpass API
export * from "./ingestion/overpass/index.js";

// Geometry
export * from "./geo/index.js";
export { GridSpatialIndex, type GridSpatialIndexOptions } from "./spatial/grid-index.js";

// Network
export * from "./network/index.js";

// Network reading
export * from "./network-reader/index.js";

// Zoning
export * from "./zoning/index.js";

export { ReaderConfigError } from "./errors.js";
