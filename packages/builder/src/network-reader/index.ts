/**
 * OSM network reader.
 *
 * Turns OSM ways into per-layer links, broken wherever ways meet, and
 * hands the reader state over to the zoning reader through the bridge.
 */

export {
  OsmNetworkReader,
  type NetworkReadResult,
  type NetworkReadStats,
} from "./network-reader.js";
export { NetworkToZoningBridge } from "./bridge.js";
export {
  DEFAULT_NETWORK_READER_SETTINGS,
  DEFAULT_ZONING_READER_SETTINGS,
  resolveNetworkReaderSettings,
  resolveZoningReaderSettings,
  type NetworkReaderSettings,
  type ZoningReaderSettings,
} from "./config.js";
export {
  LinkBreaker,
  reconcileAtLocation,
  type BreakResult,
  type LinearEntity,
  type LinkReplacementListener,
  type ReconcileContext,
  type ReconcileResult,
} from "./link-reconciler.js";
export {
  NetworkLayerReaderData,
  type InternalLocationEntry,
  type LayerDataOptions,
  type LayerDataStats,
} from "./layer-data.js";
export { NetworkLayerParser, type LayerParserStats } from "./layer-parser.js";
export {
  splitCircularWay,
  findLoopSplitPositions,
  needsReversal,
  type CircularWayPart,
  type LoopSection,
} from "./circular-ways.js";
export { NetworkReaderData } from "./reader-data.js";
export { OsmNodeData } from "./osm-node-data.js";
