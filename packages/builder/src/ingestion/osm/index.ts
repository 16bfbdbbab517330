/**
 * OSM parsing module.
 *
 * PBF streaming, entity types, tag interpretation and way classification.
 */

export { parseOsmPbf, countPbfElements, type ParseOptions } from "./parser.js";
export {
  isRoundabout,
  extractOneWay,
  isReverseOneWay,
  extractName,
  extractVerticalLayerIndex,
  resolveCircularTravelDirection,
  type DrivingSide,
  type CircularDirection,
} from "./tag-extractors.js";
export {
  PUBLIC_TRANSPORT_MODES,
  RAIL_MODES,
  isRailMode,
  isPublicTransportMode,
  classifyPublicTransport,
  extractPublicTransportModes,
  isStopAreaRelation,
  isPlatformMultipolygon,
  type PublicTransportRole,
} from "./public-transport-tags.js";
export {
  createWayClassifier,
  parseWayTagTable,
  DEFAULT_WAY_CLASSIFIER,
  type LayerTagRule,
  type WayTagTable,
  type WayClassifier,
} from "./classification.js";
export {
  isCircularWay,
  findIndicesOfFirstLoop,
  refIndexRange,
  isAllWayNodesAvailable,
} from "./way-utils.js";
export type {
  OsmNode,
  OsmWay,
  OsmRelation,
  OsmRelationMember,
  OsmElement,
  OsmTags,
} from "./types.js";
