/**
 * Public transport zoning: transfer zones, groups and connectoids.
 */

export {
  OsmZoningReader,
  type ZoningReadResult,
  type ZoningReadStats,
} from "./zoning-reader.js";
export { ConnectoidHelper, type ConnectoidHelperStats } from "./connectoid-helper.js";
export {
  ZoningReaderPlanitData,
  transferZoneKey,
  transferZoneGroupKey,
  type GroupSourceType,
  type ZoneSearchOptions,
} from "./zoning-planit-data.js";
export {
  ZoningReaderOsmData,
  type OuterRoleWay,
  type UnprocessedStation,
} from "./zoning-osm-data.js";
