/**
 * Overpass API ingestion module.
 *
 * Alternative to PBF files: queries the Overpass API for network and
 * public transport data within a bounding box.
 */

export {
  buildOverpassQuery,
  fetchOverpassData,
  DEFAULT_OVERPASS_ENDPOINT,
  type OverpassOptions,
  type OverpassResult,
} from "./query.js";
export { isOverpassJson, parseOverpassResponse } from "./parser.js";
export {
  DEFAULT_TILE_SIZE,
  OverpassTileCache,
  defaultCacheDir,
  tileForPoint,
  tileBbox,
  tileCacheKey,
  type TileCoord,
  type TileCacheOptions,
} from "./cache.js";
