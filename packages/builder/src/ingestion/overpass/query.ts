/**
 * Overpass API query construction and execution.
 *
 * Generates Overpass QL queries for the network (highways, railways) and
 * public transport features, and fetches results via the overpass-ts
 * client through the tile cache.
 */

import type { BoundingBox } from "@netweave/types";
import { overpassJson } from "overpass-ts";
import type { OverpassJson, OverpassOptions as OverpassTsOptions } from "overpass-ts";
import { OverpassTileCache } from "./cache.js";

/** Result from fetchOverpassData, includes the actual tile bbox that was fetched */
export interface OverpassResult {
  data: OverpassJson;
  /** The tile bbox fetched; covers, but may differ from, the requested bbox */
  fetchedBbox: BoundingBox;
  fromCache: boolean;
}

/** Options for Overpass API requests */
export interface OverpassOptions {
  /** Endpoint URL (default: OVERPASS_ENDPOINT, then the public instance) */
  endpoint?: string;
  /** Query timeout in seconds (default: 90) */
  timeout?: number;
  userAgent?: string;
  /** Bypass cache read (still writes to cache) */
  force?: boolean;
  /** Override the cache directory */
  cacheDir?: string;
  /** Disable caching entirely (no read or write) */
  noCache?: boolean;
}

export const DEFAULT_OVERPASS_ENDPOINT = "https://overpass-api.de/api/interpreter";
const DEFAULT_TIMEOUT = 90;

/**
 * Build an Overpass QL query for a bbox.
 *
 * Fetches:
 * - Ways tagged highway or railway (layer filtering happens client-side)
 * - Public transport nodes and ways (stops, platforms, stations)
 * - stop_area relations and platform multipolygons
 *
 * followed by every node the matched ways reference (`>`), without tags.
 *
 * @param bbox - Bounding box (WGS84)
 * @param timeout - Query timeout in seconds
 */
export function buildOverpassQuery(
  bbox: BoundingBox,
  timeout: number = DEFAULT_TIMEOUT
): string {
  // Overpass bbox format: (south, west, north, east)
  const b = `${bbox.minLat},${bbox.minLng},${bbox.maxLat},${bbox.maxLng}`;

  return `[out:json][timeout:${timeout}];
(
  way["highway"](${b});
  way["railway"](${b});
  nwr["public_transport"](${b});
  node["highway"="bus_stop"](${b});
  node["railway"~"^(tram_stop|station|halt|platform)$"](${b});
  way["railway"="platform"](${b});
  nw["amenity"="ferry_terminal"](${b});
  relation["type"="multipolygon"]["railway"="platform"](${b});
);
out body;
>;
out skel qt;`;
}

/**
 * Fetch network and public transport data for a bounding box.
 *
 * The bbox center is mapped to a fixed-size tile; the tile's bbox is used
 * for both the cache key and the query.
 */
export async function fetchOverpassData(
  bbox: BoundingBox,
  options: OverpassOptions = {}
): Promise<OverpassResult> {
  const timeout = options.timeout ?? DEFAULT_TIMEOUT;
  const useCache = !options.noCache;
  const cache = new OverpassTileCache({
    ...(options.cacheDir !== undefined && { dir: options.cacheDir }),
  });
  const { tile, bbox: fetchedBbox } = cache.tileFor(bbox);

  if (useCache && !options.force) {
    const cached = cache.read(tile, timeout);
    if (cached) return { data: cached, fetchedBbox, fromCache: true };
  }

  const overpassOpts: Partial<OverpassTsOptions> = {
    endpoint: options.endpoint ?? process.env["OVERPASS_ENDPOINT"] ?? DEFAULT_OVERPASS_ENDPOINT,
  };
  if (options.userAgent) {
    overpassOpts.userAgent = options.userAgent;
  }

  console.log(
    `[overpass] Fetching tile ${tile.row},${tile.col} (${fetchedBbox.minLat},${fetchedBbox.minLng} .. ${fetchedBbox.maxLat},${fetchedBbox.maxLng})`
  );
  const data = await overpassJson(buildOverpassQuery(fetchedBbox, timeout), overpassOpts);

  if (useCache) {
    cache.write(tile, timeout, data);
  }

  return { data, fetchedBbox, fromCache: false };
}
