/**
 * Disk cache for Overpass API responses.
 *
 * The world is divided into fixed-size tiles on a regular grid. A request
 * is mapped to the tile containing its center and the whole tile is
 * fetched, so repeated reads of nearby areas hit the same cache entry.
 *
 * Default location: ~/.netweave/overpass-cache/
 */

import { createHash } from "node:crypto";
import { existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import type { BoundingBox } from "@netweave/types";
import type { OverpassJson } from "overpass-ts";
import { isOverpassJson } from "./parser.js";

/** Default tile size: 0.1° ≈ 11km N-S */
export const DEFAULT_TILE_SIZE = 0.1;

/** Grid coordinates identifying a tile */
export interface TileCoord {
  row: number;
  col: number;
}

export interface TileCacheOptions {
  /** Cache directory (default: ~/.netweave/overpass-cache/) */
  dir?: string;
  /** Tile edge in degrees (default: DEFAULT_TILE_SIZE) */
  tileSize?: number;
}

export function defaultCacheDir(): string {
  return join(homedir(), ".netweave", "overpass-cache");
}

/** Tile containing a point */
export function tileForPoint(
  lat: number,
  lng: number,
  tileSize: number = DEFAULT_TILE_SIZE
): TileCoord {
  return { row: Math.floor(lat / tileSize), col: Math.floor(lng / tileSize) };
}

/**
 * Fixed bounding box of a tile, rounded to clean up floating-point
 * artifacts (e.g. 557 * 0.1 = 55.7000000000001).
 */
export function tileBbox(tile: TileCoord, tileSize: number = DEFAULT_TILE_SIZE): BoundingBox {
  const round = (v: number) => Math.round(v * 1e8) / 1e8;
  return {
    minLat: round(tile.row * tileSize),
    maxLat: round((tile.row + 1) * tileSize),
    minLng: round(tile.col * tileSize),
    maxLng: round((tile.col + 1) * tileSize),
  };
}

/** 16-char hex key from tile coordinates and query timeout */
export function tileCacheKey(tile: TileCoord, timeout: number): string {
  return createHash("sha256")
    .update(`${tile.row}|${tile.col}|${timeout}`)
    .digest("hex")
    .slice(0, 16);
}

export class OverpassTileCache {
  readonly dir: string;
  readonly tileSize: number;

  constructor(options: TileCacheOptions = {}) {
    this.dir = options.dir ?? defaultCacheDir();
    this.tileSize = options.tileSize ?? DEFAULT_TILE_SIZE;
  }

  /** Tile for the center of a bounding box, with the tile's own bbox */
  tileFor(bbox: BoundingBox): { tile: TileCoord; bbox: BoundingBox } {
    const tile = tileForPoint(
      (bbox.minLat + bbox.maxLat) / 2,
      (bbox.minLng + bbox.maxLng) / 2,
      this.tileSize
    );
    return { tile, bbox: tileBbox(tile, this.tileSize) };
  }

  pathFor(tile: TileCoord, timeout: number): string {
    return join(this.dir, `${tileCacheKey(tile, timeout)}.json`);
  }

  /**
   * Cached response for a tile; undefined on a miss, an empty file, or
   * content that is not an Overpass response.
   */
  read(tile: TileCoord, timeout: number): OverpassJson | undefined {
    const path = this.pathFor(tile, timeout);
    if (!existsSync(path) || statSync(path).size === 0) return undefined;

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(path, "utf-8"));
    } catch (err) {
      console.warn(`[overpass] Ignoring unreadable cache entry ${path}: ${String(err)}`);
      return undefined;
    }
    return isOverpassJson(parsed) ? parsed : undefined;
  }

  write(tile: TileCoord, timeout: number, response: OverpassJson): void {
    mkdirSync(this.dir, { recursive: true });
    writeFileSync(this.pathFor(tile, timeout), JSON.stringify(response));
  }
}
