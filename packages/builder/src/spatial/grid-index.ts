/**
 * Grid-based spatial index over envelopes.
 *
 * Uses ~100m grid cells with flat-earth approximation for fast lookups.
 * Items are registered in every cell their envelope touches; queries
 * return the distinct items of every touched cell, so results are
 * candidates only and callers re-check exact geometry.
 */

import type { BoundingBox } from "@netweave/types";
import { METERS_PER_DEG_LAT, metersPerDegLng } from "../geo/geometry.js";

/** Default grid cell size in meters */
const DEFAULT_CELL_SIZE = 100;

/**
 * Envelopes spanning more cells than this are kept in an overflow list
 * that every query scans, instead of being written into each cell.
 */
const MAX_CELLS_PER_ITEM = 4096;

export interface GridSpatialIndexOptions {
  /** Cell size in meters (default 100) */
  cellSizeMeters?: number;
  /**
   * Latitude used for lng-to-meters conversion. When omitted, the centre
   * latitude of the first inserted envelope is used.
   */
  referenceLat?: number;
}

export class GridSpatialIndex<T> {
  /** cell key -> items */
  private grid = new Map<string, Set<T>>();
  private oversized = new Set<T>();
  private readonly cellSize: number;
  private lngScale: number | undefined;
  private count = 0;

  constructor(options: GridSpatialIndexOptions = {}) {
    this.cellSize = options.cellSizeMeters ?? DEFAULT_CELL_SIZE;
    if (options.referenceLat !== undefined) {
      this.lngScale = metersPerDegLng(options.referenceLat);
    }
  }

  /** Number of inserted items */
  get size(): number {
    return this.count;
  }

  insert(envelope: BoundingBox, item: T): void {
    const cells = this.cellsFor(envelope);
    if (cells === undefined) {
      if (!this.oversized.has(item)) {
        this.oversized.add(item);
        this.count++;
      }
      return;
    }

    let added = false;
    for (const key of cells) {
      let set = this.grid.get(key);
      if (!set) {
        set = new Set();
        this.grid.set(key, set);
      }
      if (!set.has(item)) {
        set.add(item);
        added = true;
      }
    }
    if (added) this.count++;
  }

  /**
   * Remove an item; the envelope must be the one it was inserted with.
   * @returns true if the item was present
   */
  remove(envelope: BoundingBox, item: T): boolean {
    if (this.oversized.delete(item)) {
      this.count--;
      return true;
    }

    const cells = this.cellsFor(envelope);
    if (cells === undefined) return false;

    let removed = false;
    for (const key of cells) {
      const set = this.grid.get(key);
      if (set?.delete(item)) {
        removed = true;
        if (set.size === 0) this.grid.delete(key);
      }
    }
    if (removed) this.count--;
    return removed;
  }

  /** Candidate items whose cells overlap the envelope */
  query(envelope: BoundingBox): T[] {
    const candidates = new Set<T>(this.oversized);
    const cells = this.cellsFor(envelope);
    if (cells === undefined) {
      for (const set of this.grid.values()) {
        for (const item of set) candidates.add(item);
      }
      return [...candidates];
    }

    for (const key of cells) {
      const set = this.grid.get(key);
      if (set) {
        for (const item of set) candidates.add(item);
      }
    }
    return [...candidates];
  }

  clear(): void {
    this.grid.clear();
    this.oversized.clear();
    this.count = 0;
  }

  // ── Internal ──────────────────────────────────────────────────────────

  /** Cell keys covered by the envelope, undefined if there are too many */
  private cellsFor(envelope: BoundingBox): string[] | undefined {
    if (this.lngScale === undefined) {
      this.lngScale = metersPerDegLng((envelope.minLat + envelope.maxLat) / 2);
    }
    const [minX, minY] = this.cellCoords(envelope.minLat, envelope.minLng);
    const [maxX, maxY] = this.cellCoords(envelope.maxLat, envelope.maxLng);
    const cellCount = (maxX - minX + 1) * (maxY - minY + 1);
    if (cellCount > MAX_CELLS_PER_ITEM) return undefined;

    const keys: string[] = [];
    for (let x = minX; x <= maxX; x++) {
      for (let y = minY; y <= maxY; y++) {
        keys.push(`${x},${y}`);
      }
    }
    return keys;
  }

  private cellCoords(lat: number, lng: number): [number, number] {
    const mx = lng * (this.lngScale ?? METERS_PER_DEG_LAT);
    const my = lat * METERS_PER_DEG_LAT;
    return [Math.floor(mx / this.cellSize), Math.floor(my / this.cellSize)];
  }
}
