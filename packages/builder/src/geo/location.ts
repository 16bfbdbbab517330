/**
 * Location keys.
 *
 * Reader state is keyed by location rather than by OSM node ID because some
 * locations (inferred stop positions, projected access points) have no OSM
 * node behind them. Equality is exact coordinate equality, no tolerance.
 */

import type { Location } from "@netweave/types";
import type { OsmNode } from "../ingestion/osm/types.js";

/** Location of an OSM node */
export function locationOf(osmNode: OsmNode): Location {
  return { lat: osmNode.lat, lng: osmNode.lon };
}

/** Canonical string key for a location */
export function locationKey(location: Location): string {
  return `${location.lat},${location.lng}`;
}

export function locationsEqual(a: Location, b: Location): boolean {
  return a.lat === b.lat && a.lng === b.lng;
}

/**
 * Map keyed by location.
 *
 * Keeps the first Location object seen for a key so callers get a stable
 * reference back from `entries()`.
 */
export class LocationMap<V> {
  private entriesByKey = new Map<string, { location: Location; value: V }>();

  get size(): number {
    return this.entriesByKey.size;
  }

  get(location: Location): V | undefined {
    return this.entriesByKey.get(locationKey(location))?.value;
  }

  has(location: Location): boolean {
    return this.entriesByKey.has(locationKey(location));
  }

  set(location: Location, value: V): this {
    const key = locationKey(location);
    const existing = this.entriesByKey.get(key);
    if (existing) {
      existing.value = value;
    } else {
      this.entriesByKey.set(key, { location, value });
    }
    return this;
  }

  delete(location: Location): boolean {
    return this.entriesByKey.delete(locationKey(location));
  }

  clear(): void {
    this.entriesByKey.clear();
  }

  *entries(): IterableIterator<[Location, V]> {
    for (const { location, value } of this.entriesByKey.values()) {
      yield [location, value];
    }
  }

  *locations(): IterableIterator<Location> {
    for (const entry of this.entriesByKey.values()) {
      yield entry.location;
    }
  }
}
