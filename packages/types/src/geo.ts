/**
 * Geographic utility types.
 */

/**
 * Geographic location (WGS84).
 *
 * Used as the canonical lookup key throughout the reader state: two
 * locations denote the same point iff both coordinates are exactly equal.
 * A location may come from an OSM node or be synthetic (e.g. a stop
 * position projected onto a link).
 */
export interface Location {
  readonly lat: number;
  readonly lng: number;
}

/** Axis-aligned bounding box in WGS84 coordinates */
export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLng: number;
  maxLng: number;
}
