/**
 * Bounding box (envelope) helpers for spatial lookups.
 */

import type { BoundingBox, Location } from "@netweave/types";
import { METERS_PER_DEG_LAT, metersPerDegLng } from "./geometry.js";

/** Envelope of a set of coordinates; undefined when empty */
export function envelopeOf(coords: readonly Location[]): BoundingBox | undefined {
  if (coords.length === 0) return undefined;

  let minLat = Infinity,
    maxLat = -Infinity;
  let minLng = Infinity,
    maxLng = -Infinity;

  for (const c of coords) {
    minLat = Math.min(minLat, c.lat);
    maxLat = Math.max(maxLat, c.lat);
    minLng = Math.min(minLng, c.lng);
    maxLng = Math.max(maxLng, c.lng);
  }

  return { minLat, maxLat, minLng, maxLng };
}

/** Degenerate envelope around a single location */
export function envelopeOfLocation(location: Location): BoundingBox {
  return {
    minLat: location.lat,
    maxLat: location.lat,
    minLng: location.lng,
    maxLng: location.lng,
  };
}

/**
 * Grow an envelope by a buffer in meters on every side.
 * Longitude scaling uses the envelope's mid-latitude.
 */
export function expandEnvelope(env: BoundingBox, meters: number): BoundingBox {
  const midLat = (env.minLat + env.maxLat) / 2;
  const dLat = meters / METERS_PER_DEG_LAT;
  const dLng = meters / metersPerDegLng(midLat);
  return {
    minLat: env.minLat - dLat,
    maxLat: env.maxLat + dLat,
    minLng: env.minLng - dLng,
    maxLng: env.maxLng + dLng,
  };
}

export function envelopesIntersect(a: BoundingBox, b: BoundingBox): boolean {
  return (
    a.minLat <= b.maxLat &&
    a.maxLat >= b.minLat &&
    a.minLng <= b.maxLng &&
    a.maxLng >= b.minLng
  );
}

export function envelopeContains(env: BoundingBox, location: Location): boolean {
  return (
    location.lat >= env.minLat &&
    location.lat <= env.maxLat &&
    location.lng >= env.minLng &&
    location.lng <= env.maxLng
  );
}

/** True when all bounds are finite and min <= max on both axes */
export function isValidBoundingBox(bbox: BoundingBox): boolean {
  const values = [bbox.minLat, bbox.maxLat, bbox.minLng, bbox.maxLng];
  return (
    values.every((v) => Number.isFinite(v)) &&
    bbox.minLat <= bbox.maxLat &&
    bbox.minLng <= bbox.maxLng &&
    bbox.minLat >= -90 &&
    bbox.maxLat <= 90
  );
}
