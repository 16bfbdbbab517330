/**
 * Line geometry helpers used while breaking and matching links.
 *
 * Distances use Haversine for lengths and a flat-earth approximation for
 * point-to-line projection, which is accurate enough at stop-matching
 * scales (tens of meters).
 */

import type { Location } from "@netweave/types";
import { locationKey } from "./location.js";

/** Meters per degree of latitude (roughly constant) */
export const METERS_PER_DEG_LAT = 111_320;

/** Meters per degree of longitude at the given latitude */
export function metersPerDegLng(lat: number): number {
  return METERS_PER_DEG_LAT * Math.cos((lat * Math.PI) / 180);
}

/**
 * Index of the first coordinate exactly equal to `location`.
 */
export function findCoordinatePosition(
  geometry: readonly Location[],
  location: Location
): number | undefined {
  for (let i = 0; i < geometry.length; i++) {
    const coord = geometry[i];
    if (coord && coord.lat === location.lat && coord.lng === location.lng) {
      return i;
    }
  }
  return undefined;
}

/**
 * Indices of every interior coordinate (not first, not last) equal to
 * `location`. More than one only for self-touching geometry.
 */
export function findInteriorPositions(
  geometry: readonly Location[],
  location: Location
): number[] {
  const positions: number[] = [];
  for (let i = 1; i < geometry.length - 1; i++) {
    const coord = geometry[i];
    if (coord && coord.lat === location.lat && coord.lng === location.lng) {
      positions.push(i);
    }
  }
  return positions;
}

/**
 * Drop consecutive entries that share a location.
 * The first entry of every run is kept.
 */
export function removeAdjacentDuplicates<T>(
  items: readonly T[],
  locate: (item: T) => Location
): T[] {
  const result: T[] = [];
  let previousKey: string | undefined;
  for (const item of items) {
    const key = locationKey(locate(item));
    if (key !== previousKey) {
      result.push(item);
      previousKey = key;
    }
  }
  return result;
}

/**
 * Calculate distance between two coordinates using Haversine formula.
 *
 * @returns Distance in meters
 */
export function haversineDistance(a: Location, b: Location): number {
  const R = 6371000; // Earth's radius in meters

  const lat1 = (a.lat * Math.PI) / 180;
  const lat2 = (b.lat * Math.PI) / 180;
  const dLat = ((b.lat - a.lat) * Math.PI) / 180;
  const dLng = ((b.lng - a.lng) * Math.PI) / 180;

  const sinDLat = Math.sin(dLat / 2);
  const sinDLng = Math.sin(dLng / 2);

  const h =
    sinDLat * sinDLat + Math.cos(lat1) * Math.cos(lat2) * sinDLng * sinDLng;

  return 2 * R * Math.asin(Math.sqrt(h));
}

/**
 * Calculate the total length of a path in meters.
 */
export function calculatePathLength(coords: readonly Location[]): number {
  let total = 0;
  for (let i = 1; i < coords.length; i++) {
    const from = coords[i - 1];
    const to = coords[i];
    if (from && to) total += haversineDistance(from, to);
  }
  return total;
}

/** Projection of a point onto a line geometry */
export interface LineProjection {
  /** Closest point on the line */
  point: Location;
  /** Index of the segment start coordinate the point lies on */
  segmentIndex: number;
  /** Position along the segment, 0 at its start, 1 at its end */
  fraction: number;
  /** Distance from the input location to `point` in meters */
  distanceMeters: number;
}

/**
 * Closest point on a line geometry to the given location.
 * Returns undefined for an empty geometry.
 */
export function closestPointOnLine(
  geometry: readonly Location[],
  location: Location
): LineProjection | undefined {
  const first = geometry[0];
  if (!first) return undefined;

  const lngScale = metersPerDegLng(location.lat);
  if (geometry.length === 1) {
    return {
      point: first,
      segmentIndex: 0,
      fraction: 0,
      distanceMeters: flatDistance(location, first, lngScale),
    };
  }

  let best: LineProjection | undefined;
  for (let i = 0; i < geometry.length - 1; i++) {
    const start = geometry[i];
    const end = geometry[i + 1];
    if (!start || !end) continue;

    const px = (location.lng - start.lng) * lngScale;
    const py = (location.lat - start.lat) * METERS_PER_DEG_LAT;
    const lx = (end.lng - start.lng) * lngScale;
    const ly = (end.lat - start.lat) * METERS_PER_DEG_LAT;

    const lineLenSq = lx * lx + ly * ly;
    const t =
      lineLenSq === 0
        ? 0
        : Math.max(0, Math.min(1, (px * lx + py * ly) / lineLenSq));
    const dx = px - t * lx;
    const dy = py - t * ly;
    const distanceMeters = Math.sqrt(dx * dx + dy * dy);

    if (!best || distanceMeters < best.distanceMeters) {
      const point =
        t === 0
          ? start
          : t === 1
            ? end
            : {
                lat: start.lat + t * (end.lat - start.lat),
                lng: start.lng + t * (end.lng - start.lng),
              };
      best = { point, segmentIndex: i, fraction: t, distanceMeters };
    }
  }
  return best;
}

/** Minimum distance in meters from a location to a line geometry */
export function distanceToLine(
  geometry: readonly Location[],
  location: Location
): number {
  return closestPointOnLine(geometry, location)?.distanceMeters ?? Infinity;
}

/** Arithmetic mean of the coordinates (ring closure counted once) */
export function centroidOf(coords: readonly Location[]): Location | undefined {
  const first = coords[0];
  const last = coords[coords.length - 1];
  if (!first || !last) return undefined;

  const points =
    coords.length > 1 && first.lat === last.lat && first.lng === last.lng
      ? coords.slice(0, -1)
      : coords;
  let sumLat = 0;
  let sumLng = 0;
  for (const p of points) {
    sumLat += p.lat;
    sumLng += p.lng;
  }
  return { lat: sumLat / points.length, lng: sumLng / points.length };
}

/**
 * Orientation of a closed ring via the shoelace formula.
 * Longitude is x, latitude is y; a negative signed area is clockwise.
 */
export function isRingClockwise(ring: readonly Location[]): boolean {
  let doubleArea = 0;
  for (let i = 0; i < ring.length; i++) {
    const a = ring[i];
    const b = ring[(i + 1) % ring.length];
    if (!a || !b) continue;
    doubleArea += a.lng * b.lat - b.lng * a.lat;
  }
  return doubleArea < 0;
}

function flatDistance(a: Location, b: Location, lngScale: number): number {
  const dx = (a.lng - b.lng) * lngScale;
  const dy = (a.lat - b.lat) * METERS_PER_DEG_LAT;
  return Math.sqrt(dx * dx + dy * dy);
}
