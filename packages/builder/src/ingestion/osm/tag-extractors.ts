/**
 * Tag extraction for OSM ways.
 *
 * Only the tags that decide link identity and direction are read here;
 * the way type itself comes from the layer classifier.
 */

import type { OsmTags } from "./types.js";

/** Side of the road traffic keeps to */
export type DrivingSide = "left" | "right";

/** Travel direction around a circular way, seen from above */
export type CircularDirection = "clockwise" | "anticlockwise";

/**
 * Check if a way is tagged as a roundabout or other circular junction.
 */
export function isRoundabout(tags: OsmTags | undefined): boolean {
  const junction = tags?.["junction"];
  return junction === "roundabout" || junction === "circular";
}

/**
 * Extract one-way status from OSM tags.
 *
 * @param tags - OSM tags object
 * @returns true if the way is one-way (in either direction)
 */
export function extractOneWay(tags: OsmTags | undefined): boolean {
  if (!tags) return false;

  const oneway = tags["oneway"];

  // Explicit two-way overrides the roundabout default
  if (oneway === "no" || oneway === "false" || oneway === "0") return false;

  // Roundabouts are implicitly one-way
  if (isRoundabout(tags)) return true;

  // Explicit one-way tag
  if (oneway === "yes" || oneway === "true" || oneway === "1") return true;

  // Reverse one-way (still one-way, just opposite direction)
  if (oneway === "-1" || oneway === "reverse") return true;

  return false;
}

/**
 * Check if a way has reverse one-way direction.
 * Used during link extraction to reverse the geometry.
 */
export function isReverseOneWay(tags: OsmTags | undefined): boolean {
  if (!tags) return false;
  const oneway = tags["oneway"];
  return oneway === "-1" || oneway === "reverse";
}

/**
 * Extract road/path name from OSM tags.
 *
 * Prefers name, falls back to ref (road number) or official_name.
 */
export function extractName(tags: OsmTags | undefined): string | undefined {
  if (!tags) return undefined;
  return tags["name"] ?? tags["ref"] ?? tags["official_name"];
}

/**
 * Vertical layer index from the OSM `layer` tag (bridges, tunnels).
 * Defaults to 0 when absent or not an integer.
 */
export function extractVerticalLayerIndex(tags: OsmTags | undefined): number {
  const layerTag = tags?.["layer"];
  if (!layerTag) return 0;
  const value = parseInt(layerTag, 10);
  return isNaN(value) ? 0 : value;
}

/**
 * Travel direction on a circular one-way way.
 *
 * An explicit `direction=clockwise|anticlockwise` tag wins; otherwise the
 * country default applies: clockwise where traffic keeps left,
 * anticlockwise where it keeps right.
 */
export function resolveCircularTravelDirection(
  tags: OsmTags | undefined,
  drivingSide: DrivingSide
): CircularDirection {
  const direction = tags?.["direction"];
  if (direction === "clockwise") return "clockwise";
  if (direction === "anticlockwise") return "anticlockwise";
  return drivingSide === "left" ? "clockwise" : "anticlockwise";
}
