/**
 * Public transport tagging (PTv1 and PTv2) for stops, platforms and stations.
 *
 * See https://wiki.openstreetmap.org/wiki/Public_transport
 */

import type {
  PublicTransportMode,
  TransferZoneType,
} from "@netweave/types";
import type { OsmTags } from "./types.js";

export const PUBLIC_TRANSPORT_MODES = [
  "bus",
  "trolleybus",
  "tram",
  "train",
  "light_rail",
  "subway",
  "ferry",
] as const satisfies readonly PublicTransportMode[];

/** Modes that run on tracks */
export const RAIL_MODES = [
  "tram",
  "train",
  "light_rail",
  "subway",
] as const satisfies readonly PublicTransportMode[];

export function isRailMode(mode: PublicTransportMode): boolean {
  return RAIL_MODES.some((rail) => rail === mode);
}

export function isPublicTransportMode(value: string): value is PublicTransportMode {
  return PUBLIC_TRANSPORT_MODES.some((mode) => mode === value);
}

/** Role of a public transport entity in the zoning model */
export type PublicTransportRole =
  | { kind: "stop-position" }
  | { kind: "waiting-area"; zoneType: TransferZoneType }
  | { kind: "station" };

/**
 * Classify an entity by its public transport tags.
 * Returns undefined for anything that is not a stop, platform or station.
 */
export function classifyPublicTransport(
  tags: OsmTags | undefined
): PublicTransportRole | undefined {
  if (!tags) return undefined;

  const pt = tags["public_transport"];
  if (pt === "stop_position") return { kind: "stop-position" };
  if (pt === "platform") {
    return {
      kind: "waiting-area",
      zoneType: tags["highway"] === "bus_stop" ? "pole" : "platform",
    };
  }
  if (pt === "station") return { kind: "station" };

  // PTv1
  const highway = tags["highway"];
  const railway = tags["railway"];
  if (highway === "bus_stop") return { kind: "waiting-area", zoneType: "pole" };
  if (highway === "platform" || railway === "platform") {
    return { kind: "waiting-area", zoneType: "platform" };
  }
  if (railway === "tram_stop") return { kind: "waiting-area", zoneType: "platform" };
  if (railway === "station" || railway === "halt") return { kind: "station" };
  if (tags["amenity"] === "ferry_terminal") return { kind: "station" };

  return undefined;
}

/**
 * Modes served by a public transport entity.
 *
 * Explicit PTv2 mode keys (`bus=yes`, `tram=yes`, ...) take precedence;
 * otherwise the PTv1 tag implies a default mode.
 */
export function extractPublicTransportModes(
  tags: OsmTags | undefined
): PublicTransportMode[] {
  if (!tags) return [];

  const explicit = PUBLIC_TRANSPORT_MODES.filter((mode) => tags[mode] === "yes");
  if (explicit.length > 0) return explicit;

  const highway = tags["highway"];
  const railway = tags["railway"];
  if (highway === "bus_stop" || highway === "platform") return ["bus"];
  if (railway === "tram_stop") return ["tram"];
  if (railway === "station" || railway === "halt" || railway === "platform") {
    return tags["station"] === "subway" ? ["subway"] : ["train"];
  }
  if (tags["amenity"] === "ferry_terminal") return ["ferry"];
  return [];
}

/** True for `type=public_transport` + `public_transport=stop_area` relations */
export function isStopAreaRelation(tags: OsmTags | undefined): boolean {
  return tags?.["type"] === "public_transport" && tags["public_transport"] === "stop_area";
}

/** True for multipolygon relations describing a platform */
export function isPlatformMultipolygon(tags: OsmTags | undefined): boolean {
  return (
    tags?.["type"] === "multipolygon" &&
    (tags["public_transport"] === "platform" || tags["railway"] === "platform")
  );
}
