/**
 * Public transport zoning - waiting areas and how they attach to the network.
 */

import type { BoundingBox, Location } from "./geo.js";

/** OSM entity types that can back a transfer zone */
export type OsmEntityType = "node" | "way";

/** Public transport modes recognised on stops, platforms and stations */
export type PublicTransportMode =
  | "bus"
  | "trolleybus"
  | "tram"
  | "train"
  | "light_rail"
  | "subway"
  | "ferry";

/** What kind of waiting area a transfer zone represents */
export type TransferZoneType = "platform" | "pole" | "station" | "unknown";

/**
 * Spatial footprint of a public transport platform, pole or station.
 *
 * A zone is created "incomplete" and becomes "complete" once at least
 * one connectoid attaches it to the network.
 */
export interface TransferZone {
  id: number;
  osmId: number;
  entityType: OsmEntityType;
  type: TransferZoneType;
  /** Single location for nodes, outline or line for ways */
  geometry: Location[];
  envelope: BoundingBox;
  modes: PublicTransportMode[];
  name?: string;
}

/** Grouping of transfer zones that belong to the same stop area */
export interface TransferZoneGroup {
  id: number;
  /** OSM relation (or stand-alone station) ID */
  osmId: number;
  name?: string;
  zones: TransferZone[];
}

/** Network access point tying a stop location to a transfer zone */
export interface Connectoid {
  id: number;
  layerId: string;
  location: Location;
  accessNodeId: number;
  zone: TransferZone;
  modes: PublicTransportMode[];
  /** OSM node of the stop position, absent when the location was inferred */
  osmStopPositionId?: number;
}

/** Result of zoning construction */
export interface Zoning {
  transferZones: TransferZone[];
  transferZoneGroups: TransferZoneGroup[];
  connectoids: Connectoid[];
}
