/**
 * Reader settings with their defaults and validation.
 */

import type { BoundingBox } from "@netweave/types";
import { ReaderConfigError } from "../errors.js";
import { isValidBoundingBox } from "../geo/envelope.js";
import {
  DEFAULT_WAY_CLASSIFIER,
  type WayClassifier,
} from "../ingestion/osm/classification.js";
import type { DrivingSide } from "../ingestion/osm/tag-extractors.js";

export interface NetworkReaderSettings {
  /** Decides which layer (if any) a way belongs to */
  classifier: WayClassifier;
  /** Nodes outside this box are not registered */
  boundingBox?: BoundingBox;
  /** Decides the default travel direction of roundabouts */
  drivingSide: DrivingSide;
  /** Truncate ways with missing nodes instead of discarding them */
  salvageIncompleteWays: boolean;
  /** Drop consecutive coordinates at the same location */
  removeDuplicateCoordinates: boolean;
  /** Log fine-grained messages */
  verbose: boolean;
}

export const DEFAULT_NETWORK_READER_SETTINGS: NetworkReaderSettings = {
  classifier: DEFAULT_WAY_CLASSIFIER,
  drivingSide: "right",
  salvageIncompleteWays: true,
  removeDuplicateCoordinates: true,
  verbose: false,
};

/** Merge options over the defaults and validate the result */
export function resolveNetworkReaderSettings(
  options: Partial<NetworkReaderSettings> = {}
): NetworkReaderSettings {
  const settings = { ...DEFAULT_NETWORK_READER_SETTINGS, ...options };
  if (settings.boundingBox && !isValidBoundingBox(settings.boundingBox)) {
    const { minLat, maxLat, minLng, maxLng } = settings.boundingBox;
    throw new ReaderConfigError(
      `Invalid bounding box: lat ${minLat}..${maxLat}, lng ${minLng}..${maxLng}`
    );
  }
  if (settings.classifier.layerIds.length === 0) {
    throw new ReaderConfigError("Way classifier defines no layers");
  }
  return settings;
}

export interface ZoningReaderSettings {
  /** Max distance between a stop position and its platform or pole */
  searchRadiusPlatformToStopMeters: number;
  /** Max distance between a station and the platforms it serves */
  searchRadiusStationToPlatformMeters: number;
  /** Existing link coordinates this close to a projection are reused */
  closestLinkSearchBufferMeters: number;
  verbose: boolean;
}

export const DEFAULT_ZONING_READER_SETTINGS: ZoningReaderSettings = {
  searchRadiusPlatformToStopMeters: 25,
  searchRadiusStationToPlatformMeters: 35,
  closestLinkSearchBufferMeters: 8,
  verbose: false,
};

export function resolveZoningReaderSettings(
  options: Partial<ZoningReaderSettings> = {}
): ZoningReaderSettings {
  const settings = { ...DEFAULT_ZONING_READER_SETTINGS, ...options };
  const distances = [
    ["searchRadiusPlatformToStopMeters", settings.searchRadiusPlatformToStopMeters],
    ["searchRadiusStationToPlatformMeters", settings.searchRadiusStationToPlatformMeters],
    ["closestLinkSearchBufferMeters", settings.closestLinkSearchBufferMeters],
  ] as const;
  for (const [name, value] of distances) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new ReaderConfigError(`${name} must be a positive number, got ${value}`);
    }
  }
  return settings;
}
