/**
 * Geometry, envelope and location-key helpers.
 */

export {
  locationOf,
  locationKey,
  locationsEqual,
  LocationMap,
} from "./location.js";
export {
  METERS_PER_DEG_LAT,
  metersPerDegLng,
  findCoordinatePosition,
  findInteriorPositions,
  removeAdjacentDuplicates,
  haversineDistance,
  calculatePathLength,
  closestPointOnLine,
  distanceToLine,
  centroidOf,
  isRingClockwise,
  type LineProjection,
} from "./geometry.js";
export {
  envelopeOf,
  envelopeOfLocation,
  expandEnvelope,
  envelopesIntersect,
  envelopeContains,
  isValidBoundingBox,
} from "./envelope.js";
