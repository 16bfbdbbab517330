/**
 * Network representation built from OSM ways.
 *
 * A network consists of one layer per group of compatible modes. Nodes
 * sit at link extremities, links carry the geometry drawn by the OSM way
 * (or a piece of it, once the way has been broken at an intersection).
 */

import type { Location } from "./geo.js";

/** A node in a network layer, always at exactly one location */
export interface NetworkNode {
  id: number;
  layerId: string;
  location: Location;
  /** OSM node ID if the location is backed by an OSM node */
  osmNodeId?: number;
}

/**
 * Travel direction of a link relative to its geometry.
 *
 * - "both": traversable in either direction
 * - "forward": only from the first to the last coordinate
 */
export type LinkDirection = "both" | "forward";

/**
 * A link between two nodes.
 *
 * The geometry is immutable; breaking a link replaces it with new links.
 * The external ID is the OSM way ID the link was derived from and is
 * shared by every piece of a broken way.
 */
export interface NetworkLink {
  readonly id: number;
  readonly layerId: string;
  /** OSM way ID */
  readonly externalId: number;
  readonly nodeAId: number;
  readonly nodeBId: number;
  /** First coordinate is at node A, last at node B */
  readonly geometry: readonly Location[];
  readonly lengthMeters: number;
  readonly direction: LinkDirection;
  /** Value of the way's highway/railway tag */
  readonly wayType: string;
  /** OSM `layer` tag value, 0 when absent */
  readonly verticalLayerIndex: number;
  readonly name?: string;
}
