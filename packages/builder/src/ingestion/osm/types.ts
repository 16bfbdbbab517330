/**
 * OSM-specific types for parsed entity streams.
 *
 * These types represent the raw data from OSM (PBF or Overpass) before
 * transformation into network layers and zoning.
 */

/** OSM tags as key-value pairs */
export type OsmTags = Record<string, string>;

/** A node from OSM - represents a point location */
export interface OsmNode {
  type: "node";
  id: number;
  lat: number;
  lon: number;
  tags?: OsmTags;
}

/** A way from OSM - an ordered sequence of node references */
export interface OsmWay {
  type: "way";
  id: number;
  /** Ordered list of node IDs that make up this way */
  refs: number[];
  tags?: OsmTags;
}

/** Member of an OSM relation */
export interface OsmRelationMember {
  type: "node" | "way" | "relation";
  ref: number;
  role: string;
}

/** A relation from OSM (stop areas, multipolygon platforms) */
export interface OsmRelation {
  type: "relation";
  id: number;
  members: OsmRelationMember[];
  tags?: OsmTags;
}

/** Union of all OSM element types */
export type OsmElement = OsmNode | OsmWay | OsmRelation;
