/**
 * @netweave/types
 *
 * Shared domain types for the OSM network and zoning builder.
 *
 * - Geo: locations and bounding boxes
 * - Network: layers of nodes and links derived from OSM ways
 * - Zoning: transfer zones, groups and connectoids
 */

export * from "./geo.js";
export * from "./network.js";
export * from "./zoning.js";
