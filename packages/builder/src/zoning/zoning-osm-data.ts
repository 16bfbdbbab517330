/**
 * OSM-side bookkeeping of the zoning reader: entities seen during the main
 * pass that can only be resolved once every waiting area is known.
 */

import type { Location, OsmEntityType } from "@netweave/types";
import { locationOf } from "../geo/location.js";
import type { OsmNode, OsmTags, OsmWay } from "../ingestion/osm/types.js";

/** Station awaiting post-processing */
export interface UnprocessedStation {
  entityType: OsmEntityType;
  osmId: number;
  geometry: Location[];
  tags: OsmTags;
}

/** Outer way of a platform multipolygon, tagged through its relation */
export interface OuterRoleWay {
  wayId: number;
  relationId: number;
  relationTags: OsmTags;
}

export class ZoningReaderOsmData {
  private stopPositions = new Map<number, OsmNode>();
  private stations = new Map<OsmEntityType, Map<number, UnprocessedStation>>();
  private ignoredStopPositions = new Set<number>();
  private withoutMappedMode = new Set<string>();
  private outerRoleWays = new Map<number, OuterRoleWay>();
  private outerWayIdsByRelation = new Map<number, number[]>();
  private stopAreasByMember = new Map<string, number[]>();

  /** Nodes of zoning ways, gathered in the main pass */
  private nodes = new Map<number, OsmNode>();
  private wantedNodeIds = new Set<number>();

  /**
   * @param fallbackNodes - node table of the network read; nodes shared
   *   with network ways need not be stored twice
   */
  constructor(private readonly fallbackNodes: ReadonlyMap<number, OsmNode> = new Map()) {}

  // ── Stop positions ────────────────────────────────────────────────────

  addUnprocessedStopPosition(node: OsmNode): void {
    this.stopPositions.set(node.id, node);
  }

  removeUnprocessedStopPosition(nodeId: number): void {
    this.stopPositions.delete(nodeId);
  }

  hasUnprocessedStopPosition(nodeId: number): boolean {
    return this.stopPositions.has(nodeId);
  }

  /** Ordered by OSM ID */
  getUnprocessedStopPositions(): OsmNode[] {
    return [...this.stopPositions.values()].sort((a, b) => a.id - b.id);
  }

  /** Stop position whose modes map to no network layer */
  markIgnoredStopPosition(nodeId: number): void {
    this.ignoredStopPositions.add(nodeId);
  }

  isIgnoredStopPosition(nodeId: number): boolean {
    return this.ignoredStopPositions.has(nodeId);
  }

  // ── Stations ──────────────────────────────────────────────────────────

  addUnprocessedStation(station: UnprocessedStation): void {
    let byId = this.stations.get(station.entityType);
    if (!byId) {
      byId = new Map();
      this.stations.set(station.entityType, byId);
    }
    byId.set(station.osmId, station);
  }

  removeUnprocessedStation(entityType: OsmEntityType, osmId: number): void {
    this.stations.get(entityType)?.delete(osmId);
  }

  /** Node stations first, each type ordered by OSM ID */
  getUnprocessedStations(entityType?: OsmEntityType): UnprocessedStation[] {
    const types: OsmEntityType[] = entityType ? [entityType] : ["node", "way"];
    return types.flatMap((type) =>
      [...(this.stations.get(type)?.values() ?? [])].sort((a, b) => a.osmId - b.osmId)
    );
  }

  // ── Waiting areas ─────────────────────────────────────────────────────

  markWaitingAreaWithoutMappedMode(entityType: OsmEntityType, osmId: number): void {
    this.withoutMappedMode.add(`${entityType}:${osmId}`);
  }

  isWaitingAreaWithoutMappedMode(entityType: OsmEntityType, osmId: number): boolean {
    return this.withoutMappedMode.has(`${entityType}:${osmId}`);
  }

  get waitingAreasWithoutMappedModeCount(): number {
    return this.withoutMappedMode.size;
  }

  // ── Multipolygon platforms ────────────────────────────────────────────

  /** Keep an outer way of a platform multipolygon as the platform outline */
  addOuterRoleWay(wayId: number, relationId: number, relationTags: OsmTags): void {
    this.outerRoleWays.set(wayId, { wayId, relationId, relationTags });
    const wayIds = this.outerWayIdsByRelation.get(relationId) ?? [];
    if (!wayIds.includes(wayId)) wayIds.push(wayId);
    this.outerWayIdsByRelation.set(relationId, wayIds);
  }

  getOuterRoleWay(wayId: number): OuterRoleWay | undefined {
    return this.outerRoleWays.get(wayId);
  }

  getOuterWayIdsOfRelation(relationId: number): readonly number[] {
    return this.outerWayIdsByRelation.get(relationId) ?? [];
  }

  // ── Stop area membership ──────────────────────────────────────────────

  addStopAreaMember(entityType: OsmEntityType, osmId: number, relationId: number): void {
    const key = `${entityType}:${osmId}`;
    const relations = this.stopAreasByMember.get(key) ?? [];
    if (!relations.includes(relationId)) relations.push(relationId);
    this.stopAreasByMember.set(key, relations);
  }

  /** Stop area relation IDs the entity is a member of */
  getStopAreasOf(entityType: OsmEntityType, osmId: number): readonly number[] {
    return this.stopAreasByMember.get(`${entityType}:${osmId}`) ?? [];
  }

  // ── Way geometry ──────────────────────────────────────────────────────

  /** Ask for a node to be kept when it comes by */
  requestNode(nodeId: number): void {
    this.wantedNodeIds.add(nodeId);
  }

  /** Keep a node if it was requested; returns true when kept */
  offerNode(node: OsmNode): boolean {
    if (!this.wantedNodeIds.has(node.id)) return false;
    this.nodes.set(node.id, node);
    return true;
  }

  getNode(nodeId: number): OsmNode | undefined {
    return this.nodes.get(nodeId) ?? this.fallbackNodes.get(nodeId);
  }

  /**
   * Geometry of a way from the known nodes; undefined when any node is
   * missing.
   */
  resolveWayGeometry(way: OsmWay): Location[] | undefined {
    const geometry: Location[] = [];
    for (const ref of way.refs) {
      const node = this.getNode(ref);
      if (!node) return undefined;
      geometry.push(locationOf(node));
    }
    return geometry;
  }

  reset(): void {
    this.stopPositions.clear();
    this.stations.clear();
    this.ignoredStopPositions.clear();
    this.withoutMappedMode.clear();
    this.outerRoleWays.clear();
    this.outerWayIdsByRelation.clear();
    this.stopAreasByMember.clear();
    this.nodes.clear();
    this.wantedNodeIds.clear();
  }
}
