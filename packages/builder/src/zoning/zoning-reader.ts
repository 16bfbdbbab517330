/**
 * Build public transport zoning on top of a network read.
 *
 * Algorithm:
 * 1. Pre-process: sweep relations for stop areas and multipolygon platform
 *    outlines, then ways for the nodes their geometry needs
 * 2. Main: platforms, poles and stations become incomplete transfer zones
 *    (stations and stop positions are kept for later), stop areas become
 *    transfer zone groups
 * 3. Post-process:
 *    a. stop positions of a stop area connect to a waiting area of it
 *    b. other stop positions connect to the closest waiting area nearby
 *    c. waiting areas still unconnected attach to the closest link
 *    d. stations group the waiting areas around them; a station with none
 *       becomes a zone of its own, connected at its node when that is on
 *       the network, else to the closest links
 *
 * Connecting may break network links; this goes through the bridge's
 * LinkBreaker so the network reader state stays consistent.
 */

import type {
  BoundingBox,
  Location,
  NetworkLink,
  OsmEntityType,
  PublicTransportMode,
  TransferZone,
  TransferZoneGroup,
  TransferZoneType,
  Zoning,
} from "@netweave/types";
import { envelopeContains, envelopeOf, envelopeOfLocation, expandEnvelope } from "../geo/envelope.js";
import { centroidOf, distanceToLine } from "../geo/geometry.js";
import { locationOf, locationsEqual } from "../geo/location.js";
import { toReplayableSource, type OsmElementSource } from "../ingestion/index.js";
import {
  classifyPublicTransport,
  extractPublicTransportModes,
  isPlatformMultipolygon,
  isRailMode,
  isStopAreaRelation,
} from "../ingestion/osm/public-transport-tags.js";
import { extractName, extractVerticalLayerIndex } from "../ingestion/osm/tag-extractors.js";
import type {
  OsmNode,
  OsmRelation,
  OsmRelationMember,
  OsmTags,
  OsmWay,
} from "../ingestion/osm/types.js";
import type { NetworkToZoningBridge } from "../network-reader/bridge.js";
import { resolveZoningReaderSettings, type ZoningReaderSettings } from "../network-reader/config.js";
import { ConnectoidHelper, type ConnectoidHelperStats } from "./connectoid-helper.js";
import { ZoningReaderOsmData, type UnprocessedStation } from "./zoning-osm-data.js";
import { ZoningReaderPlanitData } from "./zoning-planit-data.js";

/**
 * Statistics about the zoning reading process.
 */
export interface ZoningReadStats extends ConnectoidHelperStats {
  transferZones: number;
  transferZoneGroups: number;
  connectoids: number;
  stopPositions: number;
  /** Stop positions whose modes no network layer serves */
  ignoredStopPositions: number;
  discardedStopPositions: number;
  waitingAreasWithoutMappedMode: number;
  /** Waiting areas left without a connectoid, or without geometry */
  discardedWaitingAreas: number;
  discardedStations: number;
  /** Entities skipped because they lie outside the bounding box */
  outsideBoundingBox: number;
  readTimeMs: number;
}

export interface ZoningReadResult {
  zoning: Zoning;
  stats: ZoningReadStats;
}

type Counters = Pick<
  ZoningReadStats,
  | "stopPositions"
  | "ignoredStopPositions"
  | "discardedStopPositions"
  | "discardedWaitingAreas"
  | "discardedStations"
  | "outsideBoundingBox"
>;

function emptyCounters(): Counters {
  return {
    stopPositions: 0,
    ignoredStopPositions: 0,
    discardedStopPositions: 0,
    discardedWaitingAreas: 0,
    discardedStations: 0,
    outsideBoundingBox: 0,
  };
}

export class OsmZoningReader {
  readonly settings: Readonly<ZoningReaderSettings>;
  private readonly bridge: NetworkToZoningBridge;
  private planitData = new ZoningReaderPlanitData();
  private osmData: ZoningReaderOsmData;
  private helper: ConnectoidHelper;
  private counters = emptyCounters();
  private completed = false;

  constructor(options: Partial<ZoningReaderSettings>, bridge: NetworkToZoningBridge | undefined) {
    if (!bridge) {
      throw new Error("Zoning reader needs the bridge of a completed network read");
    }
    if (bridge.getPopulatedNetwork().layerIds.length === 0) {
      throw new Error("Zoning reader needs a network with at least one layer");
    }
    this.settings = resolveZoningReaderSettings(options);
    this.bridge = bridge;
    this.osmData = new ZoningReaderOsmData(bridge.getOsmNodeTable());
    this.helper = new ConnectoidHelper(bridge, this.planitData, this.settings);
  }

  /**
   * Read transfer zones, groups and connectoids from an element source.
   * The source is swept three times; a plain iterable is held in memory.
   */
  async read(source: OsmElementSource): Promise<ZoningReadResult> {
    if (this.completed) {
      throw new Error("Reader already holds a zoning; call reset() before reading again");
    }
    const startTime = Date.now();
    const pass = await toReplayableSource(source);

    for (const layer of this.bridge.getPopulatedNetwork().layers()) {
      this.planitData.addLinksToIndex(layer.links());
    }

    // 1. Pre-process
    for await (const element of pass()) {
      if (element.type === "relation") this.preProcessRelation(element);
    }
    for await (const element of pass()) {
      if (element.type === "way") this.preProcessWay(element);
    }

    // 2. Main
    for await (const element of pass()) {
      if (element.type === "node") {
        this.osmData.offerNode(element);
        this.handleNode(element);
      } else if (element.type === "way") {
        this.handleWay(element);
      } else {
        this.handleRelation(element);
      }
    }

    // 3. Post-process
    this.connectStopAreaStopPositions();
    this.connectRemainingStopPositions();
    this.connectStandAloneWaitingAreas();
    this.processStations();
    this.completed = true;

    const zoning = this.buildZoning();
    const stats: ZoningReadStats = {
      ...this.counters,
      ...this.helper.stats,
      transferZones: zoning.transferZones.length,
      transferZoneGroups: zoning.transferZoneGroups.length,
      connectoids: zoning.connectoids.length,
      waitingAreasWithoutMappedMode: this.osmData.waitingAreasWithoutMappedModeCount,
      readTimeMs: Date.now() - startTime,
    };
    console.log(
      `[zoning] Read ${stats.transferZones} transfer zones, ${stats.connectoids} connectoids, ${stats.transferZoneGroups} groups in ${stats.readTimeMs}ms`
    );
    return { zoning, stats };
  }

  /** Drop all zoning state; links broken by earlier reads stay broken */
  reset(): void {
    this.planitData.reset();
    this.osmData.reset();
    this.helper = new ConnectoidHelper(this.bridge, this.planitData, this.settings);
    this.counters = emptyCounters();
    this.completed = false;
  }

  // ── Pre-processing ────────────────────────────────────────────────────

  private preProcessRelation(relation: OsmRelation): void {
    if (isStopAreaRelation(relation.tags)) {
      for (const member of relation.members) {
        if (member.type === "relation") continue;
        this.osmData.addStopAreaMember(member.type, member.ref, relation.id);
      }
    } else if (isPlatformMultipolygon(relation.tags)) {
      for (const member of relation.members) {
        if (member.type === "way" && member.role === "outer") {
          this.osmData.addOuterRoleWay(member.ref, relation.id, relation.tags ?? {});
        }
      }
    }
  }

  private preProcessWay(way: OsmWay): void {
    const role = classifyPublicTransport(way.tags);
    const needsGeometry =
      role?.kind === "waiting-area" ||
      role?.kind === "station" ||
      this.osmData.getOuterRoleWay(way.id) !== undefined;
    if (!needsGeometry) return;
    for (const ref of way.refs) this.osmData.requestNode(ref);
  }

  // ── Main processing ───────────────────────────────────────────────────

  private handleNode(node: OsmNode): void {
    const role = classifyPublicTransport(node.tags);
    if (!role) return;
    const location = locationOf(node);
    if (this.isOutsideBoundingBox(location, "node", node.id)) return;
    const tags = node.tags ?? {};

    switch (role.kind) {
      case "stop-position":
        this.counters.stopPositions++;
        if (this.mappedModes(tags).length === 0) {
          this.counters.ignoredStopPositions++;
          this.osmData.markIgnoredStopPosition(node.id);
          if (this.settings.verbose) {
            console.log(`[zoning] stop_position ${node.id} serves no mode of the network, ignored`);
          }
          return;
        }
        this.osmData.addUnprocessedStopPosition(node);
        return;
      case "waiting-area":
        this.createWaitingArea("node", node.id, [location], tags, role.zoneType);
        return;
      case "station":
        this.osmData.addUnprocessedStation({
          entityType: "node",
          osmId: node.id,
          geometry: [location],
          tags,
        });
        return;
    }
  }

  private handleWay(way: OsmWay): void {
    const outer = this.osmData.getOuterRoleWay(way.id);
    const role = classifyPublicTransport(way.tags);
    if (!role && !outer) return;

    if (role?.kind === "stop-position") {
      console.warn(`[zoning] stop_position tagged on OSM way ${way.id}, ignored`);
      return;
    }

    const geometry = this.osmData.resolveWayGeometry(way);
    if (!geometry) {
      const what = role?.kind === "station" ? "station" : "waiting area";
      console.warn(`[zoning] DISCARD: ${what} OSM way ${way.id} has nodes missing`);
      if (role?.kind === "station") {
        this.counters.discardedStations++;
      } else {
        this.counters.discardedWaitingAreas++;
      }
      return;
    }
    const centroid = centroidOf(geometry);
    if (!centroid || this.isOutsideBoundingBox(centroid, "way", way.id)) return;

    if (role?.kind === "station") {
      this.osmData.addUnprocessedStation({
        entityType: "way",
        osmId: way.id,
        geometry,
        tags: way.tags ?? {},
      });
    } else if (role) {
      this.createWaitingArea("way", way.id, geometry, way.tags ?? {}, role.zoneType);
    } else if (outer) {
      this.createWaitingArea("way", way.id, geometry, outer.relationTags, "platform");
    }
  }

  private handleRelation(relation: OsmRelation): void {
    if (!isStopAreaRelation(relation.tags)) return;
    if (this.planitData.getTransferZoneGroupByOsmId(relation.id)) return;

    const name = extractName(relation.tags);
    const group: TransferZoneGroup = {
      id: this.planitData.nextGroupId(),
      osmId: relation.id,
      ...(name !== undefined && { name }),
      zones: [],
    };
    this.planitData.addTransferZoneGroup(group);

    for (const member of relation.members) {
      const zones =
        member.type === "relation"
          ? this.osmData
              .getOuterWayIdsOfRelation(member.ref)
              .map((wayId) => this.planitData.getTransferZone("way", wayId))
          : [this.planitData.getTransferZone(member.type, member.ref)];
      for (const zone of zones) {
        if (zone) this.planitData.addZoneToGroup(group, zone);
      }
      if (zones.length === 0 || zones.some((zone) => zone === undefined)) {
        this.reportUnmatchedMember(relation.id, member);
      }
    }
  }

  /**
   * Warn about a stop or platform member of a stop area without a zone.
   * Stop positions are matched later; members whose modes no layer serves
   * were skipped on purpose.
   */
  private reportUnmatchedMember(relationId: number, member: OsmRelationMember): void {
    if (member.type === "relation") return;
    if (!member.role.startsWith("stop") && !member.role.startsWith("platform")) return;
    if (
      member.type === "node" &&
      (this.osmData.isIgnoredStopPosition(member.ref) ||
        this.osmData.hasUnprocessedStopPosition(member.ref))
    ) {
      return;
    }
    if (this.osmData.isWaitingAreaWithoutMappedMode(member.type, member.ref)) return;
    console.warn(`[zoning] stop_area ${relationId} member ${member.type} ${member.ref} not found`);
  }

  private createWaitingArea(
    entityType: OsmEntityType,
    osmId: number,
    geometry: Location[],
    tags: OsmTags,
    type: TransferZoneType
  ): void {
    const modes = this.mappedModes(tags);
    const envelope = envelopeOf(geometry);
    if (modes.length === 0 || !envelope) {
      this.osmData.markWaitingAreaWithoutMappedMode(entityType, osmId);
      if (this.settings.verbose) {
        console.log(`[zoning] waiting area ${entityType} ${osmId} serves no mode of the network, skipped`);
      }
      return;
    }

    const name = extractName(tags);
    const zone: TransferZone = {
      id: this.planitData.nextZoneId(),
      osmId,
      entityType,
      type,
      geometry,
      envelope,
      modes,
      ...(name !== undefined && { name }),
    };
    this.planitData.addIncompleteTransferZone(zone);
    this.planitData.setVerticalLayerIndex(zone, extractVerticalLayerIndex(tags));
  }

  // ── Post-processing ───────────────────────────────────────────────────

  /** a. Stop positions of a stop area connect to its closest waiting area sharing a mode */
  private connectStopAreaStopPositions(): void {
    for (const stop of this.osmData.getUnprocessedStopPositions()) {
      const stopAreaIds = this.osmData.getStopAreasOf("node", stop.id);
      if (stopAreaIds.length === 0) continue;

      const modes = this.mappedModes(stop.tags ?? {});
      const candidates = stopAreaIds
        .flatMap((id) => this.planitData.getTransferZoneGroupByOsmId(id)?.zones ?? [])
        .filter((zone) => sharedModes(zone.modes, modes).length > 0);
      const zone = closestZone(candidates, locationOf(stop));
      if (!zone) {
        if (this.settings.verbose) {
          console.log(
            `[zoning] stop_position ${stop.id} shares no mode with stop_area ${stopAreaIds.join(", ")}, searching nearby`
          );
        }
        continue;
      }
      this.connectStopPosition(stop, zone, modes);
    }
  }

  /** b. Remaining stop positions connect to the closest waiting area in range */
  private connectRemainingStopPositions(): void {
    const radius = this.settings.searchRadiusPlatformToStopMeters;
    for (const stop of this.osmData.getUnprocessedStopPositions()) {
      const location = locationOf(stop);
      const modes = this.mappedModes(stop.tags ?? {});
      const searchArea = expandEnvelope(envelopeOfLocation(location), radius);
      const inRange = (zone: TransferZone) =>
        sharedModes(zone.modes, modes).length > 0 &&
        distanceToLine(zone.geometry, location) <= radius;

      const zone =
        closestZone(this.planitData.findIncompleteZonesNear(searchArea).filter(inRange), location) ??
        closestZone(
          this.planitData.findTransferZonesNear(searchArea, { includeComplete: true }).filter(inRange),
          location
        );
      if (!zone) {
        this.counters.discardedStopPositions++;
        this.osmData.removeUnprocessedStopPosition(stop.id);
        console.warn(`[zoning] DISCARD: stop_position ${stop.id} has no waiting area within ${radius}m`);
        continue;
      }
      this.connectStopPosition(stop, zone, modes);
    }
  }

  /** c. Waiting areas without a stop position attach to the closest link in range */
  private connectStandAloneWaitingAreas(): void {
    const radius = this.settings.searchRadiusPlatformToStopMeters;
    const zones = this.planitData.incompleteZones().sort((a, b) => a.id - b.id);
    for (const zone of zones) {
      const centroid = centroidOf(zone.geometry);
      if (!centroid) continue;
      const verticalLayerIndex = this.planitData.getVerticalLayerIndex(zone);
      const searchArea = expandEnvelope(zone.envelope, radius);

      for (const [layerId, modes] of this.helper.modesByLayer(zone.modes)) {
        const [closest] = this.closestLinksPerWay(layerId, verticalLayerIndex, centroid, radius, 1, searchArea);
        if (closest) this.helper.extractConnectoidsForStandAloneZone(zone, closest, modes);
      }

      if (this.planitData.isIncomplete(zone)) {
        this.counters.discardedWaitingAreas++;
        console.warn(
          `[zoning] DISCARD: waiting area ${zone.entityType} ${zone.osmId} has no compatible link within ${radius}m`
        );
      }
    }
  }

  /** d. Stations group the waiting areas around them, or stand alone */
  private processStations(): void {
    const radius = this.settings.searchRadiusStationToPlatformMeters;
    for (const station of this.osmData.getUnprocessedStations()) {
      this.osmData.removeUnprocessedStation(station.entityType, station.osmId);
      const location = centroidOf(station.geometry);
      if (!location) continue;

      const modes = extractPublicTransportModes(station.tags);
      const zones = this.planitData
        .findTransferZonesNear(expandEnvelope(envelopeOfLocation(location), radius), {
          includeComplete: true,
        })
        .filter(
          (zone) =>
            (modes.length === 0 || sharedModes(zone.modes, modes).length > 0) &&
            distanceToLine(zone.geometry, location) <= radius
        )
        .sort((a, b) => a.id - b.id);
      if (zones.length === 0) {
        this.extractStandAloneStation(station, location);
        continue;
      }

      const group = this.groupForStation(station, zones);
      for (const zone of zones) this.planitData.addZoneToGroup(group, zone);
    }
  }

  /**
   * A station without waiting areas around it is a transfer zone itself.
   * Per layer it connects at its own node when that lies on the network,
   * otherwise to the closest links: up to two tracks for rail modes, one
   * road for the others.
   */
  private extractStandAloneStation(station: UnprocessedStation, location: Location): void {
    const stationRadius = this.settings.searchRadiusStationToPlatformMeters;
    const modes = this.mappedModes(station.tags);
    const envelope = envelopeOf(station.geometry);
    if (modes.length === 0 || !envelope) {
      this.counters.discardedStations++;
      console.warn(
        `[zoning] DISCARD: station ${station.entityType} ${station.osmId} has no waiting area within ${stationRadius}m`
      );
      return;
    }

    const name = extractName(station.tags);
    const zone: TransferZone = {
      id: this.planitData.nextZoneId(),
      osmId: station.osmId,
      entityType: station.entityType,
      type: "station",
      geometry: station.geometry,
      envelope,
      modes,
      ...(name !== undefined && { name }),
    };
    this.planitData.addIncompleteTransferZone(zone);
    const verticalLayerIndex = extractVerticalLayerIndex(station.tags);
    this.planitData.setVerticalLayerIndex(zone, verticalLayerIndex);

    const stationNode = station.entityType === "node" ? this.osmData.getNode(station.osmId) : undefined;
    for (const [layerId, layerModes] of this.helper.modesByLayer(modes)) {
      if (stationNode && this.bridge.getLayerState(layerId)?.isLocationPresent(location)) {
        this.helper.extractConnectoidsForStopPosition(stationNode, zone, layerModes);
        continue;
      }
      const rail = layerModes.some(isRailMode);
      const radius = rail ? stationRadius : this.settings.searchRadiusPlatformToStopMeters;
      const links = this.closestLinksPerWay(layerId, verticalLayerIndex, location, radius, rail ? 2 : 1);
      const layer = this.bridge.getPopulatedNetwork().getLayer(layerId);
      for (const link of links) {
        if (!layer?.hasLink(link)) continue;
        this.helper.extractConnectoidsForStandAloneZone(zone, link, layerModes);
      }
    }

    this.planitData.addZoneToGroup(this.groupForStation(station, [zone]), zone);
    if (this.planitData.isIncomplete(zone)) {
      this.counters.discardedStations++;
      console.warn(
        `[zoning] DISCARD: station ${station.entityType} ${station.osmId} has no waiting area within ${stationRadius}m and no compatible link nearby`
      );
    }
  }

  // ── Internal ──────────────────────────────────────────────────────────

  /**
   * Links of a layer and vertical layer within `radius` of a location,
   * closest first (ties to the lower link ID), at most one per OSM way.
   */
  private closestLinksPerWay(
    layerId: string,
    verticalLayerIndex: number,
    location: Location,
    radius: number,
    maxLinks: number,
    searchArea: BoundingBox = expandEnvelope(envelopeOfLocation(location), radius)
  ): NetworkLink[] {
    const candidates = this.planitData
      .findLinksSpatially(searchArea)
      .filter((l) => l.layerId === layerId && l.verticalLayerIndex === verticalLayerIndex)
      .map((link) => ({ link, distance: distanceToLine(link.geometry, location) }))
      .filter(({ distance }) => distance <= radius)
      .sort((a, b) => a.distance - b.distance || a.link.id - b.link.id);

    const result: NetworkLink[] = [];
    const seenWays = new Set<number>();
    for (const { link } of candidates) {
      if (result.length === maxLinks) break;
      if (seenWays.has(link.externalId)) continue;
      seenWays.add(link.externalId);
      result.push(link);
    }
    return result;
  }

  /**
   * Group a station joins: its stop area, else the group of a nearby
   * waiting area, else a new group named after the station.
   */
  private groupForStation(station: UnprocessedStation, zones: readonly TransferZone[]): TransferZoneGroup {
    const name = extractName(station.tags);
    const existing =
      this.osmData
        .getStopAreasOf(station.entityType, station.osmId)
        .map((id) => this.planitData.getTransferZoneGroupByOsmId(id))
        .find((g) => g !== undefined) ??
      zones.flatMap((zone) => this.planitData.getTransferZoneGroupsOf(zone))[0] ??
      this.planitData.getTransferZoneGroupByOsmId(station.osmId, station.entityType);
    if (existing) {
      if (existing.name === undefined && name !== undefined) existing.name = name;
      return existing;
    }

    const group: TransferZoneGroup = {
      id: this.planitData.nextGroupId(),
      osmId: station.osmId,
      ...(name !== undefined && { name }),
      zones: [],
    };
    this.planitData.addTransferZoneGroup(group, station.entityType);
    return group;
  }

  private connectStopPosition(
    stop: OsmNode,
    zone: TransferZone,
    modes: readonly PublicTransportMode[]
  ): void {
    this.osmData.removeUnprocessedStopPosition(stop.id);
    const created = this.helper.extractConnectoidsForStopPosition(stop, zone, sharedModes(zone.modes, modes));
    if (created.length > 0) return;

    const location = locationOf(stop);
    const connected = this.planitData
      .getConnectoidsForZone(zone)
      .some((c) => locationsEqual(c.location, location));
    if (!connected) {
      this.counters.discardedStopPositions++;
      console.warn(`[zoning] DISCARD: stop_position ${stop.id} is not on any link serving its modes`);
    }
  }

  /** Modes of the tags that a layer of the network serves */
  private mappedModes(tags: OsmTags): PublicTransportMode[] {
    return [...this.helper.modesByLayer(extractPublicTransportModes(tags)).values()].flat();
  }

  private isOutsideBoundingBox(location: Location, entityType: OsmEntityType, osmId: number): boolean {
    const bbox = this.bridge.getBoundingBox();
    if (!bbox || envelopeContains(bbox, location)) return false;
    this.counters.outsideBoundingBox++;
    if (this.settings.verbose) {
      console.log(`[zoning] ${entityType} ${osmId} outside bounding box, skipped`);
    }
    return true;
  }

  /** Complete zones, and groups reduced to their complete zones */
  private buildZoning(): Zoning {
    const transferZones = this.planitData.completeZones().sort((a, b) => a.id - b.id);
    const transferZoneGroups = this.planitData
      .transferZoneGroups()
      .map((group) => ({ ...group, zones: group.zones.filter((z) => this.planitData.isComplete(z)) }))
      .filter((group) => group.zones.length > 0);
    return {
      transferZones,
      transferZoneGroups,
      connectoids: this.planitData.allConnectoids(),
    };
  }
}

function sharedModes(
  a: readonly PublicTransportMode[],
  b: readonly PublicTransportMode[]
): PublicTransportMode[] {
  return a.filter((mode) => b.includes(mode));
}

function closestZone(zones: readonly TransferZone[], location: Location): TransferZone | undefined {
  let best: TransferZone | undefined;
  let bestDistance = Infinity;
  for (const zone of zones) {
    const distance = distanceToLine(zone.geometry, location);
    if (distance < bestDistance || (distance === bestDistance && best && zone.id < best.id)) {
      best = zone;
      bestDistance = distance;
    }
  }
  return best;
}
