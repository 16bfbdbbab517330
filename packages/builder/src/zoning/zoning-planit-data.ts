/**
 * Zoning state built while reading public transport entities.
 *
 * Transfer zones start out incomplete and become complete once a
 * connectoid attaches them to the network. A zone key (entity type + OSM
 * ID) lives in exactly one of the two collections at any time.
 *
 * Also holds the live link index used to find links near a waiting area.
 * Links change while connectoids are created (breaks, injected
 * coordinates), so the index subscribes to link replacements.
 */

import type {
  BoundingBox,
  Connectoid,
  Location,
  NetworkLink,
  OsmEntityType,
  TransferZone,
  TransferZoneGroup,
} from "@netweave/types";
import { envelopeOf, envelopesIntersect } from "../geo/envelope.js";
import { LocationMap } from "../geo/location.js";
import type { LinkReplacementListener } from "../network-reader/link-reconciler.js";
import { GridSpatialIndex } from "../spatial/grid-index.js";

export function transferZoneKey(entityType: OsmEntityType, osmId: number): string {
  return `${entityType}:${osmId}`;
}

/** OSM entity a group stems from: a stop_area relation or a station */
export type GroupSourceType = "relation" | OsmEntityType;

export function transferZoneGroupKey(sourceType: GroupSourceType, osmId: number): string {
  return `${sourceType}:${osmId}`;
}

export interface ZoneSearchOptions {
  /** Also return complete zones (default false) */
  includeComplete?: boolean;
}

export class ZoningReaderPlanitData implements LinkReplacementListener {
  private incomplete = new Map<string, TransferZone>();
  private complete = new Map<string, TransferZone>();
  private incompleteIndex = new GridSpatialIndex<TransferZone>();
  private completeIndex = new GridSpatialIndex<TransferZone>();

  /** layer ID -> location -> connectoids */
  private connectoidsByLayer = new Map<string, LocationMap<Connectoid[]>>();
  private connectoidsByZoneId = new Map<number, Connectoid[]>();

  private groupsByKey = new Map<string, TransferZoneGroup>();
  private groupsByZoneId = new Map<number, TransferZoneGroup[]>();

  private verticalLayerByZoneId = new Map<number, number>();

  private linkIndex = new GridSpatialIndex<NetworkLink>();

  private ids = { zone: 0, connectoid: 0, group: 0 };

  nextZoneId(): number {
    return this.ids.zone++;
  }

  nextConnectoidId(): number {
    return this.ids.connectoid++;
  }

  nextGroupId(): number {
    return this.ids.group++;
  }

  // ── Transfer zones ────────────────────────────────────────────────────

  addIncompleteTransferZone(zone: TransferZone): void {
    const key = transferZoneKey(zone.entityType, zone.osmId);
    if (this.incomplete.has(key) || this.complete.has(key)) {
      throw new Error(`Transfer zone for OSM ${key} already registered`);
    }
    this.incomplete.set(key, zone);
    this.incompleteIndex.insert(zone.envelope, zone);
  }

  /** Move a zone from incomplete to complete; throws unless it is incomplete */
  promoteToComplete(zone: TransferZone): void {
    const key = transferZoneKey(zone.entityType, zone.osmId);
    if (this.incomplete.get(key) !== zone) {
      throw new Error(`Transfer zone for OSM ${key} is not incomplete, cannot promote`);
    }
    this.incomplete.delete(key);
    this.incompleteIndex.remove(zone.envelope, zone);
    this.complete.set(key, zone);
    this.completeIndex.insert(zone.envelope, zone);
  }

  getIncompleteTransferZone(entityType: OsmEntityType, osmId: number): TransferZone | undefined {
    return this.incomplete.get(transferZoneKey(entityType, osmId));
  }

  getCompleteTransferZone(entityType: OsmEntityType, osmId: number): TransferZone | undefined {
    return this.complete.get(transferZoneKey(entityType, osmId));
  }

  /** Zone in either collection */
  getTransferZone(entityType: OsmEntityType, osmId: number): TransferZone | undefined {
    return (
      this.getIncompleteTransferZone(entityType, osmId) ??
      this.getCompleteTransferZone(entityType, osmId)
    );
  }

  isComplete(zone: TransferZone): boolean {
    return this.complete.get(transferZoneKey(zone.entityType, zone.osmId)) === zone;
  }

  isIncomplete(zone: TransferZone): boolean {
    return this.incomplete.get(transferZoneKey(zone.entityType, zone.osmId)) === zone;
  }

  findIncompleteZonesNear(envelope: BoundingBox): TransferZone[] {
    return this.incompleteIndex
      .query(envelope)
      .filter((zone) => envelopesIntersect(zone.envelope, envelope));
  }

  findTransferZonesNear(
    envelope: BoundingBox,
    options: ZoneSearchOptions = {}
  ): TransferZone[] {
    const zones = this.findIncompleteZonesNear(envelope);
    if (!options.includeComplete) return zones;
    return zones.concat(
      this.completeIndex
        .query(envelope)
        .filter((zone) => envelopesIntersect(zone.envelope, envelope))
    );
  }

  incompleteZones(): TransferZone[] {
    return [...this.incomplete.values()];
  }

  completeZones(): TransferZone[] {
    return [...this.complete.values()];
  }

  // ── Connectoids ───────────────────────────────────────────────────────

  addConnectoid(connectoid: Connectoid): void {
    let byLocation = this.connectoidsByLayer.get(connectoid.layerId);
    if (!byLocation) {
      byLocation = new LocationMap();
      this.connectoidsByLayer.set(connectoid.layerId, byLocation);
    }
    const atLocation = byLocation.get(connectoid.location);
    if (atLocation) {
      atLocation.push(connectoid);
    } else {
      byLocation.set(connectoid.location, [connectoid]);
    }

    const forZone = this.connectoidsByZoneId.get(connectoid.zone.id);
    if (forZone) {
      forZone.push(connectoid);
    } else {
      this.connectoidsByZoneId.set(connectoid.zone.id, [connectoid]);
    }
  }

  getConnectoidsAtLocation(layerId: string, location: Location): readonly Connectoid[] {
    return this.connectoidsByLayer.get(layerId)?.get(location) ?? [];
  }

  /** True if a connectoid exists at the location (for the zone, when given) */
  hasConnectoidAtLocation(layerId: string, location: Location, zone?: TransferZone): boolean {
    const connectoids = this.getConnectoidsAtLocation(layerId, location);
    return zone ? connectoids.some((c) => c.zone === zone) : connectoids.length > 0;
  }

  getConnectoidsForZone(zone: TransferZone): readonly Connectoid[] {
    return this.connectoidsByZoneId.get(zone.id) ?? [];
  }

  allConnectoids(): Connectoid[] {
    return [...this.connectoidsByZoneId.values()].flat().sort((a, b) => a.id - b.id);
  }

  // ── Transfer zone groups ──────────────────────────────────────────────

  addTransferZoneGroup(group: TransferZoneGroup, sourceType: GroupSourceType = "relation"): void {
    const key = transferZoneGroupKey(sourceType, group.osmId);
    if (this.groupsByKey.has(key)) {
      throw new Error(`Transfer zone group for OSM ${key} already registered`);
    }
    this.groupsByKey.set(key, group);
    for (const zone of group.zones) this.indexGroupOf(zone, group);
  }

  /** Group of a stop_area relation, or of a station when its type is given */
  getTransferZoneGroupByOsmId(
    osmId: number,
    sourceType: GroupSourceType = "relation"
  ): TransferZoneGroup | undefined {
    return this.groupsByKey.get(transferZoneGroupKey(sourceType, osmId));
  }

  getTransferZoneGroupsOf(zone: TransferZone): readonly TransferZoneGroup[] {
    return this.groupsByZoneId.get(zone.id) ?? [];
  }

  /** Add a zone to a group; a zone already in the group is left alone */
  addZoneToGroup(group: TransferZoneGroup, zone: TransferZone): void {
    if (group.zones.includes(zone)) return;
    group.zones.push(zone);
    this.indexGroupOf(zone, group);
  }

  transferZoneGroups(): TransferZoneGroup[] {
    return [...this.groupsByKey.values()];
  }

  // ── Vertical layer index ──────────────────────────────────────────────

  setVerticalLayerIndex(zone: TransferZone, index: number): void {
    this.verticalLayerByZoneId.set(zone.id, index);
  }

  /** OSM `layer` of the zone's waiting area, 0 when not set */
  getVerticalLayerIndex(zone: TransferZone): number {
    return this.verticalLayerByZoneId.get(zone.id) ?? 0;
  }

  // ── Live link index ───────────────────────────────────────────────────

  addLinksToIndex(links: Iterable<NetworkLink>): void {
    for (const link of links) {
      const envelope = envelopeOf(link.geometry);
      if (envelope) this.linkIndex.insert(envelope, link);
    }
  }

  removeLinksFromIndex(links: Iterable<NetworkLink>): void {
    for (const link of links) {
      const envelope = envelopeOf(link.geometry);
      if (envelope) this.linkIndex.remove(envelope, link);
    }
  }

  /** Indexed links whose envelope intersects the given one */
  findLinksSpatially(envelope: BoundingBox): NetworkLink[] {
    return this.linkIndex.query(envelope).filter((link) => {
      const linkEnvelope = envelopeOf(link.geometry);
      return linkEnvelope !== undefined && envelopesIntersect(linkEnvelope, envelope);
    });
  }

  get indexedLinkCount(): number {
    return this.linkIndex.size;
  }

  onLinksReplaced(removed: readonly NetworkLink[], created: readonly NetworkLink[]): void {
    this.removeLinksFromIndex(removed);
    this.addLinksToIndex(created);
  }

  // ── Lifecycle ─────────────────────────────────────────────────────────

  reset(): void {
    this.incomplete.clear();
    this.complete.clear();
    this.incompleteIndex.clear();
    this.completeIndex.clear();
    this.connectoidsByLayer.clear();
    this.connectoidsByZoneId.clear();
    this.groupsByKey.clear();
    this.groupsByZoneId.clear();
    this.verticalLayerByZoneId.clear();
    this.linkIndex.clear();
    this.ids = { zone: 0, connectoid: 0, group: 0 };
  }

  private indexGroupOf(zone: TransferZone, group: TransferZoneGroup): void {
    const groups = this.groupsByZoneId.get(zone.id);
    if (!groups) {
      this.groupsByZoneId.set(zone.id, [group]);
    } else if (!groups.includes(group)) {
      groups.push(group);
    }
  }
}
