/**
 * Connectoid creation: attach transfer zones to network nodes.
 *
 * Access nodes are taken from the network when a node already exists at a
 * location; otherwise the links running through it are broken there. All
 * breaking goes through the layer's LinkBreaker, with the zoning data as
 * listener so its link index follows every replacement.
 */

import type {
  Connectoid,
  Location,
  NetworkLink,
  NetworkNode,
  PublicTransportMode,
  TransferZone,
} from "@netweave/types";
import { centroidOf, closestPointOnLine, haversineDistance } from "../geo/geometry.js";
import { locationKey, locationOf } from "../geo/location.js";
import type { OsmNode } from "../ingestion/osm/types.js";
import type { NetworkToZoningBridge } from "../network-reader/bridge.js";
import type { ZoningReaderSettings } from "../network-reader/config.js";
import type { LinkBreaker } from "../network-reader/link-reconciler.js";
import type { ZoningReaderPlanitData } from "./zoning-planit-data.js";

export interface ConnectoidHelperStats {
  accessNodesCreated: number;
  /** Links replaced by pieces when an access node was created */
  linksBroken: number;
  /** Projected locations added to a link's geometry */
  locationsInjected: number;
  /** Locations not found on any link of the layer */
  locationsOffNetwork: number;
}

export class ConnectoidHelper {
  readonly stats: ConnectoidHelperStats = {
    accessNodesCreated: 0,
    linksBroken: 0,
    locationsInjected: 0,
    locationsOffNetwork: 0,
  };
  private breakers = new Map<string, LinkBreaker>();

  constructor(
    private readonly bridge: NetworkToZoningBridge,
    private readonly planitData: ZoningReaderPlanitData,
    private readonly settings: Readonly<ZoningReaderSettings>
  ) {}

  /**
   * Network node to attach a connectoid to at a location, breaking the
   * links through it when no node exists yet.
   *
   * @param osmNode - OSM node at the location, if any (for reporting)
   * @returns undefined when the location is on no link of the layer
   */
  extractAccessNode(
    layerId: string,
    location: Location,
    osmNode?: OsmNode
  ): NetworkNode | undefined {
    const layerState = this.bridge.getLayerState(layerId);
    if (!layerState) return undefined;

    const existing = layerState.getNodeAtLocation(location);
    if (existing) return existing;

    const result = this.breakerFor(layerId).breakAtLocation(location);
    if (!result.node) {
      this.stats.locationsOffNetwork++;
      if (this.settings.verbose) {
        const what = osmNode ? `stop_position ${osmNode.id}` : `location ${locationKey(location)}`;
        console.log(`[connectoid] ${what} is not on any link of layer ${layerId}`);
      }
      return undefined;
    }

    this.stats.accessNodesCreated++;
    this.stats.linksBroken += result.removed.length;
    return result.node;
  }

  /**
   * Connectoids from a stop position to a zone, one per layer serving the
   * given modes. Locations already connected to the zone are skipped.
   * The zone is promoted to complete when anything was created.
   */
  extractConnectoidsForStopPosition(
    osmNode: OsmNode,
    zone: TransferZone,
    modes: readonly PublicTransportMode[]
  ): Connectoid[] {
    const location = locationOf(osmNode);
    const created: Connectoid[] = [];

    for (const [layerId, layerModes] of this.modesByLayer(modes)) {
      if (this.planitData.hasConnectoidAtLocation(layerId, location, zone)) continue;
      const accessNode = this.extractAccessNode(layerId, location, osmNode);
      if (!accessNode) continue;
      created.push(this.createConnectoid(layerId, location, accessNode, zone, layerModes, osmNode.id));
    }

    this.completeIfConnected(zone, created);
    return created;
  }

  /**
   * Connectoid for a zone without a stop position, on a chosen link.
   *
   * The zone centroid is projected onto the link. An existing coordinate
   * within the search buffer of the projection is used as is; otherwise
   * the projection is added to the link geometry.
   */
  extractConnectoidsForStandAloneZone(
    zone: TransferZone,
    link: NetworkLink,
    modes: readonly PublicTransportMode[]
  ): Connectoid[] {
    const centroid = centroidOf(zone.geometry);
    const projection = centroid && closestPointOnLine(link.geometry, centroid);
    if (!projection) return [];

    const layerId = link.layerId;
    const nearest = nearestCoordinate(link.geometry, projection.point);
    const buffer = this.settings.closestLinkSearchBufferMeters;
    let location = projection.point;
    let inject = true;
    if (nearest && haversineDistance(nearest, projection.point) <= buffer) {
      location = nearest;
      inject = false;
    }

    if (this.planitData.hasConnectoidAtLocation(layerId, location, zone)) return [];
    if (inject) this.injectLocation(link, location, projection.segmentIndex);
    const accessNode = this.extractAccessNode(layerId, location);
    if (!accessNode) return [];

    const connectoid = this.createConnectoid(layerId, location, accessNode, zone, modes);
    this.completeIfConnected(zone, [connectoid]);
    return [connectoid];
  }

  /** Modes grouped by the network layer serving them; unserved modes are dropped */
  modesByLayer(modes: readonly PublicTransportMode[]): Map<string, PublicTransportMode[]> {
    const { classifier } = this.bridge.getSettings();
    const byLayer = new Map<string, PublicTransportMode[]>();
    for (const mode of modes) {
      const layerId = classifier.layerForMode(mode);
      if (!layerId || !this.bridge.getLayerState(layerId)) continue;
      const layerModes = byLayer.get(layerId) ?? [];
      layerModes.push(mode);
      byLayer.set(layerId, layerModes);
    }
    return byLayer;
  }

  // ── Internal ──────────────────────────────────────────────────────────

  private breakerFor(layerId: string): LinkBreaker {
    let breaker = this.breakers.get(layerId);
    if (!breaker) {
      breaker = this.bridge.createLinkBreaker(layerId, [this.planitData]);
      this.breakers.set(layerId, breaker);
    }
    return breaker;
  }

  /** Add a coordinate after `segmentIndex` and record it as internal */
  private injectLocation(link: NetworkLink, location: Location, segmentIndex: number): void {
    const geometry = [
      ...link.geometry.slice(0, segmentIndex + 1),
      location,
      ...link.geometry.slice(segmentIndex + 1),
    ];
    const replacement = this.breakerFor(link.layerId).replaceLinkGeometry(link, geometry);
    this.bridge
      .getLayerState(link.layerId)
      ?.registerLocationAsInternalToLink(location, replacement);
    this.stats.locationsInjected++;
  }

  private createConnectoid(
    layerId: string,
    location: Location,
    accessNode: NetworkNode,
    zone: TransferZone,
    modes: readonly PublicTransportMode[],
    osmStopPositionId?: number
  ): Connectoid {
    const connectoid: Connectoid = {
      id: this.planitData.nextConnectoidId(),
      layerId,
      location,
      accessNodeId: accessNode.id,
      zone,
      modes: [...modes],
      ...(osmStopPositionId !== undefined && { osmStopPositionId }),
    };
    this.planitData.addConnectoid(connectoid);
    return connectoid;
  }

  private completeIfConnected(zone: TransferZone, created: readonly Connectoid[]): void {
    if (created.length > 0 && this.planitData.isIncomplete(zone)) {
      this.planitData.promoteToComplete(zone);
    }
  }
}

function nearestCoordinate(geometry: readonly Location[], target: Location): Location | undefined {
  let best: Location | undefined;
  let bestDistance = Infinity;
  for (const coordinate of geometry) {
    const distance = haversineDistance(coordinate, target);
    if (distance < bestDistance) {
      best = coordinate;
      bestDistance = distance;
    }
  }
  return best;
}
