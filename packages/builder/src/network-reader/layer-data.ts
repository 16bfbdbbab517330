/**
 * Per-layer reader state.
 *
 * Single source of truth, per network layer, for what is known about a
 * location while ways are converted into links:
 *
 * - location -> network node (the location is a link extremity)
 * - location -> links it is internal to, plus the OSM node behind it
 * - OSM way ID -> current links, for every way represented by more than
 *   the one link it was created as (broken, circular, or replaced)
 *
 * Internal entries keep the links recorded when the location was first
 * seen. Those references go stale as links are broken; lookups resolve
 * them through the OSM way map instead of trusting them.
 */

import type { Location, NetworkLink, NetworkNode } from "@netweave/types";
import { findCoordinatePosition } from "../geo/geometry.js";
import { LocationMap, locationKey } from "../geo/location.js";
import type { OsmNode } from "../ingestion/osm/types.js";
import type { NetworkLayer } from "../network/network-layer.js";
import { reconcileAtLocation, type ReconcileResult } from "./link-reconciler.js";

/** Links a location was recorded as internal to */
export interface InternalLocationEntry {
  links: NetworkLink[];
  osmNode?: OsmNode;
}

interface NodeEntry {
  node: NetworkNode;
  osmNode?: OsmNode;
}

/** Warning counters surfaced for testing and reporting */
export interface LayerDataStats {
  /** registerNodeAtLocation replaced a different node */
  nodeOverwrites: number;
  /** A broken way had no current link at a recorded location */
  unmatchedBrokenLinks: number;
  /** A way was registered with fewer than 2 current links */
  undersizedWayLinkSets: number;
  /** Node locations still carrying internal entries at validation */
  staleInternalEntries: number;
}

export interface LayerDataOptions {
  /** Log fine-grained messages (default false) */
  verbose?: boolean;
}

export class NetworkLayerReaderData {
  private nodesByLocation = new LocationMap<NodeEntry>();
  private internalByLocation = new LocationMap<InternalLocationEntry>();
  private linksByOsmWayId = new Map<number, Set<NetworkLink>>();
  /** Links removed by a caller, per OSM way */
  private removedByOsmWayId = new Map<number, NetworkLink[]>();
  private readonly verbose: boolean;
  private readonly tag: string;

  readonly stats: LayerDataStats = emptyStats();

  constructor(
    readonly layer: NetworkLayer,
    options: LayerDataOptions = {}
  ) {
    this.verbose = options.verbose ?? false;
    this.tag = `[layer:${layer.id}]`;
  }

  get layerId(): string {
    return this.layer.id;
  }

  // ── Nodes ─────────────────────────────────────────────────────────────

  /**
   * Record that a node now exists at a location. Replacing a different
   * node is reported; the new node wins.
   */
  registerNodeAtLocation(
    location: Location,
    node: NetworkNode,
    osmNode?: OsmNode
  ): void {
    const existing = this.nodesByLocation.get(location);
    if (existing && existing.node.id !== node.id) {
      this.stats.nodeOverwrites++;
      console.warn(
        `${this.tag} Node ${node.id} replaces node ${existing.node.id} at ${locationKey(location)}`
      );
    }
    const osm = osmNode ?? existing?.osmNode;
    this.nodesByLocation.set(location, { node, ...(osm && { osmNode: osm }) });
  }

  getNodeAtLocation(location: Location): NetworkNode | undefined {
    return this.nodesByLocation.get(location)?.node;
  }

  /** OSM node behind a location, from either the node or the internal entry */
  getOsmNodeAtLocation(location: Location): OsmNode | undefined {
    return (
      this.nodesByLocation.get(location)?.osmNode ??
      this.internalByLocation.get(location)?.osmNode
    );
  }

  /**
   * Forget nodes removed by a caller (e.g. pruning). A location registered
   * for a different node is left alone.
   */
  removeNodes(nodes: Iterable<NetworkNode>): void {
    for (const node of nodes) {
      if (this.nodesByLocation.get(node.location)?.node.id !== node.id) continue;
      this.nodesByLocation.delete(node.location);
    }
  }

  // ── Internal locations ────────────────────────────────────────────────

  /**
   * Record that a location lies strictly between the first and last
   * coordinate of a link.
   */
  registerLocationAsInternalToLink(
    location: Location,
    link: NetworkLink,
    osmNode?: OsmNode
  ): void {
    const entry = this.internalByLocation.get(location);
    if (entry) {
      entry.links.push(link);
      if (!entry.osmNode && osmNode) entry.osmNode = osmNode;
    } else {
      this.internalByLocation.set(location, {
        links: [link],
        ...(osmNode && { osmNode }),
      });
    }
  }

  getInternalEntry(location: Location): Readonly<InternalLocationEntry> | undefined {
    return this.internalByLocation.get(location);
  }

  isLocationInternal(location: Location): boolean {
    return this.internalByLocation.has(location);
  }

  /** True if the location is a node or internal to any link */
  isLocationPresent(location: Location): boolean {
    return this.nodesByLocation.has(location) || this.internalByLocation.has(location);
  }

  /** Drop the internal entry of a location that became a node */
  clearInternalEntry(location: Location): void {
    this.internalByLocation.delete(location);
  }

  /**
   * Every location recorded as internal to at least `n` links, in
   * registration order.
   */
  collectLocationsInternalToAtLeast(n: number): Location[] {
    const result: Location[] = [];
    for (const [location, entry] of this.internalByLocation.entries()) {
      if (entry.links.length >= n) result.push(location);
    }
    return result;
  }

  /** Node locations that are also recorded as internal to a link */
  collectInternalLocationsOnNodes(): Location[] {
    const result: Location[] = [];
    for (const location of this.nodesByLocation.locations()) {
      if (this.internalByLocation.has(location)) result.push(location);
    }
    return result;
  }

  // ── Reconciliation ────────────────────────────────────────────────────

  /**
   * Resolve the recorded internal links of a location to the links that
   * currently represent them.
   */
  reconcileLinksAtLocation(location: Location): ReconcileResult<NetworkLink> {
    const entry = this.internalByLocation.get(location);
    if (!entry) return { links: [], extremeLinks: [], dropped: [] };

    return reconcileAtLocation(location, entry.links, {
      currentByExternalId: (wayId) => this.linksByOsmWayId.get(wayId),
      isRetired: (link) => !this.layer.hasLink(link),
      onUnmatched: (link) => {
        if (this.wasRemovedAt(link.externalId, location)) {
          if (this.verbose) {
            console.log(`${this.tag} Piece of OSM way ${link.externalId} at ${locationKey(location)} was removed`);
          }
          return;
        }
        this.stats.unmatchedBrokenLinks++;
        console.warn(
          `${this.tag} Unable to locate broken sub-link of OSM way ${link.externalId} at ${locationKey(location)}, likely malformed way`
        );
      },
    });
  }

  /**
   * Links presently valid at a location: the current links it is internal
   * to, plus the links ending at its node. Empty when the location was
   * never registered (e.g. outside the parsed bounding box).
   */
  findCurrentLinksAtLocation(location: Location): NetworkLink[] {
    const node = this.nodesByLocation.get(location)?.node;
    const internal = this.internalByLocation.has(location);
    if (!node && !internal) {
      if (this.verbose) {
        console.log(`${this.tag} Location ${locationKey(location)} not present in layer`);
      }
      return [];
    }

    const result = new Map<number, NetworkLink>();
    if (internal) {
      const reconciled = this.reconcileLinksAtLocation(location);
      for (const link of [...reconciled.links, ...reconciled.extremeLinks]) {
        result.set(link.id, link);
      }
    }
    if (node) {
      for (const link of this.layer.linksAt(node.id)) result.set(link.id, link);
    }
    return [...result.values()];
  }

  // ── OSM way -> current links ──────────────────────────────────────────

  /**
   * Register links that jointly represent an OSM way, merged with any
   * existing entry. A way split into fewer than 2 links is reported.
   */
  updateOsmWayLinks(osmWayId: number, links: Iterable<NetworkLink>): void {
    const added = [...links];
    if (added.length < 2) {
      this.stats.undersizedWayLinkSets++;
      console.warn(
        `${this.tag} OSM way ${osmWayId} registered with ${added.length} link(s), expected at least 2`
      );
    }
    const set = this.linksByOsmWayId.get(osmWayId) ?? new Set<NetworkLink>();
    for (const link of added) set.add(link);
    this.linksByOsmWayId.set(osmWayId, set);
  }

  /**
   * Swap replaced links for their replacements in a way's entry. A way
   * without an entry was represented by exactly the removed links.
   */
  replaceOsmWayLinks(
    osmWayId: number,
    removed: Iterable<NetworkLink>,
    created: Iterable<NetworkLink>
  ): void {
    const set = this.linksByOsmWayId.get(osmWayId) ?? new Set<NetworkLink>();
    for (const link of removed) set.delete(link);
    for (const link of created) set.add(link);
    this.linksByOsmWayId.set(osmWayId, set);
  }

  getOsmWayLinks(osmWayId: number): ReadonlySet<NetworkLink> | undefined {
    return this.linksByOsmWayId.get(osmWayId);
  }

  /** Forget links removed by a caller (e.g. pruning) */
  removeLinks(links: Iterable<NetworkLink>): void {
    for (const link of links) {
      const removed = this.removedByOsmWayId.get(link.externalId);
      if (removed) {
        removed.push(link);
      } else {
        this.removedByOsmWayId.set(link.externalId, [link]);
      }
      const set = this.linksByOsmWayId.get(link.externalId);
      if (!set) continue;
      set.delete(link);
      if (set.size === 0) this.linksByOsmWayId.delete(link.externalId);
    }
  }

  // ── Lifecycle ─────────────────────────────────────────────────────────

  /**
   * Report node locations that still carry internal entries.
   * @returns number of offending locations
   */
  validate(): number {
    let offending = 0;
    for (const [location, entry] of this.nodesByLocation.entries()) {
      if (!this.internalByLocation.has(location)) continue;
      offending++;
      console.error(
        `${this.tag} Node ${entry.node.id} at ${locationKey(location)} still recorded as internal to a link`
      );
    }
    this.stats.staleInternalEntries = offending;
    return offending;
  }

  reset(): void {
    this.nodesByLocation.clear();
    this.internalByLocation.clear();
    this.linksByOsmWayId.clear();
    this.removedByOsmWayId.clear();
    Object.assign(this.stats, emptyStats());
  }

  // ── Internal ──────────────────────────────────────────────────────────

  private wasRemovedAt(osmWayId: number, location: Location): boolean {
    return (this.removedByOsmWayId.get(osmWayId) ?? []).some(
      (link) => findCoordinatePosition(link.geometry, location) !== undefined
    );
  }
}

function emptyStats(): LayerDataStats {
  return {
    nodeOverwrites: 0,
    unmatchedBrokenLinks: 0,
    undersizedWayLinkSets: 0,
    staleInternalEntries: 0,
  };
}
