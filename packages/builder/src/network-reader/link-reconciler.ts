/**
 * Link-breaking reconciler.
 *
 * Locations remember the links they were internal to when first seen.
 * After links are broken those references may point at links that no
 * longer exist. `reconcileAtLocation` maps each recorded link to the link
 * (or links) that currently cover the location, using the OSM way ID ->
 * current links map. `LinkBreaker` performs a break at a location and
 * keeps every index consistent afterwards.
 */

import type { Location, NetworkLink, NetworkNode } from "@netweave/types";
import { findCoordinatePosition, findInteriorPositions } from "../geo/geometry.js";
import type { NetworkLayer } from "../network/network-layer.js";
import type { NetworkLayerReaderData } from "./layer-data.js";

/** Anything with an ID, the ID of its source way, and a line geometry */
export interface LinearEntity {
  readonly id: number;
  readonly externalId: number;
  readonly geometry: readonly Location[];
}

export interface ReconcileResult<T> {
  /** Current links on which the location is an interior coordinate */
  links: T[];
  /** Current links on which the location is the first or last coordinate */
  extremeLinks: T[];
  /** Recorded links with no current counterpart */
  dropped: T[];
}

export interface ReconcileContext<T> {
  /** Current links of a way that was split or replaced; undefined if never */
  currentByExternalId(externalId: number): Iterable<T> | undefined;
  /** True for a recorded link removed without replacement */
  isRetired?(link: T): boolean;
  /** Called when a broken way has no current link containing the location */
  onUnmatched?(recorded: T): void;
}

/**
 * Resolve links recorded at a location to the links that cover it now.
 *
 * A recorded link whose way was never split is still current. Otherwise
 * the way's current links are searched for the location by exact
 * coordinate: interior matches supersede the recorded link; when the
 * location only survives as a first or last coordinate the match is an
 * extreme link. Results are unique by ID.
 */
export function reconcileAtLocation<T extends LinearEntity>(
  location: Location,
  recorded: readonly T[],
  context: ReconcileContext<T>
): ReconcileResult<T> {
  const interior = new Map<number, T>();
  const extreme = new Map<number, T>();
  const dropped: T[] = [];

  for (const link of recorded) {
    const current = context.currentByExternalId(link.externalId);

    if (current === undefined) {
      if (context.isRetired?.(link)) {
        dropped.push(link);
      } else if (findInteriorPositions(link.geometry, location).length > 0) {
        interior.set(link.id, link);
      } else if (findCoordinatePosition(link.geometry, location) !== undefined) {
        extreme.set(link.id, link);
      } else {
        dropped.push(link);
      }
      continue;
    }

    let matched = false;
    const extremeMatches: T[] = [];
    for (const candidate of current) {
      if (findInteriorPositions(candidate.geometry, location).length > 0) {
        interior.set(candidate.id, candidate);
        matched = true;
      } else if (findCoordinatePosition(candidate.geometry, location) !== undefined) {
        extremeMatches.push(candidate);
      }
    }
    if (matched) continue;

    if (extremeMatches.length > 0) {
      for (const candidate of extremeMatches) extreme.set(candidate.id, candidate);
    } else {
      context.onUnmatched?.(link);
      dropped.push(link);
    }
  }

  for (const id of interior.keys()) extreme.delete(id);
  return {
    links: [...interior.values()],
    extremeLinks: [...extreme.values()],
    dropped,
  };
}

// ─── Breaking ──────────────────────────────────────────────────────────

/** Notified whenever links are replaced by other links */
export interface LinkReplacementListener {
  onLinksReplaced(
    removed: readonly NetworkLink[],
    created: readonly NetworkLink[]
  ): void;
}

export interface BreakResult {
  /** Node at the location; undefined when no link covers it */
  node: NetworkNode | undefined;
  /** Links now at the location (created pieces plus untouched links) */
  links: NetworkLink[];
  created: NetworkLink[];
  removed: NetworkLink[];
  /** True when every current link already ended at the location */
  extremeOnly: boolean;
}

/**
 * Breaks the links of one layer at a location.
 *
 * The only way links are split, replaced or removed once a layer has been
 * parsed, so the way map, internal entries and any listeners stay in step.
 */
export class LinkBreaker {
  constructor(
    private readonly layerData: NetworkLayerReaderData,
    private readonly listeners: readonly LinkReplacementListener[] = []
  ) {}

  get layer(): NetworkLayer {
    return this.layerData.layer;
  }

  /**
   * Break every current link the location is internal to, creating a
   * node there when none exists.
   *
   * Breaking where all current links already end is a no-op and returns
   * those links unchanged.
   */
  breakAtLocation(location: Location): BreakResult {
    const reconciled = this.layerData.reconcileLinksAtLocation(location);
    const existingNode = this.layerData.getNodeAtLocation(location);

    if (reconciled.links.length === 0) {
      const links = new Map(reconciled.extremeLinks.map((l) => [l.id, l]));
      if (existingNode) {
        this.layerData.clearInternalEntry(location);
        for (const link of this.layer.linksAt(existingNode.id)) links.set(link.id, link);
      }
      return {
        node: existingNode,
        links: [...links.values()],
        created: [],
        removed: [],
        extremeOnly: links.size > 0,
      };
    }

    const osmNode = this.layerData.getOsmNodeAtLocation(location);
    const node = existingNode ?? this.layer.createNode(location, osmNode?.id);
    const outcome = this.layer.breakLinksAtLocation(reconciled.links, node);

    for (const [wayId, change] of groupByWay(outcome.removed, outcome.created)) {
      this.layerData.replaceOsmWayLinks(wayId, change.removed, change.created);
    }
    this.layerData.registerNodeAtLocation(location, node, osmNode);
    this.layerData.clearInternalEntry(location);
    this.notify(outcome.removed, outcome.created);

    return {
      node,
      links: [...outcome.created, ...outcome.unchanged, ...reconciled.extremeLinks],
      created: outcome.created,
      removed: outcome.removed,
      extremeOnly: false,
    };
  }

  /**
   * Replace a link's geometry (same nodes, same way) and record the
   * replacement in the way map.
   */
  replaceLinkGeometry(link: NetworkLink, geometry: readonly Location[]): NetworkLink {
    const replacement = this.layer.replaceLinkGeometry(link, geometry);
    this.layerData.replaceOsmWayLinks(link.externalId, [link], [replacement]);
    this.notify([link], [replacement]);
    return replacement;
  }

  /**
   * Remove links from the layer (e.g. pruning). Listeners hear about them
   * as replaced by nothing.
   */
  removeLinks(links: readonly NetworkLink[]): void {
    const removed = links.filter((link) => this.layer.hasLink(link));
    this.layer.removeLinks(removed);
    this.layerData.removeLinks(removed);
    this.notify(removed, []);
  }

  /** Remove nodes from the layer; throws while a link still references one */
  removeNodes(nodes: readonly NetworkNode[]): void {
    for (const node of nodes) this.layer.removeNode(node);
    this.layerData.removeNodes(nodes);
  }

  private notify(removed: readonly NetworkLink[], created: readonly NetworkLink[]): void {
    if (removed.length === 0 && created.length === 0) return;
    for (const listener of this.listeners) {
      listener.onLinksReplaced(removed, created);
    }
  }
}

function groupByWay(
  removed: readonly NetworkLink[],
  created: readonly NetworkLink[]
): Map<number, { removed: NetworkLink[]; created: NetworkLink[] }> {
  const byWay = new Map<number, { removed: NetworkLink[]; created: NetworkLink[] }>();
  const entryFor = (wayId: number) => {
    let entry = byWay.get(wayId);
    if (!entry) {
      entry = { removed: [], created: [] };
      byWay.set(wayId, entry);
    }
    return entry;
  };
  for (const link of removed) entryFor(link.externalId).removed.push(link);
  for (const link of created) entryFor(link.externalId).created.push(link);
  return byWay;
}
