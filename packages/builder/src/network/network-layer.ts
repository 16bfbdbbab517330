/**
 * Network layer - nodes and links for one group of compatible modes.
 *
 * This is the generic graph primitive the readers build on. It knows
 * nothing about OSM; link external IDs are opaque to it.
 */

import type {
  LinkDirection,
  Location,
  NetworkLink,
  NetworkNode,
} from "@netweave/types";
import {
  calculatePathLength,
  findCoordinatePosition,
  findInteriorPositions,
} from "../geo/geometry.js";

/** Attributes copied onto every piece of a link when it is broken */
export interface LinkOptions {
  direction?: LinkDirection;
  wayType?: string;
  verticalLayerIndex?: number;
  name?: string;
}

/** Outcome of breaking a set of links at a node */
export interface LinkBreakOutcome {
  /** Links that were replaced (no longer part of the layer) */
  removed: NetworkLink[];
  /** Replacement links, in the order of `removed` */
  created: NetworkLink[];
  /** Input links on which the location is an extremity */
  unchanged: NetworkLink[];
}

/** Source of unique IDs shared by all layers of a network */
export interface IdSource {
  nextNodeId(): number;
  nextLinkId(): number;
}

export class NetworkLayer {
  private nodesById = new Map<number, NetworkNode>();
  private linksById = new Map<number, NetworkLink>();
  /** node ID -> IDs of links starting or ending at it */
  private adjacency = new Map<number, Set<number>>();

  constructor(
    readonly id: string,
    private readonly ids: IdSource
  ) {}

  get nodeCount(): number {
    return this.nodesById.size;
  }

  get linkCount(): number {
    return this.linksById.size;
  }

  nodes(): IterableIterator<NetworkNode> {
    return this.nodesById.values();
  }

  links(): IterableIterator<NetworkLink> {
    return this.linksById.values();
  }

  getNode(id: number): NetworkNode | undefined {
    return this.nodesById.get(id);
  }

  getLink(id: number): NetworkLink | undefined {
    return this.linksById.get(id);
  }

  hasLink(link: NetworkLink): boolean {
    return this.linksById.get(link.id) === link;
  }

  /** Links starting or ending at a node */
  linksAt(nodeId: number): NetworkLink[] {
    const ids = this.adjacency.get(nodeId);
    if (!ids) return [];
    const result: NetworkLink[] = [];
    for (const id of ids) {
      const link = this.linksById.get(id);
      if (link) result.push(link);
    }
    return result;
  }

  /** All links derived from the given external (OSM way) ID */
  findLinksByExternalId(externalId: number): NetworkLink[] {
    const result: NetworkLink[] = [];
    for (const link of this.linksById.values()) {
      if (link.externalId === externalId) result.push(link);
    }
    return result;
  }

  createNode(location: Location, osmNodeId?: number): NetworkNode {
    const node: NetworkNode = {
      id: this.ids.nextNodeId(),
      layerId: this.id,
      location,
      ...(osmNodeId !== undefined && { osmNodeId }),
    };
    this.nodesById.set(node.id, node);
    return node;
  }

  /**
   * Create a link between two nodes of this layer.
   * The geometry must start at node A and end at node B.
   */
  createLink(
    nodeA: NetworkNode,
    nodeB: NetworkNode,
    geometry: readonly Location[],
    externalId: number,
    options: LinkOptions = {}
  ): NetworkLink {
    if (geometry.length < 2) {
      throw new Error(
        `Link geometry for external id ${externalId} needs at least 2 coordinates, got ${geometry.length}`
      );
    }
    if (!this.nodesById.has(nodeA.id) || !this.nodesById.has(nodeB.id)) {
      throw new Error(`Link end nodes must belong to layer ${this.id}`);
    }

    const link: NetworkLink = {
      id: this.ids.nextLinkId(),
      layerId: this.id,
      externalId,
      nodeAId: nodeA.id,
      nodeBId: nodeB.id,
      geometry: [...geometry],
      lengthMeters: calculatePathLength(geometry),
      direction: options.direction ?? "both",
      wayType: options.wayType ?? "unknown",
      verticalLayerIndex: options.verticalLayerIndex ?? 0,
      ...(options.name !== undefined && { name: options.name }),
    };

    this.linksById.set(link.id, link);
    this.addToAdjacency(link.nodeAId, link.id);
    this.addToAdjacency(link.nodeBId, link.id);
    return link;
  }

  removeLinks(links: Iterable<NetworkLink>): void {
    for (const link of links) {
      if (!this.linksById.delete(link.id)) continue;
      this.adjacency.get(link.nodeAId)?.delete(link.id);
      this.adjacency.get(link.nodeBId)?.delete(link.id);
    }
  }

  /** Remove a node; throws while links still reference it */
  removeNode(node: NetworkNode): void {
    const attached = this.adjacency.get(node.id);
    if (attached && attached.size > 0) {
      throw new Error(
        `Cannot remove node ${node.id} from layer ${this.id}: ${attached.size} link(s) attached`
      );
    }
    this.nodesById.delete(node.id);
    this.adjacency.delete(node.id);
  }

  /**
   * Replace a link by one with the same nodes and attributes but a new
   * geometry. The new geometry must keep the original end coordinates.
   */
  replaceLinkGeometry(
    link: NetworkLink,
    geometry: readonly Location[]
  ): NetworkLink {
    const nodeA = this.nodesById.get(link.nodeAId);
    const nodeB = this.nodesById.get(link.nodeBId);
    if (!nodeA || !nodeB || !this.hasLink(link)) {
      throw new Error(`Link ${link.id} is not part of layer ${this.id}`);
    }
    const replacement = this.createLink(
      nodeA,
      nodeB,
      geometry,
      link.externalId,
      optionsOf(link)
    );
    this.removeLinks([link]);
    return replacement;
  }

  /**
   * Break links at a node's location.
   *
   * Every link on which the location is an interior coordinate is removed
   * and replaced by pieces meeting at the node (two pieces, or more for
   * self-touching geometry). Links on which the location is the first or
   * last coordinate are left untouched. A link whose geometry does not
   * contain the location at all is a caller error.
   */
  breakLinksAtLocation(
    links: readonly NetworkLink[],
    node: NetworkNode
  ): LinkBreakOutcome {
    const outcome: LinkBreakOutcome = { removed: [], created: [], unchanged: [] };
    const location = node.location;

    for (const link of links) {
      if (!this.hasLink(link)) {
        throw new Error(`Link ${link.id} is not part of layer ${this.id}`);
      }
      if (findCoordinatePosition(link.geometry, location) === undefined) {
        throw new Error(
          `Location ${location.lat},${location.lng} is not on link ${link.id} (external id ${link.externalId})`
        );
      }

      const cuts = findInteriorPositions(link.geometry, location);
      if (cuts.length === 0) {
        outcome.unchanged.push(link);
        continue;
      }

      const endpoints = [0, ...cuts, link.geometry.length - 1];
      const pieces: NetworkLink[] = [];
      for (let i = 0; i < endpoints.length - 1; i++) {
        const start = endpoints[i] ?? 0;
        const end = endpoints[i + 1] ?? link.geometry.length - 1;
        const from = i === 0 ? this.nodesById.get(link.nodeAId) : node;
        const to =
          i === endpoints.length - 2 ? this.nodesById.get(link.nodeBId) : node;
        if (!from || !to) {
          throw new Error(`Link ${link.id} references a node missing from layer ${this.id}`);
        }
        pieces.push(
          this.createLink(
            from,
            to,
            link.geometry.slice(start, end + 1),
            link.externalId,
            optionsOf(link)
          )
        );
      }

      this.removeLinks([link]);
      outcome.removed.push(link);
      outcome.created.push(...pieces);
    }

    return outcome;
  }

  // ── Internal ──────────────────────────────────────────────────────────

  private addToAdjacency(nodeId: number, linkId: number): void {
    const existing = this.adjacency.get(nodeId);
    if (existing) {
      existing.add(linkId);
    } else {
      this.adjacency.set(nodeId, new Set([linkId]));
    }
  }
}

function optionsOf(link: NetworkLink): LinkOptions {
  return {
    direction: link.direction,
    wayType: link.wayType,
    verticalLayerIndex: link.verticalLayerIndex,
    ...(link.name !== undefined && { name: link.name }),
  };
}
