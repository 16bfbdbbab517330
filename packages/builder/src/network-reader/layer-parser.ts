/**
 * Converts OSM ways of one layer into network links.
 *
 * Ways are first turned into one link each, with the locations between
 * their ends recorded as internal. Once every way is in, `complete()`
 * breaks links wherever a location is shared (a node of another link, or
 * internal to several links) so that links only meet at nodes.
 */

import type { Location, NetworkLink, NetworkNode } from "@netweave/types";
import { removeAdjacentDuplicates } from "../geo/geometry.js";
import { locationKey, locationOf } from "../geo/location.js";
import {
  extractName,
  extractOneWay,
  extractVerticalLayerIndex,
  isReverseOneWay,
  isRoundabout,
  resolveCircularTravelDirection,
} from "../ingestion/osm/tag-extractors.js";
import type { OsmNode, OsmWay } from "../ingestion/osm/types.js";
import {
  isAllWayNodesAvailable,
  isCircularWay,
  refIndexRange,
} from "../ingestion/osm/way-utils.js";
import type { NetworkLayer } from "../network/network-layer.js";
import { needsReversal, splitCircularWay, type LoopSection } from "./circular-ways.js";
import type { NetworkReaderSettings } from "./config.js";
import type { LayerDataStats, NetworkLayerReaderData } from "./layer-data.js";
import { LinkBreaker } from "./link-reconciler.js";
import type { NetworkReaderData } from "./reader-data.js";

export interface LayerParserStats extends LayerDataStats {
  linksCreated: number;
  nodesCreated: number;
  /** Ways split into several links when links were broken at shared locations */
  brokenWays: number;
  circularWays: number;
  salvagedWays: number;
  discardedWays: number;
  /** Way nodes missing from the node table (outside the bounding box) */
  nodesOutsideBoundingBox: number;
}

interface ExtractOptions {
  allowTruncation: boolean;
  /** Build the link against the drawing direction */
  reverse: boolean;
}

export class NetworkLayerParser {
  readonly layerData: NetworkLayerReaderData;
  private readonly tag: string;
  private counters = {
    linksCreated: 0,
    nodesCreated: 0,
    brokenWays: 0,
    circularWays: 0,
    salvagedWays: 0,
    discardedWays: 0,
    nodesOutsideBoundingBox: 0,
  };

  constructor(
    readonly layer: NetworkLayer,
    private readonly readerData: NetworkReaderData,
    private readonly settings: NetworkReaderSettings
  ) {
    this.layerData = readerData.getOrCreateLayerData(layer);
    this.tag = `[layer:${layer.id}]`;
  }

  get stats(): LayerParserStats {
    return { ...this.counters, ...this.layerData.stats };
  }

  /**
   * Turn a way into a link. Circular ways are postponed until every
   * regular way of every layer is in, so their split points are known.
   */
  handleWay(way: OsmWay): NetworkLink | undefined {
    if (isCircularWay(way)) {
      this.readerData.postponeCircularWay(way, this.layer.id);
      return undefined;
    }
    return this.extractLink(
      way,
      0,
      way.refs.length - 1,
      this.settings.salvageIncompleteWays
    );
  }

  /**
   * Create a link from the refs between two positions of a way (inclusive).
   * Returns undefined when the way was discarded.
   */
  extractLink(
    way: OsmWay,
    startIndex: number,
    endIndex: number,
    allowTruncation: boolean
  ): NetworkLink | undefined {
    return this.extractLinkAlong(way, refIndexRange(startIndex, endIndex), {
      allowTruncation,
      reverse: isReverseOneWay(way.tags),
    });
  }

  /**
   * Split a circular way into parts and create a link per part. All of its
   * nodes must be available; circular parts are never truncated.
   */
  handleCircularWay(way: OsmWay): NetworkLink[] {
    const nodes = this.readerData.osmNodeData.getRegisteredOsmNodes();
    if (!isAllWayNodesAvailable(way, nodes)) {
      this.discard(way, "circular way with nodes missing");
      return [];
    }

    this.counters.circularWays++;
    const locationAt = (refIndex: number): Location | undefined => {
      const ref = way.refs[refIndex];
      const node = ref === undefined ? undefined : nodes.get(ref);
      return node && locationOf(node);
    };
    const parts = splitCircularWay(way, (refIndex) => {
      const location = locationAt(refIndex);
      return location !== undefined && this.readerData.isLocationPresentInAnyLayer(location);
    });

    const links: NetworkLink[] = [];
    for (const part of parts) {
      const reverse = part.loop
        ? this.isLoopReversed(way, part.loop, locationAt)
        : isReverseOneWay(way.tags);
      const link = this.extractLinkAlong(way, part.indices, {
        allowTruncation: false,
        reverse,
      });
      if (link) links.push(link);
    }

    if (this.settings.verbose) {
      console.log(`[circular] Split OSM way ${way.id} into ${links.length} links`);
    }
    if (links.length > 0) this.layerData.updateOsmWayLinks(way.id, links);
    return links;
  }

  /**
   * Break links at every shared location, then check consistency.
   * @returns number of OSM ways broken into multiple links
   */
  complete(): number {
    const breaker = new LinkBreaker(this.layerData);
    const brokenWayIds = new Set<number>();
    const breakAt = (location: Location) => {
      for (const link of breaker.breakAtLocation(location).removed) {
        brokenWayIds.add(link.externalId);
      }
    };

    for (const location of this.layerData.collectInternalLocationsOnNodes()) {
      breakAt(location);
    }

    const shared = this.layerData
      .collectLocationsInternalToAtLeast(2)
      .sort((a, b) => compareKeys(locationKey(a), locationKey(b)));
    for (const location of shared) {
      if (this.layerData.isLocationInternal(location)) breakAt(location);
    }

    this.counters.brokenWays = brokenWayIds.size;
    console.log(`${this.tag} Broke ${brokenWayIds.size} OSM ways into multiple links`);
    this.layerData.validate();
    return brokenWayIds.size;
  }

  // ── Internal ──────────────────────────────────────────────────────────

  private extractLinkAlong(
    way: OsmWay,
    indices: readonly number[],
    options: ExtractOptions
  ): NetworkLink | undefined {
    const nodeData = this.readerData.osmNodeData;
    const available: OsmNode[] = [];
    let firstAvailable = -1;
    let lastAvailable = -1;
    indices.forEach((refIndex, position) => {
      const ref = way.refs[refIndex];
      const node = ref === undefined ? undefined : nodeData.getRegisteredOsmNode(ref);
      if (!node) return;
      available.push(node);
      if (firstAvailable < 0) firstAvailable = position;
      lastAvailable = position;
    });

    const missing = indices.length - available.length;
    if (missing > 0) {
      if (!options.allowTruncation) {
        this.discard(way, `${missing} of ${indices.length} nodes unavailable`);
        return undefined;
      }
      if (available.length < 2) {
        this.discard(way, `only ${available.length} of ${indices.length} nodes available`);
        return undefined;
      }
      const missingInside = lastAvailable - firstAvailable + 1 - available.length;
      if (missingInside > 0) {
        this.counters.nodesOutsideBoundingBox += missingInside;
        if (this.settings.verbose) {
          console.log(`${this.tag} OSM way ${way.id} skips ${missingInside} interior node(s) outside bounding box`);
        }
      }
      this.counters.salvagedWays++;
      console.warn(
        `${this.tag} SALVAGED: OSM way ${way.id} geometry incomplete, truncated from ${indices.length} to ${available.length} nodes`
      );
    }

    let osmNodes = this.settings.removeDuplicateCoordinates
      ? removeAdjacentDuplicates(available, locationOf)
      : available;
    if (osmNodes.length < 2) {
      this.discard(way, "fewer than 2 distinct coordinates");
      return undefined;
    }
    if (options.reverse) osmNodes = [...osmNodes].reverse();

    return this.createLink(way, osmNodes);
  }

  private createLink(way: OsmWay, osmNodes: readonly OsmNode[]): NetworkLink | undefined {
    const first = osmNodes[0];
    const last = osmNodes[osmNodes.length - 1];
    if (!first || !last) return undefined;

    const name = extractName(way.tags);
    const link = this.layer.createLink(
      this.getOrCreateNode(first),
      this.getOrCreateNode(last),
      osmNodes.map(locationOf),
      way.id,
      {
        direction: extractOneWay(way.tags) ? "forward" : "both",
        wayType: this.settings.classifier.wayTypeOf(way.tags) ?? "unknown",
        verticalLayerIndex: extractVerticalLayerIndex(way.tags),
        ...(name !== undefined && { name }),
      }
    );
    this.counters.linksCreated++;

    for (const osmNode of osmNodes.slice(1, -1)) {
      this.layerData.registerLocationAsInternalToLink(locationOf(osmNode), link, osmNode);
    }
    return link;
  }

  private getOrCreateNode(osmNode: OsmNode): NetworkNode {
    const location = locationOf(osmNode);
    const existing = this.layerData.getNodeAtLocation(location);
    if (existing) return existing;

    const node = this.layer.createNode(location, osmNode.id);
    this.layerData.registerNodeAtLocation(location, node, osmNode);
    this.counters.nodesCreated++;
    return node;
  }

  private isLoopReversed(
    way: OsmWay,
    loop: LoopSection,
    locationAt: (refIndex: number) => Location | undefined
  ): boolean {
    if (!extractOneWay(way.tags)) return false;
    if (!isRoundabout(way.tags)) return isReverseOneWay(way.tags);

    const ring: Location[] = [];
    for (let i = loop.start; i < loop.end; i++) {
      const location = locationAt(i);
      if (location) ring.push(location);
    }
    const direction = resolveCircularTravelDirection(way.tags, this.settings.drivingSide);
    return needsReversal(ring, direction);
  }

  private discard(way: OsmWay, reason: string): void {
    this.counters.discardedWays++;
    this.readerData.registerDiscardedWay(way.id);
    console.warn(`${this.tag} Discarded OSM way ${way.id}: ${reason}`);
  }
}

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
