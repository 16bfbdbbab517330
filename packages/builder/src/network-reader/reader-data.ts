/**
 * State shared by all layer parsers of one network read.
 */

import type { BoundingBox, Location } from "@netweave/types";
import type { OsmWay } from "../ingestion/osm/types.js";
import type { NetworkLayer } from "../network/network-layer.js";
import { NetworkLayerReaderData } from "./layer-data.js";
import { OsmNodeData } from "./osm-node-data.js";

interface PostponedWay {
  way: OsmWay;
  layerId: string;
}

export class NetworkReaderData {
  readonly osmNodeData: OsmNodeData;
  private layerDataById = new Map<string, NetworkLayerReaderData>();
  private discardedWayIds = new Set<number>();
  private postponed = new Map<number, PostponedWay>();
  private completed = false;

  constructor(
    readonly boundingBox: BoundingBox | undefined,
    private readonly verbose = false
  ) {
    this.osmNodeData = new OsmNodeData(boundingBox);
  }

  getOrCreateLayerData(layer: NetworkLayer): NetworkLayerReaderData {
    let data = this.layerDataById.get(layer.id);
    if (!data) {
      data = new NetworkLayerReaderData(layer, { verbose: this.verbose });
      this.layerDataById.set(layer.id, data);
    }
    return data;
  }

  getLayerData(layerId: string): NetworkLayerReaderData | undefined {
    return this.layerDataById.get(layerId);
  }

  allLayerData(): NetworkLayerReaderData[] {
    return [...this.layerDataById.values()];
  }

  /** True if any layer has a node at, or a link through, the location */
  isLocationPresentInAnyLayer(location: Location): boolean {
    for (const data of this.layerDataById.values()) {
      if (data.isLocationPresent(location)) return true;
    }
    return false;
  }

  // ── Discarded ways ────────────────────────────────────────────────────

  /** Record a way that was processed but could not become a link */
  registerDiscardedWay(wayId: number): void {
    this.discardedWayIds.add(wayId);
  }

  isDiscardedWay(wayId: number): boolean {
    return this.discardedWayIds.has(wayId);
  }

  get discardedWayCount(): number {
    return this.discardedWayIds.size;
  }

  // ── Circular ways ─────────────────────────────────────────────────────

  postponeCircularWay(way: OsmWay, layerId: string): void {
    this.postponed.set(way.id, { way, layerId });
  }

  /** Remove and return postponed circular ways, ordered by way ID */
  takePostponedCircularWays(): PostponedWay[] {
    const ways = [...this.postponed.values()].sort((a, b) => a.way.id - b.way.id);
    this.postponed.clear();
    return ways;
  }

  get postponedCount(): number {
    return this.postponed.size;
  }

  // ── Lifecycle ─────────────────────────────────────────────────────────

  markComplete(): void {
    this.completed = true;
  }

  get isComplete(): boolean {
    return this.completed;
  }
}
