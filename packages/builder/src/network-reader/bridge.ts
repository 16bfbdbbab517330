/**
 * Read-only view of a completed network read, handed to the zoning reader.
 *
 * The zoning reader needs to find links by location and, when it creates
 * connectoids, break links. It gets no direct access to the reader state:
 * breaking goes through a LinkBreaker obtained here, which keeps the way
 * map and internal entries consistent.
 */

import type { BoundingBox } from "@netweave/types";
import type { OsmNode } from "../ingestion/osm/types.js";
import type { TransportNetwork } from "../network/transport-network.js";
import type { NetworkReaderSettings } from "./config.js";
import type { NetworkLayerReaderData } from "./layer-data.js";
import { LinkBreaker, type LinkReplacementListener } from "./link-reconciler.js";
import type { NetworkReaderData } from "./reader-data.js";

export class NetworkToZoningBridge {
  constructor(
    private readonly data: NetworkReaderData,
    private readonly network: TransportNetwork,
    private readonly settings: Readonly<NetworkReaderSettings>
  ) {
    if (!data.isComplete) {
      throw new Error("Network reading has not completed; cannot hand over to zoning");
    }
  }

  getLayerState(layerId: string): NetworkLayerReaderData | undefined {
    return this.data.getLayerData(layerId);
  }

  getOsmNodeTable(): ReadonlyMap<number, OsmNode> {
    return this.data.osmNodeData.getRegisteredOsmNodes();
  }

  getPopulatedNetwork(): TransportNetwork {
    return this.network;
  }

  getBoundingBox(): BoundingBox | undefined {
    return this.data.boundingBox;
  }

  getSettings(): Readonly<NetworkReaderSettings> {
    return this.settings;
  }

  /** True for a network way that was read but produced no link */
  isOsmWayProcessedAndUnavailable(wayId: number): boolean {
    return this.data.isDiscardedWay(wayId);
  }

  /** Breaker for one layer; listeners hear about every replacement */
  createLinkBreaker(
    layerId: string,
    listeners: readonly LinkReplacementListener[] = []
  ): LinkBreaker {
    const layerData = this.data.getLayerData(layerId);
    if (!layerData) {
      throw new Error(`No reader state for layer '${layerId}'`);
    }
    return new LinkBreaker(layerData, listeners);
  }
}
