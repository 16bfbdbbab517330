/**
 * Multi-layer transport network.
 */

import { NetworkLayer, type IdSource } from "./network-layer.js";

export class TransportNetwork {
  private layersById = new Map<string, NetworkLayer>();
  private nodeIdCounter = 0;
  private linkIdCounter = 0;

  private readonly ids: IdSource = {
    nextNodeId: () => ++this.nodeIdCounter,
    nextLinkId: () => ++this.linkIdCounter,
  };

  constructor(layerIds: Iterable<string> = []) {
    for (const id of layerIds) this.getOrCreateLayer(id);
  }

  getLayer(id: string): NetworkLayer | undefined {
    return this.layersById.get(id);
  }

  getOrCreateLayer(id: string): NetworkLayer {
    let layer = this.layersById.get(id);
    if (!layer) {
      layer = new NetworkLayer(id, this.ids);
      this.layersById.set(id, layer);
    }
    return layer;
  }

  layers(): NetworkLayer[] {
    return [...this.layersById.values()];
  }

  get layerIds(): string[] {
    return [...this.layersById.keys()];
  }

  get nodeCount(): number {
    let total = 0;
    for (const layer of this.layersById.values()) total += layer.nodeCount;
    return total;
  }

  get linkCount(): number {
    let total = 0;
    for (const layer of this.layersById.values()) total += layer.linkCount;
    return total;
  }
}
