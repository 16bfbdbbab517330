/**
 * Build a multi-layer network from OSM elements.
 *
 * Algorithm:
 * 1. Sweep ways; pre-register the nodes of every way a layer accepts
 * 2. Sweep again; register those nodes, then turn ways into links per
 *    layer (circular ways are postponed)
 * 3. Split postponed circular ways, in way ID order
 * 4. Complete every layer: break links at shared locations
 *
 * Elements must arrive in PBF order: nodes before the ways using them.
 */

import { osmFileSource, toReplayableSource, type OsmElementSource } from "../ingestion/index.js";
import { ReaderConfigError } from "../errors.js";
import { TransportNetwork } from "../network/transport-network.js";
import { NetworkToZoningBridge } from "./bridge.js";
import { resolveNetworkReaderSettings, type NetworkReaderSettings } from "./config.js";
import { NetworkLayerParser, type LayerParserStats } from "./layer-parser.js";
import { NetworkReaderData } from "./reader-data.js";

/**
 * Statistics about the network reading process.
 */
export interface NetworkReadStats {
  /** Parser stats per layer ID */
  layers: Record<string, LayerParserStats>;
  /** Ways accepted by a layer */
  waysProcessed: number;
  /** Ways no layer accepts */
  waysIgnored: number;
  circularWays: number;
  /** OSM nodes registered (referenced by a network way, inside the bounding box) */
  nodesRegistered: number;
  nodesOutsideBoundingBox: number;
  /** Ways that produced no link */
  discardedWays: number;
  nodesCount: number;
  linksCount: number;
  readTimeMs: number;
}

export interface NetworkReadResult {
  network: TransportNetwork;
  bridge: NetworkToZoningBridge;
  stats: NetworkReadStats;
}

export class OsmNetworkReader {
  readonly settings: Readonly<NetworkReaderSettings>;
  private network: TransportNetwork;
  private data: NetworkReaderData;

  /**
   * @param network - Network to populate; its layers must all be known to
   *   the classifier. A fresh one is created when omitted.
   */
  constructor(options: Partial<NetworkReaderSettings> = {}, network?: TransportNetwork) {
    this.settings = resolveNetworkReaderSettings(options);
    const known = this.settings.classifier.layerIds;
    if (network) {
      const unknown = network.layerIds.filter((id) => !known.includes(id));
      if (unknown.length > 0) {
        throw new ReaderConfigError(
          `Network layers [${unknown.join(", ")}] are not produced by the way classifier (layers: ${known.join(", ")})`
        );
      }
    }
    this.network = network ?? new TransportNetwork(known);
    for (const id of known) this.network.getOrCreateLayer(id);
    this.data = new NetworkReaderData(this.settings.boundingBox, this.settings.verbose);
  }

  /**
   * Read a network from an element source.
   *
   * A plain iterable is held in memory for the second sweep; a factory is
   * called once per sweep.
   */
  async read(source: OsmElementSource): Promise<NetworkReadResult> {
    if (this.data.isComplete) {
      throw new Error("Reader already holds a network; call reset() before reading again");
    }
    const startTime = Date.now();
    const pass = await toReplayableSource(source);
    const { classifier } = this.settings;
    const nodeData = this.data.osmNodeData;

    // 1. Pre-register nodes of network ways
    for await (const element of pass()) {
      if (element.type !== "way" || !classifier.layerFor(element.tags)) continue;
      for (const ref of element.refs) nodeData.preregister(ref);
    }

    // 2. Register nodes, convert ways
    const parsers = new Map<string, NetworkLayerParser>();
    const parserFor = (layerId: string) => {
      let parser = parsers.get(layerId);
      if (!parser) {
        parser = new NetworkLayerParser(
          this.network.getOrCreateLayer(layerId),
          this.data,
          this.settings
        );
        parsers.set(layerId, parser);
      }
      return parser;
    };
    for (const id of classifier.layerIds) parserFor(id);

    let waysProcessed = 0;
    let waysIgnored = 0;
    for await (const element of pass()) {
      if (element.type === "node") {
        nodeData.register(element);
      } else if (element.type === "way") {
        const layerId = classifier.layerFor(element.tags);
        if (!layerId) {
          waysIgnored++;
          continue;
        }
        waysProcessed++;
        parserFor(layerId).handleWay(element);
      }
    }

    // 3. Circular ways, once every regular way is known
    const circular = this.data.takePostponedCircularWays();
    for (const { way, layerId } of circular) {
      parserFor(layerId).handleCircularWay(way);
    }

    // 4. Break links at shared locations
    for (const parser of parsers.values()) parser.complete();
    this.data.markComplete();

    const layers: Record<string, LayerParserStats> = {};
    for (const [layerId, parser] of parsers) layers[layerId] = parser.stats;

    const stats: NetworkReadStats = {
      layers,
      waysProcessed,
      waysIgnored,
      circularWays: circular.length,
      nodesRegistered: nodeData.registeredCount,
      nodesOutsideBoundingBox: nodeData.outsideBoundingBox,
      discardedWays: this.data.discardedWayCount,
      nodesCount: this.network.nodeCount,
      linksCount: this.network.linkCount,
      readTimeMs: Date.now() - startTime,
    };
    console.log(
      `[network] Read ${stats.linksCount} links, ${stats.nodesCount} nodes from ${waysProcessed} ways in ${stats.readTimeMs}ms`
    );
    if (stats.discardedWays > 0) {
      console.warn(`[network] ${stats.discardedWays} ways discarded`);
    }

    return {
      network: this.network,
      bridge: new NetworkToZoningBridge(this.data, this.network, this.settings),
      stats,
    };
  }

  /** Read a `.osm.pbf`, `.pbf` or saved Overpass `.json` file */
  async readFromFile(path: string): Promise<NetworkReadResult> {
    return this.read(osmFileSource(path));
  }

  /**
   * Drop all reader state and start over with an empty network with the
   * same layers. Results handed out earlier stay intact.
   */
  reset(): void {
    this.network = new TransportNetwork(this.network.layerIds);
    this.data = new NetworkReaderData(this.settings.boundingBox, this.settings.verbose);
  }
}

