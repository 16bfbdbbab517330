import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { TransportNetwork } from "../network/transport-network.js";
import type { OsmNode } from "../ingestion/osm/types.js";
import { at, gridNode, osmNode, osmWay } from "../testing/osm-fixtures.js";
import { resolveNetworkReaderSettings, type NetworkReaderSettings } from "./config.js";
import { NetworkLayerParser } from "./layer-parser.js";
import { NetworkReaderData } from "./reader-data.js";

// ─── Helpers ───────────────────────────────────────────────────────────

let data: NetworkReaderData;

function setup(options: Partial<NetworkReaderSettings> = {}): NetworkLayerParser {
  const network = new TransportNetwork(["road"]);
  data = new NetworkReaderData(undefined);
  return new NetworkLayerParser(
    network.getOrCreateLayer("road"),
    data,
    resolveNetworkReaderSettings(options)
  );
}

function register(...nodes: OsmNode[]): void {
  for (const node of nodes) {
    data.osmNodeData.preregister(node.id);
    data.osmNodeData.register(node);
  }
}

// Square, drawn clockwise: (0,0) north to (0,1), east to (1,1), south to (1,0)
const n1 = gridNode(1, 0, 0);
const n2 = gridNode(2, 0, 1);
const n3 = gridNode(3, 1, 1);
const n4 = gridNode(4, 1, 0);

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ─── Regular ways ──────────────────────────────────────────────────────

describe("NetworkLayerParser.extractLink", () => {
  it("creates a link with end nodes and internal locations", () => {
    const parser = setup();
    const a = gridNode(1, 0, 0);
    const b = gridNode(2, 1, 0);
    const c = gridNode(3, 2, 0);
    register(a, b, c);

    const link = parser.handleWay(osmWay(10, [1, 2, 3], { highway: "residential", name: "Ash Row" }));

    expect(link?.geometry).toEqual([at(a), at(b), at(c)]);
    expect(link?.externalId).toBe(10);
    expect(link?.direction).toBe("both");
    expect(link?.wayType).toBe("residential");
    expect(link?.name).toBe("Ash Row");
    expect(parser.layerData.getNodeAtLocation(at(a))?.osmNodeId).toBe(1);
    expect(parser.layerData.getNodeAtLocation(at(c))?.osmNodeId).toBe(3);
    expect(parser.layerData.getInternalEntry(at(b))?.links).toEqual([link]);
    expect(parser.layerData.getOsmNodeAtLocation(at(b))).toBe(b);
    expect(parser.stats.linksCreated).toBe(1);
    expect(parser.stats.nodesCreated).toBe(2);
  });

  it("reuses the node at a shared end", () => {
    const parser = setup();
    register(gridNode(1, 0, 0), gridNode(2, 1, 0), gridNode(3, 2, 0));

    const first = parser.handleWay(osmWay(10, [1, 2]));
    const second = parser.handleWay(osmWay(20, [2, 3]));

    expect(first?.nodeBId).toBe(second?.nodeAId);
    expect(parser.stats.nodesCreated).toBe(3);
  });

  it("reverses the geometry of oneway=-1 ways", () => {
    const parser = setup();
    const a = gridNode(1, 0, 0);
    const b = gridNode(2, 1, 0);
    const c = gridNode(3, 2, 0);
    register(a, b, c);

    const link = parser.handleWay(osmWay(10, [1, 2, 3], { highway: "primary", oneway: "-1" }));

    expect(link?.geometry).toEqual([at(c), at(b), at(a)]);
    expect(link?.direction).toBe("forward");
  });

  it("salvages a way with a missing end node", () => {
    const parser = setup();
    const a = gridNode(1, 0, 0);
    const b = gridNode(2, 1, 0);
    const c = gridNode(3, 2, 0);
    register(a, b, c);

    const link = parser.handleWay(osmWay(10, [1, 2, 3, 4]));

    expect(link?.geometry).toEqual([at(a), at(b), at(c)]);
    expect(parser.stats.salvagedWays).toBe(1);
    expect(console.warn).toHaveBeenCalledWith(
      "[layer:road] SALVAGED: OSM way 10 geometry incomplete, truncated from 4 to 3 nodes"
    );
  });

  it("skips a missing interior node and counts it", () => {
    const parser = setup();
    const a = gridNode(1, 0, 0);
    const c = gridNode(3, 2, 0);
    register(a, c);

    const link = parser.handleWay(osmWay(10, [1, 2, 3]));

    expect(link?.geometry).toEqual([at(a), at(c)]);
    expect(parser.stats.nodesOutsideBoundingBox).toBe(1);
  });

  it("discards an incomplete way when salvaging is off", () => {
    const parser = setup({ salvageIncompleteWays: false });
    register(gridNode(1, 0, 0), gridNode(2, 1, 0));

    expect(parser.handleWay(osmWay(10, [1, 2, 3]))).toBeUndefined();
    expect(data.isDiscardedWay(10)).toBe(true);
    expect(parser.stats.discardedWays).toBe(1);
    expect(parser.layer.linkCount).toBe(0);
  });

  it("discards a way with fewer than 2 available nodes", () => {
    const parser = setup();
    register(gridNode(1, 0, 0));

    expect(parser.handleWay(osmWay(10, [1, 2, 3]))).toBeUndefined();
    expect(data.isDiscardedWay(10)).toBe(true);
  });

  it("drops consecutive nodes at the same location", () => {
    const parser = setup();
    const a = gridNode(1, 0, 0);
    const b = gridNode(2, 1, 0);
    const bTwin = osmNode(5, b.lat, b.lon);
    const c = gridNode(3, 2, 0);
    register(a, b, bTwin, c);

    const link = parser.handleWay(osmWay(10, [1, 2, 5, 3]));

    expect(link?.geometry).toEqual([at(a), at(b), at(c)]);
  });

  it("postpones circular ways", () => {
    const parser = setup();
    register(n1, n2, n3, n4);

    expect(parser.handleWay(osmWay(10, [1, 2, 3, 4, 1]))).toBeUndefined();
    expect(data.postponedCount).toBe(1);
    expect(parser.layer.linkCount).toBe(0);
  });
});

// ─── Circular ways ─────────────────────────────────────────────────────

describe("NetworkLayerParser.handleCircularWay", () => {
  it("splits an unconnected loop into two links registered under the way", () => {
    const parser = setup();
    register(n1, n2, n3, n4);

    const links = parser.handleCircularWay(osmWay(10, [1, 2, 3, 4, 1]));

    expect(links.map((l) => l.geometry)).toEqual([
      [at(n1), at(n2), at(n3)],
      [at(n3), at(n4), at(n1)],
    ]);
    expect(parser.layerData.getOsmWayLinks(10)?.size).toBe(2);
    expect(parser.stats.circularWays).toBe(1);
  });

  it("splits where the loop meets an existing way", () => {
    const parser = setup();
    const spur = gridNode(9, -1, 1);
    register(n1, n2, n3, n4, spur);
    parser.handleWay(osmWay(20, [9, 2]));

    const links = parser.handleCircularWay(osmWay(10, [1, 2, 3, 4, 1]));

    // one connection at position 1: cut there and at 1 + 4/2
    expect(links.map((l) => l.geometry)).toEqual([
      [at(n2), at(n3), at(n4)],
      [at(n4), at(n1), at(n2)],
    ]);
  });

  it("orients roundabouts anticlockwise where traffic keeps right", () => {
    const parser = setup({ drivingSide: "right" });
    register(n1, n2, n3, n4);

    const links = parser.handleCircularWay(
      osmWay(10, [1, 2, 3, 4, 1], { highway: "primary", junction: "roundabout" })
    );

    expect(links.map((l) => l.geometry)).toEqual([
      [at(n3), at(n2), at(n1)],
      [at(n1), at(n4), at(n3)],
    ]);
    expect(links.every((l) => l.direction === "forward")).toBe(true);
  });

  it("keeps roundabouts drawn clockwise where traffic keeps left", () => {
    const parser = setup({ drivingSide: "left" });
    register(n1, n2, n3, n4);

    const links = parser.handleCircularWay(
      osmWay(10, [1, 2, 3, 4, 1], { highway: "primary", junction: "roundabout" })
    );

    expect(links.map((l) => l.geometry)).toEqual([
      [at(n1), at(n2), at(n3)],
      [at(n3), at(n4), at(n1)],
    ]);
  });

  it("discards a circular way with a missing node", () => {
    const parser = setup();
    register(n1, n2, n3);

    expect(parser.handleCircularWay(osmWay(10, [1, 2, 3, 4, 1]))).toEqual([]);
    expect(data.isDiscardedWay(10)).toBe(true);
    expect(parser.layer.linkCount).toBe(0);
  });
});

// ─── Completion ────────────────────────────────────────────────────────

describe("NetworkLayerParser.complete", () => {
  it("breaks two ways crossing at an interior node", () => {
    const parser = setup();
    const west = gridNode(1, 0, 1);
    const centre = gridNode(2, 1, 1);
    const east = gridNode(3, 2, 1);
    const south = gridNode(4, 1, 0);
    const north = gridNode(5, 1, 2);
    register(west, centre, east, south, north);
    parser.handleWay(osmWay(10, [1, 2, 3]));
    parser.handleWay(osmWay(20, [4, 2, 5]));

    expect(parser.complete()).toBe(2);

    const node = parser.layerData.getNodeAtLocation(at(centre));
    expect(node).toBeDefined();
    expect(parser.layer.linksAt(node?.id ?? -1)).toHaveLength(4);
    expect(parser.layer.linkCount).toBe(4);
    expect(parser.stats.brokenWays).toBe(2);
    expect(parser.stats.staleInternalEntries).toBe(0);
    expect(console.log).toHaveBeenCalledWith("[layer:road] Broke 2 OSM ways into multiple links");
  });

  it("breaks a way where another way ends on it", () => {
    const parser = setup();
    const west = gridNode(1, 0, 1);
    const centre = gridNode(2, 1, 1);
    const east = gridNode(3, 2, 1);
    const north = gridNode(4, 1, 2);
    register(west, centre, east, north);
    parser.handleWay(osmWay(10, [1, 2, 3]));
    parser.handleWay(osmWay(20, [2, 4]));

    expect(parser.complete()).toBe(1);

    expect(parser.layer.linkCount).toBe(3);
    expect(parser.layerData.isLocationInternal(at(centre))).toBe(false);
    expect(
      [...(parser.layerData.getOsmWayLinks(10) ?? [])].map((l) => l.geometry)
    ).toEqual([
      [at(west), at(centre)],
      [at(centre), at(east)],
    ]);
  });

  it("leaves ways that only share end nodes alone", () => {
    const parser = setup();
    register(gridNode(1, 0, 0), gridNode(2, 1, 0), gridNode(3, 2, 0));
    parser.handleWay(osmWay(10, [1, 2]));
    parser.handleWay(osmWay(20, [2, 3]));

    expect(parser.complete()).toBe(0);
    expect(parser.layer.linkCount).toBe(2);
  });
});
