import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Location, NetworkLink } from "@netweave/types";
import { TransportNetwork } from "../network/transport-network.js";
import type { NetworkLayer } from "../network/network-layer.js";
import { at, gridNode } from "../testing/osm-fixtures.js";
import { NetworkLayerReaderData } from "./layer-data.js";

// ─── Helpers ───────────────────────────────────────────────────────────

function p(x: number, y: number): Location {
  return at(gridNode(0, x, y));
}

function makeLink(layer: NetworkLayer, points: Location[], wayId: number): NetworkLink {
  const first = points[0];
  const last = points[points.length - 1];
  if (!first || !last) throw new Error("need points");
  return layer.createLink(layer.createNode(first), layer.createNode(last), points, wayId);
}

let layer: NetworkLayer;
let data: NetworkLayerReaderData;

beforeEach(() => {
  layer = new TransportNetwork(["road"]).getOrCreateLayer("road");
  data = new NetworkLayerReaderData(layer);
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("NetworkLayerReaderData nodes", () => {
  it("makes a location present once a node is registered", () => {
    const node = layer.createNode(p(0, 0));
    expect(data.isLocationPresent(p(0, 0))).toBe(false);

    data.registerNodeAtLocation(p(0, 0), node);

    expect(data.isLocationPresent(p(0, 0))).toBe(true);
    expect(data.getNodeAtLocation(p(0, 0))).toBe(node);
  });

  it("keeps at most one node per location and reports replacement", () => {
    const first = layer.createNode(p(0, 0));
    const second = layer.createNode(p(0, 0));

    data.registerNodeAtLocation(p(0, 0), first);
    data.registerNodeAtLocation(p(0, 0), first);
    expect(data.stats.nodeOverwrites).toBe(0);

    data.registerNodeAtLocation(p(0, 0), second);
    expect(data.getNodeAtLocation(p(0, 0))).toBe(second);
    expect(data.stats.nodeOverwrites).toBe(1);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("keeps the OSM node when re-registering without one", () => {
    const osm = gridNode(7, 0, 0);
    const node = layer.createNode(p(0, 0), 7);

    data.registerNodeAtLocation(p(0, 0), node, osm);
    data.registerNodeAtLocation(p(0, 0), node);

    expect(data.getOsmNodeAtLocation(p(0, 0))).toBe(osm);
  });

  it("forgets the location of a removed node", () => {
    const node = layer.createNode(p(0, 0));
    data.registerNodeAtLocation(p(0, 0), node);
    layer.removeNode(node);

    data.removeNodes([node]);

    expect(data.isLocationPresent(p(0, 0))).toBe(false);
    expect(data.getNodeAtLocation(p(0, 0))).toBeUndefined();
  });

  it("keeps a location registered for another node", () => {
    const first = layer.createNode(p(0, 0));
    const second = layer.createNode(p(0, 0));
    data.registerNodeAtLocation(p(0, 0), first);
    data.registerNodeAtLocation(p(0, 0), second);

    data.removeNodes([first]);

    expect(data.getNodeAtLocation(p(0, 0))).toBe(second);
  });
});

describe("NetworkLayerReaderData internal locations", () => {
  it("appends links a location is internal to", () => {
    const a = makeLink(layer, [p(0, 1), p(1, 1), p(2, 1)], 100);
    const b = makeLink(layer, [p(1, 0), p(1, 1), p(1, 2)], 200);
    const osm = gridNode(11, 1, 1);

    data.registerLocationAsInternalToLink(p(1, 1), a, osm);
    data.registerLocationAsInternalToLink(p(1, 1), b);

    expect(data.isLocationInternal(p(1, 1))).toBe(true);
    expect(data.isLocationPresent(p(1, 1))).toBe(true);
    expect(data.getInternalEntry(p(1, 1))?.links).toEqual([a, b]);
    expect(data.getOsmNodeAtLocation(p(1, 1))).toBe(osm);
  });

  it("collects locations internal to at least n links", () => {
    const a = makeLink(layer, [p(0, 1), p(1, 1), p(2, 1), p(3, 1)], 100);
    const b = makeLink(layer, [p(1, 0), p(1, 1), p(1, 2)], 200);
    data.registerLocationAsInternalToLink(p(1, 1), a);
    data.registerLocationAsInternalToLink(p(2, 1), a);
    data.registerLocationAsInternalToLink(p(1, 1), b);

    expect(data.collectLocationsInternalToAtLeast(1)).toEqual([p(1, 1), p(2, 1)]);
    expect(data.collectLocationsInternalToAtLeast(2)).toEqual([p(1, 1)]);
    expect(data.collectLocationsInternalToAtLeast(3)).toEqual([]);
  });

  it("collects internal locations that also hold a node", () => {
    const a = makeLink(layer, [p(0, 1), p(1, 1), p(2, 1)], 100);
    data.registerLocationAsInternalToLink(p(1, 1), a);
    data.registerNodeAtLocation(p(0, 1), layer.createNode(p(0, 1)));
    expect(data.collectInternalLocationsOnNodes()).toEqual([]);

    data.registerNodeAtLocation(p(1, 1), layer.createNode(p(1, 1)));
    expect(data.collectInternalLocationsOnNodes()).toEqual([p(1, 1)]);
  });

  it("returns nothing for a location that was never registered", () => {
    expect(data.findCurrentLinksAtLocation(p(5, 5))).toEqual([]);
    expect(data.getNodeAtLocation(p(5, 5))).toBeUndefined();
    expect(data.getInternalEntry(p(5, 5))).toBeUndefined();
  });

  it("finds links ending at a node location", () => {
    const a = makeLink(layer, [p(0, 1), p(1, 1), p(2, 1)], 100);
    const nodeA = layer.getNode(a.nodeAId);
    if (!nodeA) throw new Error("missing node");
    data.registerNodeAtLocation(p(0, 1), nodeA);

    expect(data.findCurrentLinksAtLocation(p(0, 1))).toEqual([a]);
  });

  it("drops recorded links that were removed without replacement", () => {
    const a = makeLink(layer, [p(0, 1), p(1, 1), p(2, 1)], 100);
    data.registerLocationAsInternalToLink(p(1, 1), a);
    layer.removeLinks([a]);

    expect(data.findCurrentLinksAtLocation(p(1, 1))).toEqual([]);
    expect(data.stats.unmatchedBrokenLinks).toBe(0);
  });
});

describe("NetworkLayerReaderData way links", () => {
  it("warns when fewer than 2 links represent a way", () => {
    const a = makeLink(layer, [p(0, 0), p(1, 0)], 100);

    data.updateOsmWayLinks(100, [a]);

    expect(data.stats.undersizedWayLinkSets).toBe(1);
    expect(data.getOsmWayLinks(100)?.size).toBe(1);
  });

  it("merges updates into the existing entry", () => {
    const a = makeLink(layer, [p(0, 0), p(1, 0)], 100);
    const b = makeLink(layer, [p(1, 0), p(2, 0)], 100);
    const c = makeLink(layer, [p(2, 0), p(3, 0)], 100);
    const d = makeLink(layer, [p(3, 0), p(4, 0)], 100);

    data.updateOsmWayLinks(100, [a, b]);
    data.updateOsmWayLinks(100, [c, d]);

    expect([...(data.getOsmWayLinks(100) ?? [])]).toEqual([a, b, c, d]);
    expect(data.stats.undersizedWayLinkSets).toBe(0);
  });

  it("replaces removed links by created ones", () => {
    const a = makeLink(layer, [p(0, 0), p(1, 0)], 100);
    const b = makeLink(layer, [p(1, 0), p(2, 0)], 100);
    const b1 = makeLink(layer, [p(1, 0), p(1.5, 0)], 100);
    const b2 = makeLink(layer, [p(1.5, 0), p(2, 0)], 100);
    data.updateOsmWayLinks(100, [a, b]);

    data.replaceOsmWayLinks(100, [b], [b1, b2]);

    expect([...(data.getOsmWayLinks(100) ?? [])]).toEqual([a, b1, b2]);
  });

  it("starts an entry when a single-link way is replaced", () => {
    const a = makeLink(layer, [p(0, 0), p(1, 0), p(2, 0)], 100);
    const a1 = makeLink(layer, [p(0, 0), p(1, 0)], 100);
    const a2 = makeLink(layer, [p(1, 0), p(2, 0)], 100);

    data.replaceOsmWayLinks(100, [a], [a1, a2]);

    expect([...(data.getOsmWayLinks(100) ?? [])]).toEqual([a1, a2]);
  });

  it("forgets removed links and empty entries", () => {
    const a = makeLink(layer, [p(0, 0), p(1, 0)], 100);
    const b = makeLink(layer, [p(1, 0), p(2, 0)], 100);
    data.updateOsmWayLinks(100, [a, b]);

    data.removeLinks([a]);
    expect([...(data.getOsmWayLinks(100) ?? [])]).toEqual([b]);

    data.removeLinks([b]);
    expect(data.getOsmWayLinks(100)).toBeUndefined();
  });

  it("does not report a location inside a removed piece as unmatched", () => {
    const original = makeLink(layer, [p(0, 0), p(1, 0), p(2, 0), p(3, 0), p(4, 0)], 100);
    const head = makeLink(layer, [p(0, 0), p(1, 0), p(2, 0)], 100);
    const tail = makeLink(layer, [p(2, 0), p(3, 0), p(4, 0)], 100);
    data.registerLocationAsInternalToLink(p(3, 0), original);
    data.replaceOsmWayLinks(100, [original], [head, tail]);
    layer.removeLinks([original, tail]);

    data.removeLinks([tail]);

    expect(data.findCurrentLinksAtLocation(p(3, 0))).toEqual([]);
    expect(data.stats.unmatchedBrokenLinks).toBe(0);
    expect(console.warn).not.toHaveBeenCalled();
  });
});

describe("NetworkLayerReaderData lifecycle", () => {
  it("reports node locations still carrying internal entries", () => {
    const a = makeLink(layer, [p(0, 1), p(1, 1), p(2, 1)], 100);
    data.registerLocationAsInternalToLink(p(1, 1), a);
    data.registerNodeAtLocation(p(1, 1), layer.createNode(p(1, 1)));

    expect(data.validate()).toBe(1);
    expect(data.stats.staleInternalEntries).toBe(1);
    expect(console.error).toHaveBeenCalledTimes(1);

    data.clearInternalEntry(p(1, 1));
    expect(data.validate()).toBe(0);
  });

  it("clears all state on reset", () => {
    const a = makeLink(layer, [p(0, 1), p(1, 1), p(2, 1)], 100);
    data.registerLocationAsInternalToLink(p(1, 1), a);
    data.registerNodeAtLocation(p(0, 1), layer.createNode(p(0, 1)));
    data.updateOsmWayLinks(100, [a]);

    data.reset();

    expect(data.isLocationPresent(p(1, 1))).toBe(false);
    expect(data.isLocationPresent(p(0, 1))).toBe(false);
    expect(data.getOsmWayLinks(100)).toBeUndefined();
    expect(data.stats.undersizedWayLinkSets).toBe(0);
  });
});
