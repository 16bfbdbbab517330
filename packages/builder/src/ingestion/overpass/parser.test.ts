import { describe, it, expect } from "vitest";
import type { OverpassJson } from "overpass-ts";
import { isOverpassJson, parseOverpassResponse } from "./parser.js";

/** Collect all elements from an async generator */
async function collectAll<T>(gen: AsyncGenerator<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of gen) {
    items.push(item);
  }
  return items;
}

function makeOverpassResponse(elements: OverpassJson["elements"]): OverpassJson {
  return {
    version: 0.6,
    generator: "test",
    osm3s: { timestamp_osm_base: "2024-01-01T00:00:00Z", copyright: "test" },
    elements,
  };
}

describe("parseOverpassResponse", () => {
  it("converts Overpass nodes to OsmNode", async () => {
    const response = makeOverpassResponse([
      { type: "node", id: 123, lat: 55.61, lon: 12.51, tags: { highway: "bus_stop" } },
    ]);

    const elements = await collectAll(parseOverpassResponse(response));

    expect(elements).toEqual([
      { type: "node", id: 123, lat: 55.61, lon: 12.51, tags: { highway: "bus_stop" } },
    ]);
  });

  it("converts ways with refs from nodes[]", async () => {
    const response = makeOverpassResponse([
      { type: "way", id: 100, nodes: [1, 2, 3], tags: { highway: "residential" } },
    ]);

    const elements = await collectAll(parseOverpassResponse(response));

    expect(elements).toEqual([
      { type: "way", id: 100, refs: [1, 2, 3], tags: { highway: "residential" } },
    ]);
  });

  it("yields nodes, then ways, then relations", async () => {
    const response = makeOverpassResponse([
      {
        type: "relation",
        id: 7,
        members: [{ type: "node", ref: 1, role: "stop" }],
        tags: { type: "public_transport", public_transport: "stop_area" },
      },
      { type: "way", id: 100, nodes: [1, 2], tags: { highway: "residential" } },
      { type: "node", id: 1, lat: 55.61, lon: 12.51 },
      { type: "node", id: 2, lat: 55.62, lon: 12.51 },
    ]);

    const elements = await collectAll(parseOverpassResponse(response));

    expect(elements.map((e) => `${e.type}:${e.id}`)).toEqual([
      "node:1",
      "node:2",
      "way:100",
      "relation:7",
    ]);
    expect(elements[3]).toEqual({
      type: "relation",
      id: 7,
      members: [{ type: "node", ref: 1, role: "stop" }],
      tags: { type: "public_transport", public_transport: "stop_area" },
    });
  });

  it("keeps the tagged copy of a node that also appears as a skeleton", async () => {
    const response = makeOverpassResponse([
      {
        type: "node",
        id: 2,
        lat: 55.62,
        lon: 12.51,
        tags: { public_transport: "stop_position", bus: "yes" },
      },
      { type: "way", id: 100, nodes: [1, 2], tags: { highway: "residential" } },
      { type: "node", id: 1, lat: 55.61, lon: 12.51 },
      { type: "node", id: 2, lat: 55.62, lon: 12.51 },
    ]);

    const elements = await collectAll(parseOverpassResponse(response));

    const nodes = elements.filter((e) => e.type === "node");
    expect(nodes).toHaveLength(2);
    expect(nodes[0]).toEqual({
      type: "node",
      id: 2,
      lat: 55.62,
      lon: 12.51,
      tags: { public_transport: "stop_position", bus: "yes" },
    });
  });

  it("handles an empty response", async () => {
    const elements = await collectAll(parseOverpassResponse(makeOverpassResponse([])));
    expect(elements).toHaveLength(0);
  });
});

describe("isOverpassJson", () => {
  it("accepts a response with typed elements", () => {
    expect(isOverpassJson(makeOverpassResponse([{ type: "node", id: 1, lat: 0, lon: 0 }]))).toBe(
      true
    );
  });

  it("rejects other JSON", () => {
    expect(isOverpassJson(null)).toBe(false);
    expect(isOverpassJson([])).toBe(false);
    expect(isOverpassJson({ elements: {} })).toBe(false);
    expect(isOverpassJson({ elements: [{ type: "node" }] })).toBe(false);
  });
});
