import { describe, expect, it } from "vitest";
import { gridNode } from "../testing/osm-fixtures.js";
import { OsmNodeData } from "./osm-node-data.js";

describe("OsmNodeData", () => {
  it("registers only pre-registered nodes", () => {
    const data = new OsmNodeData();
    data.preregister(1);

    expect(data.register(gridNode(1, 0, 0))).toBe(true);
    expect(data.register(gridNode(2, 1, 0))).toBe(false);
    expect(data.getRegisteredOsmNode(1)?.lat).toBe(55);
    expect(data.getRegisteredOsmNode(2)).toBeUndefined();
    expect(data.isPreregistered(2)).toBe(false);
    expect(data.registeredCount).toBe(1);
  });

  it("rejects nodes outside the bounding box and counts them", () => {
    const data = new OsmNodeData({ minLat: 54.9995, maxLat: 55.0015, minLng: 9.9995, maxLng: 10.0015 });
    data.preregister(1);
    data.preregister(2);

    expect(data.register(gridNode(1, 1, 1))).toBe(true);
    expect(data.register(gridNode(2, 5, 0))).toBe(false);
    expect(data.outsideBoundingBox).toBe(1);
    expect([...data.getRegisteredOsmNodes().keys()]).toEqual([1]);
  });

  it("forgets everything on reset", () => {
    const data = new OsmNodeData({ minLat: 54, maxLat: 56, minLng: 9, maxLng: 11 });
    data.preregister(1);
    data.preregister(2);
    data.register(gridNode(1, 0, 0));
    data.register({ type: "node", id: 2, lat: 60, lon: 10 });

    data.reset();

    expect(data.registeredCount).toBe(0);
    expect(data.outsideBoundingBox).toBe(0);
    expect(data.isPreregistered(1)).toBe(false);
    expect(data.register(gridNode(1, 0, 0))).toBe(false);
  });
});
