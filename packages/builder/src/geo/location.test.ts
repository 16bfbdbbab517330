import { describe, expect, it } from "vitest";
import { LocationMap, locationKey, locationOf, locationsEqual } from "./location.js";

describe("location keys", () => {
  it("keys a location by its exact coordinates", () => {
    expect(locationKey({ lat: 55, lng: 10.001 })).toBe("55,10.001");
    expect(locationOf({ type: "node", id: 1, lat: 55, lon: 10 })).toEqual({ lat: 55, lng: 10 });
  });

  it("compares without tolerance", () => {
    expect(locationsEqual({ lat: 55, lng: 10 }, { lat: 55, lng: 10 })).toBe(true);
    expect(locationsEqual({ lat: 55, lng: 10 }, { lat: 55, lng: 10.0000001 })).toBe(false);
  });
});

describe("LocationMap", () => {
  it("treats equal coordinates as one key and keeps the first location", () => {
    const first = { lat: 55, lng: 10 };
    const map = new LocationMap<string>();
    map.set(first, "a");
    map.set({ lat: 55, lng: 10 }, "b");

    expect(map.size).toBe(1);
    expect(map.get({ lat: 55, lng: 10 })).toBe("b");
    const [entry] = [...map.entries()];
    expect(entry?.[0]).toBe(first);
    expect(entry?.[1]).toBe("b");
  });

  it("deletes and clears", () => {
    const map = new LocationMap<number>();
    map.set({ lat: 1, lng: 2 }, 1).set({ lat: 3, lng: 4 }, 2);

    expect(map.delete({ lat: 1, lng: 2 })).toBe(true);
    expect(map.delete({ lat: 1, lng: 2 })).toBe(false);
    expect(map.has({ lat: 3, lng: 4 })).toBe(true);
    expect([...map.locations()]).toEqual([{ lat: 3, lng: 4 }]);

    map.clear();
    expect(map.size).toBe(0);
  });
});
