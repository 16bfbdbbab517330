import { describe, it, expect } from "vitest";
import {
  extractOneWay,
  isReverseOneWay,
  isRoundabout,
  extractName,
  extractVerticalLayerIndex,
  resolveCircularTravelDirection,
} from "./tag-extractors.js";

describe("extractOneWay", () => {
  it("returns false for undefined tags", () => {
    expect(extractOneWay(undefined)).toBe(false);
  });

  it("returns false for bidirectional roads", () => {
    expect(extractOneWay({ highway: "residential" })).toBe(false);
    expect(extractOneWay({ oneway: "no" })).toBe(false);
  });

  it("returns true for oneway=yes", () => {
    expect(extractOneWay({ oneway: "yes" })).toBe(true);
  });

  it("returns true for roundabouts", () => {
    expect(extractOneWay({ junction: "roundabout" })).toBe(true);
    expect(extractOneWay({ junction: "circular" })).toBe(true);
  });

  it("lets oneway=no override the roundabout default", () => {
    expect(extractOneWay({ junction: "roundabout", oneway: "no" })).toBe(false);
  });

  it("returns true for reverse one-way", () => {
    expect(extractOneWay({ oneway: "-1" })).toBe(true);
    expect(extractOneWay({ oneway: "reverse" })).toBe(true);
  });
});

describe("isReverseOneWay", () => {
  it("returns false for normal one-way", () => {
    expect(isReverseOneWay({ oneway: "yes" })).toBe(false);
  });

  it("returns true for oneway=-1", () => {
    expect(isReverseOneWay({ oneway: "-1" })).toBe(true);
  });
});

describe("isRoundabout", () => {
  it("recognises junction=roundabout and junction=circular", () => {
    expect(isRoundabout({ junction: "roundabout" })).toBe(true);
    expect(isRoundabout({ junction: "circular" })).toBe(true);
    expect(isRoundabout({ junction: "yes" })).toBe(false);
    expect(isRoundabout(undefined)).toBe(false);
  });
});

describe("extractName", () => {
  it("returns undefined for no name", () => {
    expect(extractName(undefined)).toBeUndefined();
    expect(extractName({})).toBeUndefined();
  });

  it("falls back to ref", () => {
    expect(extractName({ ref: "B-12" })).toBe("B-12");
  });

  it("prefers name over ref", () => {
    expect(extractName({ name: "Station Road", ref: "B-12" })).toBe("Station Road");
  });
});

describe("extractVerticalLayerIndex", () => {
  it("defaults to 0", () => {
    expect(extractVerticalLayerIndex(undefined)).toBe(0);
    expect(extractVerticalLayerIndex({ layer: "bridge" })).toBe(0);
  });

  it("parses signed integers", () => {
    expect(extractVerticalLayerIndex({ layer: "1" })).toBe(1);
    expect(extractVerticalLayerIndex({ layer: "-2" })).toBe(-2);
  });
});

describe("resolveCircularTravelDirection", () => {
  it("uses the explicit direction tag", () => {
    expect(resolveCircularTravelDirection({ direction: "clockwise" }, "right")).toBe("clockwise");
    expect(resolveCircularTravelDirection({ direction: "anticlockwise" }, "left")).toBe("anticlockwise");
  });

  it("falls back to the driving side default", () => {
    expect(resolveCircularTravelDirection({ junction: "roundabout" }, "right")).toBe("anticlockwise");
    expect(resolveCircularTravelDirection({ junction: "roundabout" }, "left")).toBe("clockwise");
  });
});
