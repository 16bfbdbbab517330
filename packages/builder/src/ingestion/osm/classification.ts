/**
 * Way classification - which network layer an OSM way belongs to.
 *
 * The classifier is passed explicitly to the readers so tests (and callers
 * with other layer setups) can supply their own. The default table lives
 * in way-tags.json.
 */

import { readFileSync } from "node:fs";
import type { PublicTransportMode } from "@netweave/types";
import { isPublicTransportMode } from "./public-transport-tags.js";
import type { OsmTags } from "./types.js";

/** Tag key and accepted values that place a way in a layer */
export interface LayerTagRule {
  key: string;
  values: string[];
}

/** Layer rules plus the layer serving each public transport mode */
export interface WayTagTable {
  layers: Record<string, LayerTagRule>;
  modes: Partial<Record<PublicTransportMode, string>>;
}

export interface WayClassifier {
  /** All layer IDs this classifier can produce */
  readonly layerIds: readonly string[];
  /** Layer a way belongs to; undefined when it belongs to none */
  layerFor(tags: OsmTags | undefined): string | undefined;
  /** Value of the tag that decided the layer (e.g. "residential") */
  wayTypeOf(tags: OsmTags | undefined): string | undefined;
  /** Layer serving a public transport mode */
  layerForMode(mode: PublicTransportMode): string | undefined;
}

/**
 * Build a classifier from a tag table.
 *
 * Layers are tried in table order; the first rule whose key carries an
 * accepted value wins. Ways tagged `area=yes` never form links.
 */
export function createWayClassifier(table: WayTagTable): WayClassifier {
  const rules = Object.entries(table.layers).map(([layerId, rule]) => ({
    layerId,
    key: rule.key,
    values: new Set(rule.values),
  }));

  const match = (tags: OsmTags | undefined) => {
    if (!tags || tags["area"] === "yes") return undefined;
    for (const rule of rules) {
      const value = tags[rule.key];
      if (value !== undefined && rule.values.has(value)) {
        return { layerId: rule.layerId, value };
      }
    }
    return undefined;
  };

  return {
    layerIds: rules.map((r) => r.layerId),
    layerFor: (tags) => match(tags)?.layerId,
    wayTypeOf: (tags) => match(tags)?.value,
    layerForMode: (mode) => table.modes[mode],
  };
}

/**
 * Validate parsed JSON as a way tag table.
 * Throws with the offending path when the shape is wrong.
 */
export function parseWayTagTable(raw: unknown): WayTagTable {
  const rawLayers = isRecord(raw) ? raw["layers"] : undefined;
  const rawModes = isRecord(raw) ? raw["modes"] : undefined;
  if (!isRecord(rawLayers) || !isRecord(rawModes)) {
    throw new Error("Way tag table must be an object with 'layers' and 'modes'");
  }

  const layers: Record<string, LayerTagRule> = {};
  for (const [layerId, rule] of Object.entries(rawLayers)) {
    const key = isRecord(rule) ? rule["key"] : undefined;
    const values: unknown = isRecord(rule) ? rule["values"] : undefined;
    if (typeof key !== "string" || !isStringArray(values)) {
      throw new Error(`Way tag table: invalid rule for layer '${layerId}'`);
    }
    layers[layerId] = { key, values };
  }

  const modes: Partial<Record<PublicTransportMode, string>> = {};
  for (const [mode, layerId] of Object.entries(rawModes)) {
    if (!isPublicTransportMode(mode)) {
      throw new Error(`Way tag table: unknown mode '${mode}'`);
    }
    if (typeof layerId !== "string" || !(layerId in layers)) {
      throw new Error(`Way tag table: mode '${mode}' maps to unknown layer`);
    }
    modes[mode] = layerId;
  }

  return { layers, modes };
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function loadDefaultWayTagTable(): WayTagTable {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("./way-tags.json", import.meta.url), "utf8")
  );
  return parseWayTagTable(raw);
}

/** Highways on the "road" layer, railways on the "rail" layer */
export const DEFAULT_WAY_CLASSIFIER: WayClassifier = createWayClassifier(
  loadDefaultWayTagTable()
);
