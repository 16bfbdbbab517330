/**
 * Network and zoning summary for an OSM extract.
 *
 * Reads the network, then the public transport zoning on top of it, and
 * prints per-layer and zoning statistics.
 *
 * Usage: npx tsx scripts/read-network.ts <path-to.osm.pbf|overpass.json> [--left] [--verbose]
 *        npx tsx scripts/read-network.ts --bbox=minLng,minLat,maxLng,maxLat [--left] [--verbose]
 *
 * With --bbox the data comes from the Overpass API (through the tile cache)
 * and the network is clipped to the box.
 */
import { resolve } from "path";
import type { BoundingBox } from "@netweave/types";
import {
  fetchOverpassElements,
  osmFileSource,
  type OsmElementSource,
} from "../src/ingestion/index.js";
import { countPbfElements } from "../src/ingestion/osm/index.js";
import { OsmNetworkReader } from "../src/network-reader/index.js";
import { OsmZoningReader } from "../src/zoning/index.js";

// ── CLI ──────────────────────────────────────────────────────────────

const USAGE =
  "Usage: npx tsx scripts/read-network.ts <path-to.osm.pbf|overpass.json> | --bbox=minLng,minLat,maxLng,maxLat [--left] [--verbose]";

const args = process.argv.slice(2);
const inputPath = args.find((a) => !a.startsWith("--"));
const bboxArg = args.find((a) => a.startsWith("--bbox="))?.slice("--bbox=".length);
if (!inputPath && !bboxArg) {
  console.error(USAGE);
  process.exit(1);
}
const verbose = args.includes("--verbose");
const drivingSide = args.includes("--left") ? "left" : "right";

// ── Helpers ──────────────────────────────────────────────────────────

async function* toAsync<T>(items: readonly T[]): AsyncGenerator<T> {
  yield* items;
}

function row(label: string, value: number | string): string {
  return `  ${label.padEnd(32)} ${String(value).padStart(10)}`;
}

function parseBbox(value: string): BoundingBox {
  const parts = value.split(",").map(Number);
  const [minLng, minLat, maxLng, maxLat] = parts;
  if (
    parts.length !== 4 ||
    minLng === undefined ||
    minLat === undefined ||
    maxLng === undefined ||
    maxLat === undefined ||
    parts.some(isNaN)
  ) {
    throw new Error(`Invalid --bbox '${value}'. ${USAGE}`);
  }
  return { minLat, maxLat, minLng, maxLng };
}

// ── Main ─────────────────────────────────────────────────────────────

async function main() {
  let source: OsmElementSource;
  let boundingBox: BoundingBox | undefined;
  if (bboxArg) {
    boundingBox = parseBbox(bboxArg);
    const { elements, fetchedBbox } = await fetchOverpassElements(boundingBox);
    console.log(
      `Fetched ${elements.length} elements for ${fetchedBbox.minLat},${fetchedBbox.minLng} - ${fetchedBbox.maxLat},${fetchedBbox.maxLng}`
    );
    source = () => toAsync(elements);
  } else {
    const path = resolve(inputPath ?? "");
    source = osmFileSource(path);
    if (!path.toLowerCase().endsWith(".json")) {
      const counts = await countPbfElements(path);
      console.log(`${counts.node} nodes, ${counts.way} ways, ${counts.relation} relations in ${path}`);
    }
  }

  const networkReader = new OsmNetworkReader({
    drivingSide,
    verbose,
    ...(boundingBox && { boundingBox }),
  });
  const { network, bridge, stats } = await networkReader.read(source);

  console.log("\nNetwork");
  console.log(row("ways processed", stats.waysProcessed));
  console.log(row("ways ignored", stats.waysIgnored));
  console.log(row("circular ways", stats.circularWays));
  console.log(row("discarded ways", stats.discardedWays));
  console.log(row("nodes", stats.nodesCount));
  console.log(row("links", stats.linksCount));
  for (const layer of network.layers()) {
    console.log(`\n  Layer ${layer.id}`);
    console.log(row("  nodes", layer.nodeCount));
    console.log(row("  links", layer.linkCount));
    const layerStats = stats.layers[layer.id];
    if (layerStats) {
      console.log(row("  broken ways", layerStats.brokenWays));
    }
  }

  const zoningReader = new OsmZoningReader({ verbose }, bridge);
  const { stats: zoningStats } = await zoningReader.read(source);

  console.log("\nZoning");
  console.log(row("transfer zones", zoningStats.transferZones));
  console.log(row("transfer zone groups", zoningStats.transferZoneGroups));
  console.log(row("connectoids", zoningStats.connectoids));
  console.log(row("stop positions", zoningStats.stopPositions));
  console.log(row("  ignored", zoningStats.ignoredStopPositions));
  console.log(row("  discarded", zoningStats.discardedStopPositions));
  console.log(row("discarded waiting areas", zoningStats.discardedWaitingAreas));
  console.log(row("discarded stations", zoningStats.discardedStations));
  console.log(row("links broken for connectoids", zoningStats.linksBroken));
  console.log(row("network links after zoning", network.linkCount));
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
