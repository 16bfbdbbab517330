/**
 * OSM node table gathered during network reading.
 *
 * Only nodes referenced by an eligible way are kept: ways are scanned
 * first to pre-register the IDs they reference, then nodes are registered
 * if pre-registered (and inside the bounding box, when one is set).
 */

import type { BoundingBox } from "@netweave/types";
import { envelopeContains } from "../geo/envelope.js";
import { locationOf } from "../geo/location.js";
import type { OsmNode } from "../ingestion/osm/types.js";

export class OsmNodeData {
  private preregistered = new Set<number>();
  private registered = new Map<number, OsmNode>();
  private outsideBoundingBoxCount = 0;

  constructor(private readonly boundingBox?: BoundingBox) {}

  preregister(nodeId: number): void {
    this.preregistered.add(nodeId);
  }

  isPreregistered(nodeId: number): boolean {
    return this.preregistered.has(nodeId);
  }

  /**
   * Register a node if it was pre-registered and lies inside the bounding
   * box (when set).
   * @returns true if the node was registered
   */
  register(osmNode: OsmNode): boolean {
    if (!this.preregistered.has(osmNode.id)) return false;
    if (this.boundingBox && !envelopeContains(this.boundingBox, locationOf(osmNode))) {
      this.outsideBoundingBoxCount++;
      return false;
    }
    this.registered.set(osmNode.id, osmNode);
    return true;
  }

  getRegisteredOsmNode(nodeId: number): OsmNode | undefined {
    return this.registered.get(nodeId);
  }

  /** Read-only view of all registered nodes */
  getRegisteredOsmNodes(): ReadonlyMap<number, OsmNode> {
    return this.registered;
  }

  get registeredCount(): number {
    return this.registered.size;
  }

  /** Pre-registered nodes rejected because they lie outside the bounding box */
  get outsideBoundingBox(): number {
    return this.outsideBoundingBoxCount;
  }

  reset(): void {
    this.preregistered.clear();
    this.registered.clear();
    this.outsideBoundingBoxCount = 0;
  }
}
