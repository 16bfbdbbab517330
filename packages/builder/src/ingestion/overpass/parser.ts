/**
 * Overpass JSON response parser.
 *
 * Converts Overpass API response elements into OsmNode/OsmWay/OsmRelation.
 *
 * With `out body; >; out skel qt;`, Overpass returns the matched elements
 * with tags first, then every node they reference without tags. A node
 * can therefore appear twice; the tagged copy wins.
 */

import type {
  OverpassJson,
  OverpassNode,
  OverpassRelation,
  OverpassWay,
} from "overpass-ts";
import type { OsmNode, OsmRelation, OsmRelationMember, OsmWay } from "../osm/types.js";

/**
 * Check that parsed JSON looks like an Overpass response (an object with
 * an `elements` array of typed, numbered elements).
 */
export function isOverpassJson(value: unknown): value is OverpassJson {
  if (typeof value !== "object" || value === null || !("elements" in value)) {
    return false;
  }
  const { elements } = value;
  return (
    Array.isArray(elements) &&
    elements.every(
      (e: unknown) =>
        typeof e === "object" &&
        e !== null &&
        "type" in e &&
        typeof e.type === "string" &&
        "id" in e &&
        typeof e.id === "number"
    )
  );
}

/**
 * Parse an Overpass JSON response.
 *
 * Yields all nodes first, then ways, then relations, matching the order
 * of a PBF file.
 *
 * @param response - Overpass JSON response from fetchOverpassData()
 */
export async function* parseOverpassResponse(
  response: OverpassJson
): AsyncGenerator<OsmNode | OsmWay | OsmRelation> {
  const nodes = new Map<number, OsmNode>();
  const ways: OsmWay[] = [];
  const relations: OsmRelation[] = [];

  for (const element of response.elements) {
    switch (element.type) {
      case "node": {
        const node = element as OverpassNode;
        const existing = nodes.get(node.id);
        if (existing?.tags) continue;
        nodes.set(node.id, {
          type: "node",
          id: node.id,
          lat: node.lat,
          lon: node.lon,
          ...(node.tags && { tags: node.tags }),
        });
        break;
      }
      case "way": {
        const way = element as OverpassWay;
        ways.push({
          type: "way",
          id: way.id,
          refs: way.nodes,
          ...(way.tags && { tags: way.tags }),
        });
        break;
      }
      case "relation": {
        const relation = element as OverpassRelation;
        relations.push({
          type: "relation",
          id: relation.id,
          members: relation.members.flatMap(toMember),
          ...(relation.tags && { tags: relation.tags }),
        });
        break;
      }
    }
  }

  yield* nodes.values();
  yield* ways;
  yield* relations;
}

function toMember(member: OverpassRelation["members"][number]): OsmRelationMember[] {
  const { type, ref, role } = member;
  if (type === "node" || type === "way" || type === "relation") {
    return [{ type, ref, role }];
  }
  return [];
}
