/**
 * Overpass JSON response parser.
 *
 * Converts Overpass API response elements into OsmNode/OsmWay records,
 * the same records the XML parser yields.
 *
 * With `out body geom;`, ways carry `nodes[]` (OSM node IDs) and a
 * parallel `geometry[]` (inline lat/lon), so nodes are synthesized from
 * the ways without a separate node query.
 */

import type { OverpassJson, OverpassNode, OverpassWay } from "overpass-ts";
import type { OsmNode, OsmWay } from "../osm/types.js";
import { isRoadHighway } from "../osm/types.js";

/**
 * Parse an Overpass JSON response into OsmNode and OsmWay elements.
 *
 * Yields explicit node elements first, then for each road way the nodes
 * synthesized from its geometry followed by the way itself. Each node id
 * is yielded once.
 *
 * @param response - Overpass JSON response from fetchOverpassData()
 */
export async function* parseOverpassResponse(
  response: OverpassJson
): AsyncGenerator<OsmNode | OsmWay> {
  const yieldedNodeIds = new Set<number>();

  for (const element of response.elements) {
    if (element.type === "node") {
      const node = element as OverpassNode;
      yield { type: "node", id: node.id, lat: node.lat, lon: node.lon, tags: node.tags };
      yieldedNodeIds.add(node.id);
    }
  }

  for (const element of response.elements) {
    if (element.type !== "way") continue;
    const way = element as OverpassWay;

    // The query already filters server-side; anything else is not a road
    if (!isRoadHighway(way.tags?.["highway"])) continue;

    // way.geometry[i] is the coordinate of way.nodes[i]
    if (way.geometry && way.nodes) {
      for (let i = 0; i < way.nodes.length; i++) {
        const nodeId = way.nodes[i];
        const geom = way.geometry[i];
        if (nodeId === undefined || yieldedNodeIds.has(nodeId)) continue;
        if (!geom) continue; // node outside bbox

        yield { type: "node", id: nodeId, lat: geom.lat, lon: geom.lon };
        yieldedNodeIds.add(nodeId);
      }
    }

    yield { type: "way", id: way.id, refs: way.nodes, tags: way.tags };
  }
}
