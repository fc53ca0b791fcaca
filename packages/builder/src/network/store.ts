/**
 * In-memory node/way store for one import run.
 */

import type { Coordinate } from "@lanegraph/types";
import { toRoadWay } from "../ingestion/osm/tag-extractors.js";
import type { OsmNode, OsmWay, RoadWay } from "../ingestion/osm/types.js";

/** Parsed map data held for the duration of one import */
export interface OsmStore {
  /** Node coordinates by OSM node id */
  nodes: Map<number, Coordinate>;
  /** Accepted road ways, in input order */
  ways: RoadWay[];
  /** Ways read but not imported (non-road highway type, too few nodes) */
  discardedWays: number;
}

/**
 * Collect nodes and road ways from an element stream.
 *
 * Nodes may arrive in any order relative to ways. A node id seen twice
 * keeps its last coordinates.
 */
export async function collectOsmElements(
  elements: AsyncIterable<OsmNode | OsmWay>
): Promise<OsmStore> {
  const nodes = new Map<number, Coordinate>();
  const ways: RoadWay[] = [];
  let discardedWays = 0;

  for await (const element of elements) {
    if (element.type === "node") {
      nodes.set(element.id, { lat: element.lat, lng: element.lon });
    } else {
      const way = toRoadWay(element);
      if (way) {
        ways.push(way);
      } else {
        discardedWays++;
      }
    }
  }

  return { nodes, ways, discardedWays };
}
