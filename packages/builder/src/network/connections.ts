/**
 * Lane connection building.
 *
 * Every road connects to all roads that start where it ends. Lane-level
 * turn rules are not modelled: each lane gets the same uniform
 * distribution over the outgoing roads.
 */

import type { NodeRoadIndex, RoadMetadata } from "@lanegraph/types";
import type { Road } from "./road.js";
import { roadsStartingAt } from "./node-index.js";

/**
 * Attach outgoing lane connections to every road.
 *
 * @param roads - Roads without connections
 * @param metadata - Segment per road id (gives the end node)
 * @param nodeIndex - Node index keyed by road id
 * @returns Number of (lane, target) connection entries created
 */
export function buildConnections(
  roads: readonly Road[],
  metadata: RoadMetadata,
  nodeIndex: NodeRoadIndex
): number {
  let connectionsCreated = 0;

  for (const road of roads) {
    const segment = metadata.get(road.id);
    if (!segment) continue;

    const outgoing = roadsStartingAt(nodeIndex, segment.endNodeId, road.id);
    if (outgoing.length === 0) continue;

    const probability = 1 / outgoing.length;
    for (let lane = 0; lane < road.lanes; lane++) {
      for (const targetId of outgoing) {
        road.addLaneConnection(lane, targetId, probability);
        connectionsCreated++;
      }
    }
  }

  return connectionsCreated;
}
