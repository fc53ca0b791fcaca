/**
 * Intersection detection.
 *
 * A boundary node is any node where a way has to be cut into separate
 * road segments: nodes shared by two or more ways, plus the two ends of
 * every way.
 */

import type { RoadWay } from "../ingestion/osm/types.js";

/** Result of intersection detection */
export interface IntersectionResult {
  /** Node ids that force a segment cut */
  boundaries: Set<number>;
  /** Number of distinct ways referencing each node */
  usageCounts: Map<number, number>;
}

/**
 * Count, for every node, the number of distinct ways that reference it.
 *
 * A way that visits the same node twice (a closed loop) counts once.
 */
export function countNodeUsage(ways: readonly RoadWay[]): Map<number, number> {
  const usageCounts = new Map<number, number>();
  for (const way of ways) {
    for (const nodeId of new Set(way.nodeIds)) {
      usageCounts.set(nodeId, (usageCounts.get(nodeId) ?? 0) + 1);
    }
  }
  return usageCounts;
}

/**
 * Find the boundary nodes of a set of ways.
 *
 * @param ways - Accepted road ways
 * @returns Boundary set and the node usage counts it was derived from
 */
export function findIntersections(ways: readonly RoadWay[]): IntersectionResult {
  const usageCounts = countNodeUsage(ways);
  const boundaries = new Set<number>();

  for (const [nodeId, count] of usageCounts) {
    if (count >= 2) boundaries.add(nodeId);
  }

  // Way ends always cut, so dead ends still terminate a segment
  for (const way of ways) {
    const first = way.nodeIds[0];
    const last = way.nodeIds[way.nodeIds.length - 1];
    if (first !== undefined) boundaries.add(first);
    if (last !== undefined) boundaries.add(last);
  }

  return { boundaries, usageCounts };
}
