/**
 * Node -> roads index.
 */

import type { NodeRoadIndex, RoadSegment } from "@lanegraph/types";

/**
 * Index roads by the nodes they start and end at.
 *
 * Entries keep the order of the input, so each node lists its roads in
 * the order they were produced.
 */
export function buildNodeIndex<Id>(
  entries: Iterable<{ roadId: Id; segment: RoadSegment }>
): NodeRoadIndex<Id> {
  const index: NodeRoadIndex<Id> = new Map();
  for (const { roadId, segment } of entries) {
    addToIndex(index, segment.startNodeId, { roadId, startsHere: true });
    addToIndex(index, segment.endNodeId, { roadId, startsHere: false });
  }
  return index;
}

/**
 * Roads that start at a node, excluding one road id (typically the road
 * arriving there).
 */
export function roadsStartingAt<Id>(
  index: NodeRoadIndex<Id>,
  nodeId: number,
  exclude?: Id
): Id[] {
  const refs = index.get(nodeId);
  if (!refs) return [];
  return refs
    .filter((ref) => ref.startsHere && ref.roadId !== exclude)
    .map((ref) => ref.roadId);
}

function addToIndex<Id>(
  index: NodeRoadIndex<Id>,
  nodeId: number,
  ref: { roadId: Id; startsHere: boolean }
): void {
  const existing = index.get(nodeId);
  if (existing) {
    existing.push(ref);
  } else {
    index.set(nodeId, [ref]);
  }
}
