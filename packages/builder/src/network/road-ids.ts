/**
 * Road identity.
 *
 * Segments get a synthetic id while ways are walked; roads get their
 * authoritative id from the allocator when they are constructed. The
 * two are joined by position: the i-th segment becomes the i-th road.
 */

import type {
  NodeRoadIndex,
  RoadId,
  RoadMetadata,
  RoadSegment,
  SyntheticRoadId,
} from "@lanegraph/types";
import { RoadIdMismatchError } from "../errors.js";
import { buildNodeIndex } from "./node-index.js";

const WAY_ID_BITS = 48n;
const WAY_ID_MASK = (1n << WAY_ID_BITS) - 1n;

/**
 * Pack a way id and a signed segment index into a synthetic road id.
 *
 * Forward segments use indices 0, 1, 2, ...; reverse segments -1, -2, ...
 * The index occupies the high 16 bits in two's complement.
 */
export function syntheticRoadId(osmWayId: number, segmentIndex: number): SyntheticRoadId {
  const index = BigInt.asUintN(16, BigInt(segmentIndex));
  return BigInt.asUintN(64, (index << WAY_ID_BITS) | (BigInt(osmWayId) & WAY_ID_MASK));
}

/**
 * Unpack a synthetic road id.
 */
export function decodeSyntheticRoadId(id: SyntheticRoadId): {
  osmWayId: number;
  segmentIndex: number;
} {
  return {
    osmWayId: Number(id & WAY_ID_MASK),
    segmentIndex: Number(BigInt.asIntN(16, id >> WAY_ID_BITS)),
  };
}

/**
 * Hands out authoritative road ids, sequentially from a starting value.
 *
 * One allocator per import run keeps ids deterministic across runs.
 */
export class RoadIdAllocator {
  private nextId: RoadId;

  constructor(firstId: RoadId = 0) {
    this.nextId = firstId;
  }

  next(): RoadId {
    return this.nextId++;
  }

  /** Number the next call to next() will return */
  peek(): RoadId {
    return this.nextId;
  }
}

/** Segment metadata and node index keyed by authoritative ids */
export interface RekeyedSegments {
  metadata: RoadMetadata;
  nodeIndex: NodeRoadIndex;
  /** Synthetic id -> authoritative id */
  idMap: Map<SyntheticRoadId, RoadId>;
}

/**
 * Re-key segments from synthetic ids to the ids of the roads built from
 * them, by position: the i-th segment belongs to the i-th road.
 *
 * @throws RoadIdMismatchError if segments and roads differ in number, or
 *   a road id is used twice
 */
export function rekeySegments(
  segments: readonly { roadId: SyntheticRoadId; segment: RoadSegment }[],
  roads: readonly { id: RoadId }[]
): RekeyedSegments {
  if (segments.length !== roads.length) {
    throw new RoadIdMismatchError(
      `Cannot re-key ${segments.length} segments onto ${roads.length} roads`
    );
  }

  const metadata: RoadMetadata = new Map();
  const idMap = new Map<SyntheticRoadId, RoadId>();
  const rekeyed: { roadId: RoadId; segment: RoadSegment }[] = [];

  segments.forEach(({ roadId: syntheticId, segment }, i) => {
    const road = roads[i];
    if (!road || metadata.has(road.id)) {
      throw new RoadIdMismatchError(`Road id ${road?.id} is not unique`);
    }
    metadata.set(road.id, segment);
    idMap.set(syntheticId, road.id);
    rekeyed.push({ roadId: road.id, segment });
  });

  return { metadata, nodeIndex: buildNodeIndex(rekeyed), idMap };
}
