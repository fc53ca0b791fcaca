import { describe, it, expect } from "vitest";
import type { RoadSegment } from "@lanegraph/types";
import {
  syntheticRoadId,
  decodeSyntheticRoadId,
  RoadIdAllocator,
  rekeySegments,
} from "./road-ids.js";
import { RoadIdMismatchError } from "../errors.js";

function makeSegment(startNodeId: number, endNodeId: number): RoadSegment {
  return {
    startNodeId,
    endNodeId,
    start: { lat: 0, lng: 0 },
    end: { lat: 0, lng: 0.001 },
    lengthMeters: 111,
    lanes: 1,
    maxSpeed: 8.3,
    oneWay: true,
    osmWayId: 7,
  };
}

describe("syntheticRoadId", () => {
  it("uses the way id for the first forward segment", () => {
    expect(syntheticRoadId(100, 0)).toBe(100n);
  });

  it("stores the segment index in the high 16 bits", () => {
    expect(syntheticRoadId(100, 1)).toBe((1n << 48n) | 100n);
  });

  it("stores negative indices in two's complement", () => {
    expect(syntheticRoadId(100, -1)).toBe((0xffffn << 48n) | 100n);
    expect(syntheticRoadId(100, -2)).toBe((0xfffen << 48n) | 100n);
  });

  it("distinguishes directions and positions of one way", () => {
    const ids = new Set([
      syntheticRoadId(5, 0),
      syntheticRoadId(5, 1),
      syntheticRoadId(5, -1),
      syntheticRoadId(5, -2),
      syntheticRoadId(6, 0),
    ]);
    expect(ids.size).toBe(5);
  });

  it("keeps large way ids intact", () => {
    const wayId = 11_234_567_890;
    expect(decodeSyntheticRoadId(syntheticRoadId(wayId, -3))).toEqual({
      osmWayId: wayId,
      segmentIndex: -3,
    });
  });
});

describe("decodeSyntheticRoadId", () => {
  it("recovers way id and forward index", () => {
    expect(decodeSyntheticRoadId((2n << 48n) | 42n)).toEqual({ osmWayId: 42, segmentIndex: 2 });
  });
});

describe("RoadIdAllocator", () => {
  it("hands out sequential ids from 0", () => {
    const allocator = new RoadIdAllocator();
    expect([allocator.next(), allocator.next(), allocator.next()]).toEqual([0, 1, 2]);
  });

  it("starts at a given id", () => {
    const allocator = new RoadIdAllocator(10);
    expect(allocator.next()).toBe(10);
    expect(allocator.peek()).toBe(11);
  });

  it("peek does not consume an id", () => {
    const allocator = new RoadIdAllocator();
    expect(allocator.peek()).toBe(0);
    expect(allocator.next()).toBe(0);
  });
});

describe("rekeySegments", () => {
  const segments = [
    { roadId: syntheticRoadId(7, 0), segment: makeSegment(1, 2) },
    { roadId: syntheticRoadId(7, -1), segment: makeSegment(2, 1) },
  ];

  it("keys metadata by road id, by position", () => {
    const { metadata } = rekeySegments(segments, [{ id: 0 }, { id: 1 }]);

    expect(metadata.get(0)?.startNodeId).toBe(1);
    expect(metadata.get(1)?.startNodeId).toBe(2);
  });

  it("maps synthetic ids to road ids", () => {
    const { idMap } = rekeySegments(segments, [{ id: 4 }, { id: 9 }]);

    expect(idMap.get(syntheticRoadId(7, 0))).toBe(4);
    expect(idMap.get(syntheticRoadId(7, -1))).toBe(9);
  });

  it("rebuilds the node index with road ids", () => {
    const { nodeIndex } = rekeySegments(segments, [{ id: 0 }, { id: 1 }]);

    expect(nodeIndex.get(1)).toEqual([
      { roadId: 0, startsHere: true },
      { roadId: 1, startsHere: false },
    ]);
    expect(nodeIndex.get(2)).toEqual([
      { roadId: 0, startsHere: false },
      { roadId: 1, startsHere: true },
    ]);
  });

  it("throws when segment and road counts differ", () => {
    expect(() => rekeySegments(segments, [{ id: 0 }])).toThrow(RoadIdMismatchError);
    expect(() => rekeySegments(segments, [{ id: 0 }])).toThrow(
      "Cannot re-key 2 segments onto 1 roads"
    );
  });

  it("throws when a road id repeats", () => {
    expect(() => rekeySegments(segments, [{ id: 3 }, { id: 3 }])).toThrow(RoadIdMismatchError);
  });
});
