import { describe, it, expect } from "vitest";
import type { RoadSegment } from "@lanegraph/types";
import { buildConnections } from "./connections.js";
import { Road } from "./road.js";
import { RoadIdAllocator, rekeySegments, syntheticRoadId } from "./road-ids.js";

function makeSegment(startNodeId: number, endNodeId: number, lanes = 1): RoadSegment {
  return {
    startNodeId,
    endNodeId,
    start: { lat: 0, lng: 0 },
    end: { lat: 0, lng: 0.001 },
    lengthMeters: 111,
    lanes,
    maxSpeed: 13.9,
    oneWay: true,
    osmWayId: 1,
  };
}

/** Build roads for the given segments and connect them */
function connect(segments: RoadSegment[]) {
  const allocator = new RoadIdAllocator();
  const synthetic = segments.map((segment, i) => ({ roadId: syntheticRoadId(1, i), segment }));
  const roads = segments.map((segment) => Road.fromSegment(segment, allocator));
  const { metadata, nodeIndex } = rekeySegments(synthetic, roads);
  const count = buildConnections(roads, metadata, nodeIndex);
  return { roads, count };
}

describe("buildConnections", () => {
  it("gives each lane 1/m towards every outgoing road", () => {
    const { roads, count } = connect([
      makeSegment(1, 2, 2), // 0: into the junction
      makeSegment(2, 3), // 1
      makeSegment(2, 4), // 2
    ]);

    const [incoming] = roads;
    for (const lane of [0, 1]) {
      expect(incoming?.getLaneConnections(lane)).toEqual([
        { roadId: 1, probability: 0.5 },
        { roadId: 2, probability: 0.5 },
      ]);
    }
    expect(count).toBe(4);
  });

  it("leaves dead ends without connections", () => {
    const { roads, count } = connect([makeSegment(1, 2), makeSegment(3, 4)]);

    expect(roads.every((road) => road.connectionCount === 0)).toBe(true);
    expect(count).toBe(0);
  });

  it("includes the reverse road as a U-turn", () => {
    const { roads } = connect([makeSegment(1, 2), makeSegment(2, 1)]);

    expect(roads[0]?.getLaneConnections(0)).toEqual([{ roadId: 1, probability: 1 }]);
    expect(roads[1]?.getLaneConnections(0)).toEqual([{ roadId: 0, probability: 1 }]);
  });

  it("does not connect a loop road to itself", () => {
    const { roads, count } = connect([makeSegment(5, 5)]);

    expect(roads[0]?.connectionCount).toBe(0);
    expect(count).toBe(0);
  });

  it("ignores roads without segment metadata", () => {
    const road = new Road(0, { lengthMeters: 10, lanes: 1, maxSpeed: 5 });
    expect(buildConnections([road], new Map(), new Map())).toBe(0);
  });
});
