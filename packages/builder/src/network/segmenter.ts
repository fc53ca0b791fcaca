/**
 * Way segmentation.
 *
 * Walks each way and cuts it at boundary nodes into directional road
 * segments. Two-way ways are walked a second time in reverse, giving
 * each direction its own segments.
 */

import type { Coordinate, RoadSegment, SyntheticRoadId } from "@lanegraph/types";
import type { RoadWay } from "../ingestion/osm/types.js";
import { DEFAULT_ROAD_NETWORK_OPTIONS, type RoadNetworkOptions } from "./defaults.js";
import { calculatePathLength } from "./geometry.js";
import { syntheticRoadId } from "./road-ids.js";

/** A segment with the synthetic id it was created under */
export interface SyntheticSegment {
  roadId: SyntheticRoadId;
  segment: RoadSegment;
}

export type SegmenterOptions = Pick<
  Required<RoadNetworkOptions>,
  "laneDefaults" | "speedDefaults" | "fallbackSpeed" | "minSegmentLength"
>;

/**
 * Lane count for a way: explicit tag, else the highway default, else 1.
 */
export function inferLanes(
  way: RoadWay,
  laneDefaults: RoadNetworkOptions["laneDefaults"] = DEFAULT_ROAD_NETWORK_OPTIONS.laneDefaults
): number {
  if (way.lanes !== undefined && way.lanes > 0) return way.lanes;
  return laneDefaults?.[way.highway] ?? 1;
}

/**
 * Max speed (m/s) for a way: explicit tag, else the highway default,
 * else the fallback speed.
 */
export function inferMaxSpeed(
  way: RoadWay,
  speedDefaults: RoadNetworkOptions["speedDefaults"] = DEFAULT_ROAD_NETWORK_OPTIONS.speedDefaults,
  fallbackSpeed: number = DEFAULT_ROAD_NETWORK_OPTIONS.fallbackSpeed
): number {
  if (way.maxSpeed !== undefined && way.maxSpeed > 0) return way.maxSpeed;
  return speedDefaults?.[way.highway] ?? fallbackSpeed;
}

/**
 * Cut one walk of a way into segments.
 *
 * A cut happens at every boundary node after the first position and at
 * the last node. Spans whose start or end node has no coordinates are
 * dropped; the next span starts at the current node regardless.
 */
function walkSegments(
  way: RoadWay,
  nodeIds: readonly number[],
  oneWay: boolean,
  nodes: ReadonlyMap<number, Coordinate>,
  boundaries: ReadonlySet<number>,
  options: SegmenterOptions
): RoadSegment[] {
  const segments: RoadSegment[] = [];
  const lanes = inferLanes(way, options.laneDefaults);
  const maxSpeed = inferMaxSpeed(way, options.speedDefaults, options.fallbackSpeed);

  let spanStart = 0;
  for (let i = 1; i < nodeIds.length; i++) {
    const endNodeId = nodeIds[i];
    if (endNodeId === undefined) continue;
    const isLast = i === nodeIds.length - 1;
    if (!isLast && !boundaries.has(endNodeId)) continue;

    const span = nodeIds.slice(spanStart, i + 1);
    spanStart = i;

    const startNodeId = span[0];
    if (startNodeId === undefined) continue;
    const start = nodes.get(startNodeId);
    const end = nodes.get(endNodeId);
    if (!start || !end) continue;

    const pathLength = calculatePathLength(span.map((nodeId) => nodes.get(nodeId)));

    segments.push({
      startNodeId,
      endNodeId,
      start,
      end,
      lengthMeters: Math.max(pathLength, options.minSegmentLength),
      lanes,
      maxSpeed,
      oneWay,
      name: way.name,
      osmWayId: way.id,
    });
  }

  return segments;
}

/**
 * Segment a single way.
 *
 * @returns Forward segments (indices 0, 1, ...) followed, for two-way
 *   ways, by reverse segments (indices -1, -2, ...)
 */
export function segmentWay(
  way: RoadWay,
  nodes: ReadonlyMap<number, Coordinate>,
  boundaries: ReadonlySet<number>,
  options: SegmenterOptions = DEFAULT_ROAD_NETWORK_OPTIONS
): SyntheticSegment[] {
  const forward = walkSegments(way, way.nodeIds, way.oneWay, nodes, boundaries, options);
  const result: SyntheticSegment[] = forward.map((segment, index) => ({
    roadId: syntheticRoadId(way.id, index),
    segment,
  }));

  if (!way.oneWay) {
    // Traffic against the drawing direction is its own one-way road
    const reversedIds = [...way.nodeIds].reverse();
    const reverse = walkSegments(way, reversedIds, true, nodes, boundaries, options);
    reverse.forEach((segment, index) => {
      result.push({ roadId: syntheticRoadId(way.id, -(index + 1)), segment });
    });
  }

  return result;
}

/**
 * Segment all ways in input order.
 *
 * @returns Segments in production order: per way, forward then reverse
 */
export function segmentWays(
  ways: readonly RoadWay[],
  nodes: ReadonlyMap<number, Coordinate>,
  boundaries: ReadonlySet<number>,
  options: SegmenterOptions = DEFAULT_ROAD_NETWORK_OPTIONS
): SyntheticSegment[] {
  const segments: SyntheticSegment[] = [];
  for (const way of ways) {
    segments.push(...segmentWay(way, nodes, boundaries, options));
  }
  return segments;
}
