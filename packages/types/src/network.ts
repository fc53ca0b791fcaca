/**
 * Network-level types: run statistics and the persisted network document.
 */

import type { RoadId, RoadSegment } from "./road.js";
import type { BoundingBox } from "./geo.js";

/** Statistics about one import run */
export interface ImportStats {
  /** OSM nodes read from the source */
  nodesRead: number;
  /** Accepted road ways read from the source */
  waysRead: number;
  /** Boundary nodes (intersections and way endpoints) */
  intersectionsFound: number;
  /** Directional road segments created */
  roadSegmentsCreated: number;
  /** Lane connection entries created */
  connectionsCreated: number;
}

/** Segment metadata keyed by authoritative road id */
export type RoadMetadata = Map<RoadId, RoadSegment>;

/** Axis order used on disk: [minLon, minLat, maxLon, maxLat] */
export type NetworkBbox = [number, number, number, number];

/** A lane connection as written to the network document */
export interface NetworkConnectionRecord {
  roadId: RoadId;
  lane: number;
  probability: number;
}

/** A road as written to the network document */
export interface NetworkRoadRecord {
  id: RoadId;
  startLat: number;
  startLon: number;
  endLat: number;
  endLon: number;
  name: string;
  osmWayId: number;
  length: number;
  lanes: number;
  maxSpeed: number;
  connections: NetworkConnectionRecord[];
}

/** Aggregate statistics block of the network document */
export interface NetworkStatsRecord {
  totalRoads: number;
  totalIntersections: number;
  totalConnections: number;
  nodesRead: number;
  waysRead: number;
  roadSegmentsCreated: number;
}

/** The persisted network document */
export interface NetworkDocument {
  name: string;
  version: string;
  bbox: NetworkBbox;
  roads: NetworkRoadRecord[];
  stats: NetworkStatsRecord;
}

/** Header metadata of a network document */
export interface NetworkInfo {
  name: string;
  version: string;
  bbox: BoundingBox;
  totalRoads: number;
  totalIntersections: number;
  totalConnections: number;
}
