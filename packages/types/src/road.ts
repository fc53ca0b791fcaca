/**
 * Road-level types.
 *
 * A road segment is the directional stretch of an OSM way between two
 * boundary nodes. Each segment becomes exactly one graph-level road,
 * which carries the lane connections vehicles use to leave it.
 */

import type { Coordinate } from "./geo.js";

/** Authoritative road id, assigned when a road entity is constructed */
export type RoadId = number;

/**
 * Synthetic road id used while ways are being segmented.
 *
 * Packs the source way id (low 48 bits) and the signed segment index
 * (high 16 bits, negative for the reverse direction).
 */
export type SyntheticRoadId = bigint;

/** A directional span of a way between two boundary nodes */
export interface RoadSegment {
  startNodeId: number;
  endNodeId: number;
  start: Coordinate;
  end: Coordinate;
  /** Length in meters, never below the configured minimum */
  lengthMeters: number;
  lanes: number;
  /** Max speed in m/s */
  maxSpeed: number;
  /** True for one-way ways and for every reverse-direction segment */
  oneWay: boolean;
  name?: string;
  osmWayId: number;
}

/** One outgoing transition from a lane */
export interface LaneConnection {
  roadId: RoadId;
  /** Probability that traffic on the lane takes this road (0-1) */
  probability: number;
}

/** A reference from a node to a road touching it */
export interface NodeRoadRef<Id = RoadId> {
  roadId: Id;
  /** True if the road starts at the node, false if it ends there */
  startsHere: boolean;
}

/** Node id -> roads starting or ending at that node */
export type NodeRoadIndex<Id = RoadId> = Map<number, NodeRoadRef<Id>[]>;
