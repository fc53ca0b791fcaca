/**
 * Graph-level road entity.
 *
 * A road is a one-way stretch between two boundary nodes. Each lane has
 * its own list of outgoing connections; for every lane the connection
 * probabilities sum to 1.
 */

import type { LaneConnection, RoadId, RoadSegment } from "@lanegraph/types";
import type { RoadIdAllocator } from "./road-ids.js";

/** Physical attributes a road is constructed with */
export interface RoadAttributes {
  lengthMeters: number;
  lanes: number;
  /** Max speed in m/s */
  maxSpeed: number;
}

export class Road {
  readonly id: RoadId;
  readonly lengthMeters: number;
  readonly lanes: number;
  readonly maxSpeed: number;
  private readonly laneConnections: LaneConnection[][];

  constructor(id: RoadId, attributes: RoadAttributes) {
    this.id = id;
    this.lengthMeters = attributes.lengthMeters;
    this.lanes = Math.max(1, Math.floor(attributes.lanes));
    this.maxSpeed = attributes.maxSpeed;
    this.laneConnections = Array.from({ length: this.lanes }, () => []);
  }

  /**
   * Construct a road for a segment, taking the next id from the allocator.
   */
  static fromSegment(segment: RoadSegment, allocator: RoadIdAllocator): Road {
    return new Road(allocator.next(), {
      lengthMeters: segment.lengthMeters,
      lanes: segment.lanes,
      maxSpeed: segment.maxSpeed,
    });
  }

  /**
   * Let vehicles on a lane continue onto another road.
   *
   * @param lane - Lane index, 0 is the rightmost lane
   * @param roadId - Target road
   * @param probability - Probability that the target is chosen
   */
  addLaneConnection(lane: number, roadId: RoadId, probability: number): void {
    const connections = this.laneConnections[lane];
    if (!connections) {
      throw new RangeError(`Road ${this.id} has no lane ${lane} (lanes: ${this.lanes})`);
    }
    connections.push({ roadId, probability });
  }

  /** Outgoing connections of one lane */
  getLaneConnections(lane: number): readonly LaneConnection[] {
    return this.laneConnections[lane] ?? [];
  }

  /** Outgoing connections of every lane, indexed by lane */
  get connections(): readonly (readonly LaneConnection[])[] {
    return this.laneConnections;
  }

  /** Total number of (lane, target) connection entries */
  get connectionCount(): number {
    return this.laneConnections.reduce((sum, lane) => sum + lane.length, 0);
  }
}
