/**
 * Road network construction module.
 *
 * Turns OSM nodes and ways into directional, lane-aware roads.
 *
 * Elements -> Store -> Intersections -> Segments -> Roads (re-keyed) -> Connections
 */

import type {
  ImportStats,
  NodeRoadIndex,
  RoadId,
  RoadMetadata,
  SyntheticRoadId,
} from "@lanegraph/types";
import type { OsmNode, OsmWay } from "../ingestion/osm/types.js";
import { buildConnections } from "./connections.js";
import { resolveRoadNetworkOptions, type RoadNetworkOptions } from "./defaults.js";
import { findIntersections } from "./intersections.js";
import { Road } from "./road.js";
import { RoadIdAllocator, rekeySegments } from "./road-ids.js";
import { segmentWays } from "./segmenter.js";
import { collectOsmElements, type OsmStore } from "./store.js";

export {
  DEFAULT_LANES,
  DEFAULT_SPEEDS,
  DEFAULT_ROAD_NETWORK_OPTIONS,
  resolveRoadNetworkOptions,
  type RoadNetworkOptions,
} from "./defaults.js";
export { haversineDistance, calculatePathLength, EARTH_RADIUS_METERS } from "./geometry.js";
export { collectOsmElements, type OsmStore } from "./store.js";
export { findIntersections, countNodeUsage, type IntersectionResult } from "./intersections.js";
export {
  segmentWay,
  segmentWays,
  inferLanes,
  inferMaxSpeed,
  type SyntheticSegment,
  type SegmenterOptions,
} from "./segmenter.js";
export {
  syntheticRoadId,
  decodeSyntheticRoadId,
  RoadIdAllocator,
  rekeySegments,
  type RekeyedSegments,
} from "./road-ids.js";
export { buildNodeIndex, roadsStartingAt } from "./node-index.js";
export { Road, type RoadAttributes } from "./road.js";
export { buildConnections } from "./connections.js";

/** The assembled road network of one import run */
export interface RoadNetwork {
  /** Roads in the order their segments were produced */
  roads: Road[];
  /** Segment metadata keyed by road id */
  metadata: RoadMetadata;
  /** Node -> roads starting or ending there, keyed by road id */
  nodeIndex: NodeRoadIndex;
  /** Synthetic segment id -> road id */
  idMap: Map<SyntheticRoadId, RoadId>;
  stats: ImportStats;
}

/**
 * Build the road network from a populated store.
 *
 * Pipeline:
 * 1. Find boundary nodes (intersections and way ends)
 * 2. Split ways into directional segments at the boundaries
 * 3. Construct one road per segment, in order, with allocator ids
 * 4. Re-key segment metadata and the node index to the road ids
 * 5. Connect every road to the roads leaving its end node
 *
 * @param store - Nodes and accepted ways of this run
 * @param options - Default tables and logging
 */
export function assembleRoadNetwork(
  store: OsmStore,
  options?: RoadNetworkOptions
): RoadNetwork {
  const opts = resolveRoadNetworkOptions(options);
  const log = opts.log;

  const { boundaries } = findIntersections(store.ways);
  log(`Found ${boundaries.size} intersections`);

  const segments = segmentWays(store.ways, store.nodes, boundaries, opts);
  log(`Created ${segments.length} road segments`);

  const allocator = new RoadIdAllocator();
  const roads = segments.map(({ segment }) => Road.fromSegment(segment, allocator));
  const { metadata, nodeIndex, idMap } = rekeySegments(segments, roads);

  const connectionsCreated = buildConnections(roads, metadata, nodeIndex);
  log(`Created ${connectionsCreated} connections`);

  return {
    roads,
    metadata,
    nodeIndex,
    idMap,
    stats: {
      nodesRead: store.nodes.size,
      waysRead: store.ways.length,
      intersectionsFound: boundaries.size,
      roadSegmentsCreated: segments.length,
      connectionsCreated,
    },
  };
}

/**
 * Build the road network from a stream of OSM elements.
 *
 * @param elements - Async iterable of OSM nodes and ways, in any order
 * @param options - Default tables and logging
 */
export async function buildRoadNetwork(
  elements: AsyncIterable<OsmNode | OsmWay>,
  options?: RoadNetworkOptions
): Promise<RoadNetwork> {
  const store = await collectOsmElements(elements);
  const { log } = resolveRoadNetworkOptions(options);
  log(`Parsed ${store.nodes.size} nodes, ${store.ways.length} ways`);
  return assembleRoadNetwork(store, options);
}
