/**
 * Network document export.
 *
 * Serializes a road network into the JSON document the simulator loads:
 * a header (name, version, bbox), one record per road with its lane
 * connections, and the run statistics.
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type {
  NetworkBbox,
  NetworkConnectionRecord,
  NetworkDocument,
  NetworkRoadRecord,
} from "@lanegraph/types";
import { NetworkFileError } from "../errors.js";
import type { RoadNetwork } from "../network/index.js";

/** Document format version */
export const NETWORK_DOCUMENT_VERSION = "1.0";

/** Network name used when none is given */
export const DEFAULT_NETWORK_NAME = "Imported Network";

/**
 * Bounding box over all segment endpoints, as [minLon, minLat, maxLon, maxLat].
 *
 * An empty network yields [0, 0, 0, 0].
 */
export function computeNetworkBbox(network: Pick<RoadNetwork, "metadata">): NetworkBbox {
  if (network.metadata.size === 0) return [0, 0, 0, 0];

  let minLat = Infinity,
    maxLat = -Infinity;
  let minLng = Infinity,
    maxLng = -Infinity;

  for (const segment of network.metadata.values()) {
    for (const point of [segment.start, segment.end]) {
      minLat = Math.min(minLat, point.lat);
      maxLat = Math.max(maxLat, point.lat);
      minLng = Math.min(minLng, point.lng);
      maxLng = Math.max(maxLng, point.lng);
    }
  }

  return [minLng, minLat, maxLng, maxLat];
}

/**
 * Build the network document for a road network.
 *
 * Connections are listed lane by lane, in the order they were attached.
 *
 * @param network - The assembled network
 * @param name - Network name written to the header
 */
export function toNetworkDocument(
  network: RoadNetwork,
  name: string = DEFAULT_NETWORK_NAME
): NetworkDocument {
  const roads: NetworkRoadRecord[] = [];

  for (const road of network.roads) {
    const segment = network.metadata.get(road.id);
    if (!segment) continue;

    const connections: NetworkConnectionRecord[] = [];
    road.connections.forEach((laneConnections, lane) => {
      for (const connection of laneConnections) {
        connections.push({
          roadId: connection.roadId,
          lane,
          probability: connection.probability,
        });
      }
    });

    roads.push({
      id: road.id,
      startLat: segment.start.lat,
      startLon: segment.start.lng,
      endLat: segment.end.lat,
      endLon: segment.end.lng,
      name: segment.name ?? "",
      osmWayId: segment.osmWayId,
      length: road.lengthMeters,
      lanes: road.lanes,
      maxSpeed: road.maxSpeed,
      connections,
    });
  }

  return {
    name,
    version: NETWORK_DOCUMENT_VERSION,
    bbox: computeNetworkBbox(network),
    roads,
    stats: {
      totalRoads: network.roads.length,
      totalIntersections: network.stats.intersectionsFound,
      totalConnections: network.stats.connectionsCreated,
      nodesRead: network.stats.nodesRead,
      waysRead: network.stats.waysRead,
      roadSegmentsCreated: network.stats.roadSegmentsCreated,
    },
  };
}

/**
 * Write a road network to a JSON file, creating parent directories.
 *
 * @throws NetworkFileError if the file cannot be written
 */
export function writeNetworkJson(
  network: RoadNetwork,
  outputPath: string,
  name: string = DEFAULT_NETWORK_NAME
): NetworkDocument {
  const document = toNetworkDocument(network, name);
  try {
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, JSON.stringify(document, null, 2) + "\n", "utf-8");
  } catch (error) {
    throw new NetworkFileError(`Cannot open output file: ${outputPath}`, { cause: error });
  }
  return document;
}
