/**
 * Network document loading.
 *
 * Reads a document written by writeNetworkJson() back into roads, so a
 * simulation can start from an imported network without re-importing.
 */

import { readFileSync } from "node:fs";
import type { Coordinate, NetworkInfo, RoadId } from "@lanegraph/types";
import { NetworkFileError } from "../errors.js";
import { Road } from "../network/road.js";

/** A network read back from disk */
export interface LoadedNetwork {
  name: string;
  version: string;
  /** Roads in document order, connections attached */
  roads: Road[];
  /** Endpoints of roads whose record carries coordinates */
  endpoints: Map<RoadId, { start: Coordinate; end: Coordinate }>;
}

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readDocument(jsonPath: string): JsonObject {
  let raw: string;
  try {
    raw = readFileSync(jsonPath, "utf-8");
  } catch (error) {
    throw new NetworkFileError(`Cannot open network file: ${jsonPath}`, { cause: error });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new NetworkFileError(`JSON parse error in ${jsonPath}: ${reason}`, { cause: error });
  }

  if (!isJsonObject(data)) {
    throw new NetworkFileError(`Invalid network file: ${jsonPath} is not a JSON object`);
  }
  return data;
}

function requireNumber(record: JsonObject, key: string, context: string): number {
  const value = record[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new NetworkFileError(`Invalid network file: ${context} has no numeric '${key}'`);
  }
  return value;
}

function optionalNumber(record: JsonObject, key: string): number | undefined {
  const value = record[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function optionalString(record: JsonObject, key: string): string {
  const value = record[key];
  return typeof value === "string" ? value : "";
}

function readEndpoints(record: JsonObject): { start: Coordinate; end: Coordinate } | undefined {
  const startLat = optionalNumber(record, "startLat");
  const startLon = optionalNumber(record, "startLon");
  const endLat = optionalNumber(record, "endLat");
  const endLon = optionalNumber(record, "endLon");
  if (
    startLat === undefined ||
    startLon === undefined ||
    endLat === undefined ||
    endLon === undefined
  ) {
    return undefined;
  }
  return { start: { lat: startLat, lng: startLon }, end: { lat: endLat, lng: endLon } };
}

/**
 * Attach the connections of one road record.
 *
 * A connection with a lane goes to that lane only; one without a lane is
 * attached to every lane. Missing probabilities count as 1.
 */
function attachConnections(road: Road, record: JsonObject): void {
  const connections = record["connections"];
  if (!Array.isArray(connections)) return;

  for (const connection of connections) {
    if (!isJsonObject(connection)) {
      throw new NetworkFileError(`Invalid network file: road ${road.id} has a malformed connection`);
    }
    const targetId = requireNumber(connection, "roadId", `a connection of road ${road.id}`);
    const probability = optionalNumber(connection, "probability") ?? 1.0;
    const lane = optionalNumber(connection, "lane");

    if (lane === undefined) {
      for (let l = 0; l < road.lanes; l++) {
        road.addLaneConnection(l, targetId, probability);
      }
    } else if (Number.isInteger(lane) && lane >= 0 && lane < road.lanes) {
      road.addLaneConnection(lane, targetId, probability);
    } else {
      throw new NetworkFileError(
        `Invalid network file: road ${road.id} has a connection on lane ${lane} of ${road.lanes}`
      );
    }
  }
}

/**
 * Load a road network from a JSON network document.
 *
 * @param jsonPath - Path to the document
 * @throws NetworkFileError if the file is unreadable or malformed
 */
export function loadNetwork(jsonPath: string): LoadedNetwork {
  const data = readDocument(jsonPath);

  const roadRecords = data["roads"];
  if (!Array.isArray(roadRecords)) {
    throw new NetworkFileError("Invalid network file: missing 'roads' array");
  }

  const roads: Road[] = [];
  const endpoints = new Map<RoadId, { start: Coordinate; end: Coordinate }>();
  const records: JsonObject[] = [];

  // First pass: create all roads, so connections may point forward
  roadRecords.forEach((record: unknown, index) => {
    if (!isJsonObject(record)) {
      throw new NetworkFileError(`Invalid network file: road #${index} is not an object`);
    }
    const context = `road #${index}`;
    const road = new Road(requireNumber(record, "id", context), {
      lengthMeters: requireNumber(record, "length", context),
      lanes: requireNumber(record, "lanes", context),
      maxSpeed: requireNumber(record, "maxSpeed", context),
    });

    const roadEndpoints = readEndpoints(record);
    if (roadEndpoints) endpoints.set(road.id, roadEndpoints);

    roads.push(road);
    records.push(record);
  });

  // Second pass: connections
  roads.forEach((road, index) => {
    const record = records[index];
    if (record) attachConnections(road, record);
  });

  return {
    name: optionalString(data, "name"),
    version: optionalString(data, "version"),
    roads,
    endpoints,
  };
}

/**
 * Read the header metadata of a network document without building roads.
 *
 * Missing fields read as empty strings and zeros.
 *
 * @throws NetworkFileError if the file is unreadable or not a JSON object
 */
export function getNetworkInfo(jsonPath: string): NetworkInfo {
  const data = readDocument(jsonPath);

  const bbox = { minLat: 0, maxLat: 0, minLng: 0, maxLng: 0 };
  const rawBbox = data["bbox"];
  if (Array.isArray(rawBbox) && rawBbox.length >= 4) {
    const [minLon, minLat, maxLon, maxLat]: unknown[] = rawBbox;
    if (
      typeof minLon === "number" &&
      typeof minLat === "number" &&
      typeof maxLon === "number" &&
      typeof maxLat === "number"
    ) {
      bbox.minLng = minLon;
      bbox.minLat = minLat;
      bbox.maxLng = maxLon;
      bbox.maxLat = maxLat;
    }
  }

  const rawStats = data["stats"];
  const stats: JsonObject = isJsonObject(rawStats) ? rawStats : {};

  return {
    name: optionalString(data, "name"),
    version: optionalString(data, "version"),
    bbox,
    totalRoads: optionalNumber(stats, "totalRoads") ?? 0,
    totalIntersections: optionalNumber(stats, "totalIntersections") ?? 0,
    totalConnections: optionalNumber(stats, "totalConnections") ?? 0,
  };
}
