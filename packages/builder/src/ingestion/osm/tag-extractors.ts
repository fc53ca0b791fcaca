/**
 * Extract road attributes from OSM tags.
 *
 * These functions convert OSM's tag key-value pairs into the values a
 * road segment carries (direction, lanes, speed, name).
 */

import type { OsmTags, OsmWay, RoadWay } from "./types.js";
import { isRoadHighway } from "./types.js";

/** km/h -> m/s */
const KMH_TO_MPS = 1 / 3.6;

/** mph -> m/s */
const MPH_TO_MPS = 0.44704;

/**
 * Extract one-way information from OSM tags.
 *
 * Handles:
 * - oneway=yes|true|1
 * - oneway=-1|reverse (one-way against the drawing direction)
 * - junction=roundabout (implicit one-way)
 *
 * @param tags - OSM tags object
 * @returns true if one-way, false if bidirectional
 */
export function extractOneWay(tags: OsmTags | undefined): boolean {
  if (!tags) return false;

  const oneway = tags["oneway"];

  if (tags["junction"] === "roundabout") return true;
  if (oneway === "yes" || oneway === "true" || oneway === "1") return true;
  if (oneway === "-1" || oneway === "reverse") return true;

  return false;
}

/**
 * Check if a way has reverse one-way direction.
 * Used when normalizing ways so the node order follows traffic.
 */
export function isReverseOneWay(tags: OsmTags | undefined): boolean {
  if (!tags) return false;
  const oneway = tags["oneway"];
  return oneway === "-1" || oneway === "reverse";
}

/**
 * Parse a maxspeed tag value into m/s.
 *
 * Accepts a leading number, read as km/h unless the value mentions "mph":
 * - "50" -> 13.89
 * - "50 km/h" -> 13.89
 * - "30 mph" -> 13.41
 *
 * @returns Speed in m/s, or undefined for empty, non-numeric or non-positive values
 */
export function parseMaxSpeed(maxspeed: string | undefined): number | undefined {
  if (!maxspeed) return undefined;

  const match = maxspeed.trim().match(/^\d+(?:\.\d+)?/);
  if (!match) return undefined;

  const value = parseFloat(match[0]);
  if (isNaN(value) || value <= 0) return undefined;

  if (maxspeed.toLowerCase().includes("mph")) {
    return value * MPH_TO_MPS;
  }
  return value * KMH_TO_MPS;
}

/**
 * Extract speed limit from OSM tags.
 *
 * @param tags - OSM tags object
 * @returns Speed limit in m/s, or undefined if not usable
 */
export function extractMaxSpeed(tags: OsmTags | undefined): number | undefined {
  return parseMaxSpeed(tags?.["maxspeed"]);
}

/**
 * Extract lane count from OSM tags.
 *
 * @param tags - OSM tags object
 * @returns Number of lanes, or undefined if missing, non-numeric or not positive
 */
export function extractLanes(tags: OsmTags | undefined): number | undefined {
  const lanesTag = tags?.["lanes"];
  if (!lanesTag) return undefined;

  const lanes = parseInt(lanesTag, 10);
  return isNaN(lanes) || lanes <= 0 ? undefined : lanes;
}

/**
 * Extract road name from OSM tags.
 *
 * Prefers name, falls back to ref (road number) or official_name.
 *
 * @param tags - OSM tags object
 * @returns Name string or undefined
 */
export function extractName(tags: OsmTags | undefined): string | undefined {
  if (!tags) return undefined;
  return tags["name"] ?? tags["ref"] ?? tags["official_name"];
}

/**
 * Interpret a raw OSM way as a road.
 *
 * @returns The normalized way, or undefined if it is not an importable road
 *   (unknown highway type or fewer than two nodes)
 */
export function toRoadWay(way: OsmWay): RoadWay | undefined {
  const highway = way.tags?.["highway"];
  if (!isRoadHighway(highway)) return undefined;
  if (way.refs.length < 2) return undefined;

  const nodeIds = isReverseOneWay(way.tags) ? [...way.refs].reverse() : [...way.refs];

  return {
    id: way.id,
    nodeIds,
    highway,
    name: extractName(way.tags),
    oneWay: extractOneWay(way.tags),
    lanes: extractLanes(way.tags),
    maxSpeed: extractMaxSpeed(way.tags),
  };
}
