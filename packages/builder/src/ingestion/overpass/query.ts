/**
 * Overpass API query construction and execution.
 *
 * Generates Overpass QL queries for drivable roads and fetches results
 * via the overpass-ts client.
 */

import type { BoundingBox } from "@lanegraph/types";
import { overpassJson } from "overpass-ts";
import type { OverpassJson, OverpassOptions as OverpassTsOptions } from "overpass-ts";
import { ROAD_HIGHWAYS } from "../osm/types.js";

/** Options for Overpass API requests */
export interface OverpassOptions {
  /** Overpass API endpoint URL (for self-hosted instances) */
  endpoint?: string;
  /** Query timeout in seconds (default: 90) */
  timeout?: number;
  /** User-agent string */
  userAgent?: string;
}

export const DEFAULT_OVERPASS_ENDPOINT = "https://overpass-api.de/api/interpreter";
const DEFAULT_TIMEOUT = 90;

/**
 * Build an Overpass QL query for the road ways within a bbox.
 *
 * Uses `out body geom;` to get inline geometry on ways, so node
 * coordinates come with the ways instead of a second query.
 *
 * @param bbox - Bounding box (WGS84)
 * @param timeout - Query timeout in seconds
 * @returns Overpass QL query string
 */
export function buildOverpassQuery(
  bbox: BoundingBox,
  timeout: number = DEFAULT_TIMEOUT
): string {
  // Overpass bbox format: (south, west, north, east)
  const bboxStr = `${bbox.minLat},${bbox.minLng},${bbox.maxLat},${bbox.maxLng}`;
  const highwayRegex = `^(${ROAD_HIGHWAYS.join("|")})$`;

  return `[out:json][timeout:${timeout}];
(
  way["highway"~"${highwayRegex}"](${bboxStr});
);
out body geom;`;
}

/**
 * Fetch road data from the Overpass API for a bounding box.
 *
 * @param bbox - Bounding box to query
 * @param options - API options (endpoint, timeout, user agent)
 * @returns Overpass JSON response
 */
export async function fetchOverpassData(
  bbox: BoundingBox,
  options?: OverpassOptions
): Promise<OverpassJson> {
  const query = buildOverpassQuery(bbox, options?.timeout ?? DEFAULT_TIMEOUT);

  const overpassOpts: Partial<OverpassTsOptions> = {
    endpoint: options?.endpoint ?? DEFAULT_OVERPASS_ENDPOINT,
  };
  if (options?.userAgent) {
    overpassOpts.userAgent = options.userAgent;
  }

  return overpassJson(query, overpassOpts);
}
