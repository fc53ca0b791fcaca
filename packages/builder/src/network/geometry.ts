/**
 * Great-circle distance helpers.
 */

import type { Coordinate } from "@lanegraph/types";

/** Earth's radius in meters */
export const EARTH_RADIUS_METERS = 6371000;

/**
 * Calculate distance between two coordinates using Haversine formula.
 *
 * @param a - First coordinate
 * @param b - Second coordinate
 * @returns Distance in meters
 */
export function haversineDistance(a: Coordinate, b: Coordinate): number {
  const lat1 = (a.lat * Math.PI) / 180;
  const lat2 = (b.lat * Math.PI) / 180;
  const dLat = ((b.lat - a.lat) * Math.PI) / 180;
  const dLng = ((b.lng - a.lng) * Math.PI) / 180;

  const sinDLat = Math.sin(dLat / 2);
  const sinDLng = Math.sin(dLng / 2);

  const h =
    sinDLat * sinDLat + Math.cos(lat1) * Math.cos(lat2) * sinDLng * sinDLng;

  return 2 * EARTH_RADIUS_METERS * Math.asin(Math.sqrt(h));
}

/**
 * Calculate the length of a path in meters.
 *
 * Unresolved points (undefined) break the path: the pairs on either side
 * of them contribute nothing.
 */
export function calculatePathLength(coords: (Coordinate | undefined)[]): number {
  let total = 0;
  for (let i = 0; i < coords.length - 1; i++) {
    const a = coords[i];
    const b = coords[i + 1];
    if (a && b) {
      total += haversineDistance(a, b);
    }
  }
  return total;
}
