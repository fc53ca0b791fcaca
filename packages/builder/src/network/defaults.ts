/**
 * Default road attributes by highway type, used when a way carries no
 * usable lanes or maxspeed tag.
 *
 * Speeds follow typical German urban limits.
 */

import type { RoadHighway } from "../ingestion/osm/types.js";

/** Default max speed per highway type, in m/s */
export const DEFAULT_SPEEDS: Readonly<Record<RoadHighway, number>> = Object.freeze({
  motorway: 33.3, // 120 km/h
  motorway_link: 22.2, // 80 km/h
  trunk: 27.8, // 100 km/h
  trunk_link: 16.7, // 60 km/h
  primary: 13.9, // 50 km/h
  primary_link: 11.1, // 40 km/h
  secondary: 13.9,
  secondary_link: 11.1,
  tertiary: 13.9,
  tertiary_link: 11.1,
  residential: 8.3, // 30 km/h
  living_street: 5.6, // 20 km/h
  unclassified: 13.9,
  service: 5.6,
});

/** Default lane count per highway type (per direction of travel) */
export const DEFAULT_LANES: Readonly<Record<RoadHighway, number>> = Object.freeze({
  motorway: 3,
  motorway_link: 1,
  trunk: 2,
  trunk_link: 1,
  primary: 2,
  primary_link: 1,
  secondary: 2,
  secondary_link: 1,
  tertiary: 1,
  tertiary_link: 1,
  residential: 1,
  living_street: 1,
  unclassified: 1,
  service: 1,
});

/** Options for road network construction */
export interface RoadNetworkOptions {
  /** Lane counts by highway type; missing types fall back to 1 */
  laneDefaults?: Partial<Record<RoadHighway, number>>;
  /** Max speeds (m/s) by highway type; missing types use fallbackSpeed */
  speedDefaults?: Partial<Record<RoadHighway, number>>;
  /** Max speed (m/s) when neither tag nor table gives one */
  fallbackSpeed?: number;
  /** Segments shorter than this are stretched to it (meters) */
  minSegmentLength?: number;
  /** Progress logger; defaults to console.log */
  log?: (message: string) => void;
}

/** Default options for road network construction */
export const DEFAULT_ROAD_NETWORK_OPTIONS: Readonly<Required<RoadNetworkOptions>> = Object.freeze({
  laneDefaults: DEFAULT_LANES,
  speedDefaults: DEFAULT_SPEEDS,
  fallbackSpeed: 13.9, // 50 km/h
  minSegmentLength: 1.0,
  log: (message: string) => console.log(`[import] ${message}`),
});

/**
 * Merge options over the defaults. Keys set to undefined keep the default.
 */
export function resolveRoadNetworkOptions(
  options?: RoadNetworkOptions
): Required<RoadNetworkOptions> {
  const d = DEFAULT_ROAD_NETWORK_OPTIONS;
  return {
    laneDefaults: options?.laneDefaults ?? d.laneDefaults,
    speedDefaults: options?.speedDefaults ?? d.speedDefaults,
    fallbackSpeed: options?.fallbackSpeed ?? d.fallbackSpeed,
    minSegmentLength: options?.minSegmentLength ?? d.minSegmentLength,
    log: options?.log ?? d.log,
  };
}
