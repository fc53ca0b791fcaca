/**
 * OSM-specific types for parsing map data.
 *
 * These types represent the raw data from OSM before transformation
 * into road segments and roads.
 */

/** OSM tags as key-value pairs */
export type OsmTags = Record<string, string>;

/** A node from OSM - represents a point location */
export interface OsmNode {
  type: "node";
  id: number;
  lat: number;
  lon: number;
  tags?: OsmTags;
}

/** A way from OSM - represents a linear feature (road, path, etc.) */
export interface OsmWay {
  type: "way";
  id: number;
  /** Ordered list of node IDs that make up this way */
  refs: number[];
  tags?: OsmTags;
}

/** Union of the OSM element types the importer consumes */
export type OsmElement = OsmNode | OsmWay;

/**
 * A way that passed the road filter, with its tags already interpreted.
 */
export interface RoadWay {
  id: number;
  /** Node ids in direction of travel (reversed for oneway=-1) */
  nodeIds: number[];
  highway: RoadHighway;
  name?: string;
  oneWay: boolean;
  /** Explicit lane count, if tagged with a positive number */
  lanes?: number;
  /** Explicit max speed in m/s, if tagged with a positive value */
  maxSpeed?: number;
}

/**
 * Highway tag values imported as drivable roads.
 *
 * Footways, cycleways, tracks and the like are skipped; the simulator
 * only moves motor vehicles.
 */
export const ROAD_HIGHWAYS = [
  "motorway",
  "motorway_link",
  "trunk",
  "trunk_link",
  "primary",
  "primary_link",
  "secondary",
  "secondary_link",
  "tertiary",
  "tertiary_link",
  "residential",
  "living_street",
  "unclassified",
  "service",
] as const;

export type RoadHighway = (typeof ROAD_HIGHWAYS)[number];

const ROAD_HIGHWAY_SET: ReadonlySet<string> = new Set(ROAD_HIGHWAYS);

/**
 * Check if a highway tag value is one we import.
 */
export function isRoadHighway(highway: string | undefined): highway is RoadHighway {
  if (!highway) return false;
  return ROAD_HIGHWAY_SET.has(highway);
}
