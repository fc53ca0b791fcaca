/**
 * Data ingestion module.
 *
 * Responsible for building the road network from OSM data.
 *
 * Pipeline:
 * OSM XML file / Overpass API -> OsmNode/OsmWay stream -> RoadNetwork
 */

import type { BoundingBox } from "@lanegraph/types";
import { buildRoadNetwork, type RoadNetwork, type RoadNetworkOptions } from "../network/index.js";
import { parseOsmXml } from "./osm/index.js";
import { fetchOverpassData, parseOverpassResponse } from "./overpass/index.js";
import type { OverpassOptions } from "./overpass/index.js";

/** Result of an import run */
export interface ImportResult {
  network: RoadNetwork;
  /** Wall-clock time of the whole run */
  importTimeMs: number;
}

/** Options for importing from the Overpass API */
export interface OverpassImportOptions extends RoadNetworkOptions {
  overpass?: OverpassOptions;
}

/**
 * Import an OSM XML file and build the road network.
 *
 * @param osmPath - Path to the .osm file
 * @param options - Default tables and logging
 * @throws UnsupportedFormatError, OsmFileError or OsmParseError
 */
export async function importOsmFile(
  osmPath: string,
  options?: RoadNetworkOptions
): Promise<ImportResult> {
  const startTime = Date.now();

  const network = await buildRoadNetwork(parseOsmXml(osmPath), options);

  return { network, importTimeMs: Date.now() - startTime };
}

/**
 * Import the roads of a bounding box from the Overpass API.
 *
 * The Overpass equivalent of `importOsmFile()`: the response is turned
 * into the same element stream and goes through `buildRoadNetwork()`.
 *
 * @param bbox - Bounding box to query
 * @param options - Overpass API options plus network options
 */
export async function importFromOverpass(
  bbox: BoundingBox,
  options: OverpassImportOptions = {}
): Promise<ImportResult> {
  const startTime = Date.now();
  const { overpass, ...networkOptions } = options;

  const data = await fetchOverpassData(bbox, overpass);
  const network = await buildRoadNetwork(parseOverpassResponse(data), networkOptions);

  return { network, importTimeMs: Date.now() - startTime };
}
