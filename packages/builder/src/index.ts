/**
 * @lanegraph/builder
 *
 * Imports OpenStreetMap road data into a lane-aware road network for
 * traffic simulation.
 *
 * Pipeline:
 * 1. Read OSM XML (or query Overpass) -> nodes and ways
 * 2. Find intersections and split ways into directional segments
 * 3. Create roads with sequential ids, re-key segments to them
 * 4. Connect roads at shared nodes
 * 5. Write the network document (JSON)
 */

// Errors
export {
  OsmFileError,
  OsmParseError,
  UnsupportedFormatError,
  NetworkFileError,
  RoadIdMismatchError,
} from "./errors.js";

// Ingestion
export {
  importOsmFile,
  importFromOverpass,
  type ImportResult,
  type OverpassImportOptions,
} from "./ingestion/index.js";

// OSM parsing
export {
  parseOsmXml,
  assertXmlInput,
  extractOneWay,
  isReverseOneWay,
  parseMaxSpeed,
  extractMaxSpeed,
  extractLanes,
  extractName,
  toRoadWay,
  type OsmNode,
  type OsmWay,
  type OsmElement,
  type OsmTags,
  type RoadWay,
  type RoadHighway,
  ROAD_HIGHWAYS,
  isRoadHighway,
} from "./ingestion/osm/index.js";

// Overpass API
export {
  buildOverpassQuery,
  fetchOverpassData,
  parseOverpassResponse,
  DEFAULT_OVERPASS_ENDPOINT,
  type OverpassOptions,
} from "./ingestion/overpass/index.js";

// Network construction
export {
  buildRoadNetwork,
  assembleRoadNetwork,
  type RoadNetwork,
  DEFAULT_LANES,
  DEFAULT_SPEEDS,
  DEFAULT_ROAD_NETWORK_OPTIONS,
  resolveRoadNetworkOptions,
  type RoadNetworkOptions,
  haversineDistance,
  calculatePathLength,
  EARTH_RADIUS_METERS,
  collectOsmElements,
  type OsmStore,
  findIntersections,
  countNodeUsage,
  type IntersectionResult,
  segmentWay,
  segmentWays,
  inferLanes,
  inferMaxSpeed,
  type SyntheticSegment,
  type SegmenterOptions,
  syntheticRoadId,
  decodeSyntheticRoadId,
  RoadIdAllocator,
  rekeySegments,
  type RekeyedSegments,
  buildNodeIndex,
  roadsStartingAt,
  Road,
  type RoadAttributes,
  buildConnections,
} from "./network/index.js";

// Export / load
export {
  computeNetworkBbox,
  toNetworkDocument,
  writeNetworkJson,
  NETWORK_DOCUMENT_VERSION,
  DEFAULT_NETWORK_NAME,
  loadNetwork,
  getNetworkInfo,
  type LoadedNetwork,
} from "./export/index.js";

// CLI
export { runCli, type CliOptions } from "./cli.js";
