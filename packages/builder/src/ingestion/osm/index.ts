/**
 * OSM parsing module.
 *
 * Streams OSM XML into nodes and ways and interprets way tags as roads.
 */

export { parseOsmXml, assertXmlInput } from "./parser.js";
export {
  extractOneWay,
  isReverseOneWay,
  parseMaxSpeed,
  extractMaxSpeed,
  extractLanes,
  extractName,
  toRoadWay,
} from "./tag-extractors.js";
export {
  type OsmNode,
  type OsmWay,
  type OsmElement,
  type OsmTags,
  type RoadWay,
  type RoadHighway,
  ROAD_HIGHWAYS,
  isRoadHighway,
} from "./types.js";
