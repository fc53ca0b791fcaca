/**
 * Overpass API ingestion module.
 *
 * An alternative to file-based ingestion: queries the Overpass API for
 * the roads within a bounding box.
 */

export {
  buildOverpassQuery,
  fetchOverpassData,
  DEFAULT_OVERPASS_ENDPOINT,
  type OverpassOptions,
} from "./query.js";
export { parseOverpassResponse } from "./parser.js";
