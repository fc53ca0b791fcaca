/**
 * OSM XML file parser.
 *
 * Streams an .osm file through sax and yields OSM nodes and ways as they
 * close, so the graph builder pulls records without knowing the format.
 */

import { createReadStream } from "node:fs";
import sax from "sax";
import type { QualifiedTag, Tag } from "sax";
import { OsmFileError, OsmParseError, UnsupportedFormatError } from "../../errors.js";
import type { OsmNode, OsmTags, OsmWay } from "./types.js";

/** Extensions of binary or compressed OSM formats */
const UNSUPPORTED_EXTENSIONS = [".pbf", ".o5m", ".gz", ".bz2", ".zip"];

/**
 * Reject input paths that are not plain OSM XML.
 *
 * @throws UnsupportedFormatError for PBF and compressed files
 */
export function assertXmlInput(osmPath: string): void {
  const lower = osmPath.toLowerCase();
  const ext = UNSUPPORTED_EXTENSIONS.find((e) => lower.endsWith(e));
  if (ext) {
    throw new UnsupportedFormatError(
      `${ext} input is not supported: ${osmPath}. Please use .osm XML format.`
    );
  }
}

function readAttr(tag: Tag | QualifiedTag, key: string): string | undefined {
  const value = tag.attributes[key];
  if (value === undefined) return undefined;
  return typeof value === "string" ? value : value.value;
}

function readNumberAttr(tag: Tag | QualifiedTag, key: string): number | undefined {
  const raw = readAttr(tag, key);
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Parse an OSM XML file and yield nodes and ways in document order.
 *
 * Relations, bounds and any other elements are ignored. Nodes without a
 * numeric id or coordinates, and ways without a numeric id, are skipped.
 *
 * @param osmPath - Path to the .osm file
 * @yields OsmNode and OsmWay elements
 * @throws UnsupportedFormatError, OsmFileError or OsmParseError
 */
export async function* parseOsmXml(osmPath: string): AsyncGenerator<OsmNode | OsmWay> {
  assertXmlInput(osmPath);

  const parser = sax.parser(true, { trim: true });
  const ready: (OsmNode | OsmWay)[] = [];
  let current: OsmNode | OsmWay | undefined;
  let currentTags: OsmTags = {};
  const state: { error?: Error } = {};

  parser.onopentag = (tag) => {
    switch (tag.name) {
      case "node": {
        const id = readNumberAttr(tag, "id");
        const lat = readNumberAttr(tag, "lat");
        const lon = readNumberAttr(tag, "lon");
        current =
          id !== undefined && lat !== undefined && lon !== undefined
            ? { type: "node", id, lat, lon }
            : undefined;
        currentTags = {};
        break;
      }
      case "way": {
        const id = readNumberAttr(tag, "id");
        current = id !== undefined ? { type: "way", id, refs: [] } : undefined;
        currentTags = {};
        break;
      }
      case "nd": {
        const ref = readNumberAttr(tag, "ref");
        if (current?.type === "way" && ref !== undefined) {
          current.refs.push(ref);
        }
        break;
      }
      case "tag": {
        const k = readAttr(tag, "k");
        const v = readAttr(tag, "v");
        if (current && k !== undefined && v !== undefined) {
          currentTags[k] = v;
        }
        break;
      }
    }
  };

  parser.onclosetag = (name) => {
    if ((name === "node" || name === "way") && current?.type === name) {
      if (Object.keys(currentTags).length > 0) {
        current.tags = currentTags;
      }
      ready.push(current);
      current = undefined;
    }
  };

  parser.onerror = (err) => {
    state.error = err;
  };

  const stream = createReadStream(osmPath, { encoding: "utf8" });
  try {
    for await (const chunk of stream) {
      parser.write(String(chunk));
      if (state.error) break;
      yield* ready.splice(0);
    }
  } catch (error) {
    throw new OsmFileError(`Cannot open OSM file: ${osmPath}`, { cause: error });
  } finally {
    stream.destroy();
  }

  if (!state.error) {
    parser.close();
  }
  if (state.error) {
    throw new OsmParseError(`XML parse error in ${osmPath}: ${state.error.message}`, {
      cause: state.error,
    });
  }

  yield* ready.splice(0);
}
