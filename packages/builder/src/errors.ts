/**
 * Errors that abort an import run.
 *
 * Data-quality problems inside the map (missing nodes, odd tag values,
 * unusable ways) are not errors; they are skipped where they occur.
 */

/** The OSM input file could not be opened or read */
export class OsmFileError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "OsmFileError";
  }
}

/** The OSM input is not well-formed XML */
export class OsmParseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "OsmParseError";
  }
}

/** The input uses a format variant the importer does not read */
export class UnsupportedFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnsupportedFormatError";
  }
}

/** A network document could not be read or has the wrong shape */
export class NetworkFileError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "NetworkFileError";
  }
}

/** Road entities no longer line up one-to-one with the segments they came from */
export class RoadIdMismatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RoadIdMismatchError";
  }
}
