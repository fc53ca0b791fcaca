/**
 * import-osm command line.
 *
 * Usage: import-osm <input.osm> <output.json> [network-name]
 */

import { writeNetworkJson, DEFAULT_NETWORK_NAME } from "./export/index.js";
import { importOsmFile } from "./ingestion/index.js";
import type { RoadNetworkOptions } from "./network/index.js";

/** Output sinks, replaceable for tests */
export interface CliOptions {
  /** Standard output; defaults to console.log */
  out?: (line: string) => void;
  /** Error output; defaults to console.error */
  err?: (line: string) => void;
  /** Pipeline progress logger */
  log?: RoadNetworkOptions["log"];
}

function printUsage(out: (line: string) => void): void {
  out("Usage: import-osm <input.osm> <output.json> [network-name]");
  out("");
  out("Arguments:");
  out("  input.osm     Path to OpenStreetMap XML file");
  out("  output.json   Path for output JSON network file");
  out(`  network-name  Optional name for the network (default: '${DEFAULT_NETWORK_NAME}')`);
}

/**
 * Run the importer with command line arguments.
 *
 * @param args - Arguments after the program name
 * @returns Process exit code
 */
export async function runCli(args: readonly string[], options: CliOptions = {}): Promise<number> {
  const out = options.out ?? console.log;
  const err = options.err ?? console.error;

  const [inputPath, outputPath, name = DEFAULT_NETWORK_NAME] = args;
  if (!inputPath || !outputPath) {
    printUsage(out);
    return 1;
  }

  out("=== OSM Import ===");
  out(`Input:  ${inputPath}`);
  out(`Output: ${outputPath}`);
  out(`Name:   ${name}`);
  out("");

  const startTime = Date.now();
  try {
    const { network } = await importOsmFile(inputPath, { log: options.log });
    writeNetworkJson(network, outputPath, name);

    const { stats } = network;
    out("");
    out("=== Import Complete ===");
    out(`  OSM nodes read:      ${stats.nodesRead}`);
    out(`  OSM ways read:       ${stats.waysRead}`);
    out(`  Intersections found: ${stats.intersectionsFound}`);
    out(`  Road segments:       ${stats.roadSegmentsCreated}`);
    out(`  Connections:         ${stats.connectionsCreated}`);
    out(`  Time elapsed:        ${Date.now() - startTime} ms`);
    out("");
    out(`Output saved to: ${outputPath}`);
    return 0;
  } catch (error) {
    err(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}
