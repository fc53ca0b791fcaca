/**
 * Import an OSM XML file into a road network document.
 *
 * Usage: npx tsx scripts/import-osm.ts <input.osm> <output.json> [network-name]
 */
import { runCli } from "../src/cli.js";

process.exit(await runCli(process.argv.slice(2)));
