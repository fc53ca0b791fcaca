export {
  toNetworkDocument,
  writeNetworkJson,
  computeNetworkBbox,
  NETWORK_DOCUMENT_VERSION,
  DEFAULT_NETWORK_NAME,
} from "./network-json.js";
export { loadNetwork, getNetworkInfo, type LoadedNetwork } from "./network-loader.js";
