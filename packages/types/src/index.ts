/**
 * @lanegraph/types
 *
 * Shared domain types for the lane-aware road network builder.
 *
 * - Geo: coordinates and bounding boxes
 * - Road: directional road segments and graph-level road records
 * - Network: the assembled network, run statistics and the persisted document
 */

export * from "./geo.js";
export * from "./road.js";
export * from "./network.js";
