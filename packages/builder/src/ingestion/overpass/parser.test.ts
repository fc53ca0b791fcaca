import { describe, it, expect } from "vitest";
import { parseOverpassResponse } from "./parser.js";
import { buildRoadNetwork } from "../../network/index.js";
import type { OverpassJson } from "overpass-ts";

/** Collect all elements from an async generator */
async function collectAll<T>(gen: AsyncGenerator<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of gen) {
    items.push(item);
  }
  return items;
}

function makeOverpassResponse(
  elements: OverpassJson["elements"]
): OverpassJson {
  return {
    version: 0.6,
    generator: "test",
    osm3s: {
      timestamp_osm_base: "2024-01-01T00:00:00Z",
      copyright: "test",
    },
    elements,
  };
}

describe("parseOverpassResponse", () => {
  it("converts Overpass nodes to OsmNode", async () => {
    const response = makeOverpassResponse([
      { type: "node", id: 123, lat: 42.96, lon: -85.66, tags: { crossing: "zebra" } },
    ]);

    const elements = await collectAll(parseOverpassResponse(response));

    expect(elements).toEqual([
      { type: "node", id: 123, lat: 42.96, lon: -85.66, tags: { crossing: "zebra" } },
    ]);
  });

  it("converts Overpass ways to OsmWay with refs from nodes[]", async () => {
    const response = makeOverpassResponse([
      {
        type: "way",
        id: 100,
        nodes: [1, 2, 3],
        tags: { highway: "residential", name: "Main St" },
        geometry: [
          { lat: 42.96, lon: -85.66 },
          { lat: 42.961, lon: -85.66 },
          { lat: 42.962, lon: -85.66 },
        ],
      },
    ]);

    const elements = await collectAll(parseOverpassResponse(response));

    expect(elements).toHaveLength(4);
    expect(elements[3]).toEqual({
      type: "way",
      id: 100,
      refs: [1, 2, 3],
      tags: { highway: "residential", name: "Main St" },
    });
  });

  it("synthesizes nodes from way geometry, before the way", async () => {
    const response = makeOverpassResponse([
      {
        type: "way",
        id: 100,
        nodes: [10, 20],
        tags: { highway: "primary" },
        geometry: [
          { lat: 1.0, lon: 2.0 },
          { lat: 1.5, lon: 2.5 },
        ],
      },
    ]);

    const elements = await collectAll(parseOverpassResponse(response));

    expect(elements.map((e) => e.type)).toEqual(["node", "node", "way"]);
    expect(elements[0]).toEqual({ type: "node", id: 10, lat: 1.0, lon: 2.0 });
    expect(elements[1]).toEqual({ type: "node", id: 20, lat: 1.5, lon: 2.5 });
  });

  it("yields a node shared by two ways only once", async () => {
    const response = makeOverpassResponse([
      {
        type: "way",
        id: 100,
        nodes: [1, 2],
        tags: { highway: "residential" },
        geometry: [
          { lat: 0, lon: 0 },
          { lat: 0, lon: 0.001 },
        ],
      },
      {
        type: "way",
        id: 101,
        nodes: [2, 3],
        tags: { highway: "residential" },
        geometry: [
          { lat: 0, lon: 0.001 },
          { lat: 0, lon: 0.002 },
        ],
      },
    ]);

    const elements = await collectAll(parseOverpassResponse(response));
    const nodeIds = elements.filter((e) => e.type === "node").map((e) => e.id);

    expect(nodeIds).toEqual([1, 2, 3]);
  });

  it("does not re-synthesize nodes already given explicitly", async () => {
    const response = makeOverpassResponse([
      { type: "node", id: 1, lat: 5, lon: 6 },
      {
        type: "way",
        id: 100,
        nodes: [1, 2],
        tags: { highway: "tertiary" },
        geometry: [
          { lat: 0, lon: 0 },
          { lat: 0, lon: 0.001 },
        ],
      },
    ]);

    const elements = await collectAll(parseOverpassResponse(response));

    expect(elements.filter((e) => e.type === "node" && e.id === 1)).toEqual([
      { type: "node", id: 1, lat: 5, lon: 6, tags: undefined },
    ]);
  });

  it("skips ways that are not drivable roads", async () => {
    const response = makeOverpassResponse([
      {
        type: "way",
        id: 200,
        nodes: [1, 2],
        tags: { highway: "footway" },
        geometry: [
          { lat: 0, lon: 0 },
          { lat: 0, lon: 0.001 },
        ],
      },
    ]);

    const elements = await collectAll(parseOverpassResponse(response));
    expect(elements).toHaveLength(0);
  });

  it("handles empty response", async () => {
    const elements = await collectAll(parseOverpassResponse(makeOverpassResponse([])));
    expect(elements).toHaveLength(0);
  });

  it("feeds the road network builder", async () => {
    const response = makeOverpassResponse([
      {
        type: "way",
        id: 100,
        nodes: [1, 2, 3],
        tags: { highway: "primary" },
        geometry: [
          { lat: 0, lon: 0 },
          { lat: 0, lon: 0.001 },
          { lat: 0, lon: 0.002 },
        ],
      },
    ]);

    const network = await buildRoadNetwork(parseOverpassResponse(response), { log: () => {} });

    expect(network.stats.nodesRead).toBe(3);
    expect(network.stats.waysRead).toBe(1);
    // one span per direction
    expect(network.roads).toHaveLength(2);
  });
});
