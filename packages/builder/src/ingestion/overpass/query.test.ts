import { describe, it, expect, vi, beforeEach } from "vitest";
import { buildOverpassQuery, fetchOverpassData, DEFAULT_OVERPASS_ENDPOINT } from "./query.js";
import { ROAD_HIGHWAYS } from "../osm/types.js";

vi.mock("overpass-ts", () => ({
  overpassJson: vi.fn(),
}));

import { overpassJson } from "overpass-ts";

describe("buildOverpassQuery", () => {
  const bbox = { minLat: 48.15, maxLat: 48.17, minLng: 11.56, maxLng: 11.6 };

  it("includes all road highway types in regex", () => {
    const query = buildOverpassQuery(bbox);

    for (const highway of ROAD_HIGHWAYS) {
      expect(query).toContain(highway);
    }
  });

  it("formats bbox as south,west,north,east", () => {
    const query = buildOverpassQuery(bbox);
    expect(query).toContain("(48.15,11.56,48.17,11.6)");
  });

  it("requests JSON output with inline geometry", () => {
    const query = buildOverpassQuery(bbox);
    expect(query).toContain("[out:json]");
    expect(query).toContain("out body geom;");
  });

  it("does not query signal or crossing nodes", () => {
    const query = buildOverpassQuery(bbox);
    expect(query).not.toContain("traffic_signals");
    expect(query).not.toContain("node[");
  });

  it("uses default timeout of 90", () => {
    expect(buildOverpassQuery(bbox)).toContain("[timeout:90]");
  });

  it("respects custom timeout", () => {
    expect(buildOverpassQuery(bbox, 120)).toContain("[timeout:120]");
  });
});

describe("fetchOverpassData", () => {
  const bbox = { minLat: 48.15, maxLat: 48.17, minLng: 11.56, maxLng: 11.6 };
  const mockResponse = {
    version: 0.6,
    generator: "test",
    osm3s: { timestamp_osm_base: "2024-01-01T00:00:00Z", copyright: "test" },
    elements: [],
  };
  const mockedOverpassJson = vi.mocked(overpassJson);

  beforeEach(() => {
    mockedOverpassJson.mockReset();
    mockedOverpassJson.mockResolvedValue(mockResponse);
  });

  it("returns the API response", async () => {
    const data = await fetchOverpassData(bbox);
    expect(data).toEqual(mockResponse);
    expect(mockedOverpassJson).toHaveBeenCalledOnce();
  });

  it("sends the built query to the default endpoint", async () => {
    await fetchOverpassData(bbox);
    expect(mockedOverpassJson).toHaveBeenCalledWith(buildOverpassQuery(bbox, 90), {
      endpoint: DEFAULT_OVERPASS_ENDPOINT,
    });
  });

  it("passes endpoint, timeout and user agent through", async () => {
    await fetchOverpassData(bbox, {
      endpoint: "http://localhost:12345/api/interpreter",
      timeout: 30,
      userAgent: "lanegraph-test",
    });
    expect(mockedOverpassJson).toHaveBeenCalledWith(buildOverpassQuery(bbox, 30), {
      endpoint: "http://localhost:12345/api/interpreter",
      userAgent: "lanegraph-test",
    });
  });
});
