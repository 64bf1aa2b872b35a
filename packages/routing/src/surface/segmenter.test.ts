import { describe, it, expect } from "vitest";
import type { LngLat, PathSegment, SurfaceRange } from "@surface-route/types";
import {
  assignSurfaceCodes,
  pathToLineString,
  segmentPath,
  splitIntoSegments,
} from "./segmenter.js";
import { surfaceTypeForCode } from "./surface-codes.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

/** A straight northbound line of `count` coordinates, 0.001° apart */
function northbound(count: number, start: LngLat = [33, -1]): LngLat[] {
  return Array.from({ length: count }, (_, i): LngLat => [start[0], start[1] + i * 0.001]);
}

function range(startIndex: number, endIndex: number, code: number): SurfaceRange {
  return { startIndex, endIndex, code };
}

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("surfaceTypeForCode", () => {
  it("maps known codes", () => {
    expect(surfaceTypeForCode(3)).toBe("Asphalt");
    expect(surfaceTypeForCode(8)).toBe("Compacted Gravel");
    expect(surfaceTypeForCode(18)).toBe("Grass Paver");
  });

  it("reads gaps in the table and missing codes as Unknown", () => {
    expect(surfaceTypeForCode(5)).toBe("Unknown");
    expect(surfaceTypeForCode(16)).toBe("Unknown");
    expect(surfaceTypeForCode(99)).toBe("Unknown");
    expect(surfaceTypeForCode(null)).toBe("Unknown");
  });
});

describe("splitIntoSegments", () => {
  it("returns n - 1 consecutive pairs", () => {
    expect(splitIntoSegments([1, 2, 3, 4])).toEqual([
      [1, 2],
      [2, 3],
      [3, 4],
    ]);
  });

  it("returns nothing for fewer than two items", () => {
    expect(splitIntoSegments([1])).toEqual([]);
    expect(splitIntoSegments([])).toEqual([]);
  });
});

describe("assignSurfaceCodes", () => {
  it("covers the segment bridging two adjacent ranges", () => {
    const codes = assignSurfaceCodes(20, [range(0, 10, 3), range(11, 20, 10)]);
    expect(codes.slice(0, 10)).toEqual(Array(10).fill(3));
    expect(codes.slice(10)).toEqual(Array(10).fill(10));
  });

  it("splits ranges sharing an endpoint at that coordinate", () => {
    const codes = assignSurfaceCodes(20, [range(0, 10, 3), range(10, 20, 10)]);
    expect(codes[9]).toBe(3);
    expect(codes[10]).toBe(10);
  });

  it("leaves segments touching no range Unknown", () => {
    // segment 2 starts on the range's last coordinate; segment 3 touches nothing
    expect(assignSurfaceCodes(4, [range(0, 2, 3)])).toEqual([3, 3, 3, 0]);
    expect(assignSurfaceCodes(3, [])).toEqual([0, 0, 0]);
  });

  it("lets the last overlapping range win", () => {
    expect(assignSurfaceCodes(3, [range(0, 3, 3), range(1, 2, 11)])).toEqual([3, 11, 3]);
  });
});

describe("segmentPath", () => {
  it("returns no segments for a path shorter than two coordinates", () => {
    expect(segmentPath([[33, -1]], [])).toEqual([]);
    expect(segmentPath([], [])).toEqual([]);
  });

  it("labels every segment from the ranges", () => {
    const segments = segmentPath(northbound(21), [range(0, 10, 3), range(11, 20, 10)]);

    expect(segments).toHaveLength(20);
    expect(segments.filter((s) => s.surface === "Asphalt")).toHaveLength(10);
    expect(segments.filter((s) => s.surface === "Gravel")).toHaveLength(10);
    expect(segments.some((s) => s.surface === "Unknown")).toBe(false);
    expect(segments.map((s) => s.index)).toEqual(Array.from({ length: 20 }, (_, i) => i));
  });

  it("keeps unmapped codes but labels them Unknown", () => {
    const [segment] = segmentPath(northbound(2), [range(0, 1, 5)]);
    expect(segment?.surfaceCode).toBe(5);
    expect(segment?.surface).toBe("Unknown");
  });

  it("measures length in the projected plane", () => {
    const [segment] = segmentPath(northbound(2), [range(0, 1, 3)]);
    // 0.001° of latitude on the zone's central meridian, scaled by 0.9996
    expect(segment?.lengthMeters).toBeCloseTo(110.53, 1);
  });

  it("chains segments end to start", () => {
    const segments = segmentPath(northbound(6), []);
    for (let i = 0; i + 1 < segments.length; i++) {
      expect(segments[i]?.geometry[1]).toBe(segments[i + 1]?.geometry[0]);
    }
  });

  it("returns geometry within 1e-6° of the input coordinates", () => {
    const coordinates: LngLat[] = [
      [30.0611, -1.9441],
      [30.0642, -1.9468],
      [30.0703, -1.9502],
    ];
    const segments = segmentPath(coordinates, []);
    const line = pathToLineString(segments);

    expect(line).toHaveLength(coordinates.length);
    line.forEach(([lng, lat], i) => {
      const [expectedLng, expectedLat] = coordinates[i] ?? [NaN, NaN];
      expect(Math.abs(lng - expectedLng)).toBeLessThan(1e-6);
      expect(Math.abs(lat - expectedLat)).toBeLessThan(1e-6);
    });
  });
});

describe("pathToLineString", () => {
  it("rebuilds the line in index order", () => {
    const a: LngLat = [0, 0];
    const b: LngLat = [0, 1];
    const c: LngLat = [0, 2];
    const segments: PathSegment[] = [
      { index: 1, geometry: [b, c], surfaceCode: 0, surface: "Unknown", lengthMeters: 1 },
      { index: 0, geometry: [a, b], surfaceCode: 0, surface: "Unknown", lengthMeters: 1 },
    ];
    expect(pathToLineString(segments)).toEqual([a, b, c]);
  });

  it("is empty for an empty path", () => {
    expect(pathToLineString([])).toEqual([]);
  });
});
