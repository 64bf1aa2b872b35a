import { describe, it, expect } from "vitest";
import type { LngLat } from "@surface-route/types";
import { bufferPoint, pointInPolygon } from "./polygon.js";
import { fromUtm, planarDistance, toUtm } from "./utm.js";

const zone = { zone: 36, south: true };
const center: LngLat = [30.1234, -1.5678];

function offset(point: LngLat, dEast: number, dNorth: number): LngLat {
  const p = toUtm(point, zone);
  return fromUtm({ easting: p.easting + dEast, northing: p.northing + dNorth }, zone);
}

describe("bufferPoint", () => {
  it("returns a closed ring with the requested vertex count", () => {
    const ring = bufferPoint(center, 10, zone, 16);
    expect(ring).toHaveLength(17);
    expect(ring[16]).toEqual(ring[0]);
  });

  it("places every vertex at the radius in the projected plane", () => {
    const c = toUtm(center, zone);
    for (const vertex of bufferPoint(center, 10, zone)) {
      expect(planarDistance(c, toUtm(vertex, zone))).toBeCloseTo(10, 6);
    }
  });
});

describe("pointInPolygon", () => {
  const ring = bufferPoint(center, 10, zone);

  it("contains the centre and nearby points", () => {
    expect(pointInPolygon(center, ring)).toBe(true);
    expect(pointInPolygon(offset(center, 5, -5), ring)).toBe(true);
  });

  it("excludes points beyond the radius", () => {
    expect(pointInPolygon(offset(center, 15, 0), ring)).toBe(false);
    expect(pointInPolygon(offset(center, 0, -10.5), ring)).toBe(false);
  });

  it("works on a plain square", () => {
    const square: LngLat[] = [
      [0, 0],
      [1, 0],
      [1, 1],
      [0, 1],
      [0, 0],
    ];
    expect(pointInPolygon([0.5, 0.5], square)).toBe(true);
    expect(pointInPolygon([1.5, 0.5], square)).toBe(false);
  });
});
