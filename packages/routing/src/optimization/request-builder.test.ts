import { describe, it, expect } from "vitest";
import type { CanonicalPoint } from "@surface-route/types";
import { buildRoutingRequest, toOptimizationBody } from "./request-builder.js";
import { EmptyDestinationsError } from "../errors.js";

function point(longitude: number, latitude: number, identifier: string | null = null): CanonicalPoint {
  return { identifier, longitude, latitude };
}

const source = point(30.06, -1.95, "Depot");
const finalStop = point(30.1, -1.97, "Yard");

describe("buildRoutingRequest", () => {
  it("assigns job ids 1..N in input order", () => {
    for (const n of [1, 2, 7, 25]) {
      const destinations = Array.from({ length: n }, (_, i) => point(30 + i / 100, -2, `d${i}`));
      const request = buildRoutingRequest(source, finalStop, destinations);
      expect(request.jobs.map((j) => j.id)).toEqual(Array.from({ length: n }, (_, i) => i + 1));
      expect(request.jobs.map((j) => j.location)).toEqual(destinations);
    }
  });

  it("makes every job mandatory", () => {
    const request = buildRoutingRequest(source, finalStop, [point(30, -2), point(31, -2)]);
    expect(request.jobs.every((j) => j.priority === 1)).toBe(true);
  });

  it("builds one vehicle from source to final stop", () => {
    const request = buildRoutingRequest(source, finalStop, [point(30, -2)]);
    expect(request.vehicle).toEqual({
      id: 1,
      profile: "driving-hgv",
      start: source,
      end: finalStop,
    });
  });

  it("accepts a profile override", () => {
    const request = buildRoutingRequest(source, finalStop, [point(30, -2)], {
      profile: "driving-car",
    });
    expect(request.vehicle.profile).toBe("driving-car");
  });

  it("fails with EmptyDestinationsError for no destinations", () => {
    expect(() => buildRoutingRequest(source, finalStop, [])).toThrow(EmptyDestinationsError);
  });
});

describe("toOptimizationBody", () => {
  it("uses [lon, lat] locations and asks for geometry", () => {
    const request = buildRoutingRequest(source, finalStop, [point(30.2, -2.1)]);
    expect(toOptimizationBody(request)).toEqual({
      jobs: [{ id: 1, location: [30.2, -2.1], priority: 1 }],
      vehicles: [
        { id: 1, profile: "driving-hgv", start: [30.06, -1.95], end: [30.1, -1.97] },
      ],
      options: { g: true },
    });
  });
});
