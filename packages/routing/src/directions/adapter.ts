/**
 * Directions service adapter.
 *
 * Requests the detailed geometry and surface extras for the stops in
 * visiting order. Surface ranges index into the returned geometry, so the
 * request order must be exactly the sequencer's order. Failures keep the
 * service's message; there is nothing to classify here.
 */

import type { LngLat, SurfaceRange } from "@surface-route/types";
import {
  OrsApiError,
  type DirectionsRequestBody,
  type DirectionsResponse,
} from "@surface-route/clients-core";
import { RoutePlanningError, ServiceError } from "../errors.js";

export const DEFAULT_DIRECTIONS_PROFILE = "driving-car";

/** Anything that can compute directions (DirectionsClient in production) */
export interface DirectionsService {
  directions(profile: string, body: DirectionsRequestBody): Promise<DirectionsResponse>;
}

export interface DirectionsOptions {
  /** Routing profile (default: "driving-car") */
  profile?: string;
}

/** Raw service surface summary entry (distance in meters) */
export interface SurfaceSummaryEntry {
  code: number;
  distanceMeters: number;
  amount: number;
}

export interface DetailedPath {
  /** Path geometry; elevation, when present, is dropped */
  coordinates: LngLat[];
  surfaceRanges: SurfaceRange[];
  surfaceSummary: SurfaceSummaryEntry[];
}

export async function requestDirections(
  service: DirectionsService,
  coordinates: readonly LngLat[],
  options: DirectionsOptions = {},
): Promise<DetailedPath> {
  if (coordinates.length < 2) {
    throw new ServiceError(
      `Directions need at least two coordinates, got ${coordinates.length}`,
      null,
    );
  }

  const body: DirectionsRequestBody = {
    coordinates: coordinates.map(([lng, lat]) => [lng, lat]),
    extra_info: ["surface"],
  };

  let response: DirectionsResponse;
  try {
    response = await service.directions(options.profile ?? DEFAULT_DIRECTIONS_PROFILE, body);
  } catch (err) {
    if (err instanceof RoutePlanningError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    const status = err instanceof OrsApiError ? err.status : null;
    throw new ServiceError(message, status, { cause: err });
  }

  return toDetailedPath(response);
}

/** Take the first feature's geometry and surface extras */
export function toDetailedPath(response: DirectionsResponse): DetailedPath {
  const [feature] = response.features;
  if (!feature) {
    throw new ServiceError("Malformed directions response: no route returned", null);
  }
  const surface = feature.properties.extras.surface;

  return {
    coordinates: feature.geometry.coordinates.map(([lng, lat]): LngLat => [lng, lat]),
    surfaceRanges: surface.values.map(([startIndex, endIndex, code]) => ({
      startIndex,
      endIndex,
      code,
    })),
    surfaceSummary: surface.summary.map((entry) => ({
      code: Math.trunc(entry.value),
      distanceMeters: entry.distance,
      amount: entry.amount,
    })),
  };
}
