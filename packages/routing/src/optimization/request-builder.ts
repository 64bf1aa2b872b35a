/**
 * Routing request construction.
 *
 * One vehicle driving from the source to the final stop, one mandatory job
 * per destination. Job ids are 1-based input positions.
 */

import type { CanonicalPoint, RoutingRequest } from "@surface-route/types";
import type { OptimizationRequestBody } from "@surface-route/clients-core";
import { EmptyDestinationsError } from "../errors.js";
import { toLngLat } from "../points/normalize.js";

export const DEFAULT_OPTIMIZATION_PROFILE = "driving-hgv";

export interface RequestBuilderOptions {
  /** Vehicle routing profile (default: "driving-hgv") */
  profile?: string;
}

/**
 * Build the vehicle routing request.
 *
 * @throws EmptyDestinationsError when there is nothing to visit
 */
export function buildRoutingRequest(
  source: CanonicalPoint,
  finalStop: CanonicalPoint,
  destinations: readonly CanonicalPoint[],
  options: RequestBuilderOptions = {},
): RoutingRequest {
  if (destinations.length === 0) {
    throw new EmptyDestinationsError();
  }

  return {
    vehicle: {
      id: 1,
      profile: options.profile ?? DEFAULT_OPTIMIZATION_PROFILE,
      start: source,
      end: finalStop,
    },
    jobs: destinations.map((location, i) => ({
      id: i + 1,
      location,
      priority: 1,
    })),
  };
}

/** Wire body for the optimization endpoint; `g` makes steps carry distances */
export function toOptimizationBody(request: RoutingRequest): OptimizationRequestBody {
  const { vehicle } = request;
  return {
    jobs: request.jobs.map((job) => ({
      id: job.id,
      location: toLngLat(job.location),
      priority: job.priority,
    })),
    vehicles: [
      {
        id: vehicle.id,
        profile: vehicle.profile,
        start: toLngLat(vehicle.start),
        end: toLngLat(vehicle.end),
      },
    ],
    options: { g: true },
  };
}
