/**
 * Optimization service adapter.
 *
 * Submits the routing request, turns the service's itinerary into
 * VisitSteps and classifies failures. Never retries; that is the caller's
 * decision.
 */

import type { CanonicalPoint, RoutingRequest, VisitStep } from "@surface-route/types";
import {
  OrsApiError,
  type OptimizationRequestBody,
  type OptimizationResponse,
} from "@surface-route/clients-core";
import {
  RoutePlanningError,
  ServiceError,
  UnroutableLocationError,
} from "../errors.js";
import {
  findLookupMatch,
  parseErrorCoordinate,
  type LookupEntry,
} from "./error-classifier.js";
import { toOptimizationBody } from "./request-builder.js";

/** Anything that can solve a routing problem (OptimizationClient in production) */
export interface OptimizationService {
  optimize(body: OptimizationRequestBody): Promise<OptimizationResponse>;
}

/**
 * Map a failure of the optimization call to a domain error.
 *
 * Unroutable-point errors whose coordinate matches a submitted point become
 * UnroutableLocationError; anything else keeps the service's message.
 */
export function classifyOptimizationError(
  err: unknown,
  lookup: readonly LookupEntry[],
): RoutePlanningError {
  const message = err instanceof Error ? err.message : String(err);

  const coordinate = parseErrorCoordinate(message);
  if (coordinate) {
    const match = findLookupMatch(lookup, coordinate);
    if (match) {
      return new UnroutableLocationError(match.name, { cause: err });
    }
  }

  if (err instanceof RoutePlanningError) return err;
  const status = err instanceof OrsApiError ? err.status : null;
  return new ServiceError(message, status, { cause: err });
}

/**
 * Submit the request and return the itinerary's steps in service order.
 *
 * @throws UnroutableLocationError when the service names a point we sent
 * @throws ServiceError for every other failure
 */
export async function requestOptimization(
  service: OptimizationService,
  request: RoutingRequest,
  lookup: readonly LookupEntry[],
): Promise<VisitStep[]> {
  let response: OptimizationResponse;
  try {
    response = await service.optimize(toOptimizationBody(request));
  } catch (err) {
    throw classifyOptimizationError(err, lookup);
  }

  const unassigned = response.unassigned ?? [];
  if (unassigned.length > 0) {
    const ids = unassigned.map((u) => u.id).join(", ");
    console.warn(`[route-plan] Optimizer left ${unassigned.length} job(s) unassigned: ${ids}`);
  }

  return toVisitSteps(response, request);
}

/**
 * Convert the first route's steps into VisitSteps.
 *
 * Step locations keep the identifier of the point they stand for.
 *
 * @throws ServiceError when a job step cannot be tied back to a submitted job
 */
export function toVisitSteps(
  response: OptimizationResponse,
  request: RoutingRequest,
): VisitStep[] {
  const [route] = response.routes;
  if (!route) {
    throw new ServiceError("Malformed optimization response: no route returned", null);
  }

  const jobsById = new Map(request.jobs.map((job) => [job.id, job]));

  return route.steps.map((step, i): VisitStep => {
    const [longitude, latitude] = step.location;
    const located = (identifier: string | null): CanonicalPoint => ({
      identifier,
      longitude,
      latitude,
    });

    if (step.type !== "job") {
      const point = step.type === "start" ? request.vehicle.start : request.vehicle.end;
      return {
        kind: step.type,
        jobId: null,
        location: located(point.identifier),
        cumulativeDistanceMeters: step.distance,
      };
    }

    const jobId = step.job ?? step.id;
    const job = jobId !== undefined ? jobsById.get(jobId) : undefined;
    if (jobId === undefined || !job) {
      throw new ServiceError(
        `Malformed optimization response: step ${i} refers to unknown job ${jobId ?? "(none)"}`,
        null,
      );
    }
    return {
      kind: "job",
      jobId,
      location: located(job.location.identifier),
      cumulativeDistanceMeters: step.distance,
    };
  });
}
