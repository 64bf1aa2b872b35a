/**
 * The route planning pipeline.
 *
 * normalize → build request → optimize → sequence → directions → segment.
 * All-or-nothing: any failure aborts the run with a typed error, and every
 * input problem is raised before the first service call.
 */

import type {
  InputTable,
  NamedPoint,
  OptimalRouteResult,
  PathSegment,
} from "@surface-route/types";
import { normalizePoints, normalizeSinglePoint } from "../points/normalize.js";
import {
  buildRoutingRequest,
  DEFAULT_OPTIMIZATION_PROFILE,
} from "../optimization/request-builder.js";
import {
  buildLocationLookup,
  DEFAULT_FINAL_STOP_NAME,
  DEFAULT_SOURCE_NAME,
} from "../optimization/error-classifier.js";
import { requestOptimization, type OptimizationService } from "../optimization/adapter.js";
import { sequenceVisits } from "../sequencing/visit-sequencer.js";
import {
  DEFAULT_DIRECTIONS_PROFILE,
  requestDirections,
  type DirectionsService,
} from "../directions/adapter.js";
import { segmentPath } from "../surface/segmenter.js";
import { summarizeServiceSurfaces, summarizeSurfaces } from "../surface/statistics.js";

/** Raw tables as uploaded by the caller */
export interface RoutePlanningInput {
  /** Single-row table with the starting point */
  source: InputTable;
  destinations: InputTable;
  /** Destinations column holding each destination's name */
  identifierField: string;
  /** Single-row table with the final stop */
  finalStop: InputTable;
}

/** Explicitly constructed handles to the external services */
export interface RoutePlanningServices {
  optimization: OptimizationService;
  directions: DirectionsService;
}

export interface RoutePlanningOptions {
  /** Vehicle profile for the optimizer (default: "driving-hgv") */
  optimizationProfile?: string;
  /** Profile for the detailed path (default: "driving-car") */
  directionsProfile?: string;
  /** Buffer radius for the destination join, meters (default: 10) */
  joinBufferMeters?: number;
}

export async function computeOptimalRoute(
  input: RoutePlanningInput,
  services: RoutePlanningServices,
  options: RoutePlanningOptions = {},
): Promise<OptimalRouteResult> {
  const source = normalizeSinglePoint(input.source, "source");
  const finalStop = normalizeSinglePoint(input.finalStop, "final-stop");
  const destinations = normalizePoints(input.destinations, {
    table: "destination",
    identifierField: input.identifierField,
  });

  const optimizationProfile = options.optimizationProfile ?? DEFAULT_OPTIMIZATION_PROFILE;
  const request = buildRoutingRequest(source, finalStop, destinations, {
    profile: optimizationProfile,
  });
  const lookup = buildLocationLookup(source, finalStop, destinations);

  console.log(
    `[route-plan] Optimizing ${destinations.length} destination(s), profile=${optimizationProfile}`,
  );
  const steps = await requestOptimization(services.optimization, request, lookup);

  const sequence = sequenceVisits(
    steps,
    destinations,
    { bufferMeters: options.joinBufferMeters },
  );
  console.log(
    `[route-plan] Sequenced ${sequence.rankedJobs.length} stop(s) into ${sequence.routeSegments.length} leg(s)`,
  );

  const detailed = await requestDirections(services.directions, sequence.orderedCoordinates, {
    profile: options.directionsProfile ?? DEFAULT_DIRECTIONS_PROFILE,
  });
  const path = segmentPath(detailed.coordinates, detailed.surfaceRanges);
  const surfaceStatistics = summarizeSurfaces(path);
  const serviceSurfaceSummary = summarizeServiceSurfaces(detailed.surfaceSummary);

  const computedKm = totalLengthKm(path);
  const reportedKm = serviceSurfaceSummary.reduce((sum, entry) => sum + entry.distanceKm, 0);
  console.log(
    `[route-plan] Path: ${path.length} segments, ${computedKm.toFixed(2)}km (service reports ${reportedKm.toFixed(2)}km)`,
  );

  const sourceNamed: NamedPoint = { name: source.identifier ?? DEFAULT_SOURCE_NAME, point: source };
  const finalStopNamed: NamedPoint = {
    name: finalStop.identifier ?? DEFAULT_FINAL_STOP_NAME,
    point: finalStop,
  };

  return {
    path,
    source: sourceNamed,
    finalStop: finalStopNamed,
    destinations: sequence.destinations,
    routeSegments: sequence.routeSegments,
    surfaceStatistics,
    serviceSurfaceSummary,
    identifierField: input.identifierField,
    warnings: sequence.warnings,
  };
}

function totalLengthKm(path: readonly PathSegment[]): number {
  return path.reduce((sum, segment) => sum + segment.lengthMeters, 0) / 1000;
}
