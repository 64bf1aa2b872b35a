/**
 * Visit sequencing.
 *
 * Reconstructs the visiting order from the optimizer's steps, joins it back
 * onto the destination rows and derives the leg table between consecutive
 * stops. Cumulative distance is the authoritative order: steps are
 * stable-sorted by it even though the service already returns them in
 * visiting order.
 */

import type {
  CanonicalPoint,
  DataQualityWarning,
  LngLat,
  OrderedDestination,
  RankedJob,
  RouteSegment,
  VisitStep,
} from "@surface-route/types";
import { toLngLat } from "../points/normalize.js";
import { joinDestinationsToRanks, type SpatialJoinOptions } from "./spatial-join.js";

export const HOME_BASE_LABEL = "home_base";
export const FINAL_STOP_LABEL = "final_stop";

export interface VisitSequence {
  rankedJobs: RankedJob[];
  /** Sorted by rank; unmatched destinations last */
  destinations: OrderedDestination[];
  routeSegments: RouteSegment[];
  /** Stop coordinates in the order sent to the directions service */
  orderedCoordinates: LngLat[];
  warnings: DataQualityWarning[];
}

/** Steps stable-sorted by cumulative distance */
export function orderSteps(steps: readonly VisitStep[]): VisitStep[] {
  return [...steps].sort((a, b) => a.cumulativeDistanceMeters - b.cumulativeDistanceMeters);
}

/** Job steps in visiting order with rank 1..K */
export function rankJobSteps(steps: readonly VisitStep[]): RankedJob[] {
  const ranked: RankedJob[] = [];
  for (const step of orderSteps(steps)) {
    if (step.kind !== "job" || step.jobId === null) continue;
    ranked.push({
      rank: ranked.length + 1,
      jobId: step.jobId,
      location: step.location,
      cumulativeDistanceMeters: step.cumulativeDistanceMeters,
    });
  }
  return ranked;
}

/**
 * Generic stop labels in visiting order: `home_base`, `destination N`…,
 * `final_stop`.
 */
export function stopLabels(ordered: readonly VisitStep[]): string[] {
  let jobCount = 0;
  return ordered.map((step) => {
    switch (step.kind) {
      case "start":
        return HOME_BASE_LABEL;
      case "end":
        return FINAL_STOP_LABEL;
      case "job":
        jobCount += 1;
        return `destination ${jobCount}`;
    }
  });
}

/**
 * Lower-cased destination name → identifier, for relabelling segments.
 *
 * Destinations without a rank or identifier are left out, so their legs keep
 * the generic label.
 */
export function buildNameLookup(
  destinations: readonly OrderedDestination[],
): Map<string, string> {
  const lookup = new Map<string, string>();
  for (const d of destinations) {
    if (d.name === null || d.identifier === null) continue;
    lookup.set(d.name.toLowerCase(), d.identifier);
  }
  return lookup;
}

/**
 * Legs between consecutive stops.
 *
 * Length is this step's cumulative distance minus the previous one's,
 * in km rounded to 2 decimals. There is one leg fewer than steps.
 */
export function buildRouteSegments(
  steps: readonly VisitStep[],
  nameLookup: ReadonlyMap<string, string> = new Map(),
): RouteSegment[] {
  const ordered = orderSteps(steps);
  const labels = stopLabels(ordered).map((label) => nameLookup.get(label) ?? label);

  const segments: RouteSegment[] = [];
  for (let i = 1; i < ordered.length; i++) {
    const prev = ordered[i - 1];
    const current = ordered[i];
    if (!prev || !current) continue;
    segments.push({
      segmentName: `${labels[i - 1]} to ${labels[i]}`,
      origin: prev.location,
      destination: current.location,
      lengthKm: roundTo(
        (current.cumulativeDistanceMeters - prev.cumulativeDistanceMeters) / 1000,
        2,
      ),
    });
  }
  return segments;
}

/** Full sequencing: ranks, joined destinations, legs and directions order */
export function sequenceVisits(
  steps: readonly VisitStep[],
  destinations: readonly CanonicalPoint[],
  options: SpatialJoinOptions = {},
): VisitSequence {
  const rankedJobs = rankJobSteps(steps);
  const joined = joinDestinationsToRanks(destinations, rankedJobs, options);
  const routeSegments = buildRouteSegments(steps, buildNameLookup(joined.destinations));
  const orderedCoordinates = orderSteps(steps).map((step) => toLngLat(step.location));

  return {
    rankedJobs,
    destinations: joined.destinations,
    routeSegments,
    orderedCoordinates,
    warnings: joined.warnings,
  };
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
