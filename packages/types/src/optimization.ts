/**
 * Vehicle routing problem types.
 *
 * A routing request is always one vehicle with a fixed start and end and one
 * mandatory job per destination. Job ids are the destination's 1-based
 * position in the input table and are the only stable link back to it.
 */

import type { CanonicalPoint } from "./point.js";

export interface Vehicle {
  id: number;
  /** Routing profile used by the optimization service (e.g. "driving-hgv") */
  profile: string;
  start: CanonicalPoint;
  end: CanonicalPoint;
}

export interface Job {
  /** 1-based position of the destination in the input table */
  id: number;
  location: CanonicalPoint;
  /** All destinations are mandatory; the builder always sets 1 */
  priority: number;
}

export interface RoutingRequest {
  vehicle: Vehicle;
  jobs: Job[];
}

export type VisitStepKind = "start" | "job" | "end";

/** One step of the optimized itinerary, in visiting order */
export interface VisitStep {
  kind: VisitStepKind;
  /** Present only on job steps */
  jobId: number | null;
  location: CanonicalPoint;
  /** Distance driven from the start up to this step, in meters */
  cumulativeDistanceMeters: number;
}

/** A job step after sorting by cumulative distance */
export interface RankedJob {
  rank: number;
  jobId: number;
  location: CanonicalPoint;
  cumulativeDistanceMeters: number;
}
