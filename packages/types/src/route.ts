/**
 * Route results - the output of the route planning pipeline.
 *
 * The caller receives the annotated path, the destinations in visiting
 * order, the leg table between consecutive stops and the surface statistics.
 */

import type { CanonicalPoint } from "./point.js";
import type {
  PathSegment,
  ServiceSurfaceSummaryEntry,
  SurfaceStatistic,
} from "./surface.js";

/** A leg between two consecutive stops of the optimized itinerary */
export interface RouteSegment {
  /** e.g. "home_base to Lake View" */
  segmentName: string;
  origin: CanonicalPoint;
  destination: CanonicalPoint;
  /** Rounded to 2 decimal places */
  lengthKm: number;
}

/** A destination row after joining it back onto its visit rank */
export interface OrderedDestination {
  /** "Destination N", or null when no rank matched */
  name: string | null;
  identifier: string | null;
  rank: number | null;
  /** 1-based row position in the destinations input table */
  inputPosition: number;
  /** Cumulative distance of the matched job step in meters */
  cumulativeDistanceMeters: number | null;
  point: CanonicalPoint;
}

/** Source or final stop echoed back with its display name */
export interface NamedPoint {
  name: string;
  point: CanonicalPoint;
}

/** Non-fatal data-quality signal raised while sequencing */
export interface JoinMismatchWarning {
  kind: "join-mismatch";
  inputPosition: number;
  identifier: string | null;
  message: string;
}

/** A stop of the optimized route matched by no destination, or by several */
export interface RankCoverageWarning {
  kind: "rank-unmatched" | "rank-shared";
  rank: number;
  jobId: number;
  message: string;
}

export type DataQualityWarning = JoinMismatchWarning | RankCoverageWarning;

/** Everything `computeOptimalRoute` hands back to its caller */
export interface OptimalRouteResult {
  /** Annotated path, ordered along the route */
  path: PathSegment[];
  source: NamedPoint;
  finalStop: NamedPoint;
  /** Sorted by rank; unmatched destinations last */
  destinations: OrderedDestination[];
  routeSegments: RouteSegment[];
  surfaceStatistics: SurfaceStatistic[];
  /** The directions service's own surface summary, for cross-checking */
  serviceSurfaceSummary: ServiceSurfaceSummaryEntry[];
  identifierField: string;
  warnings: DataQualityWarning[];
}
