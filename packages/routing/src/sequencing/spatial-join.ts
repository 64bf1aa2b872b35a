/**
 * Joining destinations back onto their visit rank.
 *
 * Each ranked job gets a small circular buffer built in the UTM zone
 * covering the jobs. A destination takes the rank of the buffer it falls
 * in. When buffers overlap, the destination's own job (job id equals its
 * input position) wins, then the rank whose job coordinate is nearest, then
 * the lower rank. Destinations inside no buffer stay in the table with a
 * null rank and raise a join-mismatch warning; ranks matched by no
 * destination, or by several, raise a rank warning.
 */

import type {
  CanonicalPoint,
  DataQualityWarning,
  OrderedDestination,
  RankCoverageWarning,
  RankedJob,
} from "@surface-route/types";
import { bufferPoint, pointInPolygon } from "../geo/polygon.js";
import { planarDistance, toUtm, utmZoneFor } from "../geo/utm.js";
import { toLngLat } from "../points/normalize.js";

export const DEFAULT_JOIN_BUFFER_METERS = 10;

export interface SpatialJoinOptions {
  /** Buffer radius around each ranked job (default: 10) */
  bufferMeters?: number;
}

export interface SpatialJoinResult {
  /** Sorted by rank; unmatched destinations last, in input order */
  destinations: OrderedDestination[];
  warnings: DataQualityWarning[];
}

export function destinationName(rank: number): string {
  return `Destination ${rank}`;
}

export function joinDestinationsToRanks(
  destinations: readonly CanonicalPoint[],
  ranked: readonly RankedJob[],
  options: SpatialJoinOptions = {},
): SpatialJoinResult {
  const bufferMeters = options.bufferMeters ?? DEFAULT_JOIN_BUFFER_METERS;
  const zone =
    ranked.length > 0 ? utmZoneFor(ranked.map((job) => toLngLat(job.location))) : null;

  const buffers = zone
    ? ranked.map((job) => ({
        job,
        ring: bufferPoint(toLngLat(job.location), bufferMeters, zone),
        projected: toUtm(toLngLat(job.location), zone),
      }))
    : [];

  const joined: OrderedDestination[] = [];
  const warnings: DataQualityWarning[] = [];

  destinations.forEach((point, i) => {
    const inputPosition = i + 1;
    const position = toLngLat(point);
    const hits = buffers.filter((b) => pointInPolygon(position, b.ring));

    const ownJob = hits.find((hit) => hit.job.jobId === inputPosition);
    let best: RankedJob | null = ownJob ? ownJob.job : null;
    if (!best && zone && hits.length > 0) {
      const projected = toUtm(position, zone);
      let bestDistance = Infinity;
      for (const hit of hits) {
        const d = planarDistance(projected, hit.projected);
        if (d < bestDistance || (d === bestDistance && best && hit.job.rank < best.rank)) {
          best = hit.job;
          bestDistance = d;
        }
      }
    }

    if (!best) {
      const label = point.identifier ?? `#${inputPosition}`;
      const message = `Destination ${label} could not be matched to any stop of the optimized route`;
      console.warn(`[route-plan] ${message}`);
      warnings.push({
        kind: "join-mismatch",
        inputPosition,
        identifier: point.identifier,
        message,
      });
    }

    joined.push({
      name: best ? destinationName(best.rank) : null,
      identifier: point.identifier,
      rank: best ? best.rank : null,
      inputPosition,
      cumulativeDistanceMeters: best ? best.cumulativeDistanceMeters : null,
      point,
    });
  });

  warnings.push(...checkRankCoverage(ranked, joined));

  joined.sort((a, b) => {
    if (a.rank === null && b.rank === null) return a.inputPosition - b.inputPosition;
    if (a.rank === null) return 1;
    if (b.rank === null) return -1;
    return a.rank - b.rank;
  });

  return { destinations: joined, warnings };
}

/** One warning per rank matched by no destination or by more than one */
function checkRankCoverage(
  ranked: readonly RankedJob[],
  joined: readonly OrderedDestination[],
): RankCoverageWarning[] {
  const counts = new Map<number, number>();
  for (const d of joined) {
    if (d.rank !== null) counts.set(d.rank, (counts.get(d.rank) ?? 0) + 1);
  }

  const warnings: RankCoverageWarning[] = [];
  for (const job of ranked) {
    const count = counts.get(job.rank) ?? 0;
    if (count === 1) continue;
    const stop = `Stop ${job.rank} (job ${job.jobId}) of the optimized route`;
    const message =
      count === 0 ? `${stop} matched no destination` : `${stop} matched ${count} destinations`;
    console.warn(`[route-plan] ${message}`);
    warnings.push({
      kind: count === 0 ? "rank-unmatched" : "rank-shared",
      rank: job.rank,
      jobId: job.jobId,
      message,
    });
  }
  return warnings;
}
