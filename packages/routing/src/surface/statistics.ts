/**
 * Per-surface length statistics over the segmented path.
 */

import type {
  PathSegment,
  ServiceSurfaceSummaryEntry,
  SurfaceStatistic,
  SurfaceType,
} from "@surface-route/types";
import type { SurfaceSummaryEntry } from "../directions/adapter.js";
import { roundTo } from "../sequencing/visit-sequencer.js";
import { surfaceTypeForCode } from "./surface-codes.js";

/**
 * Group segments by surface type. Lengths in km and percentages are rounded
 * to 2 places; rows are sorted by length, longest first. A zero-length path
 * reports 0% for every type.
 */
export function summarizeSurfaces(segments: readonly PathSegment[]): SurfaceStatistic[] {
  const totals = new Map<SurfaceType, number>();
  let totalMeters = 0;
  for (const segment of segments) {
    totals.set(segment.surface, (totals.get(segment.surface) ?? 0) + segment.lengthMeters);
    totalMeters += segment.lengthMeters;
  }

  return [...totals.entries()]
    .sort((a, b) => b[1] - a[1])
    .map(([surface, meters]) => ({
      surface,
      totalLengthKm: roundTo(meters / 1000, 2),
      percentage: totalMeters > 0 ? roundTo((meters / totalMeters) * 100, 2) : 0,
    }));
}

/** The directions service's own summary, labelled with the same surface names */
export function summarizeServiceSurfaces(
  summary: readonly SurfaceSummaryEntry[],
): ServiceSurfaceSummaryEntry[] {
  return summary.map((entry) => ({
    code: entry.code,
    surface: surfaceTypeForCode(entry.code),
    distanceKm: roundTo(entry.distanceMeters / 1000, 2),
    amount: entry.amount,
  }));
}
