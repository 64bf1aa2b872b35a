/**
 * CSV text for the leg table and the surface statistics table.
 */

import type { RouteSegment, SurfaceStatistic } from "@surface-route/types";

export function routeSegmentsToCsv(segments: readonly RouteSegment[]): string {
  return toCsv(
    ["segment_name", "length_km"],
    segments.map((s) => [s.segmentName, s.lengthKm]),
  );
}

export function surfaceStatisticsToCsv(statistics: readonly SurfaceStatistic[]): string {
  return toCsv(
    ["surface", "total_length_km", "percentage"],
    statistics.map((s) => [s.surface, s.totalLengthKm, s.percentage]),
  );
}

/** Header plus rows, "\n"-terminated; fields quoted only when needed */
function toCsv(header: readonly string[], rows: readonly (string | number)[][]): string {
  return [header, ...rows].map((row) => row.map(escapeField).join(",") + "\n").join("");
}

function escapeField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}
