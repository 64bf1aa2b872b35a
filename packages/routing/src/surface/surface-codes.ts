/**
 * Surface code table of the directions service's `surface` extra.
 *
 * Codes missing from the table (5, 9, 16 and anything new) read as Unknown.
 */

import type { SurfaceType } from "@surface-route/types";

export const SURFACE_CODES: ReadonlyMap<number, SurfaceType> = new Map<number, SurfaceType>([
  [0, "Unknown"],
  [1, "Paved"],
  [2, "Unpaved"],
  [3, "Asphalt"],
  [4, "Concrete"],
  [6, "Metal"],
  [7, "Wood"],
  [8, "Compacted Gravel"],
  [10, "Gravel"],
  [11, "Dirt"],
  [12, "Ground"],
  [13, "Ice"],
  [14, "Paving Stones"],
  [15, "Sand"],
  [17, "Grass"],
  [18, "Grass Paver"],
]);

export const UNKNOWN_SURFACE_CODE = 0;

export function surfaceTypeForCode(code: number | null | undefined): SurfaceType {
  if (code === null || code === undefined) return "Unknown";
  return SURFACE_CODES.get(code) ?? "Unknown";
}
