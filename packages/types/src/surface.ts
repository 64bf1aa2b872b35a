/**
 * Road surface classification.
 *
 * Surface codes are the small integers the directions service reports in its
 * `surface` extra; the label set is closed.
 */

import type { LngLat } from "./geo.js";

export type SurfaceType =
  | "Unknown"
  | "Paved"
  | "Unpaved"
  | "Asphalt"
  | "Concrete"
  | "Metal"
  | "Wood"
  | "Compacted Gravel"
  | "Gravel"
  | "Dirt"
  | "Ground"
  | "Ice"
  | "Paving Stones"
  | "Sand"
  | "Grass"
  | "Grass Paver";

/** A `[startIndex, endIndex, code]` range into the path's coordinate array (inclusive) */
export interface SurfaceRange {
  startIndex: number;
  endIndex: number;
  code: number;
}

/** Elementary 2-point piece of the detailed path */
export interface PathSegment {
  /** Position along the route, 0-based */
  index: number;
  geometry: [LngLat, LngLat];
  surfaceCode: number;
  surface: SurfaceType;
  /** Planar length in meters (UTM) */
  lengthMeters: number;
}

/** Length share of one surface type over the whole path */
export interface SurfaceStatistic {
  surface: SurfaceType;
  totalLengthKm: number;
  percentage: number;
}

/** Surface summary entry as reported by the directions service */
export interface ServiceSurfaceSummaryEntry {
  code: number;
  surface: SurfaceType;
  distanceKm: number;
  /** Share of the route the service attributes to this surface (0-100) */
  amount: number;
}
