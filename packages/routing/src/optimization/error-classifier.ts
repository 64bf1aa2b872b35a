/**
 * Recovering the offending location from optimization errors.
 *
 * The service reports unroutable points by coordinate only. Matching that
 * coordinate against everything we submitted lets us name the point the
 * user actually has to fix.
 */

import type { CanonicalPoint, LngLat } from "@surface-route/types";

/** A submitted point with the name it is shown under */
export interface LookupEntry {
  name: string;
  longitude: number;
  latitude: number;
}

/** ≈11 m at the equator */
export const LOOKUP_TOLERANCE_DEGREES = 0.0001;

export const DEFAULT_SOURCE_NAME = "Starting point";
export const DEFAULT_FINAL_STOP_NAME = "Final stop";
export const UNNAMED_DESTINATION = "Unnamed Destination";

const ROUTABLE_POINT_ERROR = /Could not find routable point/i;
// "... coordinate 2: 30.1234000 -1.5678000."
const ROUTABLE_POINT_COORDINATE = /coordinate \d+: (-?\d+\.?\d*)\s+(-?\d+\.?\d*)/;

const UNFOUND_ROUTE_ERROR = /(?:Unfound route\(s\)|No route found) from location/i;
// "... from location [30.1234,-1.5678]"
const UNFOUND_ROUTE_COORDINATE = /location \[(-?\d+\.?\d*),\s*(-?\d+\.?\d*)\]/;

/**
 * Build the lookup table of every submitted point.
 *
 * Source and final stop go first, then destinations in input order, so a
 * coordinate shared by several points resolves to the earliest.
 */
export function buildLocationLookup(
  source: CanonicalPoint,
  finalStop: CanonicalPoint,
  destinations: readonly CanonicalPoint[],
): LookupEntry[] {
  return [
    entry(source, DEFAULT_SOURCE_NAME),
    entry(finalStop, DEFAULT_FINAL_STOP_NAME),
    ...destinations.map((d) => entry(d, UNNAMED_DESTINATION)),
  ];
}

/**
 * Parse the offending [lon, lat] out of a service error message.
 *
 * @returns null when the message is of an unrecognized shape
 */
export function parseErrorCoordinate(message: string): LngLat | null {
  let match: RegExpExecArray | null = null;
  if (ROUTABLE_POINT_ERROR.test(message)) {
    match = ROUTABLE_POINT_COORDINATE.exec(message);
  } else if (UNFOUND_ROUTE_ERROR.test(message)) {
    match = UNFOUND_ROUTE_COORDINATE.exec(message);
  }
  if (!match || match[1] === undefined || match[2] === undefined) return null;

  const lon = Number.parseFloat(match[1]);
  const lat = Number.parseFloat(match[2]);
  if (!Number.isFinite(lon) || !Number.isFinite(lat)) return null;
  return [lon, lat];
}

/** First lookup entry within tolerance of the coordinate on both axes */
export function findLookupMatch(
  lookup: readonly LookupEntry[],
  [lon, lat]: LngLat,
  tolerance: number = LOOKUP_TOLERANCE_DEGREES,
): LookupEntry | undefined {
  return lookup.find(
    (p) => Math.abs(p.longitude - lon) < tolerance && Math.abs(p.latitude - lat) < tolerance,
  );
}

function entry(point: CanonicalPoint, fallbackName: string): LookupEntry {
  return {
    name: point.identifier ?? fallbackName,
    longitude: point.longitude,
    latitude: point.latitude,
  };
}
