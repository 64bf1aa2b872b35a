/**
 * Surface segmentation of the detailed path.
 *
 * The path is cut into 2-point segments between consecutive coordinates.
 * Each segment gets the surface of the range covering it and a length
 * measured in the UTM zone covering the path.
 *
 * Range assignment: ranges index coordinates, inclusive on both ends, so
 * segment i (coordinates i → i+1) belongs to a range containing both i and
 * i+1; the last such range wins. A segment bridging two ranges
 * (e.g. [0,10] then [11,20]) takes the range containing its end coordinate,
 * then one containing its start. Otherwise it is Unknown.
 */

import type { LngLat, PathSegment, SurfaceRange } from "@surface-route/types";
import { fromUtm, planarDistance, toUtm, utmZoneFor } from "../geo/utm.js";
import { surfaceTypeForCode, UNKNOWN_SURFACE_CODE } from "./surface-codes.js";

/** 2-point pieces between every consecutive coordinate pair */
export function splitIntoSegments<T>(coordinates: readonly T[]): [T, T][] {
  const pieces: [T, T][] = [];
  for (let i = 0; i + 1 < coordinates.length; i++) {
    const a = coordinates[i];
    const b = coordinates[i + 1];
    if (a === undefined || b === undefined) continue;
    pieces.push([a, b]);
  }
  return pieces;
}

/** Surface code per segment; see the module comment for the rules */
export function assignSurfaceCodes(
  segmentCount: number,
  ranges: readonly SurfaceRange[],
): number[] {
  const codes: (number | null)[] = new Array<number | null>(segmentCount).fill(null);

  for (const range of ranges) {
    const from = Math.max(0, range.startIndex);
    const to = Math.min(segmentCount - 1, range.endIndex - 1);
    for (let i = from; i <= to; i++) codes[i] = range.code;
  }

  return codes.map((code, i) => {
    if (code !== null) return code;
    const byEnd = lastRangeContaining(ranges, i + 1);
    if (byEnd) return byEnd.code;
    const byStart = lastRangeContaining(ranges, i);
    return byStart ? byStart.code : UNKNOWN_SURFACE_CODE;
  });
}

/**
 * Build the annotated path.
 *
 * Lengths come from the projected plane; geometry is projected back to
 * degrees. Segments chain exactly: segment i's end is the same coordinate
 * as segment i+1's start.
 */
export function segmentPath(
  coordinates: readonly LngLat[],
  ranges: readonly SurfaceRange[],
): PathSegment[] {
  if (coordinates.length < 2) return [];

  const zone = utmZoneFor(coordinates);
  const points = coordinates.map((c) => {
    const projected = toUtm(c, zone);
    return { projected, degrees: fromUtm(projected, zone) };
  });

  const pieces = splitIntoSegments(points);
  const codes = assignSurfaceCodes(pieces.length, ranges);

  return pieces.map(([a, b], index): PathSegment => {
    const code = codes[index] ?? UNKNOWN_SURFACE_CODE;
    return {
      index,
      geometry: [a.degrees, b.degrees],
      surfaceCode: code,
      surface: surfaceTypeForCode(code),
      lengthMeters: planarDistance(a.projected, b.projected),
    };
  });
}

/** Reassemble the continuous line from an ordered segment list */
export function pathToLineString(path: readonly PathSegment[]): LngLat[] {
  const ordered = [...path].sort((a, b) => a.index - b.index);
  const line: LngLat[] = [];
  for (const segment of ordered) {
    const [start, end] = segment.geometry;
    if (line.length === 0) line.push(start);
    line.push(end);
  }
  return line;
}

function lastRangeContaining(
  ranges: readonly SurfaceRange[],
  coordinateIndex: number,
): SurfaceRange | undefined {
  let found: SurfaceRange | undefined;
  for (const range of ranges) {
    if (range.startIndex <= coordinateIndex && coordinateIndex <= range.endIndex) {
      found = range;
    }
  }
  return found;
}
