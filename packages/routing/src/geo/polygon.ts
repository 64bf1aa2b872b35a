/**
 * Point buffers and point-in-polygon tests.
 */

import type { LngLat, UtmZone } from "@surface-route/types";
import { fromUtm, toUtm } from "./utm.js";

/** Vertices used to approximate a circle */
export const DEFAULT_BUFFER_VERTICES = 64;

/**
 * Circular buffer around a point, built in the projected plane and returned
 * in degrees as a closed ring.
 *
 * @param radiusMeters - Buffer radius in meters
 */
export function bufferPoint(
  center: LngLat,
  radiusMeters: number,
  zone: UtmZone,
  vertices: number = DEFAULT_BUFFER_VERTICES,
): LngLat[] {
  const { easting, northing } = toUtm(center, zone);
  const ring: LngLat[] = [];
  for (let i = 0; i < vertices; i++) {
    const theta = (2 * Math.PI * i) / vertices;
    ring.push(
      fromUtm(
        {
          easting: easting + radiusMeters * Math.cos(theta),
          northing: northing + radiusMeters * Math.sin(theta),
        },
        zone,
      ),
    );
  }
  const first = ring[0];
  if (first) ring.push([first[0], first[1]]);
  return ring;
}

/**
 * Ray-casting point-in-polygon test on a closed ring.
 *
 * Points exactly on an edge may land on either side.
 */
export function pointInPolygon(point: LngLat, ring: readonly LngLat[]): boolean {
  const [x, y] = point;
  let inside = false;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const a = ring[i];
    const b = ring[j];
    if (!a || !b) continue;
    const [xi, yi] = a;
    const [xj, yj] = b;
    if (yi > y !== yj > y && x < ((xj - xi) * (y - yi)) / (yj - yi) + xi) {
      inside = !inside;
    }
  }
  return inside;
}
