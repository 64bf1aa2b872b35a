/**
 * Geographic utility types.
 */

/** Longitude/latitude pair in GeoJSON axis order (WGS84 degrees) */
export type LngLat = [number, number];

/** Axis-aligned bounding box in WGS84 coordinates */
export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLng: number;
  maxLng: number;
}

/** A UTM zone: 1-60 plus hemisphere */
export interface UtmZone {
  zone: number;
  south: boolean;
}

/** Planar coordinate in a UTM zone (meters) */
export interface ProjectedPoint {
  easting: number;
  northing: number;
}
