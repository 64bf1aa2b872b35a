/**
 * GeoJSON export for route planning results.
 *
 * Converts an OptimalRouteResult into a FeatureCollection with one LineString
 * feature per path segment (styled by surface), a route-level summary
 * feature, and Point features for the stops.
 */

import type {
  LngLat,
  OptimalRouteResult,
  PathSegment,
  SurfaceType,
} from "@surface-route/types";
import { toLngLat } from "../points/normalize.js";
import { pathToLineString } from "../surface/segmenter.js";

export interface RouteLineFeature {
  type: "Feature";
  geometry: { type: "LineString"; coordinates: LngLat[] };
  properties: Record<string, unknown>;
}

export interface RoutePointFeature {
  type: "Feature";
  geometry: { type: "Point"; coordinates: LngLat };
  properties: Record<string, unknown>;
}

export type RouteGeoJsonFeature = RouteLineFeature | RoutePointFeature;

export interface RouteGeoJsonCollection {
  type: "FeatureCollection";
  features: RouteGeoJsonFeature[];
}

/** Stroke colour per surface: blues for sealed, ambers/browns for loose */
export const SURFACE_COLORS: Record<SurfaceType, string> = {
  Unknown: "#9ca3af",
  Paved: "#2563eb",
  Asphalt: "#1d4ed8",
  Concrete: "#3b82f6",
  "Paving Stones": "#4f46e5",
  Metal: "#6b7280",
  Wood: "#78716c",
  Unpaved: "#d97706",
  "Compacted Gravel": "#f59e0b",
  Gravel: "#d97706",
  Dirt: "#b45309",
  Ground: "#92400e",
  Sand: "#eab308",
  Ice: "#06b6d4",
  Grass: "#16a34a",
  "Grass Paver": "#15803d",
};

/** One styled LineString per segment, in route order */
export function pathToSegmentFeatures(path: readonly PathSegment[]): RouteLineFeature[] {
  return [...path]
    .sort((a, b) => a.index - b.index)
    .map((segment) => ({
      type: "Feature",
      geometry: { type: "LineString", coordinates: [...segment.geometry] },
      properties: {
        isSegment: true,
        segmentIndex: segment.index,
        surface: segment.surface,
        surfaceCode: segment.surfaceCode,
        lengthMeters: Math.round(segment.lengthMeters * 10) / 10,
        stroke: SURFACE_COLORS[segment.surface],
        "stroke-width": 4,
        "stroke-opacity": 0.9,
      },
    }));
}

export function routeToFeatureCollection(result: OptimalRouteResult): RouteGeoJsonCollection {
  const features: RouteGeoJsonFeature[] = pathToSegmentFeatures(result.path);

  const totalMeters = result.path.reduce((sum, segment) => sum + segment.lengthMeters, 0);
  const ranked = result.destinations.filter((d) => d.rank !== null);

  // Route-level summary feature (invisible, for popup metadata)
  const line = pathToLineString(result.path);
  if (line.length >= 2) {
    features.push({
      type: "Feature",
      geometry: { type: "LineString", coordinates: line },
      properties: {
        isSegment: false,
        distanceMeters: Math.round(totalMeters),
        distanceKm: Math.round(totalMeters / 100) / 10,
        totalStops: ranked.length,
        segmentCount: result.path.length,
        stroke: "#000000",
        "stroke-width": 0,
        "stroke-opacity": 0,
      },
    });
  }

  features.push({
    type: "Feature",
    geometry: { type: "Point", coordinates: toLngLat(result.source.point) },
    properties: { role: "source", name: result.source.name },
  });

  for (const destination of ranked) {
    features.push({
      type: "Feature",
      geometry: { type: "Point", coordinates: toLngLat(destination.point) },
      properties: {
        [result.identifierField]: destination.identifier,
        role: "destination",
        name: destination.identifier ?? destination.name,
        rank: destination.rank,
      },
    });
  }

  features.push({
    type: "Feature",
    geometry: { type: "Point", coordinates: toLngLat(result.finalStop.point) },
    properties: { role: "final-stop", name: result.finalStop.name },
  });

  return { type: "FeatureCollection", features };
}
