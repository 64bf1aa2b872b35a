/**
 * Wire types for the openrouteservice optimization and directions endpoints.
 *
 * Request bodies are plain interfaces; responses are described by zod
 * schemas so that an unexpected shape fails at the client boundary instead
 * of deep inside the pipeline.
 */

import { z } from "zod";

// ---------------------------------------------------------------------------
// Coordinate
// ---------------------------------------------------------------------------

/** [longitude, latitude] */
export type WireLngLat = [number, number];

const lngLatSchema = z.tuple([z.number(), z.number()]);

// ---------------------------------------------------------------------------
// Optimization
// ---------------------------------------------------------------------------

export interface OptimizationJobBody {
  id: number;
  location: WireLngLat;
  priority: number;
}

export interface OptimizationVehicleBody {
  id: number;
  profile: string;
  start: WireLngLat;
  end: WireLngLat;
}

export interface OptimizationRequestBody {
  jobs: OptimizationJobBody[];
  vehicles: OptimizationVehicleBody[];
  /** `g: true` asks for geometry, which also adds per-step distances */
  options?: { g: boolean };
}

export const optimizationStepSchema = z.object({
  type: z.enum(["start", "job", "end"]),
  location: lngLatSchema,
  /** Job id (older service versions) */
  job: z.number().int().optional(),
  /** Job id (newer service versions) */
  id: z.number().int().optional(),
  /** Cumulative distance in meters */
  distance: z.number().nonnegative(),
});

export const optimizationRouteSchema = z.object({
  vehicle: z.number().int(),
  steps: z.array(optimizationStepSchema).min(2),
  distance: z.number().optional(),
  duration: z.number().optional(),
});

export const optimizationResponseSchema = z.object({
  code: z.number().int(),
  routes: z.array(optimizationRouteSchema).min(1),
  unassigned: z
    .array(z.object({ id: z.number().int(), location: lngLatSchema.optional() }))
    .optional(),
});

export type OptimizationStep = z.infer<typeof optimizationStepSchema>;
export type OptimizationRoute = z.infer<typeof optimizationRouteSchema>;
export type OptimizationResponse = z.infer<typeof optimizationResponseSchema>;

// ---------------------------------------------------------------------------
// Directions
// ---------------------------------------------------------------------------

export interface DirectionsRequestBody {
  coordinates: WireLngLat[];
  extra_info: string[];
}

const surfaceExtraSchema = z.object({
  /** [startIndex, endIndex, surfaceCode] into the geometry's coordinates */
  values: z.array(z.tuple([z.number().int(), z.number().int(), z.number().int()])),
  summary: z.array(
    z.object({
      value: z.number(),
      distance: z.number(),
      amount: z.number(),
    }),
  ),
});

export const directionsFeatureSchema = z.object({
  type: z.literal("Feature"),
  geometry: z.object({
    type: z.literal("LineString"),
    // Elevation may be appended as a third value
    coordinates: z.array(z.tuple([z.number(), z.number()]).rest(z.number())).min(2),
  }),
  properties: z.object({
    extras: z.object({
      surface: surfaceExtraSchema,
    }),
    summary: z
      .object({
        distance: z.number().optional(),
        duration: z.number().optional(),
      })
      .optional(),
  }),
});

export const directionsResponseSchema = z.object({
  type: z.literal("FeatureCollection"),
  features: z.array(directionsFeatureSchema).min(1),
});

export type DirectionsFeature = z.infer<typeof directionsFeatureSchema>;
export type DirectionsResponse = z.infer<typeof directionsResponseSchema>;
