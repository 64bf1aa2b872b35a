import type { OptimalRouteResult } from "@surface-route/types";
import type { RouteGeoJsonCollection } from "@surface-route/routing";

export interface ComputeRouteResponse {
  route: OptimalRouteResult;
  /** The annotated path and stops, ready for a map */
  geojson: RouteGeoJsonCollection;
}

export interface HealthResponse {
  status: "ok";
  uptime: number;
}

export interface ErrorResponse {
  message: string;
  details?: unknown;
}
