/**
 * Route planning service: wires the configured service clients into the
 * routing pipeline and attaches the GeoJSON view of the result.
 */

import { DirectionsClient, OptimizationClient } from "@surface-route/clients-core";
import {
  computeOptimalRoute,
  routeToFeatureCollection,
  type RoutePlanningServices,
} from "@surface-route/routing";
import type { ServerConfig } from "../config.js";
import type { ComputeRouteRequest } from "../models/requests.js";
import type { ComputeRouteResponse } from "../models/responses.js";

export class RoutePlanningService {
  private config: ServerConfig;
  private services: RoutePlanningServices;

  /** `services` replaces the HTTP clients built from `config.ors` */
  constructor(config: ServerConfig, services?: RoutePlanningServices) {
    this.config = config;
    this.services = services ?? {
      optimization: new OptimizationClient(config.ors),
      directions: new DirectionsClient(config.ors),
    };
  }

  async plan(request: ComputeRouteRequest): Promise<ComputeRouteResponse> {
    const started = Date.now();
    const route = await computeOptimalRoute(request, this.services, {
      optimizationProfile: this.config.optimizationProfile,
      directionsProfile: this.config.directionsProfile,
    });
    console.log(`[route-plan] Done in ${Date.now() - started}ms`);
    return { route, geojson: routeToFeatureCollection(route) };
  }
}
