// Base
export {
  BaseClient,
  DEFAULT_BASE_URL,
  type ClientConfig,
  type RequestParams,
} from "./baseClient.js";
export { OrsApiError, extractServiceMessage, toOrsApiError } from "./errors.js";

// Service clients
export { OptimizationClient } from "./optimizationClient.js";
export { DirectionsClient } from "./directionsClient.js";

// Wire types
export {
  optimizationResponseSchema,
  directionsResponseSchema,
  type WireLngLat,
  type OptimizationJobBody,
  type OptimizationVehicleBody,
  type OptimizationRequestBody,
  type OptimizationStep,
  type OptimizationRoute,
  type OptimizationResponse,
  type DirectionsRequestBody,
  type DirectionsFeature,
  type DirectionsResponse,
} from "./types.js";
