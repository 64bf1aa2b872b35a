export {
  buildRoutingRequest,
  toOptimizationBody,
  DEFAULT_OPTIMIZATION_PROFILE,
  type RequestBuilderOptions,
} from "./request-builder.js";
export {
  buildLocationLookup,
  parseErrorCoordinate,
  findLookupMatch,
  LOOKUP_TOLERANCE_DEGREES,
  DEFAULT_SOURCE_NAME,
  DEFAULT_FINAL_STOP_NAME,
  UNNAMED_DESTINATION,
  type LookupEntry,
} from "./error-classifier.js";
export {
  requestOptimization,
  classifyOptimizationError,
  toVisitSteps,
  type OptimizationService,
} from "./adapter.js";
