export {
  computeOptimalRoute,
  type RoutePlanningInput,
  type RoutePlanningOptions,
  type RoutePlanningServices,
} from "./compute-optimal-route.js";
