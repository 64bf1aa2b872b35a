export {
  requestDirections,
  toDetailedPath,
  DEFAULT_DIRECTIONS_PROFILE,
  type DirectionsService,
  type DirectionsOptions,
  type DetailedPath,
  type SurfaceSummaryEntry,
} from "./adapter.js";
