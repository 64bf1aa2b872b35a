export {
  pathToSegmentFeatures,
  routeToFeatureCollection,
  SURFACE_COLORS,
  type RouteGeoJsonCollection,
  type RouteGeoJsonFeature,
  type RouteLineFeature,
  type RoutePointFeature,
} from "./route-geojson.js";
export { routeSegmentsToCsv, surfaceStatisticsToCsv } from "./csv.js";
