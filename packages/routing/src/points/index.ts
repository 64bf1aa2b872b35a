export {
  normalizeColumnName,
  resolveCoordinateColumns,
  normalizePoints,
  normalizeSinglePoint,
  toLngLat,
  LATITUDE_ALIASES,
  LONGITUDE_ALIASES,
  type NormalizeOptions,
  type CoordinateColumns,
} from "./normalize.js";
