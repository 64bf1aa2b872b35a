export {
  boundsOf,
  centralMeridian,
  utmZoneFor,
  toUtm,
  fromUtm,
  planarDistance,
} from "./utm.js";
export { bufferPoint, pointInPolygon, DEFAULT_BUFFER_VERTICES } from "./polygon.js";
