export { SURFACE_CODES, UNKNOWN_SURFACE_CODE, surfaceTypeForCode } from "./surface-codes.js";
export {
  assignSurfaceCodes,
  pathToLineString,
  segmentPath,
  splitIntoSegments,
} from "./segmenter.js";
export { summarizeServiceSurfaces, summarizeSurfaces } from "./statistics.js";
