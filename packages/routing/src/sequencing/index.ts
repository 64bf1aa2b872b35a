export {
  sequenceVisits,
  orderSteps,
  rankJobSteps,
  stopLabels,
  buildNameLookup,
  buildRouteSegments,
  roundTo,
  HOME_BASE_LABEL,
  FINAL_STOP_LABEL,
  type VisitSequence,
} from "./visit-sequencer.js";
export {
  joinDestinationsToRanks,
  destinationName,
  DEFAULT_JOIN_BUFFER_METERS,
  type SpatialJoinOptions,
  type SpatialJoinResult,
} from "./spatial-join.js";
