/**
 * @surface-route/routing
 *
 * Plans a single-vehicle route through a set of destinations and annotates
 * the driven path with road surface information.
 *
 * Pipeline:
 * 1. Normalize the uploaded point tables -> CanonicalPoints
 * 2. Build the vehicle routing request and ask the optimizer -> VisitSteps
 * 3. Rank the visits, join destinations back, build the leg table
 * 4. Ask for the detailed path with surface extras -> DetailedPath
 * 5. Split the path into surface-labelled segments and summarize
 */

export * from "./errors.js";

// Modules
export * from "./points/index.js";
export * from "./geo/index.js";
export * from "./optimization/index.js";
export * from "./sequencing/index.js";
export * from "./directions/index.js";
export * from "./surface/index.js";
export * from "./pipeline/index.js";
export * from "./export/index.js";
