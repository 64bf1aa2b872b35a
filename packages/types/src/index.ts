/**
 * @surface-route/types
 *
 * Shared domain types for the route planning pipeline.
 *
 * - Point: Harmonized input points
 * - Optimization: Vehicle routing request and visit steps
 * - Surface: Road surface classification of the detailed path
 * - Route: The result handed back to the caller
 */

export * from "./geo.js";
export * from "./point.js";
export * from "./optimization.js";
export * from "./surface.js";
export * from "./route.js";
