/**
 * Canonical point representation shared by every pipeline stage.
 */

/** A single row of a caller-supplied input table (CSV row, pick-list entry, map click) */
export type InputRow = Record<string, unknown>;

/** An input table in row order */
export type InputTable = InputRow[];

/** A point after column harmonization */
export interface CanonicalPoint {
  /** Value of the identifier column, stringified (null when absent) */
  readonly identifier: string | null;
  /** Degrees, WGS84 */
  readonly longitude: number;
  /** Degrees, WGS84 */
  readonly latitude: number;
}

/** Which input table a point came from */
export type PointRole = "source" | "final-stop" | "destination";
