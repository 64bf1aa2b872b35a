/**
 * Point normalization.
 *
 * Input tables arrive from CSV uploads, pick-lists and map clicks with
 * inconsistent column naming. Column names are lower-cased and
 * whitespace-normalized, coordinate aliases are resolved to `lat`/`lon`,
 * and every row becomes a CanonicalPoint in input order. Row order matters:
 * it becomes the job id assignment later.
 */

import type {
  CanonicalPoint,
  InputTable,
  LngLat,
  PointRole,
} from "@surface-route/types";
import {
  InvalidCoordinateError,
  MissingColumnError,
  MissingPointError,
} from "../errors.js";

/** Recognized aliases per axis, in precedence order */
export const LATITUDE_ALIASES = ["lat", "latitude", "y"] as const;
export const LONGITUDE_ALIASES = ["lon", "longitude", "x"] as const;

/** Plain decimal numbers only; rejects hex, binary and octal literals */
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export interface NormalizeOptions {
  /** Which table is being normalized (used in error messages) */
  table: PointRole;
  /** Column holding the point's identifier; matched after normalization */
  identifierField?: string;
}

/** Original column names for the resolved axes */
export interface CoordinateColumns {
  lat: string;
  lon: string;
}

/** Lower-case, trim and collapse inner whitespace */
export function normalizeColumnName(name: string): string {
  return name.trim().replace(/\s+/g, " ").toLowerCase();
}

/**
 * Resolve the latitude/longitude columns of a table.
 *
 * Returns the ORIGINAL column names so rows can be read without copying.
 * When several aliases are present the first in precedence order wins.
 */
export function resolveCoordinateColumns(
  columns: Iterable<string>,
  table: PointRole,
): CoordinateColumns {
  const byNormalized = new Map<string, string>();
  for (const column of columns) {
    const key = normalizeColumnName(column);
    if (!byNormalized.has(key)) byNormalized.set(key, column);
  }

  const lat = firstPresent(byNormalized, LATITUDE_ALIASES);
  const lon = firstPresent(byNormalized, LONGITUDE_ALIASES);

  if (lat === undefined || lon === undefined) {
    const missing: ("lat" | "lon")[] = [];
    if (lat === undefined) missing.push("lat");
    if (lon === undefined) missing.push("lon");
    throw new MissingColumnError(table, missing);
  }

  return { lat, lon };
}

/**
 * Convert a table into CanonicalPoints, one per row, preserving row order.
 *
 * An empty table yields an empty list; there are no columns to check.
 */
export function normalizePoints(
  rows: InputTable,
  options: NormalizeOptions,
): CanonicalPoint[] {
  if (rows.length === 0) return [];

  const columns = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) columns.add(key);
  }

  const coordinateColumns = resolveCoordinateColumns(columns, options.table);
  const identifierColumn =
    options.identifierField !== undefined
      ? findColumn(columns, options.identifierField)
      : undefined;

  return rows.map((row, i) => {
    const position = i + 1;
    const latitude = readCoordinate(
      row[coordinateColumns.lat],
      -90,
      90,
      options.table,
      position,
      coordinateColumns.lat,
    );
    const longitude = readCoordinate(
      row[coordinateColumns.lon],
      -180,
      180,
      options.table,
      position,
      coordinateColumns.lon,
    );
    const identifier =
      identifierColumn !== undefined ? readIdentifier(row[identifierColumn]) : null;
    return { identifier, longitude, latitude };
  });
}

/**
 * Normalize a single-point table (source or final stop).
 *
 * Only the first row is used; the identifier is taken from a `name` column
 * when the caller supplies one.
 */
export function normalizeSinglePoint(
  rows: InputTable,
  table: PointRole,
): CanonicalPoint {
  const [first] = normalizePoints(rows, { table, identifierField: "name" });
  if (!first) throw new MissingPointError(table);
  return first;
}

/** GeoJSON-order coordinate of a point */
export function toLngLat(point: CanonicalPoint): LngLat {
  return [point.longitude, point.latitude];
}

function firstPresent(
  byNormalized: Map<string, string>,
  aliases: readonly string[],
): string | undefined {
  for (const alias of aliases) {
    const column = byNormalized.get(alias);
    if (column !== undefined) return column;
  }
  return undefined;
}

function findColumn(columns: Set<string>, field: string): string | undefined {
  const wanted = normalizeColumnName(field);
  for (const column of columns) {
    if (normalizeColumnName(column) === wanted) return column;
  }
  return undefined;
}

function readCoordinate(
  value: unknown,
  min: number,
  max: number,
  table: PointRole,
  row: number,
  column: string,
): number {
  let n = Number.NaN;
  if (typeof value === "number") {
    n = value;
  } else if (typeof value === "string" && DECIMAL_PATTERN.test(value.trim())) {
    n = Number(value.trim());
  }
  if (!Number.isFinite(n) || n < min || n > max) {
    throw new InvalidCoordinateError(table, row, column, value);
  }
  return n;
}

function readIdentifier(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "number" && Number.isNaN(value)) return null;
  const text = String(value).trim();
  return text === "" ? null : text;
}
