/**
 * Error hierarchy for the route planning pipeline.
 *
 * Callers catch `RoutePlanningError` and show `message` as-is. `status`
 * is the HTTP status the server answers with.
 */

import type { PointRole } from "@surface-route/types";

export class RoutePlanningError extends Error {
  readonly status: number;

  constructor(message: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RoutePlanningError";
    this.status = status;
  }
}

/** An input table has no resolvable latitude/longitude columns */
export class MissingColumnError extends RoutePlanningError {
  readonly table: PointRole;
  readonly missing: ("lat" | "lon")[];

  constructor(table: PointRole, missing: ("lat" | "lon")[]) {
    const needed = missing.map((axis) => AXIS_ALIASES[axis]).join(" and ");
    super(`Missing column: the ${tableLabel(table)} table needs ${needed} column.`, 422);
    this.name = "MissingColumnError";
    this.table = table;
    this.missing = missing;
  }
}

/** A coordinate cell is not a number, or is out of range */
export class InvalidCoordinateError extends RoutePlanningError {
  readonly table: PointRole;
  /** 1-based row position */
  readonly row: number;

  constructor(table: PointRole, row: number, column: string, value: unknown) {
    super(
      `Invalid coordinate: row ${row} of the ${tableLabel(table)} table has ` +
        `${column} = ${JSON.stringify(value) ?? String(value)}.`,
      422,
    );
    this.name = "InvalidCoordinateError";
    this.table = table;
    this.row = row;
  }
}

/** The source or final-stop table has no rows */
export class MissingPointError extends RoutePlanningError {
  readonly table: PointRole;

  constructor(table: PointRole) {
    super(`Missing point: the ${tableLabel(table)} table is empty.`, 422);
    this.name = "MissingPointError";
    this.table = table;
  }
}

export class EmptyDestinationsError extends RoutePlanningError {
  constructor() {
    super("No destinations: at least one destination is required.", 422);
    this.name = "EmptyDestinationsError";
  }
}

/** A named point is too far from the road network to be routed */
export class UnroutableLocationError extends RoutePlanningError {
  readonly locationName: string;

  constructor(locationName: string, options?: { cause?: unknown }) {
    super(
      `Unroutable Location: The point named '${locationName}' could not be reached. ` +
        "Places that are more than 500m from a road are considered to be unreachable!",
      422,
      options,
    );
    this.name = "UnroutableLocationError";
    this.locationName = locationName;
  }
}

/** Any other failure of an external service; `message` is the service's own */
export class ServiceError extends RoutePlanningError {
  /** Status the service answered with, or null (network failure, bad shape) */
  readonly serviceStatus: number | null;

  constructor(
    message: string,
    serviceStatus: number | null,
    options?: { cause?: unknown },
  ) {
    super(message, 502, options);
    this.name = "ServiceError";
    this.serviceStatus = serviceStatus;
  }
}

const AXIS_ALIASES = {
  lat: "a latitude (lat, latitude or y)",
  lon: "a longitude (lon, longitude or x)",
} as const;

function tableLabel(table: PointRole): string {
  switch (table) {
    case "source":
      return "starting point";
    case "final-stop":
      return "final stop";
    case "destination":
      return "destinations";
  }
}
