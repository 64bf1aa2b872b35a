import { describe, it, expect } from "vitest";
import {
  normalizeColumnName,
  normalizePoints,
  normalizeSinglePoint,
  resolveCoordinateColumns,
} from "./normalize.js";
import {
  InvalidCoordinateError,
  MissingColumnError,
  MissingPointError,
} from "../errors.js";

describe("normalizeColumnName", () => {
  it("lower-cases and trims", () => {
    expect(normalizeColumnName("  Latitude ")).toBe("latitude");
  });

  it("collapses inner whitespace", () => {
    expect(normalizeColumnName("Site \t  ID")).toBe("site id");
  });
});

describe("resolveCoordinateColumns", () => {
  it("resolves each alias pair to the original column names", () => {
    expect(resolveCoordinateColumns(["Y", "X"], "destination")).toEqual({
      lat: "Y",
      lon: "X",
    });
    expect(resolveCoordinateColumns(["LATITUDE", " Longitude"], "destination")).toEqual({
      lat: "LATITUDE",
      lon: " Longitude",
    });
  });

  it("prefers lat over latitude over y", () => {
    expect(resolveCoordinateColumns(["y", "latitude", "lat", "x"], "source").lat).toBe("lat");
    expect(resolveCoordinateColumns(["y", "latitude", "x"], "source").lat).toBe("latitude");
  });

  it("throws MissingColumnError listing the missing axes", () => {
    try {
      resolveCoordinateColumns(["name", "easting"], "final-stop");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MissingColumnError);
      if (err instanceof MissingColumnError) {
        expect(err.missing).toEqual(["lat", "lon"]);
        expect(err.table).toBe("final-stop");
      }
    }
  });

  it("names only the missing axis", () => {
    expect(() => resolveCoordinateColumns(["lat", "name"], "destination")).toThrow(
      "Missing column: the destinations table needs a longitude (lon, longitude or x) column.",
    );
  });
});

describe("normalizePoints", () => {
  const expected = [
    { identifier: "Lake View", longitude: 30.1234, latitude: -1.5678 },
    { identifier: "Hill Top", longitude: 29.9, latitude: -2.01 },
  ];

  it("produces identical points for every alias spelling", () => {
    const tables = [
      [
        { Y: -1.5678, X: 30.1234, Site: "Lake View" },
        { Y: -2.01, X: 29.9, Site: "Hill Top" },
      ],
      [
        { latitude: -1.5678, LONGITUDE: 30.1234, site: "Lake View" },
        { latitude: -2.01, LONGITUDE: 29.9, site: "Hill Top" },
      ],
      [
        { Lat: "-1.5678", lon: " 30.1234 ", "  SITE ": "Lake View" },
        { Lat: "-2.01", lon: "29.9", "  SITE ": "Hill Top" },
      ],
    ];
    for (const rows of tables) {
      expect(normalizePoints(rows, { table: "destination", identifierField: "site" })).toEqual(
        expected,
      );
    }
  });

  it("keeps input row order", () => {
    const rows = [3, 1, 2].map((n) => ({ lat: n, lon: n, id: n }));
    const points = normalizePoints(rows, { table: "destination", identifierField: "id" });
    expect(points.map((p) => p.identifier)).toEqual(["3", "1", "2"]);
  });

  it("uses null identifiers when the column is absent or blank", () => {
    const points = normalizePoints(
      [
        { lat: 1, lon: 2, code: "  " },
        { lat: 1, lon: 2 },
      ],
      { table: "destination", identifierField: "code" },
    );
    expect(points.map((p) => p.identifier)).toEqual([null, null]);
  });

  it("returns an empty list for an empty table", () => {
    expect(normalizePoints([], { table: "destination" })).toEqual([]);
  });

  it("rejects non-numeric and out-of-range coordinates", () => {
    expect(() =>
      normalizePoints([{ lat: "north", lon: 1 }], { table: "destination" }),
    ).toThrow(InvalidCoordinateError);
    expect(() =>
      normalizePoints([{ lat: 1, lon: 1 }, { lat: 91, lon: 1 }], { table: "source" }),
    ).toThrow('Invalid coordinate: row 2 of the starting point table has lat = 91.');
  });

  it("rejects hex and binary literals in coordinate strings", () => {
    expect(() =>
      normalizePoints([{ lat: "0x1E", lon: 1 }], { table: "destination" }),
    ).toThrow('Invalid coordinate: row 1 of the destinations table has lat = "0x1E".');
    expect(() =>
      normalizePoints([{ lat: 1, lon: "0b11" }], { table: "destination" }),
    ).toThrow(InvalidCoordinateError);
  });

  it("accepts signed, leading-dot and exponent decimals", () => {
    const points = normalizePoints(
      [
        { lat: "-1.5", lon: "+30" },
        { lat: ".5", lon: "1e1" },
      ],
      { table: "destination" },
    );
    expect(points.map((p) => [p.longitude, p.latitude])).toEqual([
      [30, -1.5],
      [10, 0.5],
    ]);
  });
});

describe("normalizeSinglePoint", () => {
  it("takes the first row and its name", () => {
    expect(
      normalizeSinglePoint(
        [
          { Latitude: -1.95, Longitude: 30.06, Name: "Depot" },
          { Latitude: 0, Longitude: 0, Name: "Ignored" },
        ],
        "source",
      ),
    ).toEqual({ identifier: "Depot", longitude: 30.06, latitude: -1.95 });
  });

  it("throws MissingPointError for an empty table", () => {
    expect(() => normalizeSinglePoint([], "final-stop")).toThrow(MissingPointError);
  });
});
