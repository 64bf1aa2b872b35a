/**
 * UTM projection on the WGS84 ellipsoid.
 *
 * Lengths and buffers must be metrically accurate, so geometry is projected
 * into the UTM zone covering the data before measuring. The transverse
 * Mercator projection uses Krüger's series to sixth order in the third
 * flattening (Karney 2011), which keeps round-trip error in the nanometre
 * range anywhere inside a zone.
 */

import type { BoundingBox, LngLat, ProjectedPoint, UtmZone } from "@surface-route/types";

const WGS84_A = 6_378_137;
const WGS84_F = 1 / 298.257223563;
const K0 = 0.9996;
const FALSE_EASTING = 500_000;
const FALSE_NORTHING_SOUTH = 10_000_000;

const E = Math.sqrt(WGS84_F * (2 - WGS84_F));
const N = WGS84_F / (2 - WGS84_F);
const N2 = N * N;
const N3 = N2 * N;
const N4 = N3 * N;
const N5 = N4 * N;
const N6 = N5 * N;

/** 2πA is the circumference of a meridian */
const A = (WGS84_A / (1 + N)) * (1 + N2 / 4 + N4 / 64 + N6 / 256);

const ALPHA = [
  N / 2 - (2 * N2) / 3 + (5 * N3) / 16 + (41 * N4) / 180 - (127 * N5) / 288 + (7891 * N6) / 37800,
  (13 * N2) / 48 - (3 * N3) / 5 + (557 * N4) / 1440 + (281 * N5) / 630 - (1983433 * N6) / 1935360,
  (61 * N3) / 240 - (103 * N4) / 140 + (15061 * N5) / 26880 + (167603 * N6) / 181440,
  (49561 * N4) / 161280 - (179 * N5) / 168 + (6601661 * N6) / 7257600,
  (34729 * N5) / 80640 - (3418889 * N6) / 1995840,
  (212378941 * N6) / 319334400,
];

const BETA = [
  N / 2 - (2 * N2) / 3 + (37 * N3) / 96 - N4 / 360 - (81 * N5) / 512 + (96199 * N6) / 604800,
  N2 / 48 + N3 / 15 - (437 * N4) / 1440 + (46 * N5) / 105 - (1118711 * N6) / 3870720,
  (17 * N3) / 480 - (37 * N4) / 840 - (209 * N5) / 4480 + (5569 * N6) / 90720,
  (4397 * N4) / 161280 - (11 * N5) / 504 - (830251 * N6) / 7257600,
  (4583 * N5) / 161280 - (108847 * N6) / 3991680,
  (20648693 * N6) / 638668800,
];

const DEG = Math.PI / 180;

/** Longitude of a zone's central meridian, in degrees */
export function centralMeridian(zone: number): number {
  return (zone - 1) * 6 - 180 + 3;
}

/** Bounding box of a non-empty point set */
export function boundsOf(points: readonly LngLat[]): BoundingBox {
  const bounds: BoundingBox = {
    minLat: Infinity,
    maxLat: -Infinity,
    minLng: Infinity,
    maxLng: -Infinity,
  };
  for (const [lng, lat] of points) {
    bounds.minLng = Math.min(bounds.minLng, lng);
    bounds.maxLng = Math.max(bounds.maxLng, lng);
    bounds.minLat = Math.min(bounds.minLat, lat);
    bounds.maxLat = Math.max(bounds.maxLat, lat);
  }
  return bounds;
}

/**
 * Pick the UTM zone covering a set of points.
 *
 * Uses the centre of their bounding box: zone from its longitude,
 * hemisphere from its latitude.
 */
export function utmZoneFor(points: readonly LngLat[]): UtmZone {
  if (points.length === 0) {
    throw new Error("Cannot choose a UTM zone for an empty point set");
  }
  const bounds = boundsOf(points);
  const centerLng = (bounds.minLng + bounds.maxLng) / 2;
  const centerLat = (bounds.minLat + bounds.maxLat) / 2;
  const zone = Math.min(60, Math.floor((centerLng + 180) / 6) + 1);
  return { zone, south: centerLat < 0 };
}

/** Project a WGS84 coordinate into the given UTM zone */
export function toUtm([lng, lat]: LngLat, zone: UtmZone): ProjectedPoint {
  const phi = lat * DEG;
  const lambda = (lng - centralMeridian(zone.zone)) * DEG;

  const cosLambda = Math.cos(lambda);
  const sinLambda = Math.sin(lambda);

  // Conformal latitude
  const tau = Math.tan(phi);
  const sigma = Math.sinh(E * Math.atanh((E * tau) / Math.sqrt(1 + tau * tau)));
  const tauPrime = tau * Math.sqrt(1 + sigma * sigma) - sigma * Math.sqrt(1 + tau * tau);

  const xiPrime = Math.atan2(tauPrime, cosLambda);
  const etaPrime = Math.asinh(sinLambda / Math.sqrt(tauPrime * tauPrime + cosLambda * cosLambda));

  let xi = xiPrime;
  let eta = etaPrime;
  for (let j = 1; j <= 6; j++) {
    const alpha = ALPHA[j - 1] ?? 0;
    xi += alpha * Math.sin(2 * j * xiPrime) * Math.cosh(2 * j * etaPrime);
    eta += alpha * Math.cos(2 * j * xiPrime) * Math.sinh(2 * j * etaPrime);
  }

  return {
    easting: K0 * A * eta + FALSE_EASTING,
    northing: K0 * A * xi + (zone.south ? FALSE_NORTHING_SOUTH : 0),
  };
}

/** Convert a UTM coordinate back to WGS84 degrees */
export function fromUtm(point: ProjectedPoint, zone: UtmZone): LngLat {
  const x = point.easting - FALSE_EASTING;
  const y = point.northing - (zone.south ? FALSE_NORTHING_SOUTH : 0);

  const eta = x / (K0 * A);
  const xi = y / (K0 * A);

  let xiPrime = xi;
  let etaPrime = eta;
  for (let j = 1; j <= 6; j++) {
    const beta = BETA[j - 1] ?? 0;
    xiPrime -= beta * Math.sin(2 * j * xi) * Math.cosh(2 * j * eta);
    etaPrime -= beta * Math.cos(2 * j * xi) * Math.sinh(2 * j * eta);
  }

  const sinhEtaPrime = Math.sinh(etaPrime);
  const sinXiPrime = Math.sin(xiPrime);
  const cosXiPrime = Math.cos(xiPrime);

  const tauPrime = sinXiPrime / Math.sqrt(sinhEtaPrime * sinhEtaPrime + cosXiPrime * cosXiPrime);

  // Newton-Raphson back from conformal latitude
  let tau = tauPrime;
  for (let iter = 0; iter < 10; iter++) {
    const sigma = Math.sinh(E * Math.atanh((E * tau) / Math.sqrt(1 + tau * tau)));
    const tauI = tau * Math.sqrt(1 + sigma * sigma) - sigma * Math.sqrt(1 + tau * tau);
    const delta =
      ((tauPrime - tauI) / Math.sqrt(1 + tauI * tauI)) *
      ((1 + (1 - E * E) * tau * tau) / ((1 - E * E) * Math.sqrt(1 + tau * tau)));
    tau += delta;
    if (Math.abs(delta) < 1e-12) break;
  }

  const phi = Math.atan(tau);
  const lambda = Math.atan2(sinhEtaPrime, cosXiPrime);

  return [lambda / DEG + centralMeridian(zone.zone), phi / DEG];
}

/** Planar distance between two projected points, in meters */
export function planarDistance(a: ProjectedPoint, b: ProjectedPoint): number {
  return Math.hypot(b.easting - a.easting, b.northing - a.northing);
}
