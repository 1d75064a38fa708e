import type { CompassHeading, Coordinate } from '../types/Route';
import { InvalidCoordinateError } from './errors';

/**
 * Spherical-earth geodesy helpers
 * Inputs and outputs are in degrees; all trigonometry runs in radians.
 */

export const EARTH_RADIUS_METERS = 6_371_000;

const COMPASS_POINTS: CompassHeading[] = ['N', 'NE', 'E', 'SE', 'S', 'SW', 'W', 'NW'];

export function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function toDegrees(radians: number): number {
  return (radians * 180) / Math.PI;
}

export function isValidCoordinate(c: Coordinate): boolean {
  return (
    Number.isFinite(c.latitude) &&
    Number.isFinite(c.longitude) &&
    c.latitude >= -90 &&
    c.latitude <= 90 &&
    c.longitude >= -180 &&
    c.longitude <= 180
  );
}

export function assertValidCoordinate(c: Coordinate): void {
  if (!isValidCoordinate(c)) {
    throw new InvalidCoordinateError(c.latitude, c.longitude);
  }
}

/**
 * Great-circle distance in meters (haversine)
 */
export function distance(a: Coordinate, b: Coordinate): number {
  assertValidCoordinate(a);
  assertValidCoordinate(b);

  const phi1 = toRadians(a.latitude);
  const phi2 = toRadians(b.latitude);
  const dPhi = toRadians(b.latitude - a.latitude);
  const dLambda = toRadians(b.longitude - a.longitude);

  const h =
    Math.sin(dPhi / 2) ** 2 +
    Math.cos(phi1) * Math.cos(phi2) * Math.sin(dLambda / 2) ** 2;
  const c = 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));

  return EARTH_RADIUS_METERS * c;
}

export interface BearingResult {
  degrees: number;
  defined: boolean; // false when both points coincide
}

/**
 * Initial great-circle bearing from a toward b
 */
export function computeBearing(a: Coordinate, b: Coordinate): BearingResult {
  assertValidCoordinate(a);
  assertValidCoordinate(b);

  if (a.latitude === b.latitude && a.longitude === b.longitude) {
    return { degrees: 0, defined: false };
  }

  const phi1 = toRadians(a.latitude);
  const phi2 = toRadians(b.latitude);
  const dLambda = toRadians(b.longitude - a.longitude);

  const x = Math.sin(dLambda) * Math.cos(phi2);
  const y =
    Math.cos(phi1) * Math.sin(phi2) -
    Math.sin(phi1) * Math.cos(phi2) * Math.cos(dLambda);

  return { degrees: (toDegrees(Math.atan2(x, y)) + 360) % 360, defined: true };
}

/**
 * Initial bearing in degrees [0, 360); 0 for coincident points
 */
export function bearing(a: Coordinate, b: Coordinate): number {
  return computeBearing(a, b).degrees;
}

/**
 * Project a point along a great circle from origin
 */
export function destinationPoint(
  origin: Coordinate,
  bearingDeg: number,
  distanceMeters: number
): Coordinate {
  assertValidCoordinate(origin);

  const delta = distanceMeters / EARTH_RADIUS_METERS;
  const theta = toRadians(bearingDeg);
  const phi1 = toRadians(origin.latitude);
  const lambda1 = toRadians(origin.longitude);

  const sinPhi2 =
    Math.sin(phi1) * Math.cos(delta) +
    Math.cos(phi1) * Math.sin(delta) * Math.cos(theta);
  const phi2 = Math.asin(Math.min(1, Math.max(-1, sinPhi2)));
  const lambda2 =
    lambda1 +
    Math.atan2(
      Math.sin(theta) * Math.sin(delta) * Math.cos(phi1),
      Math.cos(delta) - Math.sin(phi1) * Math.sin(phi2)
    );

  return {
    latitude: toDegrees(phi2),
    // Normalize to [-180, 180)
    longitude: ((toDegrees(lambda2) + 540) % 360) - 180,
  };
}

/**
 * Map a bearing to one of eight compass points
 */
export function headingFromBearing(bearingDeg: number): CompassHeading {
  const normalized = ((bearingDeg % 360) + 360) % 360;
  return COMPASS_POINTS[Math.floor((normalized + 22.5) / 45) % 8];
}

// =============================================================================
// Output rounding (response boundary only)
// =============================================================================

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function roundCoordinate(c: Coordinate): Coordinate {
  return {
    latitude: roundTo(c.latitude, 6),
    longitude: roundTo(c.longitude, 6),
  };
}
