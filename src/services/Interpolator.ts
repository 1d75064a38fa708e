import { Coordinate, PositionSource, Waypoint } from '../types/Route';
import { computeBearing, destinationPoint, distance } from '../utils/geoMath';

export interface InterpolationResult {
  coordinate: Coordinate;
  fraction: number;
  speed: number; // m/s, constant across the segment
  bearing: number; // degrees, constant across the segment
  segmentDistance: number; // meters, w0 to w1
  source: PositionSource;
  degenerate: boolean;
}

/**
 * Seconds elapsed between two instants
 */
export function secondsBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / 1000;
}

/**
 * Position at time t on the great circle between w0 and w1.
 * Speed is linear across the segment: consecutive samples carry no acceleration.
 * A zero-duration pair degrades to w0 and is marked degenerate instead of throwing.
 */
export function interpolate(w0: Waypoint, w1: Waypoint, t: Date): InterpolationResult {
  const segDistance = distance(w0.coordinate, w1.coordinate);
  const segBearing = computeBearing(w0.coordinate, w1.coordinate).degrees;
  const segDuration = secondsBetween(w0.timestamp, w1.timestamp);

  if (segDuration <= 0) {
    return {
      coordinate: w0.coordinate,
      fraction: 0,
      speed: 0,
      bearing: segBearing,
      segmentDistance: segDistance,
      source: PositionSource.EXACT_MATCH,
      degenerate: true,
    };
  }

  const elapsed = secondsBetween(w0.timestamp, t);
  const fraction = Math.min(1, Math.max(0, elapsed / segDuration));
  const speed = segDistance / segDuration;

  // Endpoints are echoed exactly rather than recomputed
  if (fraction === 0 || fraction === 1) {
    return {
      coordinate: fraction === 0 ? w0.coordinate : w1.coordinate,
      fraction,
      speed,
      bearing: segBearing,
      segmentDistance: segDistance,
      source: PositionSource.EXACT_MATCH,
      degenerate: false,
    };
  }

  return {
    coordinate: destinationPoint(w0.coordinate, segBearing, segDistance * fraction),
    fraction,
    speed,
    bearing: segBearing,
    segmentDistance: segDistance,
    source: PositionSource.INTERPOLATED,
    degenerate: false,
  };
}
