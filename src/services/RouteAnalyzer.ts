import {
  AnalysisReport,
  AnalyzerThresholds,
  Anomaly,
  Coordinate,
  ParkingAnalysis,
  ParkingStop,
  Route,
  RouteBounds,
  SegmentStats,
  SpeedBucket,
} from '../types/Route';
import { InvalidRouteError } from '../utils/errors';
import { bearing, distance, isValidCoordinate } from '../utils/geoMath';
import { createLogger } from '../utils/logger';
import { secondsBetween } from './Interpolator';

/**
 * Route Analyzer / Validator
 * Walks consecutive waypoint pairs once, accumulating statistics and anomalies.
 * Anomalies are findings in the report; only an empty route throws.
 */

export const DEFAULT_THRESHOLDS: AnalyzerThresholds = {
  maxPlausibleSpeedMps: 340, // ~speed of sound
  minMovementMeters: 1,
  stationaryThresholdSeconds: Number.POSITIVE_INFINITY,
};

const MPS_TO_KMH = 3.6;

export function speedBucket(speedMps: number): SpeedBucket {
  const kmh = speedMps * MPS_TO_KMH;
  if (kmh < 20) return '0-20_kmh';
  if (kmh < 40) return '20-40_kmh';
  if (kmh < 60) return '40-60_kmh';
  return '60+_kmh';
}

/**
 * Bounding box of the valid coordinates, null when there are none
 */
export function findRouteBounds(route: Route): RouteBounds | null {
  const coords: Coordinate[] = route
    .map((w) => w.coordinate)
    .filter(isValidCoordinate);
  if (coords.length === 0) {
    return null;
  }

  let north = -90;
  let south = 90;
  let east = -180;
  let west = 180;
  for (const { latitude, longitude } of coords) {
    north = Math.max(north, latitude);
    south = Math.min(south, latitude);
    east = Math.max(east, longitude);
    west = Math.min(west, longitude);
  }
  const northeast = { latitude: north, longitude: east };
  const southwest = { latitude: south, longitude: west };

  return {
    northeast,
    southwest,
    center: {
      latitude: (northeast.latitude + southwest.latitude) / 2,
      longitude: (northeast.longitude + southwest.longitude) / 2,
    },
  };
}

/**
 * Base thresholds overlaid with the provided values; undefined entries keep the base
 */
export function resolveThresholds(
  overrides: Partial<AnalyzerThresholds> = {},
  base: AnalyzerThresholds = DEFAULT_THRESHOLDS
): AnalyzerThresholds {
  return {
    maxPlausibleSpeedMps: overrides.maxPlausibleSpeedMps ?? base.maxPlausibleSpeedMps,
    minMovementMeters: overrides.minMovementMeters ?? base.minMovementMeters,
    stationaryThresholdSeconds: overrides.stationaryThresholdSeconds ?? base.stationaryThresholdSeconds,
  };
}

/**
 * Waypoints flagged as parking stops.
 * A stop without a reported duration is timed until the next waypoint.
 */
export function analyzeParking(route: Route): ParkingAnalysis {
  const locations: ParkingStop[] = [];

  route.forEach((waypoint, index) => {
    if (!waypoint.isParking) return;

    let durationMinutes: number | null = waypoint.parkingDurationMinutes ?? null;
    const next = route[index + 1];
    if (durationMinutes === null && next) {
      const dwell = secondsBetween(waypoint.timestamp, next.timestamp) / 60;
      durationMinutes = dwell > 0 ? dwell : null;
    }

    locations.push({
      waypointIndex: index,
      id: waypoint.id,
      coordinate: waypoint.coordinate,
      durationMinutes,
    });
  });

  const durations = locations
    .map((stop) => stop.durationMinutes)
    .filter((minutes): minutes is number => minutes !== null);
  const totalParkingMinutes = durations.reduce((sum, minutes) => sum + minutes, 0);

  return {
    totalStops: locations.length,
    totalParkingMinutes,
    averageParkingMinutes: durations.length > 0 ? totalParkingMinutes / durations.length : null,
    longestParkingMinutes: durations.length > 0 ? durations.reduce((max, m) => Math.max(max, m), 0) : null,
    locations,
  };
}

function median(values: number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

export class RouteAnalyzer {
  private readonly logger = createLogger({ component: 'RouteAnalyzer' });

  analyze(route: Route, overrides: Partial<AnalyzerThresholds> = {}): AnalysisReport {
    if (route.length === 0) {
      throw new InvalidRouteError();
    }

    const thresholds = resolveThresholds(overrides);
    const anomalies: Anomaly[] = [];
    const segments: SegmentStats[] = [];
    const speeds: number[] = [];
    const reportedOutOfBounds = new Set<number>();
    let totalDistance = 0;

    const flagOutOfBounds = (index: number): boolean => {
      const { latitude, longitude } = route[index].coordinate;
      if (isValidCoordinate(route[index].coordinate)) {
        return false;
      }
      if (!reportedOutOfBounds.has(index)) {
        reportedOutOfBounds.add(index);
        anomalies.push({
          kind: 'OUT_OF_BOUNDS',
          waypointIndexes: [index],
          severity: 'error',
          message: `Waypoint ${index} has coordinates out of range (${latitude}, ${longitude})`,
        });
      }
      return true;
    };

    for (let i = 0; i < route.length - 1; i++) {
      const from = route[i];
      const to = route[i + 1];
      const pair = [i, i + 1];

      // Evaluate both so each bad endpoint is reported
      const fromInvalid = flagOutOfBounds(i);
      const toInvalid = flagOutOfBounds(i + 1);
      const segDuration = secondsBetween(from.timestamp, to.timestamp);

      // Time ordering needs no coordinates
      if (segDuration < 0) {
        anomalies.push({
          kind: 'NON_MONOTONIC_TIME',
          waypointIndexes: pair,
          severity: 'error',
          message: `Waypoint ${i + 1} is ${Math.abs(segDuration)}s earlier than waypoint ${i}`,
        });
      }

      if (fromInvalid || toInvalid) {
        continue;
      }

      const segDistance = distance(from.coordinate, to.coordinate);
      let segSpeed: number | null = null;
      totalDistance += segDistance;

      if (segDuration === 0) {
        if (segDistance >= thresholds.minMovementMeters) {
          anomalies.push({
            kind: 'TELEPORT',
            waypointIndexes: pair,
            severity: 'error',
            message: `Moved ${segDistance.toFixed(1)}m between waypoints ${i} and ${i + 1} in zero time`,
          });
        } else if (segDistance > 0) {
          anomalies.push({
            kind: 'DUPLICATE_TIMESTAMP',
            waypointIndexes: pair,
            severity: 'error',
            message: `Waypoints ${i} and ${i + 1} share a timestamp at different positions`,
          });
        } else {
          anomalies.push({
            kind: 'DUPLICATE_POINT',
            waypointIndexes: pair,
            severity: 'warning',
            message: `Waypoints ${i} and ${i + 1} are identical in position and time`,
          });
        }
      } else if (segDuration > 0) {
        segSpeed = segDistance / segDuration;
        speeds.push(segSpeed);

        if (segSpeed > thresholds.maxPlausibleSpeedMps) {
          anomalies.push({
            kind: 'TELEPORT',
            waypointIndexes: pair,
            severity: 'error',
            message: `Speed ${segSpeed.toFixed(1)} m/s between waypoints ${i} and ${i + 1} exceeds ${thresholds.maxPlausibleSpeedMps} m/s`,
          });
        } else if (
          segDistance < thresholds.minMovementMeters &&
          segDuration > thresholds.stationaryThresholdSeconds
        ) {
          anomalies.push({
            kind: 'STATIONARY_GAP',
            waypointIndexes: pair,
            severity: 'warning',
            message: `Stationary for ${segDuration}s between waypoints ${i} and ${i + 1}`,
          });
        }
      }

      segments.push({
        segmentNumber: segments.length + 1,
        fromIndex: i,
        toIndex: i + 1,
        distanceMeters: segDistance,
        durationSeconds: segDuration,
        speedMps: segSpeed,
        bearing: bearing(from.coordinate, to.coordinate),
      });
    }

    const startTime = route[0].timestamp;
    const endTime = route[route.length - 1].timestamp;
    const durationSeconds = secondsBetween(startTime, endTime);

    const speedDistribution: Record<SpeedBucket, number> = {
      '0-20_kmh': 0,
      '20-40_kmh': 0,
      '40-60_kmh': 0,
      '60+_kmh': 0,
    };
    for (const speed of speeds) {
      speedDistribution[speedBucket(speed)] += 1;
    }

    const report: AnalysisReport = {
      waypointCount: route.length,
      startTime,
      endTime,
      totalDistanceMeters: totalDistance,
      durationSeconds,
      averageSpeedMps: durationSeconds > 0 ? totalDistance / durationSeconds : 0,
      maxSpeedMps: speeds.reduce((max, s) => Math.max(max, s), 0),
      minSpeedMps: speeds.length > 0 ? speeds.reduce((min, s) => Math.min(min, s), Infinity) : 0,
      medianSpeedMps: median(speeds),
      speedDistribution,
      bounds: findRouteBounds(route),
      segments,
      parking: analyzeParking(route),
      anomalies,
      valid: !anomalies.some((a) => a.severity === 'error'),
    };

    this.logger.debug({
      waypoints: route.length,
      distanceMeters: Math.round(totalDistance),
      anomalies: anomalies.length,
      valid: report.valid,
    }, 'Route analyzed');

    return report;
  }

  /**
   * Same computation as analyze; callers read `valid` and `anomalies`
   */
  validate(route: Route, overrides: Partial<AnalyzerThresholds> = {}): AnalysisReport {
    return this.analyze(route, overrides);
  }
}

const defaultAnalyzer = new RouteAnalyzer();

export function analyzeRoute(
  route: Route,
  thresholds: Partial<AnalyzerThresholds> = {}
): AnalysisReport {
  return defaultAnalyzer.analyze(route, thresholds);
}

export function validateRoute(
  route: Route,
  thresholds: Partial<AnalyzerThresholds> = {}
): AnalysisReport {
  return defaultAnalyzer.validate(route, thresholds);
}
