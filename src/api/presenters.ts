import { AnalysisReport, Anomaly, SimulatedPosition } from '../types/Route';
import { roundCoordinate, roundTo } from '../utils/geoMath';

/**
 * Response shaping. Rounding happens here and nowhere in the core.
 */

function roundOrNull(value: number | null, decimals: number): number | null {
  return value === null ? null : roundTo(value, decimals);
}

export function presentPosition(position: SimulatedPosition) {
  return {
    coordinate: roundCoordinate(position.coordinate),
    timestamp: position.timestamp.toISOString(),
    interpolated: position.interpolated,
    bearing: roundTo(position.bearing, 1),
    heading: position.heading,
    speed: roundTo(position.speed, 2),
    speedKmh: roundTo(position.speed * 3.6, 2),
    source: position.source,
    status: position.status,
    segment: position.segment && {
      ...position.segment,
      fraction: roundTo(position.segment.fraction, 4),
    },
    degenerate: position.degenerate,
    progress: {
      ...position.progress,
      overallPercent: roundTo(position.progress.overallPercent, 1),
    },
    eta: {
      nextWaypoint: position.eta.nextWaypoint && position.eta.nextWaypoint.toISOString(),
      finalDestination: position.eta.finalDestination.toISOString(),
      minutesToNextWaypoint: roundOrNull(position.eta.minutesToNextWaypoint, 1),
      minutesToDestination: roundTo(position.eta.minutesToDestination, 1),
    },
    distanceToNextWaypointMeters: roundOrNull(position.distanceToNextWaypointMeters, 0),
  };
}

export function presentReport(report: AnalysisReport) {
  return {
    waypointCount: report.waypointCount,
    startTime: report.startTime.toISOString(),
    endTime: report.endTime.toISOString(),
    totalDistanceMeters: Math.round(report.totalDistanceMeters),
    durationSeconds: report.durationSeconds,
    averageSpeedMps: roundTo(report.averageSpeedMps, 2),
    maxSpeedMps: roundTo(report.maxSpeedMps, 2),
    minSpeedMps: roundTo(report.minSpeedMps, 2),
    medianSpeedMps: roundTo(report.medianSpeedMps, 2),
    speedDistribution: report.speedDistribution,
    bounds: report.bounds && {
      northeast: roundCoordinate(report.bounds.northeast),
      southwest: roundCoordinate(report.bounds.southwest),
      center: roundCoordinate(report.bounds.center),
    },
    segments: report.segments.map((segment) => ({
      ...segment,
      distanceMeters: Math.round(segment.distanceMeters),
      speedMps: segment.speedMps === null ? null : roundTo(segment.speedMps, 2),
      bearing: roundTo(segment.bearing, 1),
    })),
    parking: {
      totalStops: report.parking.totalStops,
      totalParkingMinutes: roundTo(report.parking.totalParkingMinutes, 1),
      averageParkingMinutes: roundOrNull(report.parking.averageParkingMinutes, 1),
      longestParkingMinutes: roundOrNull(report.parking.longestParkingMinutes, 1),
      locations: report.parking.locations.map((stop) => ({
        ...stop,
        coordinate: roundCoordinate(stop.coordinate),
        durationMinutes: roundOrNull(stop.durationMinutes, 1),
      })),
    },
    anomalies: report.anomalies,
    valid: report.valid,
  };
}

/**
 * Validation framing: errors and warnings split out, aggregate stats trimmed down
 */
export function presentValidation(report: AnalysisReport) {
  const errors: Anomaly[] = report.anomalies.filter((a) => a.severity === 'error');
  const warnings: Anomaly[] = report.anomalies.filter((a) => a.severity === 'warning');
  const flagged = new Set(errors.flatMap((a) => a.waypointIndexes));

  return {
    valid: report.valid,
    canProceed: report.valid,
    errors,
    warnings,
    statistics: {
      totalWaypoints: report.waypointCount,
      flaggedWaypoints: flagged.size,
      errorsCount: errors.length,
      warningsCount: warnings.length,
    },
  };
}
