/**
 * Core types for route simulation and analysis
 * Everything here is a plain, serializable value
 */

export interface Coordinate {
  readonly latitude: number;
  readonly longitude: number;
}

export interface Waypoint {
  readonly id: string;
  readonly coordinate: Coordinate;
  readonly timestamp: Date;
  readonly altitude?: number; // meters
  readonly speed?: number; // m/s, as reported by the source
  readonly isParking?: boolean;
  readonly parkingDurationMinutes?: number;
}

export type Route = readonly Waypoint[];

// =============================================================================
// Simulation
// =============================================================================

export const PositionSource = {
  INTERPOLATED: 'INTERPOLATED',
  EXTRAPOLATED_BEFORE: 'EXTRAPOLATED_BEFORE',
  EXTRAPOLATED_AFTER: 'EXTRAPOLATED_AFTER',
  EXACT_MATCH: 'EXACT_MATCH',
} as const;

export type PositionSource = typeof PositionSource[keyof typeof PositionSource];

export type CompassHeading = 'N' | 'NE' | 'E' | 'SE' | 'S' | 'SW' | 'W' | 'NW';

export type MovementStatus = 'not_started' | 'moving' | 'parked' | 'completed';

export interface SegmentRef {
  fromIndex: number;
  toIndex: number;
  fraction: number; // 0..1 progress through the segment
}

export interface RouteProgress {
  overallPercent: number;
  completedWaypoints: number; // waypoints at or before the query time
  remainingWaypoints: number;
  totalWaypoints: number;
}

export interface Eta {
  nextWaypoint: Date | null;
  finalDestination: Date;
  minutesToNextWaypoint: number | null;
  minutesToDestination: number;
}

export interface SimulatedPosition {
  coordinate: Coordinate;
  timestamp: Date; // echo of the query
  interpolated: boolean;
  bearing: number; // degrees [0, 360)
  heading: CompassHeading;
  speed: number; // m/s
  source: PositionSource;
  status: MovementStatus;
  segment: SegmentRef | null;
  degenerate: boolean; // bracketing pair has zero duration
  progress: RouteProgress;
  eta: Eta;
  distanceToNextWaypointMeters: number | null;
}

// =============================================================================
// Analysis
// =============================================================================

export type AnomalyKind =
  | 'NON_MONOTONIC_TIME'
  | 'DUPLICATE_TIMESTAMP'
  | 'DUPLICATE_POINT'
  | 'TELEPORT'
  | 'STATIONARY_GAP'
  | 'OUT_OF_BOUNDS';

export type AnomalySeverity = 'warning' | 'error';

export interface Anomaly {
  kind: AnomalyKind;
  waypointIndexes: number[];
  severity: AnomalySeverity;
  message: string;
}

export interface AnalyzerThresholds {
  maxPlausibleSpeedMps: number;
  minMovementMeters: number;
  stationaryThresholdSeconds: number;
}

export interface SegmentStats {
  segmentNumber: number; // 1-based
  fromIndex: number;
  toIndex: number;
  distanceMeters: number;
  durationSeconds: number;
  speedMps: number | null; // null when the duration is not positive
  bearing: number;
}

export interface RouteBounds {
  northeast: Coordinate;
  southwest: Coordinate;
  center: Coordinate;
}

export interface ParkingStop {
  waypointIndex: number;
  id: string;
  coordinate: Coordinate;
  durationMinutes: number | null;
}

export interface ParkingAnalysis {
  totalStops: number;
  totalParkingMinutes: number;
  averageParkingMinutes: number | null;
  longestParkingMinutes: number | null;
  locations: ParkingStop[];
}

export type SpeedBucket = '0-20_kmh' | '20-40_kmh' | '40-60_kmh' | '60+_kmh';

export interface AnalysisReport {
  waypointCount: number;
  startTime: Date;
  endTime: Date;
  totalDistanceMeters: number;
  durationSeconds: number;
  averageSpeedMps: number;
  maxSpeedMps: number;
  minSpeedMps: number;
  medianSpeedMps: number;
  speedDistribution: Record<SpeedBucket, number>;
  bounds: RouteBounds | null;
  segments: SegmentStats[];
  parking: ParkingAnalysis;
  anomalies: Anomaly[];
  valid: boolean;
}
