import {
  Coordinate,
  Eta,
  MovementStatus,
  PositionSource,
  Route,
  RouteProgress,
  SegmentRef,
  SimulatedPosition,
  Waypoint,
} from '../types/Route';
import { InvalidRouteError } from '../utils/errors';
import { computeBearing, distance, headingFromBearing } from '../utils/geoMath';
import { createLogger } from '../utils/logger';
import { interpolate, secondsBetween } from './Interpolator';

/**
 * Position Simulator
 * Answers "where was the object at time T?" for a recorded route.
 * Segment indexes in results refer to the route in timestamp order.
 */

interface SegmentMotion {
  speed: number;
  bearing: number;
  degenerate: boolean;
}

const STILL: SegmentMotion = { speed: 0, bearing: 0, degenerate: false };

interface Travel {
  progress: RouteProgress;
  eta: Eta;
  distanceToNextWaypointMeters: number | null;
}

/**
 * The route in timestamp order (stable for equal timestamps).
 * An already ordered route is returned as is.
 */
export function orderByTime(route: Route): Route {
  if (route.length === 0) {
    throw new InvalidRouteError();
  }
  let ordered = true;
  for (let i = 1; i < route.length && ordered; i++) {
    ordered = route[i].timestamp.getTime() >= route[i - 1].timestamp.getTime();
  }
  if (ordered) {
    return route;
  }
  return [...route].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

/**
 * Index of the last waypoint at or before t, or -1 when t precedes the route
 */
export function locateSegment(ordered: readonly Waypoint[], t: Date): number {
  const target = t.getTime();
  let lo = 0;
  let hi = ordered.length - 1;
  let found = -1;

  while (lo <= hi) {
    const mid = (lo + hi) >>> 1;
    if (ordered[mid].timestamp.getTime() <= target) {
      found = mid;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }

  return found;
}

/**
 * Same answer as locateSegment, scanning forward from a previous result.
 * Only valid when queries arrive in non-decreasing order.
 */
function advanceCursor(ordered: readonly Waypoint[], t: Date, cursor: number): number {
  const target = t.getTime();
  let index = cursor;
  while (index + 1 < ordered.length && ordered[index + 1].timestamp.getTime() <= target) {
    index++;
  }
  return index;
}

function isNonDecreasing(timestamps: readonly Date[]): boolean {
  for (let i = 1; i < timestamps.length; i++) {
    if (timestamps[i].getTime() < timestamps[i - 1].getTime()) {
      return false;
    }
  }
  return true;
}

function segmentMotion(from: Waypoint, to: Waypoint): SegmentMotion {
  const duration = secondsBetween(from.timestamp, to.timestamp);
  const bearing = computeBearing(from.coordinate, to.coordinate).degrees;
  if (duration <= 0) {
    return { speed: 0, bearing, degenerate: true };
  }
  return {
    speed: distance(from.coordinate, to.coordinate) / duration,
    bearing,
    degenerate: false,
  };
}

function movementStatus(source: PositionSource, speed: number): MovementStatus {
  if (source === PositionSource.EXTRAPOLATED_BEFORE) return 'not_started';
  if (source === PositionSource.EXTRAPOLATED_AFTER) return 'completed';
  return speed > 0 ? 'moving' : 'parked';
}

function minutesBetween(from: Date, to: Date): number {
  return secondsBetween(from, to) / 60;
}

/**
 * Progress and arrival times once `completed` waypoints are behind and `along`
 * segments (fractional) have been covered
 */
function travelState(
  ordered: Route,
  t: Date,
  completed: number,
  along: number,
  distanceToNextWaypointMeters: number | null
): Travel {
  const total = ordered.length;
  const last = total - 1;
  const next = completed < total ? ordered[completed] : null;
  const destination = ordered[last].timestamp;

  return {
    progress: {
      overallPercent: last === 0 ? (completed > 0 ? 100 : 0) : (along / last) * 100,
      completedWaypoints: completed,
      remainingWaypoints: total - completed,
      totalWaypoints: total,
    },
    eta: {
      nextWaypoint: next ? next.timestamp : null,
      finalDestination: destination,
      minutesToNextWaypoint: next ? minutesBetween(t, next.timestamp) : null,
      minutesToDestination: Math.max(0, minutesBetween(t, destination)),
    },
    distanceToNextWaypointMeters,
  };
}

function buildPosition(
  t: Date,
  coordinate: Coordinate,
  source: PositionSource,
  motion: SegmentMotion,
  segment: SegmentRef | null,
  travel: Travel
): SimulatedPosition {
  return {
    coordinate,
    timestamp: t,
    interpolated: source === PositionSource.INTERPOLATED,
    bearing: motion.bearing,
    heading: headingFromBearing(motion.bearing),
    speed: motion.speed,
    source,
    status: movementStatus(source, motion.speed),
    segment,
    degenerate: motion.degenerate,
    ...travel,
  };
}

export class PositionSimulator {
  private readonly logger = createLogger({ component: 'PositionSimulator' });

  /**
   * Position at a single instant
   */
  simulateOne(route: Route, timestamp: Date): SimulatedPosition {
    const ordered = orderByTime(route);
    return this.resolve(ordered, timestamp, locateSegment(ordered, timestamp));
  }

  /**
   * One position per timestamp, in input order.
   * Sorted queries walk a cursor forward; unsorted ones fall back to binary search.
   */
  simulateBatch(route: Route, timestamps: readonly Date[]): SimulatedPosition[] {
    const ordered = orderByTime(route);
    const sorted = isNonDecreasing(timestamps);
    let cursor = -1;

    const positions = timestamps.map((t) => {
      const index = sorted
        ? advanceCursor(ordered, t, cursor)
        : locateSegment(ordered, t);
      cursor = index;
      return this.resolve(ordered, t, index);
    });

    this.logger.debug({
      waypoints: ordered.length,
      queries: timestamps.length,
      cursorScan: sorted,
    }, 'Simulated position batch');

    return positions;
  }

  private resolve(ordered: Route, t: Date, index: number): SimulatedPosition {
    const last = ordered.length - 1;

    if (index === -1) {
      const first = ordered[0];
      const motion = last > 0 ? segmentMotion(first, ordered[1]) : STILL;
      const segment = last > 0 ? { fromIndex: 0, toIndex: 1, fraction: 0 } : null;
      return buildPosition(t, first.coordinate, PositionSource.EXTRAPOLATED_BEFORE, motion, segment,
        travelState(ordered, t, 0, 0, 0));
    }

    const current = ordered[index];

    // Exact hit on a waypoint: echo it, take motion from the outgoing segment when there is one
    if (current.timestamp.getTime() === t.getTime()) {
      const outgoing = index < last;
      const arrived = travelState(ordered, t, index + 1, index,
        outgoing ? distance(current.coordinate, ordered[index + 1].coordinate) : null);
      if (last === 0) {
        return buildPosition(t, current.coordinate, PositionSource.EXACT_MATCH, STILL, null, arrived);
      }
      const fromIndex = outgoing ? index : index - 1;
      const motion = segmentMotion(ordered[fromIndex], ordered[fromIndex + 1]);
      const segment = { fromIndex, toIndex: fromIndex + 1, fraction: outgoing ? 0 : 1 };
      return buildPosition(t, current.coordinate, PositionSource.EXACT_MATCH, motion, segment, arrived);
    }

    if (index === last) {
      const lastWaypoint = ordered[last];
      const motion = last > 0 ? segmentMotion(ordered[last - 1], lastWaypoint) : STILL;
      const segment = last > 0 ? { fromIndex: last - 1, toIndex: last, fraction: 1 } : null;
      return buildPosition(t, lastWaypoint.coordinate, PositionSource.EXTRAPOLATED_AFTER, motion, segment,
        travelState(ordered, t, last + 1, last, null));
    }

    const next = ordered[index + 1];
    const result = interpolate(current, next, t);
    return buildPosition(
      t,
      result.coordinate,
      result.source,
      { speed: result.speed, bearing: result.bearing, degenerate: result.degenerate },
      { fromIndex: index, toIndex: index + 1, fraction: result.fraction },
      travelState(ordered, t, index + 1, index + result.fraction, result.segmentDistance * (1 - result.fraction))
    );
  }
}

const defaultSimulator = new PositionSimulator();

export function simulatePosition(route: Route, timestamp: Date): SimulatedPosition {
  return defaultSimulator.simulateOne(route, timestamp);
}

export function simulatePositionsBatch(
  route: Route,
  timestamps: readonly Date[]
): SimulatedPosition[] {
  return defaultSimulator.simulateBatch(route, timestamps);
}
