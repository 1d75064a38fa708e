import crypto from 'crypto';
import { Route, Waypoint } from '../types/Route';

export interface WaypointInit {
  id?: string;
  latitude: number;
  longitude: number;
  timestamp: Date;
  altitude?: number;
  speed?: number;
  isParking?: boolean;
  parkingDurationMinutes?: number;
}

/**
 * Content-based id for a waypoint that arrived without one
 */
export function generateWaypointId(data: Omit<WaypointInit, 'id'>): string {
  const hashContent = JSON.stringify({
    lat: data.latitude.toFixed(6),
    lon: data.longitude.toFixed(6),
    ts: data.timestamp.getTime(),
  });

  return crypto.createHash('sha256').update(hashContent).digest('hex').slice(0, 16);
}

/**
 * Create a frozen Waypoint, generating an id when none is given
 */
export function createWaypoint(data: WaypointInit): Waypoint {
  const waypoint: Waypoint = {
    id: data.id ?? generateWaypointId(data),
    coordinate: Object.freeze({ latitude: data.latitude, longitude: data.longitude }),
    timestamp: new Date(data.timestamp.getTime()),
    ...(data.altitude === undefined ? {} : { altitude: data.altitude }),
    ...(data.speed === undefined ? {} : { speed: data.speed }),
    ...(data.isParking === undefined ? {} : { isParking: data.isParking }),
    ...(data.parkingDurationMinutes === undefined
      ? {}
      : { parkingDurationMinutes: data.parkingDurationMinutes }),
  };
  return Object.freeze(waypoint);
}

/**
 * SHA-256 over the route's positions and times, in order.
 * Lets a client tell whether two uploads describe the same route.
 */
export function routeChecksum(route: Route): string {
  const hash = crypto.createHash('sha256');
  for (const w of route) {
    hash.update(`${w.coordinate.latitude},${w.coordinate.longitude},${w.timestamp.getTime()};`);
  }
  return hash.digest('hex');
}
