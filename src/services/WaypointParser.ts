import { z } from 'zod';
import { AnalyzerThresholds, Route } from '../types/Route';
import { ParseIssue, WaypointParseError } from '../utils/errors';
import { assertValidCoordinate } from '../utils/geoMath';
import { createWaypoint } from '../utils/waypointUtils';

/**
 * Boundary parsing: plain JSON records into typed, frozen waypoints.
 * Schema checks only; physical plausibility is the analyzer's job.
 */

const ZONE_SUFFIX = /(Z|[+-]\d{2}(:?\d{2})?)$/i;

// ISO-8601 (no zone means UTC), or epoch milliseconds
export const timestampSchema = z.union([
  z.string()
    .datetime({ offset: true, local: true })
    .transform((value) => new Date(ZONE_SUFFIX.test(value) ? value : `${value}Z`)),
  z.number().int().transform((value) => new Date(value)),
]).refine((date) => !Number.isNaN(date.getTime()), { message: 'Invalid timestamp' });

export const waypointInputSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).optional(),
  latitude: z.number().finite(),
  longitude: z.number().finite(),
  timestamp: timestampSchema,
  altitude: z.number().finite().optional(),
  speed: z.number().finite().min(0).optional(),
  isParking: z.boolean().optional(),
  parkingDurationMinutes: z.number().finite().min(0).optional(),
});

export const thresholdsSchema = z.object({
  maxPlausibleSpeedMps: z.number().positive().optional(),
  minMovementMeters: z.number().min(0).optional(),
  stationaryThresholdSeconds: z.number().min(0).optional(),
}).strict();

export const routeRequestSchema = z.object({
  waypoints: z.array(waypointInputSchema),
  thresholds: thresholdsSchema.optional(),
});

export const positionRequestSchema = z.object({
  waypoints: z.array(waypointInputSchema),
  timestamp: timestampSchema,
});

export const batchPositionsRequestSchema = z.object({
  waypoints: z.array(waypointInputSchema),
  timestamps: z.array(timestampSchema).min(1).max(10_000),
});

export interface ParseOptions {
  /** Reject out-of-range coordinates instead of leaving them for the analyzer */
  strictCoordinates?: boolean;
}

export interface RouteRequest {
  route: Route;
  thresholds: Partial<AnalyzerThresholds>;
}

export interface PositionRequest {
  route: Route;
  timestamp: Date;
}

export interface BatchPositionsRequest {
  route: Route;
  timestamps: Date[];
}

function toIssues(error: z.ZodError): ParseIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

function parseWith<T extends z.ZodTypeAny>(schema: T, payload: unknown): z.output<T> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new WaypointParseError(toIssues(result.error));
  }
  return result.data;
}

function buildRoute(
  waypoints: z.output<typeof waypointInputSchema>[],
  options: ParseOptions
): Route {
  const route = waypoints.map((w) => {
    const waypoint = createWaypoint({
      ...w,
      id: w.id === undefined ? undefined : String(w.id),
    });
    if (options.strictCoordinates) {
      assertValidCoordinate(waypoint.coordinate);
    }
    return waypoint;
  });
  return Object.freeze(route);
}

export function parseWaypoints(payload: unknown, options: ParseOptions = {}): Route {
  return buildRoute(parseWith(z.array(waypointInputSchema), payload), options);
}

export function parseRouteRequest(payload: unknown, options: ParseOptions = {}): RouteRequest {
  const body = parseWith(routeRequestSchema, payload);
  return {
    route: buildRoute(body.waypoints, options),
    thresholds: body.thresholds ?? {},
  };
}

export function parsePositionRequest(payload: unknown): PositionRequest {
  const body = parseWith(positionRequestSchema, payload);
  return {
    route: buildRoute(body.waypoints, { strictCoordinates: true }),
    timestamp: body.timestamp,
  };
}

export function parseBatchPositionsRequest(payload: unknown): BatchPositionsRequest {
  const body = parseWith(batchPositionsRequestSchema, payload);
  return {
    route: buildRoute(body.waypoints, { strictCoordinates: true }),
    timestamps: body.timestamps,
  };
}
