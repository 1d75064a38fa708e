/**
 * Error taxonomy for the route engine.
 * Each error carries the HTTP status the API answers with.
 */
export class RouteEngineError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

/**
 * An operation that needs at least one waypoint was given none
 */
export class InvalidRouteError extends RouteEngineError {
  constructor(message = 'Route must contain at least one waypoint') {
    super(message, 422);
  }
}

/**
 * A coordinate outside the valid latitude/longitude range was passed to a geo primitive
 */
export class InvalidCoordinateError extends RouteEngineError {
  readonly latitude: number;
  readonly longitude: number;

  constructor(latitude: number, longitude: number) {
    super(`Invalid coordinate (${latitude}, ${longitude})`, 422);
    this.latitude = latitude;
    this.longitude = longitude;
  }
}

export interface ParseIssue {
  path: string;
  message: string;
}

/**
 * Request payload failed schema validation
 */
export class WaypointParseError extends RouteEngineError {
  readonly issues: ParseIssue[];

  constructor(issues: ParseIssue[]) {
    super('Invalid waypoint payload', 400);
    this.issues = issues;
  }
}
