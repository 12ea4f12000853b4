export type RouteSearchErrorCode = 'INVALID_QUERY' | 'UNKNOWN_AIRPORT' | 'INVALID_INPUT';

/**
 * Base class for failures surfaced by the route search.
 * `status` is the HTTP status the server answers with.
 */
export class RouteSearchError extends Error {
  readonly code: RouteSearchErrorCode;
  readonly status: number;

  constructor(code: RouteSearchErrorCode, status: number, message: string) {
    super(message);
    this.name = 'RouteSearchError';
    this.code = code;
    this.status = status;
  }
}

// Malformed or semantically invalid request, rejected before any graph work
export class InvalidQueryError extends RouteSearchError {
  constructor(message: string) {
    super('INVALID_QUERY', 400, message);
    this.name = 'InvalidQueryError';
  }
}

export class UnknownAirportError extends RouteSearchError {
  readonly airport: string;

  constructor(airport: string) {
    super('UNKNOWN_AIRPORT', 404, `Unknown airport: ${airport}`);
    this.name = 'UnknownAirportError';
    this.airport = airport;
  }
}

// Catalog data failed an integrity check; the whole request is rejected
export class InvalidInputError extends RouteSearchError {
  constructor(message: string) {
    super('INVALID_INPUT', 502, message);
    this.name = 'InvalidInputError';
  }
}

export function isRouteSearchError(error: unknown): error is RouteSearchError {
  return error instanceof RouteSearchError;
}
