import { InvalidQueryError, UnknownAirportError } from './errors.js';
import type { FlightGraph } from './flight-graph.js';
import type { ConnectionPolicy, Flight, Route, TimeWindow } from './route-types.js';

const MINUTE_MS = 60_000;

export interface RouteSearchRequest {
  origin: string;
  destination: string;
  /** Direct flights and first legs must depart inside this window */
  departureWindow?: TimeWindow;
}

export function createDirectRoute(flight: Flight): Route {
  return {
    id: flight.id,
    legs: [{ flight }],
    totalPrice: flight.price,
    totalDuration: flight.arrivalTime - flight.departureTime,
    transferCount: 0,
    departureTime: flight.departureTime,
    arrivalTime: flight.arrivalTime,
  };
}

export function createConnectingRoute(first: Flight, second: Flight): Route {
  return {
    id: `${first.id}>${second.id}`,
    legs: [{ flight: first }, { flight: second }],
    totalPrice: first.price + second.price,
    totalDuration: second.arrivalTime - first.departureTime,
    transferCount: 1,
    layover: second.departureTime - first.arrivalTime,
    departureTime: first.departureTime,
    arrivalTime: second.arrivalTime,
  };
}

function departsWithin(flight: Flight, window: TimeWindow | undefined): boolean {
  if (!window) return true;
  return flight.departureTime >= window.from && flight.departureTime < window.to;
}

// Index of the first flight departing at or after `time` in a departure-sorted list
function firstDepartureAtOrAfter(flights: readonly Flight[], time: number): number {
  let low = 0;
  let high = flights.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (flights[mid].departureTime < time) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

/**
 * Enumerate every feasible route with at most one connection.
 *
 * Depth is fixed at two legs, so instead of a priority-queue relaxation the
 * search runs a direct pass over the origin's departures and a connecting pass
 * that, for each first leg, scans only the intermediate airport's departures
 * inside [arrival + min, arrival + max].
 */
export function searchRoutes(graph: FlightGraph, request: RouteSearchRequest, policy: ConnectionPolicy): Route[] {
  const { origin, destination, departureWindow } = request;

  if (origin === destination) {
    throw new InvalidQueryError('Origin and destination must differ');
  }
  if (!graph.hasAirport(origin)) {
    throw new UnknownAirportError(origin);
  }
  if (!graph.hasAirport(destination)) {
    throw new UnknownAirportError(destination);
  }

  const minGap = policy.minConnectionMinutes * MINUTE_MS;
  const maxGap = policy.maxConnectionMinutes * MINUTE_MS;
  const routes: Route[] = [];

  const firstLegs = graph.departuresFrom(origin).filter((flight) => departsWithin(flight, departureWindow));

  // Direct pass
  for (const flight of firstLegs) {
    if (flight.destination === destination) {
      routes.push(createDirectRoute(flight));
    }
  }

  // Connecting pass
  for (const first of firstLegs) {
    const via = first.destination;
    if (via === destination || via === origin) continue;

    const onward = graph.departuresFrom(via);
    const earliest = first.arrivalTime + minGap;
    const latest = first.arrivalTime + maxGap;

    for (let i = firstDepartureAtOrAfter(onward, earliest); i < onward.length; i++) {
      const second = onward[i];
      if (second.departureTime > latest) break;
      if (second.destination !== destination || second.id === first.id) continue;
      routes.push(createConnectingRoute(first, second));
    }
  }

  return routes;
}
