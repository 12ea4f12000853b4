import { InvalidInputError } from './errors.js';
import type { Flight } from './route-types.js';

const EMPTY: readonly Flight[] = Object.freeze([]);

/**
 * Departure-ordered adjacency index over one search's flight snapshot.
 * Built fresh per request and never mutated afterwards.
 */
export class FlightGraph {
  private readonly departures: ReadonlyMap<string, readonly Flight[]>;
  private readonly knownAirports: ReadonlySet<string>;
  readonly size: number;

  constructor(departures: ReadonlyMap<string, readonly Flight[]>, airports: ReadonlySet<string>, size: number) {
    this.departures = departures;
    this.knownAirports = airports;
    this.size = size;
  }

  /**
   * Flights leaving `code`, ordered by departure time then flight id
   */
  departuresFrom(code: string): readonly Flight[] {
    return this.departures.get(code) ?? EMPTY;
  }

  hasAirport(code: string): boolean {
    return this.knownAirports.has(code);
  }

  airports(): string[] {
    return [...this.knownAirports].sort();
  }
}

export function isSearchable(flight: Flight): boolean {
  return flight.status === 'scheduled' && flight.bookable;
}

export function compareByDeparture(a: Flight, b: Flight): number {
  if (a.departureTime !== b.departureTime) {
    return a.departureTime - b.departureTime;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function assertFlightIntegrity(flight: Flight): void {
  if (!flight.id) {
    throw new InvalidInputError('Flight without an id');
  }
  if (!flight.origin || !flight.destination) {
    throw new InvalidInputError(`Flight ${flight.id} is missing an airport code`);
  }
  if (!Number.isFinite(flight.departureTime) || !Number.isFinite(flight.arrivalTime)) {
    throw new InvalidInputError(`Flight ${flight.id} has an invalid timestamp`);
  }
  if (flight.arrivalTime <= flight.departureTime) {
    throw new InvalidInputError(`Flight ${flight.id} arrives before it departs`);
  }
  if (!Number.isSafeInteger(flight.price) || flight.price < 0) {
    throw new InvalidInputError(`Flight ${flight.id} has an invalid price`);
  }
}

/**
 * Index a snapshot by origin airport.
 *
 * The whole snapshot is checked before filtering, so a duplicate id or an
 * impossible schedule fails the request even on a flight that would not be
 * searched. Only scheduled, bookable flights are indexed.
 */
export function buildFlightGraph(flights: readonly Flight[]): FlightGraph {
  const seen = new Set<string>();
  for (const flight of flights) {
    assertFlightIntegrity(flight);
    if (seen.has(flight.id)) {
      throw new InvalidInputError(`Duplicate flight id: ${flight.id}`);
    }
    seen.add(flight.id);
  }

  const departures = new Map<string, Flight[]>();
  const airports = new Set<string>();
  let size = 0;

  for (const flight of flights) {
    if (!isSearchable(flight)) continue;

    const list = departures.get(flight.origin);
    if (list) {
      list.push(flight);
    } else {
      departures.set(flight.origin, [flight]);
    }
    airports.add(flight.origin);
    airports.add(flight.destination);
    size++;
  }

  for (const list of departures.values()) {
    list.sort(compareByDeparture);
  }

  return new FlightGraph(departures, airports, size);
}
