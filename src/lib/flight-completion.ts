import { type CatalogDocument, resolveAirports, resolveFlight } from './catalog.js';
import { buildFlightGraph } from './flight-graph.js';

export interface CompletionResult {
  document: CatalogDocument;
  completed: string[];
}

/**
 * Mark every scheduled flight that departed before `now` as completed.
 * Returns a new document; the search only ever reads the resulting status.
 */
export function markDepartedFlights(document: CatalogDocument, now: number): CompletionResult {
  const airports = resolveAirports(document);
  const completed: string[] = [];

  const flights = document.flights.map((record) => {
    if (record.status !== 'scheduled') return record;
    const flight = resolveFlight(record, airports);
    if (flight.departureTime >= now) return record;
    completed.push(record.id);
    return { ...record, status: 'completed' as const };
  });

  return { document: { ...document, flights }, completed };
}

export interface CatalogSummary {
  path: string;
  airports: number;
  flights: number;
  scheduled: number;
  bookable: number;
  completed: number;
  cancelled: number;
}

/**
 * Resolve and index every record, then count them by state. Fails on the
 * same integrity errors a search would.
 */
export function summarizeCatalog(document: CatalogDocument, path: string): CatalogSummary {
  const airports = resolveAirports(document);
  const flights = document.flights.map((record) => resolveFlight(record, airports));
  const graph = buildFlightGraph(flights);

  return {
    path,
    airports: airports.size,
    flights: flights.length,
    scheduled: flights.filter((flight) => flight.status === 'scheduled').length,
    bookable: graph.size,
    completed: flights.filter((flight) => flight.status === 'completed').length,
    cancelled: flights.filter((flight) => flight.status === 'cancelled').length,
  };
}
