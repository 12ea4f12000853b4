import { type FlightCatalogReader, JsonCatalog } from './catalog.js';
import {
  ConfigError,
  DEFAULT_CONNECTION_POLICY,
  DEFAULT_TRAILING_WINDOW_HOURS,
  type RouteFinderConfig,
  resolveConnectionPolicy,
  resolveTrailingWindowHours,
} from './config.js';
import { buildFlightGraph } from './flight-graph.js';
import { rankRoutes } from './route-ranker.js';
import { searchRoutes } from './route-search.js';
import type { ConnectionPolicy, Flight, RoutePage, SearchQuery, TimeWindow } from './route-types.js';
import { dayWindow, normalizeSearchQuery, validateSearchQuery } from './search-query.js';

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;

/**
 * Rank every route with at most one connection over a fixed flight snapshot.
 * Synchronous and stateless; identical inputs give identical output.
 *
 * First legs depart on the query date (a UTC day) unless `departureWindow`
 * overrides it.
 */
export function findRoutes(
  query: SearchQuery,
  flights: readonly Flight[],
  policy: ConnectionPolicy = DEFAULT_CONNECTION_POLICY,
  departureWindow?: TimeWindow,
): RoutePage {
  const normalized = normalizeSearchQuery(query);
  validateSearchQuery(normalized);

  const graph = buildFlightGraph(flights);
  const routes = searchRoutes(
    graph,
    {
      origin: normalized.origin,
      destination: normalized.destination,
      departureWindow: departureWindow ?? dayWindow(normalized.date),
    },
    policy,
  );
  return rankRoutes(routes, normalized);
}

export interface RouteFinderOptions {
  catalog: FlightCatalogReader;
  policy?: ConnectionPolicy;
  trailingWindowHours?: number;
  verbose?: boolean;
}

/**
 * Loads a snapshot from the catalog for the query's day and runs the search.
 * The snapshot covers the origin-local day plus `trailingWindowHours`, and is
 * extended further when a late first leg could still connect past that.
 */
export class RouteFinder {
  private readonly catalog: FlightCatalogReader;
  private readonly policy: ConnectionPolicy;
  private readonly trailingWindowHours: number;
  private readonly verbose: boolean;

  constructor(options: RouteFinderOptions) {
    this.catalog = options.catalog;
    this.policy = options.policy ?? DEFAULT_CONNECTION_POLICY;
    this.trailingWindowHours = options.trailingWindowHours ?? DEFAULT_TRAILING_WINDOW_HOURS;
    this.verbose = options.verbose ?? false;
  }

  private log(message: string): void {
    if (this.verbose) {
      console.log(`[RouteFinder] ${message}`);
    }
  }

  async findRoutes(query: SearchQuery): Promise<RoutePage> {
    const normalized = normalizeSearchQuery(query);
    validateSearchQuery(normalized);

    const catalog = (await this.catalog.snapshot?.()) ?? this.catalog;
    const originAirport = await catalog.findAirport?.(normalized.origin);
    const departureWindow = dayWindow(normalized.date, originAirport?.utcOffsetMinutes ?? 0);
    const candidateWindow: TimeWindow = {
      from: departureWindow.from,
      to: departureWindow.to + this.trailingWindowHours * HOUR_MS,
    };

    this.log(
      `Loading flights ${new Date(candidateWindow.from).toISOString()} to ${new Date(candidateWindow.to).toISOString()}`,
    );
    let flights = await catalog.loadCandidateFlights(candidateWindow);

    const reach = connectionReach(flights, normalized.origin, departureWindow, this.policy);
    if (reach > candidateWindow.to) {
      this.log(`Extending snapshot to ${new Date(reach).toISOString()} for late connections`);
      const tail = await catalog.loadCandidateFlights({ from: candidateWindow.to, to: reach });
      flights = [...flights, ...tail];
    }
    this.log(`Loaded ${flights.length} candidate flight(s)`);

    const page = findRoutes(normalized, flights, this.policy, departureWindow);
    this.log(`Found ${page.totalCount} route(s) ${normalized.origin} -> ${normalized.destination}`);
    return page;
  }
}

/**
 * Exclusive end of the departures a second leg may need: the latest arrival of
 * any first leg plus the maximum connection.
 */
export function connectionReach(
  flights: readonly Flight[],
  origin: string,
  departureWindow: TimeWindow,
  policy: ConnectionPolicy,
): number {
  let latestArrival = Number.NEGATIVE_INFINITY;
  for (const flight of flights) {
    if (
      flight.origin === origin &&
      flight.departureTime >= departureWindow.from &&
      flight.departureTime < departureWindow.to
    ) {
      latestArrival = Math.max(latestArrival, flight.arrivalTime);
    }
  }
  return latestArrival + policy.maxConnectionMinutes * MINUTE_MS + 1;
}

export interface RouteFinderOverrides {
  catalogPath?: string;
  minConnectionMinutes?: number;
  maxConnectionMinutes?: number;
  verbose?: boolean;
}

/**
 * Build a file-backed finder from saved config plus command-line overrides
 */
export function createRouteFinder(config: RouteFinderConfig, overrides: RouteFinderOverrides = {}): RouteFinder {
  const catalogPath = overrides.catalogPath ?? config.catalogPath;
  if (!catalogPath) {
    throw new ConfigError('No flight catalog configured. Pass --catalog or run "routefinder config set catalogPath <path>"');
  }

  const policy = resolveConnectionPolicy({
    ...config,
    minConnectionMinutes: overrides.minConnectionMinutes ?? config.minConnectionMinutes,
    maxConnectionMinutes: overrides.maxConnectionMinutes ?? config.maxConnectionMinutes,
  });

  return new RouteFinder({
    catalog: new JsonCatalog(catalogPath),
    policy,
    trailingWindowHours: resolveTrailingWindowHours(config),
    verbose: overrides.verbose,
  });
}
