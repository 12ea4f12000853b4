// Flight lifecycle states as stored by the catalog
export type FlightStatus = 'scheduled' | 'completed' | 'cancelled';

// Ranking criteria accepted by the search
export type RankCriterion = 'price' | 'duration';

export interface Airport {
  code: string;
  name: string;
  utcOffsetMinutes: number;
}

// Immutable snapshot of one scheduled flight. Times are epoch milliseconds,
// price is an integer amount of minor currency units.
export interface Flight {
  readonly id: string;
  readonly origin: string;
  readonly destination: string;
  readonly departureTime: number;
  readonly arrivalTime: number;
  readonly price: number;
  readonly bookable: boolean;
  readonly status: FlightStatus;
}

export interface Leg {
  readonly flight: Flight;
}

export interface Route {
  /** Leg flight ids joined by `>`; two routes with the same id are the same route */
  readonly id: string;
  /** One leg, or two when the route connects */
  readonly legs: readonly Leg[];
  readonly totalPrice: number;
  /** Final arrival minus first departure, in milliseconds */
  readonly totalDuration: number;
  readonly transferCount: 0 | 1;
  /** Second departure minus first arrival, present only on connecting routes */
  readonly layover?: number;
  readonly departureTime: number;
  readonly arrivalTime: number;
}

// Half-open time range [from, to) in epoch milliseconds
export interface TimeWindow {
  from: number;
  to: number;
}

export interface SearchQuery {
  origin: string;
  destination: string;
  /** Local calendar day at the origin airport, YYYY-MM-DD */
  date: string;
  criterion: RankCriterion;
  limit: number;
  offset: number;
}

export interface ConnectionPolicy {
  minConnectionMinutes: number;
  maxConnectionMinutes: number;
}

export interface PageRequest {
  criterion: RankCriterion;
  limit: number;
  offset: number;
}

export interface RoutePage {
  routes: Route[];
  /** Deduplicated feasible count, independent of limit and offset */
  totalCount: number;
  limit: number;
  offset: number;
}
