// Library exports

export type { CatalogDocument, FlightCatalogReader } from './lib/catalog.js';
export { InMemoryCatalog, JsonCatalog, readCatalogFile, resolveFlights } from './lib/catalog.js';
export type { RouteFinderConfig } from './lib/config.js';
export { ConfigError, DEFAULT_CONNECTION_POLICY, loadConfig, resolveConnectionPolicy } from './lib/config.js';
export {
  InvalidInputError,
  InvalidQueryError,
  isRouteSearchError,
  RouteSearchError,
  UnknownAirportError,
} from './lib/errors.js';
export { buildFlightGraph, FlightGraph } from './lib/flight-graph.js';
export { markDepartedFlights } from './lib/flight-completion.js';
export { formatPrice, parsePrice } from './lib/money.js';
export { createRouteFinder, findRoutes, RouteFinder } from './lib/route-finder.js';
export { rankRoutes } from './lib/route-ranker.js';
export { searchRoutes } from './lib/route-search.js';
export { handleRoutesQuery, RouteServer } from './lib/route-server.js';
export type {
  Airport,
  ConnectionPolicy,
  Flight,
  FlightStatus,
  Leg,
  RankCriterion,
  Route,
  RoutePage,
  SearchQuery,
  TimeWindow,
} from './lib/route-types.js';
export type { RoutePageView, RouteView } from './lib/route-view.js';
export { toRoutePageView } from './lib/route-view.js';
export { parseSearchParams } from './lib/search-query.js';
