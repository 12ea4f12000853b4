import { formatPrice } from './money.js';
import type { Leg, Route, RoutePage } from './route-types.js';

const MINUTE_MS = 60_000;

// JSON shapes returned by GET /routes and `routes --json`
export interface LegView {
  flightId: string;
  origin: string;
  destination: string;
  departure: string;
  arrival: string;
  price: string;
}

export interface RouteView {
  id: string;
  legs: LegView[];
  via?: string;
  totalPrice: string;
  totalDurationMinutes: number;
  transferCount: 0 | 1;
  layoverMinutes?: number;
}

export interface RoutePageView {
  routes: RouteView[];
  totalCount: number;
  limit: number;
  offset: number;
}

export function toMinutes(ms: number): number {
  return Math.round(ms / MINUTE_MS);
}

function toLegView({ flight }: Leg): LegView {
  return {
    flightId: flight.id,
    origin: flight.origin,
    destination: flight.destination,
    departure: new Date(flight.departureTime).toISOString(),
    arrival: new Date(flight.arrivalTime).toISOString(),
    price: formatPrice(flight.price),
  };
}

export function toRouteView(route: Route): RouteView {
  const view: RouteView = {
    id: route.id,
    legs: route.legs.map(toLegView),
    totalPrice: formatPrice(route.totalPrice),
    totalDurationMinutes: toMinutes(route.totalDuration),
    transferCount: route.transferCount,
  };
  if (route.transferCount === 1) {
    view.via = route.legs[0].flight.destination;
  }
  if (route.layover !== undefined) {
    view.layoverMinutes = toMinutes(route.layover);
  }
  return view;
}

export function toRoutePageView(page: RoutePage): RoutePageView {
  return {
    routes: page.routes.map(toRouteView),
    totalCount: page.totalCount,
    limit: page.limit,
    offset: page.offset,
  };
}
