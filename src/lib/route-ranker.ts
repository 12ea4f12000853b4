import { InvalidQueryError } from './errors.js';
import type { PageRequest, RankCriterion, Route, RoutePage } from './route-types.js';

export function validatePageRequest(request: PageRequest): void {
  if (request.criterion !== 'price' && request.criterion !== 'duration') {
    throw new InvalidQueryError(`Unknown ranking criterion: ${String(request.criterion)}`);
  }
  if (!Number.isInteger(request.limit) || request.limit <= 0) {
    throw new InvalidQueryError('Limit must be a positive integer');
  }
  if (!Number.isInteger(request.offset) || request.offset < 0) {
    throw new InvalidQueryError('Offset must be a non-negative integer');
  }
}

function criterionValue(route: Route, criterion: RankCriterion): number {
  return criterion === 'price' ? route.totalPrice : route.totalDuration;
}

function compareLegIds(a: Route, b: Route): number {
  const length = Math.min(a.legs.length, b.legs.length);
  for (let i = 0; i < length; i++) {
    const left = a.legs[i].flight.id;
    const right = b.legs[i].flight.id;
    if (left !== right) {
      return left < right ? -1 : 1;
    }
  }
  return a.legs.length - b.legs.length;
}

/**
 * Total order: criterion value, then transfers, then first departure, then leg ids.
 */
export function compareRoutes(a: Route, b: Route, criterion: RankCriterion): number {
  return (
    criterionValue(a, criterion) - criterionValue(b, criterion) ||
    a.transferCount - b.transferCount ||
    a.departureTime - b.departureTime ||
    compareLegIds(a, b)
  );
}

// Flight ids may contain '>', so the joined route id is not a safe key
function legKey(route: Route): string {
  return JSON.stringify(route.legs.map((leg) => leg.flight.id));
}

export function dedupeRoutes(routes: readonly Route[]): Route[] {
  const unique = new Map<string, Route>();
  for (const route of routes) {
    const key = legKey(route);
    if (!unique.has(key)) {
      unique.set(key, route);
    }
  }
  return [...unique.values()];
}

export function rankRoutes(routes: readonly Route[], request: PageRequest): RoutePage {
  validatePageRequest(request);

  const ranked = dedupeRoutes(routes).sort((a, b) => compareRoutes(a, b, request.criterion));
  const { limit, offset } = request;

  return {
    routes: offset >= ranked.length ? [] : ranked.slice(offset, offset + limit),
    totalCount: ranked.length,
    limit,
    offset,
  };
}
