import { describe, expect, it } from 'vitest';
import { InvalidQueryError, UnknownAirportError } from '../src/lib/errors.js';
import { buildFlightGraph } from '../src/lib/flight-graph.js';
import { searchRoutes } from '../src/lib/route-search.js';
import type { ConnectionPolicy, Flight } from '../src/lib/route-types.js';
import { at, flight } from './helpers.js';

const MINUTE = 60_000;
const policy: ConnectionPolicy = { minConnectionMinutes: 30, maxConnectionMinutes: 240 };

function search(flights: Flight[], origin = 'KBP', destination = 'LWO', connection = policy) {
  return searchRoutes(buildFlightGraph(flights), { origin, destination }, connection);
}

describe('searchRoutes direct pass', () => {
  it('returns a single direct route for one matching flight', () => {
    const routes = search([flight('PS101', 'KBP', 'LWO', at('08:00'), at('09:10'))]);

    expect(routes).toHaveLength(1);
    expect(routes[0].id).toBe('PS101');
    expect(routes[0].transferCount).toBe(0);
    expect(routes[0].totalDuration).toBe(70 * MINUTE);
    expect(routes[0].layover).toBeUndefined();
  });

  it('includes every direct departure, not just the first', () => {
    const routes = search([
      flight('PS101', 'KBP', 'LWO', at('08:00'), at('09:10')),
      flight('PS103', 'KBP', 'LWO', at('13:00'), at('14:10')),
      flight('PS105', 'KBP', 'LWO', at('19:00'), at('20:10')),
    ]);

    expect(routes.map((r) => r.id)).toEqual(['PS101', 'PS103', 'PS105']);
  });
});

describe('searchRoutes connecting pass', () => {
  it('connects when the layover meets the minimum', () => {
    const routes = search([
      flight('PS201', 'KBP', 'ODS', at('07:00'), at('08:20'), { price: 4550 }),
      flight('PS301', 'ODS', 'LWO', at('09:10'), at('10:30'), { price: 5225 }),
    ]);

    expect(routes).toHaveLength(1);
    const [route] = routes;
    expect(route.id).toBe('PS201>PS301');
    expect(route.transferCount).toBe(1);
    expect(route.layover).toBe(50 * MINUTE);
    expect(route.totalDuration).toBe(210 * MINUTE);
    expect(route.totalPrice).toBe(9775);
    expect(route.legs.map((leg) => leg.flight.id)).toEqual(['PS201', 'PS301']);
  });

  it('returns an empty result when the only connection is too tight', () => {
    const routes = search([
      flight('PS201', 'KBP', 'ODS', at('07:00'), at('08:20')),
      flight('PS303', 'ODS', 'LWO', at('08:40'), at('10:00')),
    ]);

    expect(routes).toEqual([]);
  });

  it('treats both connection bounds as inclusive', () => {
    const routes = search([
      flight('A1', 'KBP', 'ODS', at('07:00'), at('08:00')),
      flight('B1', 'ODS', 'LWO', at('08:29'), at('09:30')),
      flight('B2', 'ODS', 'LWO', at('08:30'), at('09:30')),
      flight('B3', 'ODS', 'LWO', at('12:00'), at('13:00')),
      flight('B4', 'ODS', 'LWO', at('12:01'), at('13:00')),
    ]);

    expect(routes.map((r) => r.id)).toEqual(['A1>B2', 'A1>B3']);
  });

  it('connects across midnight using absolute times', () => {
    const routes = search([
      flight('N1', 'KBP', 'ODS', at('22:30'), at('23:50')),
      flight('N2', 'ODS', 'LWO', at('01:00', 1), at('02:20', 1)),
    ]);

    expect(routes.map((r) => r.id)).toEqual(['N1>N2']);
    expect(routes[0].layover).toBe(70 * MINUTE);
  });

  it('skips onward flights to other airports', () => {
    const routes = search([
      flight('A1', 'KBP', 'ODS', at('07:00'), at('08:00')),
      flight('B1', 'ODS', 'WAW', at('09:00'), at('10:00')),
      flight('B2', 'ODS', 'LWO', at('09:30'), at('10:30')),
    ]);

    expect(routes.map((r) => r.id)).toEqual(['A1>B2']);
  });

  it('never routes back through the origin', () => {
    const routes = search([
      flight('LOOP', 'KBP', 'KBP', at('06:00'), at('06:30')),
      flight('D1', 'KBP', 'LWO', at('08:00'), at('09:10')),
    ]);

    expect(routes.map((r) => r.id)).toEqual(['D1']);
  });

  it('does not chain a direct flight into a second leg', () => {
    const routes = search([
      flight('D1', 'KBP', 'LWO', at('08:00'), at('09:10')),
      flight('L1', 'LWO', 'LWO', at('10:00'), at('10:30')),
    ]);

    expect(routes.map((r) => r.id)).toEqual(['D1']);
  });

  it('restricts first legs to the departure window but not second legs', () => {
    const graph = buildFlightGraph([
      flight('EARLY', 'KBP', 'LWO', at('23:00', -1), at('00:10')),
      flight('A1', 'KBP', 'ODS', at('21:00'), at('22:00')),
      flight('B1', 'ODS', 'LWO', at('00:30', 1), at('01:30', 1)),
      flight('LATE', 'KBP', 'LWO', at('00:30', 1), at('01:40', 1)),
    ]);

    const routes = searchRoutes(
      graph,
      { origin: 'KBP', destination: 'LWO', departureWindow: { from: at('00:00'), to: at('00:00', 1) } },
      policy,
    );

    expect(routes.map((r) => r.id)).toEqual(['A1>B1']);
  });
});

describe('searchRoutes failures', () => {
  const flights = [flight('PS101', 'KBP', 'LWO', at('08:00'), at('09:10'))];

  it('rejects identical origin and destination', () => {
    expect(() => search(flights, 'KBP', 'KBP')).toThrow(InvalidQueryError);
  });

  it('reports an unknown destination', () => {
    expect(() => search(flights, 'KBP', 'XYZ')).toThrow(UnknownAirportError);
    expect(() => search(flights, 'KBP', 'XYZ')).toThrow('Unknown airport: XYZ');
  });

  it('reports an unknown origin', () => {
    expect(() => search(flights, 'XYZ', 'LWO')).toThrow('Unknown airport: XYZ');
  });
});

// Deterministic pseudo-random network
function generateNetwork(seed: number, count: number): Flight[] {
  const airports = ['KBP', 'LWO', 'ODS', 'WAW', 'KRK', 'VIE'];
  let state = seed;
  const next = (max: number): number => {
    state = (state * 48271) % 2147483647;
    return state % max;
  };

  const flights: Flight[] = [];
  for (let i = 0; i < count; i++) {
    const origin = airports[next(airports.length)];
    let destination = airports[next(airports.length)];
    if (destination === origin) {
      destination = airports[(airports.indexOf(origin) + 1) % airports.length];
    }
    const departure = at('00:00') + next(36 * 60) * MINUTE;
    const arrival = departure + (45 + next(180)) * MINUTE;
    flights.push(flight(`F${i}`, origin, destination, departure, arrival, { price: 2000 + next(20000) }));
  }
  return flights;
}

describe('searchRoutes properties', () => {
  const flights = generateNetwork(42, 400);
  const graph = buildFlightGraph(flights);
  const routes = searchRoutes(graph, { origin: 'KBP', destination: 'LWO' }, policy);

  it('finds at least one route in the generated network', () => {
    expect(routes.length).toBeGreaterThan(0);
  });

  it('returns only one- or two-leg chains that respect the connection window', () => {
    for (const route of routes) {
      expect(route.legs.length).toBeGreaterThanOrEqual(1);
      expect(route.legs.length).toBeLessThanOrEqual(2);
      const first = route.legs[0].flight;
      expect(first.origin).toBe('KBP');
      const last = route.legs[route.legs.length - 1].flight;
      expect(last.destination).toBe('LWO');

      if (route.legs.length === 2) {
        const second = route.legs[1].flight;
        expect(first.destination).not.toBe('KBP');
        expect(first.destination).not.toBe('LWO');
        expect(second.origin).toBe(first.destination);
        expect(second.departureTime).toBeGreaterThanOrEqual(first.arrivalTime + policy.minConnectionMinutes * MINUTE);
        expect(second.departureTime - first.arrivalTime).toBeLessThanOrEqual(policy.maxConnectionMinutes * MINUTE);
      }
    }
  });

  it('finds every feasible pair a brute-force scan finds', () => {
    const expected = new Set<string>();
    for (const a of flights) {
      if (a.origin !== 'KBP') continue;
      if (a.destination === 'LWO') {
        expected.add(a.id);
        continue;
      }
      for (const b of flights) {
        const gap = b.departureTime - a.arrivalTime;
        if (
          b.origin === a.destination &&
          b.destination === 'LWO' &&
          a.destination !== 'KBP' &&
          gap >= policy.minConnectionMinutes * MINUTE &&
          gap <= policy.maxConnectionMinutes * MINUTE
        ) {
          expected.add(`${a.id}>${b.id}`);
        }
      }
    }

    expect(new Set(routes.map((r) => r.id))).toEqual(expected);
    expect(routes).toHaveLength(expected.size);
  });
});
