import type { Flight } from '../src/lib/route-types.js';

export const SEARCH_DATE = '2026-05-01';

/**
 * UTC epoch ms for a clock time on 2026-05-01, shifted by whole days
 */
export function at(clock: string, dayOffset = 0): number {
  const [hours, minutes] = clock.split(':').map(Number);
  return Date.UTC(2026, 4, 1 + dayOffset, hours, minutes);
}

export function flight(
  id: string,
  origin: string,
  destination: string,
  departureTime: number,
  arrivalTime: number,
  overrides: Partial<Flight> = {},
): Flight {
  return {
    id,
    origin,
    destination,
    departureTime,
    arrivalTime,
    price: 10000,
    bookable: true,
    status: 'scheduled',
    ...overrides,
  };
}
