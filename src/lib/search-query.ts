import { z } from 'zod';
import { InvalidQueryError } from './errors.js';
import { validatePageRequest } from './route-ranker.js';
import type { SearchQuery, TimeWindow } from './route-types.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const AIRPORT_CODE_PATTERN = /^[A-Z]{3}$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export const DEFAULT_LIMIT = 20;

export function normalizeAirportCode(input: string): string {
  return input.trim().toUpperCase();
}

/**
 * Parse YYYY-MM-DD into its UTC midnight, or null when it is not a real date
 */
export function parseCalendarDate(date: string): number | null {
  const match = date.match(DATE_PATTERN);
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const time = Date.UTC(year, month - 1, day);
  const check = new Date(time);
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }
  return time;
}

/**
 * The local calendar day `date` at an airport `utcOffsetMinutes` ahead of UTC
 */
export function dayWindow(date: string, utcOffsetMinutes = 0): TimeWindow {
  const midnight = parseCalendarDate(date);
  if (midnight === null) {
    throw new InvalidQueryError(`Invalid date: ${date} (expected YYYY-MM-DD)`);
  }
  const from = midnight - utcOffsetMinutes * 60_000;
  return { from, to: from + DAY_MS };
}

export function normalizeSearchQuery(query: SearchQuery): SearchQuery {
  return {
    ...query,
    origin: normalizeAirportCode(query.origin),
    destination: normalizeAirportCode(query.destination),
    date: query.date.trim(),
  };
}

/**
 * Reject a query before any catalog or graph work happens
 */
export function validateSearchQuery(query: SearchQuery): void {
  if (!AIRPORT_CODE_PATTERN.test(query.origin)) {
    throw new InvalidQueryError(`Invalid origin airport code: ${query.origin}`);
  }
  if (!AIRPORT_CODE_PATTERN.test(query.destination)) {
    throw new InvalidQueryError(`Invalid destination airport code: ${query.destination}`);
  }
  if (query.origin === query.destination) {
    throw new InvalidQueryError('Origin and destination must differ');
  }
  if (parseCalendarDate(query.date) === null) {
    throw new InvalidQueryError(`Invalid date: ${query.date} (expected YYYY-MM-DD)`);
  }
  validatePageRequest(query);
}

const searchParamsSchema = z.object({
  origin: z.string({ required_error: 'is required' }).min(1, 'is required'),
  destination: z.string({ required_error: 'is required' }).min(1, 'is required'),
  date: z.string({ required_error: 'is required' }).min(1, 'is required'),
  criterion: z.enum(['price', 'duration']).default('price'),
  limit: z.coerce.number().int().optional(),
  offset: z.coerce.number().int().default(0),
});

export type SearchParamsInput = URLSearchParams | Record<string, string | undefined>;

/**
 * Translate transport-level parameters (query string or CLI options) into a
 * validated, normalized SearchQuery.
 */
export function parseSearchParams(input: SearchParamsInput, defaults: { limit?: number } = {}): SearchQuery {
  const raw = input instanceof URLSearchParams ? Object.fromEntries(input) : input;
  const parsed = searchParamsSchema.safeParse(raw);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join('.');
    throw new InvalidQueryError(field ? `${field} ${issue.message}` : issue.message);
  }

  const query = normalizeSearchQuery({
    ...parsed.data,
    limit: parsed.data.limit ?? defaults.limit ?? DEFAULT_LIMIT,
  });
  validateSearchQuery(query);
  return query;
}
