import { readFile, writeFile } from 'node:fs/promises';
import JSON5 from 'json5';
import { z } from 'zod';
import { InvalidInputError } from './errors.js';
import { parsePrice } from './money.js';
import type { Airport, Flight, TimeWindow } from './route-types.js';

/**
 * Source of the flight snapshot for one search. Implementations may be a
 * database query, a cache read or a file; either method may be async.
 */
export interface FlightCatalogReader {
  loadCandidateFlights(window: TimeWindow): Flight[] | Promise<Flight[]>;
  findAirport?(code: string): Airport | undefined | Promise<Airport | undefined>;
  /** Pin one consistent view of the catalog for the duration of a search */
  snapshot?(): Promise<FlightCatalogReader>;
}

const airportRecordSchema = z.object({
  code: z.string().regex(/^[A-Za-z]{3}$/, 'must be a 3-letter airport code'),
  name: z.string(),
  utcOffsetMinutes: z.number().int().min(-720).max(840).default(0),
});

const flightRecordSchema = z.object({
  id: z.string().min(1),
  origin: z.string().min(1),
  destination: z.string().min(1),
  departure: z.string(),
  arrival: z.string(),
  price: z.union([z.string(), z.number()]),
  seatsAvailable: z.number().int().min(0).optional(),
  bookable: z.boolean().optional(),
  status: z.enum(['scheduled', 'completed', 'cancelled']).default('scheduled'),
});

const catalogDocumentSchema = z.object({
  airports: z.array(airportRecordSchema).default([]),
  flights: z.array(flightRecordSchema).default([]),
});

export type AirportRecord = z.infer<typeof airportRecordSchema>;
export type FlightRecord = z.infer<typeof flightRecordSchema>;
export type CatalogDocument = z.infer<typeof catalogDocumentSchema>;

const MAX_ZONE_OFFSET_MINUTES = 14 * 60;
const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2}))?(Z|[+-]\d{2}:\d{2})?$/;

/**
 * Parse an ISO-8601 date-time. Without an explicit zone the value is read as
 * local time at an airport `utcOffsetMinutes` ahead of UTC.
 */
export function parseTimestamp(value: string, utcOffsetMinutes: number): number {
  const match = value.trim().match(TIMESTAMP_PATTERN);
  if (!match) {
    throw new InvalidInputError(`Invalid timestamp: ${value}`);
  }

  const [, year, month, day, hour, minute, second, zone] = match;
  const fields = {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second ?? '0'),
  };
  if (fields.hour > 23 || fields.minute > 59 || fields.second > 59) {
    throw new InvalidInputError(`Invalid timestamp: ${value}`);
  }

  let offset = utcOffsetMinutes;
  if (zone === 'Z') {
    offset = 0;
  } else if (zone) {
    const zoneHours = Number(zone.slice(1, 3));
    const zoneMinutes = Number(zone.slice(4, 6));
    const sign = zone.startsWith('-') ? -1 : 1;
    offset = sign * (zoneHours * 60 + zoneMinutes);
    if (zoneMinutes > 59 || Math.abs(offset) > MAX_ZONE_OFFSET_MINUTES) {
      throw new InvalidInputError(`Invalid timestamp: ${value}`);
    }
  }

  const local = Date.UTC(fields.year, fields.month - 1, fields.day, fields.hour, fields.minute, fields.second);
  // Date.UTC rolls over out-of-range days and months
  const check = new Date(local);
  if (
    check.getUTCFullYear() !== fields.year ||
    check.getUTCMonth() !== fields.month - 1 ||
    check.getUTCDate() !== fields.day
  ) {
    throw new InvalidInputError(`Invalid timestamp: ${value}`);
  }
  return local - offset * 60_000;
}

export function parseCatalogDocument(data: unknown): CatalogDocument {
  const parsed = catalogDocumentSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidInputError(`Invalid catalog at ${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }
  return parsed.data;
}

export function resolveAirports(document: CatalogDocument): Map<string, Airport> {
  const airports = new Map<string, Airport>();
  for (const record of document.airports) {
    const code = record.code.toUpperCase();
    if (airports.has(code)) {
      throw new InvalidInputError(`Duplicate airport code: ${code}`);
    }
    airports.set(code, { code, name: record.name, utcOffsetMinutes: record.utcOffsetMinutes });
  }
  return airports;
}

export function resolveFlight(record: FlightRecord, airports: ReadonlyMap<string, Airport>): Flight {
  const origin = airports.get(record.origin.toUpperCase());
  const destination = airports.get(record.destination.toUpperCase());
  if (!origin) {
    throw new InvalidInputError(`Flight ${record.id} departs from an airport not in the catalog: ${record.origin}`);
  }
  if (!destination) {
    throw new InvalidInputError(`Flight ${record.id} arrives at an airport not in the catalog: ${record.destination}`);
  }

  const hasSeats = record.seatsAvailable === undefined || record.seatsAvailable > 0;

  return {
    id: record.id,
    origin: origin.code,
    destination: destination.code,
    departureTime: parseTimestamp(record.departure, origin.utcOffsetMinutes),
    arrivalTime: parseTimestamp(record.arrival, destination.utcOffsetMinutes),
    price: parsePrice(record.price),
    bookable: (record.bookable ?? true) && hasSeats,
    status: record.status,
  };
}

export function resolveFlights(document: CatalogDocument): Flight[] {
  const airports = resolveAirports(document);
  return document.flights.map((record) => resolveFlight(record, airports));
}

function departsWithin(flight: Flight, window: TimeWindow): boolean {
  return flight.departureTime >= window.from && flight.departureTime < window.to;
}

export async function readCatalogFile(path: string): Promise<CatalogDocument> {
  const content = await readFile(path, 'utf-8');
  let data: unknown;
  try {
    data = JSON5.parse(content);
  } catch (error) {
    throw new InvalidInputError(
      `Catalog ${path} is not valid JSON5: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return parseCatalogDocument(data);
}

export async function writeCatalogFile(path: string, document: CatalogDocument): Promise<void> {
  await writeFile(path, `${JSON5.stringify(document, null, 2)}\n`, 'utf-8');
}

/**
 * Catalog over flights already held in memory
 */
export class InMemoryCatalog implements FlightCatalogReader {
  private readonly flights: readonly Flight[];
  private readonly airports: ReadonlyMap<string, Airport>;

  constructor(flights: readonly Flight[], airports: readonly Airport[] = []) {
    this.flights = flights;
    this.airports = new Map(airports.map((airport) => [airport.code, airport]));
  }

  loadCandidateFlights(window: TimeWindow): Flight[] {
    return this.flights.filter((flight) => departsWithin(flight, window));
  }

  findAirport(code: string): Airport | undefined {
    return this.airports.get(code);
  }
}

/**
 * Catalog backed by a JSON5 file. Each search reads the file once through
 * `snapshot()`; the direct methods re-read it on every call.
 */
export class JsonCatalog implements FlightCatalogReader {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  async snapshot(): Promise<InMemoryCatalog> {
    const document = await readCatalogFile(this.path);
    return new InMemoryCatalog(resolveFlights(document), [...resolveAirports(document).values()]);
  }

  async loadCandidateFlights(window: TimeWindow): Promise<Flight[]> {
    return (await this.snapshot()).loadCandidateFlights(window);
  }

  async findAirport(code: string): Promise<Airport | undefined> {
    return (await this.snapshot()).findAirport(code);
  }
}
