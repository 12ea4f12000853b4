import { InvalidInputError } from './errors.js';

const PRICE_PATTERN = /^(\d+)(?:\.(\d{1,2}))?$/;

/**
 * Parse a decimal price into integer minor units (cents).
 * Accepts at most two fractional digits so sums stay exact.
 */
export function parsePrice(value: string | number): number {
  const text = typeof value === 'number' ? String(value) : value.trim();
  const match = text.match(PRICE_PATTERN);
  if (!match) {
    throw new InvalidInputError(`Invalid price: ${text}`);
  }

  const whole = Number.parseInt(match[1], 10);
  const fraction = (match[2] ?? '').padEnd(2, '0');
  const minor = whole * 100 + Number.parseInt(fraction, 10);

  if (!Number.isSafeInteger(minor)) {
    throw new InvalidInputError(`Price out of range: ${text}`);
  }
  return minor;
}

export function formatPrice(minor: number): string {
  const whole = Math.trunc(minor / 100);
  const cents = String(minor % 100).padStart(2, '0');
  return `${whole}.${cents}`;
}
