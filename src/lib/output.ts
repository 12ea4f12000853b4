import type { CliContext } from '../cli/shared.js';
import type { CatalogSummary } from './flight-completion.js';
import { formatPrice } from './money.js';
import type { Route, RoutePage, SearchQuery } from './route-types.js';
import { toMinutes, toRoutePageView } from './route-view.js';

export function formatDuration(ms: number): string {
  const minutes = toMinutes(ms);
  const hours = Math.floor(minutes / 60);
  const rest = minutes % 60;
  if (hours === 0) return `${rest}m`;
  return rest === 0 ? `${hours}h` : `${hours}h ${rest}m`;
}

// HH:MM in UTC
function formatClock(time: number): string {
  return new Date(time).toISOString().slice(11, 16);
}

function formatRoute(route: Route, index: number, ctx: CliContext): string[] {
  const { colors } = ctx;
  const lines: string[] = [];
  const stops = route.transferCount === 0 ? 'direct' : `1 stop via ${route.legs[0].flight.destination}`;

  lines.push(
    `${colors.primary(`${index}. ▸ ${route.id}`)}  ${colors.success(formatPrice(route.totalPrice))}  ${formatDuration(route.totalDuration)}  ${colors.muted(`(${stops})`)}`,
  );

  for (const { flight } of route.legs) {
    lines.push(
      `   ${colors.highlight(flight.id)} ${flight.origin} ${formatClock(flight.departureTime)} → ${flight.destination} ${formatClock(flight.arrivalTime)}  ${colors.muted(formatPrice(flight.price))}`,
    );
  }

  if (route.layover !== undefined) {
    lines.push(`   ${colors.muted(`Layover: ${formatDuration(route.layover)}`)}`);
  }

  return lines;
}

export function formatRoutePage(page: RoutePage, query: SearchQuery, ctx: CliContext): string {
  if (ctx.json) {
    return JSON.stringify(toRoutePageView(page), null, 2);
  }

  const { colors } = ctx;
  const lines: string[] = [];

  lines.push('');
  lines.push(colors.highlight(`Routes ${query.origin} → ${query.destination} on ${query.date} (by ${query.criterion})`));
  lines.push(colors.muted('────────────────────────────────────────────────────────────'));
  lines.push('');

  if (page.routes.length === 0) {
    lines.push(
      colors.warning(page.totalCount === 0 ? 'No routes found' : `No routes past offset ${page.offset}`),
    );
    lines.push('');
    return lines.join('\n');
  }

  page.routes.forEach((route, i) => {
    lines.push(...formatRoute(route, page.offset + i + 1, ctx));
    lines.push('');
  });

  const last = page.offset + page.routes.length;
  lines.push(colors.muted(`Showing ${page.offset + 1}-${last} of ${page.totalCount} (times in UTC)`));
  lines.push('');

  return lines.join('\n');
}

export function formatCatalogSummary(summary: CatalogSummary, ctx: CliContext): string {
  if (ctx.json) {
    return JSON.stringify(summary, null, 2);
  }

  const { colors } = ctx;
  const lines: string[] = [];
  lines.push('');
  lines.push(colors.primary('▸ Catalog'));
  lines.push(`  ${colors.muted('Path:')} ${summary.path}`);
  lines.push(`  ${colors.muted('Airports:')} ${summary.airports}`);
  lines.push(`  ${colors.muted('Flights:')} ${summary.flights}`);
  lines.push(`  ${colors.muted('Scheduled:')} ${summary.scheduled}`);
  lines.push(`  ${colors.muted('Bookable:')} ${summary.bookable}`);
  lines.push(`  ${colors.muted('Completed:')} ${summary.completed}`);
  lines.push(`  ${colors.muted('Cancelled:')} ${summary.cancelled}`);
  lines.push('');
  return lines.join('\n');
}

export function formatError(error: string, ctx: CliContext): string {
  if (ctx.json) {
    return JSON.stringify({ success: false, error }, null, 2);
  }
  return ctx.colors.error(`Error: ${error}`);
}

export function formatInfo(message: string, ctx: CliContext): string {
  if (ctx.json) {
    return '';
  }
  return ctx.colors.info(message);
}

export function formatVerbose(message: string, ctx: CliContext): string {
  if (ctx.json || !ctx.verbose) {
    return '';
  }
  return ctx.colors.muted(`[verbose] ${message}`);
}
