import type { Command } from 'commander';
import type { CliContext } from '../cli/shared.js';
import { loadConfig } from '../lib/config.js';
import { formatError, formatRoutePage, formatVerbose } from '../lib/output.js';
import { createRouteFinder } from '../lib/route-finder.js';
import { parseSearchParams } from '../lib/search-query.js';

interface RoutesOptions {
  date: string;
  sort?: string;
  limit?: string;
  offset?: string;
  catalog?: string;
  minConnection?: string;
  maxConnection?: string;
}

function parseMinutes(value: string | undefined, label: string): number | undefined {
  if (value === undefined) return undefined;
  const minutes = Number.parseInt(value, 10);
  if (Number.isNaN(minutes) || minutes < 0 || String(minutes) !== value.trim()) {
    throw new Error(`${label} must be a non-negative whole number of minutes`);
  }
  return minutes;
}

export function routesCommand(program: Command, getContext: () => CliContext): void {
  program
    .command('routes')
    .alias('r')
    .description('Find direct and one-stop routes between two airports')
    .argument('<origin>', 'Origin airport code (e.g., KBP)')
    .argument('<destination>', 'Destination airport code (e.g., LWO)')
    .requiredOption('-d, --date <date>', 'Departure date at the origin (YYYY-MM-DD)')
    .option('-s, --sort <criterion>', 'Rank by price or duration (default: price)')
    .option('-l, --limit <n>', 'Maximum number of routes to show')
    .option('-o, --offset <n>', 'Number of ranked routes to skip (default: 0)')
    .option('-c, --catalog <path>', 'Flight catalog file (JSON5)')
    .option('--min-connection <minutes>', 'Minimum layover in minutes')
    .option('--max-connection <minutes>', 'Maximum layover in minutes')
    .action(async (origin: string, destination: string, options: RoutesOptions) => {
      const ctx = getContext();
      const config = loadConfig();

      try {
        const query = parseSearchParams(
          {
            origin,
            destination,
            date: options.date,
            criterion: options.sort,
            limit: options.limit,
            offset: options.offset,
          },
          { limit: config.defaultLimit },
        );

        const finder = createRouteFinder(config, {
          catalogPath: options.catalog,
          minConnectionMinutes: parseMinutes(options.minConnection, '--min-connection'),
          maxConnectionMinutes: parseMinutes(options.maxConnection, '--max-connection'),
          verbose: ctx.verbose && !ctx.json,
        });

        const verboseMsg = formatVerbose(
          `Searching ${query.origin} -> ${query.destination} on ${query.date}, ranked by ${query.criterion}`,
          ctx,
        );
        if (verboseMsg) console.log(verboseMsg);

        const page = await finder.findRoutes(query);
        console.log(formatRoutePage(page, query, ctx));
      } catch (error) {
        console.log(formatError(error instanceof Error ? error.message : String(error), ctx));
        process.exit(1);
      }
    });
}
