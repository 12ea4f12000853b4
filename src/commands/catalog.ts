import type { Command } from 'commander';
import type { CliContext } from '../cli/shared.js';
import { readCatalogFile, writeCatalogFile } from '../lib/catalog.js';
import { loadConfig } from '../lib/config.js';
import { markDepartedFlights, summarizeCatalog } from '../lib/flight-completion.js';
import { formatCatalogSummary, formatError, formatInfo } from '../lib/output.js';

function resolveCatalogPath(path: string | undefined): string {
  const resolved = path ?? loadConfig().catalogPath;
  if (!resolved) {
    throw new Error('No flight catalog configured. Pass a path or run "routefinder config set catalogPath <path>"');
  }
  return resolved;
}

export function catalogCommand(program: Command, getContext: () => CliContext): void {
  const catalog = program.command('catalog').description('Inspect and maintain the flight catalog');

  // Validate and summarize
  catalog
    .command('check')
    .description('Validate the catalog and show flight counts')
    .argument('[path]', 'Catalog file (defaults to catalogPath from config)')
    .action(async (path: string | undefined) => {
      const ctx = getContext();
      try {
        const catalogPath = resolveCatalogPath(path);
        const document = await readCatalogFile(catalogPath);
        console.log(formatCatalogSummary(summarizeCatalog(document, catalogPath), ctx));
      } catch (error) {
        console.log(formatError(error instanceof Error ? error.message : String(error), ctx));
        process.exit(1);
      }
    });

  // Mark departed flights completed
  catalog
    .command('complete')
    .description('Mark scheduled flights that have already departed as completed')
    .argument('[path]', 'Catalog file (defaults to catalogPath from config)')
    .option('--now <timestamp>', 'Reference time (ISO-8601, default: current time)')
    .option('--dry-run', 'Report without writing the file')
    .action(async (path: string | undefined, options: { now?: string; dryRun?: boolean }) => {
      const ctx = getContext();
      const { colors } = ctx;

      try {
        const catalogPath = resolveCatalogPath(path);
        const now = options.now ? Date.parse(options.now) : Date.now();
        if (Number.isNaN(now)) {
          throw new Error(`Invalid --now timestamp: ${options.now}`);
        }

        const document = await readCatalogFile(catalogPath);
        const result = markDepartedFlights(document, now);

        const write = result.completed.length > 0 && !options.dryRun;
        if (write) {
          await writeCatalogFile(catalogPath, result.document);
        }

        if (ctx.json) {
          console.log(JSON.stringify({ success: true, completed: result.completed, written: write }));
          return;
        }

        if (result.completed.length === 0) {
          console.log(formatInfo('No departed flights to complete', ctx));
          return;
        }

        const verb = options.dryRun ? 'Would mark' : 'Marked';
        console.log(colors.success(`${verb} ${result.completed.length} flight(s) completed`));
        for (const id of result.completed) {
          console.log(colors.muted(`  - ${id}`));
        }
      } catch (error) {
        console.log(formatError(error instanceof Error ? error.message : String(error), ctx));
        process.exit(1);
      }
    });
}
