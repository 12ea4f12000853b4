import { createRequire } from 'node:module';
import { Command } from 'commander';
import kleur from 'kleur';
import { catalogCommand } from '../commands/catalog.js';
import { configCommand } from '../commands/config.js';
import { routesCommand } from '../commands/routes.js';
import { serverCommand } from '../commands/server.js';
import type { CliColors, CliContext } from './shared.js';

const require = createRequire(import.meta.url);
const pkg = require('../../package.json') as { version: string };

function createColors(): CliColors {
  return {
    primary: kleur.cyan,
    secondary: kleur.magenta,
    success: kleur.green,
    error: kleur.red,
    warning: kleur.yellow,
    info: kleur.blue,
    muted: kleur.gray,
    highlight: kleur.bold,
  };
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('routefinder')
    .description('Search direct and one-stop flight routes over a flight catalog')
    .version(pkg.version);

  // Global options
  program.option('--json', 'Output as JSON').option('-v, --verbose', 'Verbose output');

  // Create shared context
  const getContext = (): CliContext => {
    const opts = program.opts<{ json?: boolean; verbose?: boolean }>();
    return {
      colors: createColors(),
      json: opts.json ?? false,
      verbose: opts.verbose ?? false,
    };
  };

  // Register commands
  routesCommand(program, getContext);
  catalogCommand(program, getContext);
  serverCommand(program, getContext);
  configCommand(program, getContext);

  return program;
}
