/**
 * Server command - Start/stop/status the route server
 */

import { existsSync, readFileSync, unlinkSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { Command } from 'commander';
import type { CliContext } from '../cli/shared.js';
import { ensureConfigDir, getConfigDir, loadConfig } from '../lib/config.js';
import { createRouteFinder } from '../lib/route-finder.js';
import { RouteServer } from '../lib/route-server.js';

function getPidFile(): string {
  return join(getConfigDir(), 'server.pid');
}

function isProcessAlive(pid: string): boolean {
  try {
    process.kill(Number(pid), 0);
    return true;
  } catch {
    return false;
  }
}

export function serverCommand(program: Command, getContext: () => CliContext): void {
  const server = program.command('server').description('Manage the route search HTTP server');

  // Start server
  server
    .command('start')
    .description('Start the route search server')
    .option('-p, --port <port>', 'Server port')
    .option('-c, --catalog <path>', 'Flight catalog file (JSON5)')
    .action(async (options: { port?: string; catalog?: string }) => {
      const ctx = getContext();
      const { colors } = ctx;
      const config = loadConfig();
      const port = options.port ? Number.parseInt(options.port, 10) : (config.serverPort ?? 3000);
      const pidFile = getPidFile();

      // Validate port number
      if (Number.isNaN(port) || port < 1 || port > 65535) {
        console.log(colors.error(`Invalid port number: ${options.port}. Must be between 1 and 65535.`));
        process.exit(1);
      }

      // Check if already running
      if (existsSync(pidFile)) {
        const pid = readFileSync(pidFile, 'utf-8').trim();
        if (isProcessAlive(pid)) {
          console.log(colors.warning(`Server already running (PID: ${pid})`));
          console.log(colors.muted('Use "routefinder server stop" to stop it first'));
          return;
        }
        // Stale PID file
        unlinkSync(pidFile);
      }

      try {
        const finder = createRouteFinder(config, { catalogPath: options.catalog, verbose: ctx.verbose });
        const routeServer = new RouteServer({ port, finder, defaultLimit: config.defaultLimit });

        console.log(colors.info('Starting route server...'));
        await routeServer.start();

        ensureConfigDir();
        writeFileSync(pidFile, String(process.pid));

        console.log('');
        console.log(colors.success('Server started successfully!'));
        console.log('');
        console.log(colors.highlight('Endpoints:'));
        console.log(colors.muted(`  Health:    http://localhost:${port}/health`));
        console.log(colors.muted(`  Routes:    http://localhost:${port}/routes?origin=KBP&destination=LWO&date=2026-05-01`));
        console.log('');
        console.log(colors.info('Press Ctrl+C to stop'));

        const shutdown = () => {
          console.log('');
          console.log(colors.info('Shutting down...'));
          routeServer
            .stop()
            .then(() => {
              if (existsSync(pidFile)) {
                unlinkSync(pidFile);
              }
              process.exit(0);
            })
            .catch((err: unknown) => {
              console.log(colors.error(`Failed to stop cleanly: ${err instanceof Error ? err.message : String(err)}`));
              process.exit(1);
            });
        };

        process.on('SIGINT', shutdown);
        process.on('SIGTERM', shutdown);
      } catch (err) {
        if (existsSync(pidFile)) {
          unlinkSync(pidFile);
        }
        console.log(colors.error(`Failed to start server: ${err instanceof Error ? err.message : 'Unknown error'}`));
        process.exit(1);
      }
    });

  // Stop server
  server
    .command('stop')
    .description('Stop the route search server')
    .action(() => {
      const ctx = getContext();
      const { colors } = ctx;
      const pidFile = getPidFile();

      if (!existsSync(pidFile)) {
        console.log(colors.warning('Server is not running'));
        return;
      }

      const pid = readFileSync(pidFile, 'utf-8').trim();
      try {
        process.kill(Number(pid), 'SIGTERM');
        console.log(colors.success(`Server stopped (PID: ${pid})`));
      } catch {
        console.log(colors.warning('Server process not found, cleaning up'));
      }

      unlinkSync(pidFile);
    });

  // Server status
  server
    .command('status')
    .description('Check server status')
    .action(async () => {
      const ctx = getContext();
      const { colors } = ctx;
      const config = loadConfig();
      const port = config.serverPort ?? 3000;
      const pidFile = getPidFile();

      if (!existsSync(pidFile)) {
        if (ctx.json) {
          console.log(JSON.stringify({ running: false }));
        } else {
          console.log(colors.warning('Server is not running'));
        }
        return;
      }

      const pid = readFileSync(pidFile, 'utf-8').trim();

      if (!isProcessAlive(pid)) {
        if (ctx.json) {
          console.log(JSON.stringify({ running: false, stalePid: pid }));
        } else {
          console.log(colors.warning('Server process not found (stale PID file)'));
          console.log(colors.muted('Run "routefinder server stop" to clean up'));
        }
        return;
      }

      try {
        const response = await fetch(`http://localhost:${port}/health`);
        const health = (await response.json()) as { status: string };

        if (ctx.json) {
          console.log(JSON.stringify({ running: true, pid, port, ...health }));
        } else {
          console.log(colors.success('Server is running'));
          console.log(colors.muted(`  PID: ${pid}`));
          console.log(colors.muted(`  Port: ${port}`));
          console.log(colors.muted(`  Health: ${health.status}`));
        }
      } catch {
        if (ctx.json) {
          console.log(JSON.stringify({ running: true, pid, reachable: false }));
        } else {
          console.log(colors.success(`Server process running (PID: ${pid})`));
          console.log(colors.warning('  Unable to reach HTTP endpoint'));
        }
      }
    });
}
