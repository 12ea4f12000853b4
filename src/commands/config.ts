import type { Command } from 'commander';
import type { CliContext } from '../cli/shared.js';
import {
  deleteConfigValue,
  getConfigPath,
  isNumericConfigKey,
  loadConfig,
  parseConfigNumber,
  type RouteFinderConfig,
  resolveConnectionPolicy,
  setConfigValue,
} from '../lib/config.js';

const VALID_KEYS: (keyof RouteFinderConfig)[] = [
  'catalogPath',
  'minConnectionMinutes',
  'maxConnectionMinutes',
  'trailingWindowHours',
  'defaultLimit',
  'serverPort',
];

function isConfigKey(key: string): key is keyof RouteFinderConfig {
  return VALID_KEYS.some((valid) => valid === key);
}

export function configCommand(program: Command, getContext: () => CliContext): void {
  const config = program.command('config').description('Manage configuration');

  // Show config
  config
    .command('show')
    .description('Show current configuration')
    .action(() => {
      const ctx = getContext();
      const current = loadConfig();

      if (ctx.json) {
        console.log(JSON.stringify(current, null, 2));
        return;
      }

      const { colors } = ctx;
      console.log('');
      console.log(colors.highlight('Configuration'));
      console.log(colors.muted(`Path: ${getConfigPath()}`));
      console.log('');

      for (const key of VALID_KEYS) {
        const value = current[key];
        if (value !== undefined) {
          console.log(`  ${colors.primary(key)}: ${String(value)}`);
        } else {
          console.log(`  ${colors.primary(key)}: ${colors.muted('(not set)')}`);
        }
      }
      console.log('');
    });

  // Set config value
  config
    .command('set')
    .description('Set a configuration value')
    .argument('<key>', `Configuration key (${VALID_KEYS.join(', ')})`)
    .argument('<value>', 'Value to set')
    .action((key: string, value: string) => {
      const ctx = getContext();

      if (!isConfigKey(key)) {
        console.log(ctx.colors.error(`Invalid key: ${key}`));
        console.log(ctx.colors.muted(`Valid keys: ${VALID_KEYS.join(', ')}`));
        process.exit(1);
      }

      try {
        if (isNumericConfigKey(key)) {
          const numeric = parseConfigNumber(key, value);
          if (key === 'minConnectionMinutes' || key === 'maxConnectionMinutes') {
            resolveConnectionPolicy({ ...loadConfig(), [key]: numeric });
          }
          setConfigValue(key, numeric);
        } else {
          setConfigValue(key, value);
        }
      } catch (error) {
        console.log(ctx.colors.error(error instanceof Error ? error.message : String(error)));
        process.exit(1);
      }

      if (ctx.json) {
        console.log(JSON.stringify({ success: true, key, value: loadConfig()[key] }));
      } else {
        console.log(ctx.colors.success(`Set ${key}`));
      }
    });

  // Unset config value
  config
    .command('unset')
    .description('Remove a configuration value')
    .argument('<key>', 'Configuration key to remove')
    .action((key: string) => {
      const ctx = getContext();

      if (!isConfigKey(key)) {
        console.log(ctx.colors.error(`Invalid key: ${key}`));
        console.log(ctx.colors.muted(`Valid keys: ${VALID_KEYS.join(', ')}`));
        process.exit(1);
      }

      deleteConfigValue(key);

      if (ctx.json) {
        console.log(JSON.stringify({ success: true, key, deleted: true }));
      } else {
        console.log(ctx.colors.success(`Removed ${key}`));
      }
    });

  // Get config path
  config
    .command('path')
    .description('Show configuration file path')
    .action(() => {
      const ctx = getContext();
      if (ctx.json) {
        console.log(JSON.stringify({ path: getConfigPath() }));
      } else {
        console.log(getConfigPath());
      }
    });
}
