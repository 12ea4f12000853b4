import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import JSON5 from 'json5';
import { z } from 'zod';
import type { ConnectionPolicy } from './route-types.js';
import { DEFAULT_LIMIT } from './search-query.js';

export interface RouteFinderConfig {
  catalogPath?: string;
  minConnectionMinutes?: number;
  maxConnectionMinutes?: number;
  // Extra hours of departures loaded past the search day, for next-day connections
  trailingWindowHours?: number;
  defaultLimit?: number;
  serverPort?: number;
}

const configFileSchema = z
  .object({
    catalogPath: z.string(),
    minConnectionMinutes: z.number().int().nonnegative(),
    maxConnectionMinutes: z.number().int().nonnegative(),
    trailingWindowHours: z.number().int().nonnegative(),
    defaultLimit: z.number().int().positive(),
    serverPort: z.number().int().min(1).max(65535),
  })
  .partial();

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_CONNECTION_POLICY: ConnectionPolicy = {
  minConnectionMinutes: 45,
  maxConnectionMinutes: 720,
};

export const DEFAULT_TRAILING_WINDOW_HOURS = 24;

export const DEFAULT_CONFIG: RouteFinderConfig = {
  ...DEFAULT_CONNECTION_POLICY,
  trailingWindowHours: DEFAULT_TRAILING_WINDOW_HOURS,
  defaultLimit: DEFAULT_LIMIT,
  serverPort: 3000,
};

export function getConfigDir(): string {
  return process.env.ROUTEFINDER_CONFIG_DIR ?? join(homedir(), '.config', 'routefinder');
}

export function getConfigPath(): string {
  return join(getConfigDir(), 'config.json5');
}

export function loadConfig(): RouteFinderConfig {
  const configFile = getConfigPath();
  try {
    if (existsSync(configFile)) {
      const content = readFileSync(configFile, 'utf-8');
      const parsed = configFileSchema.parse(JSON5.parse(content));
      return { ...DEFAULT_CONFIG, ...parsed };
    }
  } catch (error) {
    console.warn(
      `Ignoring unreadable config ${configFile}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return { ...DEFAULT_CONFIG };
}

export function saveConfig(config: RouteFinderConfig): void {
  ensureConfigDir();
  const content = JSON5.stringify(config, null, 2);
  writeFileSync(getConfigPath(), content, 'utf-8');
}

export function getConfigValue<K extends keyof RouteFinderConfig>(key: K): RouteFinderConfig[K] | undefined {
  const config = loadConfig();
  return config[key];
}

export function setConfigValue<K extends keyof RouteFinderConfig>(key: K, value: RouteFinderConfig[K]): void {
  const config = loadConfig();
  config[key] = value;
  saveConfig(config);
}

export function deleteConfigValue<K extends keyof RouteFinderConfig>(key: K): void {
  const config = loadConfig();
  delete config[key];
  saveConfig(config);
}

export function ensureConfigDir(): void {
  const dir = getConfigDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

export type NumericConfigKey =
  | 'minConnectionMinutes'
  | 'maxConnectionMinutes'
  | 'trailingWindowHours'
  | 'defaultLimit'
  | 'serverPort';

const NUMERIC_RANGES: Record<NumericConfigKey, { min: number; max: number }> = {
  minConnectionMinutes: { min: 0, max: Number.MAX_SAFE_INTEGER },
  maxConnectionMinutes: { min: 0, max: Number.MAX_SAFE_INTEGER },
  trailingWindowHours: { min: 0, max: Number.MAX_SAFE_INTEGER },
  defaultLimit: { min: 1, max: Number.MAX_SAFE_INTEGER },
  serverPort: { min: 1, max: 65535 },
};

export function isNumericConfigKey(key: keyof RouteFinderConfig): key is NumericConfigKey {
  return key in NUMERIC_RANGES;
}

/**
 * Parse a whole-number config value typed on the command line
 */
export function parseConfigNumber(key: NumericConfigKey, value: string): number {
  const { min, max } = NUMERIC_RANGES[key];
  const text = value.trim();
  const parsed = /^\d+$/.test(text) ? Number(text) : Number.NaN;
  if (!Number.isSafeInteger(parsed) || parsed < min || parsed > max) {
    const range = max === Number.MAX_SAFE_INTEGER ? `at least ${min}` : `between ${min} and ${max}`;
    throw new ConfigError(`${key} must be a whole number ${range}, got ${value}`);
  }
  return parsed;
}

/**
 * Connection window from config, falling back to defaults for unset keys
 */
export function resolveConnectionPolicy(config: RouteFinderConfig): ConnectionPolicy {
  const min = config.minConnectionMinutes ?? DEFAULT_CONNECTION_POLICY.minConnectionMinutes;
  const max = config.maxConnectionMinutes ?? DEFAULT_CONNECTION_POLICY.maxConnectionMinutes;

  if (!isNonNegativeInteger(min)) {
    throw new ConfigError(`minConnectionMinutes must be a non-negative integer, got ${min}`);
  }
  if (!isNonNegativeInteger(max)) {
    throw new ConfigError(`maxConnectionMinutes must be a non-negative integer, got ${max}`);
  }
  if (max < min) {
    throw new ConfigError(`maxConnectionMinutes (${max}) is below minConnectionMinutes (${min})`);
  }
  return { minConnectionMinutes: min, maxConnectionMinutes: max };
}

export function resolveTrailingWindowHours(config: RouteFinderConfig): number {
  const hours = config.trailingWindowHours ?? DEFAULT_TRAILING_WINDOW_HOURS;
  if (!isNonNegativeInteger(hours)) {
    throw new ConfigError(`trailingWindowHours must be a non-negative integer, got ${hours}`);
  }
  return hours;
}
