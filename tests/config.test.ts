import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  ConfigError,
  DEFAULT_CONFIG,
  deleteConfigValue,
  getConfigPath,
  getConfigValue,
  loadConfig,
  parseConfigNumber,
  resolveConnectionPolicy,
  resolveTrailingWindowHours,
  setConfigValue,
} from '../src/lib/config.js';

describe('config file', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'routefinder-config-'));
    vi.stubEnv('ROUTEFINDER_CONFIG_DIR', dir);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('lives in the configured directory', () => {
    expect(getConfigPath()).toBe(join(dir, 'config.json5'));
  });

  it('returns defaults when no file exists', () => {
    expect(loadConfig()).toEqual(DEFAULT_CONFIG);
    expect(getConfigValue('minConnectionMinutes')).toBe(45);
  });

  it('round-trips values through the file', () => {
    setConfigValue('catalogPath', '/data/flights.json5');
    setConfigValue('maxConnectionMinutes', 300);

    expect(getConfigValue('catalogPath')).toBe('/data/flights.json5');
    expect(loadConfig().maxConnectionMinutes).toBe(300);

    deleteConfigValue('catalogPath');
    expect(getConfigValue('catalogPath')).toBeUndefined();
  });

  it('reads JSON5 written by hand', () => {
    writeFileSync(getConfigPath(), "// local\n{ serverPort: 8080, defaultLimit: 5, }\n", 'utf-8');

    expect(loadConfig()).toEqual({ ...DEFAULT_CONFIG, serverPort: 8080, defaultLimit: 5 });
  });

  it('ignores a file with a zero page size', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    writeFileSync(getConfigPath(), '{ defaultLimit: 0 }', 'utf-8');

    expect(loadConfig().defaultLimit).toBe(20);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('falls back to defaults on an unreadable file', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    writeFileSync(getConfigPath(), '{ serverPort: "eighty" }', 'utf-8');

    expect(loadConfig()).toEqual(DEFAULT_CONFIG);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe('parseConfigNumber', () => {
  it('reads plain whole numbers', () => {
    expect(parseConfigNumber('minConnectionMinutes', '0')).toBe(0);
    expect(parseConfigNumber('defaultLimit', ' 25 ')).toBe(25);
    expect(parseConfigNumber('serverPort', '65535')).toBe(65535);
  });

  it('rejects trailing garbage and fractions', () => {
    expect(() => parseConfigNumber('maxConnectionMinutes', '12abc')).toThrow(ConfigError);
    expect(() => parseConfigNumber('trailingWindowHours', '1.5')).toThrow(ConfigError);
    expect(() => parseConfigNumber('minConnectionMinutes', '-5')).toThrow(ConfigError);
  });

  it('rejects a page size or port no search could use', () => {
    expect(() => parseConfigNumber('defaultLimit', '0')).toThrow('defaultLimit must be a whole number at least 1, got 0');
    expect(() => parseConfigNumber('serverPort', '0')).toThrow(
      'serverPort must be a whole number between 1 and 65535, got 0',
    );
    expect(() => parseConfigNumber('serverPort', '70000')).toThrow(ConfigError);
  });
});

describe('resolveConnectionPolicy', () => {
  it('fills unset bounds from defaults', () => {
    expect(resolveConnectionPolicy({})).toEqual({ minConnectionMinutes: 45, maxConnectionMinutes: 720 });
    expect(resolveConnectionPolicy({ minConnectionMinutes: 0, maxConnectionMinutes: 0 })).toEqual({
      minConnectionMinutes: 0,
      maxConnectionMinutes: 0,
    });
  });

  it('rejects bounds that cannot form a window', () => {
    expect(() => resolveConnectionPolicy({ minConnectionMinutes: -5 })).toThrow(ConfigError);
    expect(() => resolveConnectionPolicy({ minConnectionMinutes: 90, maxConnectionMinutes: 60 })).toThrow(
      'maxConnectionMinutes (60) is below minConnectionMinutes (90)',
    );
    expect(() => resolveConnectionPolicy({ maxConnectionMinutes: 1.5 })).toThrow(
      'maxConnectionMinutes must be a non-negative integer, got 1.5',
    );
  });
});

describe('resolveTrailingWindowHours', () => {
  it('defaults to a day', () => {
    expect(resolveTrailingWindowHours({})).toBe(24);
    expect(resolveTrailingWindowHours({ trailingWindowHours: 6 })).toBe(6);
  });

  it('rejects negative hours', () => {
    expect(() => resolveTrailingWindowHours({ trailingWindowHours: -1 })).toThrow(ConfigError);
  });
});
