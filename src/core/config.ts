/**
 * Reflex Vacuum - Configuration
 *
 * Parses environment variables and CLI arguments.
 * Env vars take precedence over defaults, CLI flags over env vars.
 */

import { ConfigError } from './errors.js';

export interface VacuumConfig {
  /** Inline room layout, e.g. "0010101" */
  room: string;
  /** JSON room file; wins over every other room source */
  roomFile: string | null;
  /** Length of a generated random room (0 = off) */
  randomLength: number;
  /** Chance a generated cell is dirty */
  dirtProbability: number;
  /** Seed for random rooms */
  seed: number;
  /** Starting cell of the agent */
  startPosition: number;
  /** Pause between ticks in milliseconds */
  tickIntervalMs: number;
  /** Safety bound on the number of ticks */
  maxTicks: number;
  /** Enable verbose logging */
  verbose: boolean;
}

export const DEFAULT_CONFIG: VacuumConfig = {
  room: '0010101',
  roomFile: null,
  randomLength: 0,
  dirtProbability: 0.5,
  seed: 42,
  startPosition: 0,
  tickIntervalMs: 2000,
  maxTicks: 10_000,
  verbose: false,
};

type Env = Record<string, string | undefined>;

function parseIntEnv(env: Env, key: string, fallback: number): number {
  const val = env[key];
  if (val === undefined) return fallback;
  const parsed = parseInt(val, 10);
  return isNaN(parsed) ? fallback : parsed;
}

function parseFloatEnv(env: Env, key: string, fallback: number): number {
  const val = env[key];
  if (val === undefined) return fallback;
  const parsed = parseFloat(val);
  return isNaN(parsed) ? fallback : parsed;
}

function parseBoolEnv(env: Env, key: string, fallback: boolean): boolean {
  const val = env[key];
  if (val === undefined) return fallback;
  return val.toLowerCase() === 'true' || val === '1';
}

function parseStringEnv(env: Env, key: string, fallback: string): string {
  return env[key] ?? fallback;
}

export function loadConfig(env: Env = process.env): VacuumConfig {
  return {
    room: parseStringEnv(env, 'VACUUM_ROOM', DEFAULT_CONFIG.room),
    roomFile: env['VACUUM_ROOM_FILE'] ?? DEFAULT_CONFIG.roomFile,
    randomLength: parseIntEnv(env, 'VACUUM_RANDOM_LENGTH', DEFAULT_CONFIG.randomLength),
    dirtProbability: parseFloatEnv(env, 'VACUUM_DIRT_PROBABILITY', DEFAULT_CONFIG.dirtProbability),
    seed: parseIntEnv(env, 'VACUUM_SEED', DEFAULT_CONFIG.seed),
    startPosition: parseIntEnv(env, 'VACUUM_START', DEFAULT_CONFIG.startPosition),
    tickIntervalMs: parseIntEnv(env, 'VACUUM_TICK_INTERVAL_MS', DEFAULT_CONFIG.tickIntervalMs),
    maxTicks: parseIntEnv(env, 'VACUUM_MAX_TICKS', DEFAULT_CONFIG.maxTicks),
    verbose: parseBoolEnv(env, 'VACUUM_VERBOSE', DEFAULT_CONFIG.verbose),
  };
}

export function parseCliArgs(args: string[]): Partial<VacuumConfig> {
  const result: Partial<VacuumConfig> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case '--room':
        if (next) result.room = next;
        i++;
        break;
      case '--room-file':
        if (next) result.roomFile = next;
        i++;
        break;
      case '--random':
        if (next) result.randomLength = parseInt(next, 10);
        i++;
        break;
      case '--dirt':
        if (next) result.dirtProbability = parseFloat(next);
        i++;
        break;
      case '--seed':
        if (next) result.seed = parseInt(next, 10);
        i++;
        break;
      case '--start':
        if (next) result.startPosition = parseInt(next, 10);
        i++;
        break;
      case '--tick-interval':
        if (next) result.tickIntervalMs = parseInt(next, 10);
        i++;
        break;
      case '--max-ticks':
        if (next) result.maxTicks = parseInt(next, 10);
        i++;
        break;
      case '--verbose':
      case '-v':
        result.verbose = true;
        break;
    }
  }

  return result;
}

export function mergeConfig(envConfig: VacuumConfig, cliOverrides: Partial<VacuumConfig>): VacuumConfig {
  return { ...envConfig, ...cliOverrides };
}

/**
 * Check value ranges. Room-dependent checks (start inside the room) happen
 * once the room is built.
 */
export function validateConfig(config: VacuumConfig): VacuumConfig {
  const errors: string[] = [];

  if (!Number.isInteger(config.maxTicks) || config.maxTicks < 1) {
    errors.push('maxTicks must be a positive integer');
  }
  if (!Number.isInteger(config.tickIntervalMs) || config.tickIntervalMs < 0) {
    errors.push('tickIntervalMs must be a non-negative integer');
  }
  if (Number.isNaN(config.dirtProbability) || config.dirtProbability < 0 || config.dirtProbability > 1) {
    errors.push('dirtProbability must be between 0 and 1');
  }
  if (!Number.isInteger(config.startPosition) || config.startPosition < 0) {
    errors.push('startPosition must be a non-negative integer');
  }
  if (!Number.isInteger(config.randomLength) || config.randomLength < 0) {
    errors.push('randomLength must be a non-negative integer');
  }
  if (!Number.isInteger(config.seed)) {
    errors.push('seed must be an integer');
  }

  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
  return config;
}
