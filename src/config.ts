/**
 * Configuration loaded from environment variables
 *
 * Every value has a default so the library runs against a local SQLite file
 * without setup. Only the generation gateway needs GEMINI_API_KEY; without it
 * lookups still complete through fallback cards.
 */

import { ConfigurationError } from './errors.js';
import { isLogLevel, type LogLevel } from './logging/console-logger.js';
import { DEFAULT_DECAY_RATE } from './models/interest-score.model.js';

export interface Config {
  /** SQLite database file (":memory:" for an ephemeral database) */
  databasePath: string;
  /** API key for the Gemini generative-text provider */
  geminiApiKey?: string;
  /** Gemini model name */
  geminiModel: string;
  /** Upper bound for one generation call, in milliseconds */
  generationTimeoutMs: number;
  /** Per-day decay multiplier for newly created interest scores */
  interestDecayRate: number;
  /** Attempts for an interest graph write before giving up on version conflicts */
  interestGraphMaxRetries: number;
  /** Log level */
  logLevel: LogLevel;
}

export const DEFAULT_DATABASE_PATH = './data/lexicard.db';
export const DEFAULT_GEMINI_MODEL = 'gemini-2.5-flash';
export const DEFAULT_GENERATION_TIMEOUT_MS = 30_000;
export const DEFAULT_GRAPH_MAX_RETRIES = 3;

type Env = Record<string, string | undefined>;

function getEnvOrDefault(env: Env, name: string, defaultValue: string): string {
  const value = env[name];
  return value === undefined || value.trim() === '' ? defaultValue : value.trim();
}

/** Longest delay setTimeout honours; larger values fire after 1ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

function parsePositiveInt(env: Env, name: string, defaultValue: number, max = Number.MAX_SAFE_INTEGER): number {
  const raw = getEnvOrDefault(env, name, String(defaultValue));
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${raw}"`, name);
  }
  if (value > max) {
    throw new ConfigurationError(`${name} must be at most ${max}, got "${raw}"`, name);
  }
  return value;
}

function parseDecayRate(env: Env, name: string, defaultValue: number): number {
  const raw = getEnvOrDefault(env, name, String(defaultValue));
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0 || value > 1) {
    throw new ConfigurationError(`${name} must be in (0, 1], got "${raw}"`, name);
  }
  return value;
}

export function loadConfig(env: Env = process.env): Config {
  const logLevel = getEnvOrDefault(env, 'LOG_LEVEL', 'info').toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`LOG_LEVEL must be one of debug, info, warn, error, got "${logLevel}"`, 'LOG_LEVEL');
  }

  return {
    databasePath: getEnvOrDefault(env, 'DATABASE_PATH', DEFAULT_DATABASE_PATH),
    geminiApiKey: env.GEMINI_API_KEY?.trim() || undefined,
    geminiModel: getEnvOrDefault(env, 'GEMINI_MODEL', DEFAULT_GEMINI_MODEL),
    generationTimeoutMs: parsePositiveInt(
      env,
      'GENERATION_TIMEOUT_MS',
      DEFAULT_GENERATION_TIMEOUT_MS,
      MAX_TIMER_DELAY_MS
    ),
    interestDecayRate: parseDecayRate(env, 'INTEREST_DECAY_RATE', DEFAULT_DECAY_RATE),
    interestGraphMaxRetries: parsePositiveInt(env, 'INTEREST_GRAPH_MAX_RETRIES', DEFAULT_GRAPH_MAX_RETRIES),
    logLevel,
  };
}
