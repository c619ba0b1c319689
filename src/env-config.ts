/**
 * Environment Configuration Utility
 *
 * Provides centralized environment variable handling with:
 * - SQUADTRACE_ prefixed variables (preferred)
 * - Fallback to unprefixed variables
 * - Default values
 */

import { warn } from './logging-utils';

export const DEFAULT_RECURSIVE_DEPTH = 5;
export const DEFAULT_COMMENT_PAGES = 1;
export const DEFAULT_CONFIG_FILE = 'squadtrace.json';
export const DEFAULT_OUTPUT_FILE = 'team_network.html';

export interface SquadtraceEnvConfig {
  debug: boolean;
  recursiveDepth: number;
  commentPages: number;
  concurrency: number;
  httpTimeoutMs: number;
  userAgent: string;
  configFile: string;
  outputFile: string;
}

type Env = Record<string, string | undefined>;

/**
 * Get environment variable with SQUADTRACE_ prefix preference
 */
function getEnvVar(env: Env, name: string): string | undefined {
  const prefixed = env[`SQUADTRACE_${name}`];
  const unprefixed = env[name];

  if (!prefixed && unprefixed) {
    warn(`[ENV] Using unprefixed environment variable '${name}'. Consider using 'SQUADTRACE_${name}' to avoid conflicts.`);
  }

  return prefixed || unprefixed || undefined;
}

function getBooleanEnv(env: Env, name: string, defaultValue: boolean): boolean {
  const value = getEnvVar(env, name);
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Integer variable with the same lower bound as its CLI flag
 */
function getNumberEnv(env: Env, name: string, defaultValue: number, min: number): number {
  const value = getEnvVar(env, name);
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < min) {
    warn(`[ENV] SQUADTRACE_${name} expects an integer >= ${min}, got '${value}', using ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

/**
 * Load squadtrace defaults from the environment. CLI flags override these.
 */
export function loadEnvConfig(env: Env = process.env): SquadtraceEnvConfig {
  return {
    debug: getBooleanEnv(env, 'DEBUG', false),
    recursiveDepth: getNumberEnv(env, 'RECURSIVE_DEPTH', DEFAULT_RECURSIVE_DEPTH, 0),
    commentPages: getNumberEnv(env, 'COMMENT_PAGES', DEFAULT_COMMENT_PAGES, 0),
    concurrency: getNumberEnv(env, 'CONCURRENCY', 1, 1),
    httpTimeoutMs: getNumberEnv(env, 'HTTP_TIMEOUT_MS', 30000, 1),
    userAgent: getEnvVar(env, 'USER_AGENT') ?? 'squadtrace/1.0',
    configFile: getEnvVar(env, 'CONFIG_FILE') ?? DEFAULT_CONFIG_FILE,
    outputFile: getEnvVar(env, 'OUTPUT_FILE') ?? DEFAULT_OUTPUT_FILE,
  };
}
