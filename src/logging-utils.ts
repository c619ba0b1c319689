/**
 * Simple timestamped logging utilities
 * Provides consistent timestamp formatting across console logging
 */

let debugEnabled = false;

export const setDebugLogging = (enabled: boolean): void => {
  debugEnabled = enabled;
};

export const isDebugLogging = (): boolean => debugEnabled;

/**
 * Log with ISO timestamp prefix, preserving emoji and formatting
 */
export const timestampedLog = (message: string, ...args: unknown[]): void => {
  const timestamp = new Date().toISOString();
  console.log(`[${timestamp}] ${message}`, ...args);
};

/**
 * Convenience methods for different log levels
 */
export const log = timestampedLog;

export const warn = (message: string, ...args: unknown[]): void => {
  const timestamp = new Date().toISOString();
  console.warn(`[${timestamp}] ${message}`, ...args);
};

export const error = (message: string, ...args: unknown[]): void => {
  const timestamp = new Date().toISOString();
  console.error(`[${timestamp}] ${message}`, ...args);
};

// Only printed with --debug
export const debug = (message: string, ...args: unknown[]): void => {
  if (!debugEnabled) return;
  timestampedLog(`🔎 ${message}`, ...args);
};

/**
 * Logger object with common logging methods
 */
export const logger = {
  log: timestampedLog,
  warn,
  error,
  info: timestampedLog,  // Alias for log
  debug
};
