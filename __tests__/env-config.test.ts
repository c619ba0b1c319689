import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadEnvConfig } from '../src/env-config';

describe('loadEnvConfig', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should fall back to defaults', () => {
    expect(loadEnvConfig({})).toEqual({
      debug: false,
      recursiveDepth: 5,
      commentPages: 1,
      concurrency: 1,
      httpTimeoutMs: 30000,
      userAgent: 'squadtrace/1.0',
      configFile: 'squadtrace.json',
      outputFile: 'team_network.html'
    });
  });

  it('should read prefixed variables', () => {
    const config = loadEnvConfig({
      SQUADTRACE_DEBUG: 'TRUE',
      SQUADTRACE_RECURSIVE_DEPTH: '3',
      SQUADTRACE_HTTP_TIMEOUT_MS: '5000',
      SQUADTRACE_OUTPUT_FILE: 'graph.html'
    });

    expect(config).toMatchObject({ debug: true, recursiveDepth: 3, httpTimeoutMs: 5000, outputFile: 'graph.html' });
    expect(console.warn).not.toHaveBeenCalled();
  });

  it('should keep the default for numbers that do not parse', () => {
    expect(loadEnvConfig({ SQUADTRACE_CONCURRENCY: 'many' }).concurrency).toBe(1);
    expect(console.warn).toHaveBeenCalledWith(
      expect.stringContaining("[ENV] SQUADTRACE_CONCURRENCY expects an integer >= 1, got 'many', using 1")
    );
  });

  it('should keep the default for numbers below the flag minimum', () => {
    const config = loadEnvConfig({
      SQUADTRACE_RECURSIVE_DEPTH: '-2',
      SQUADTRACE_COMMENT_PAGES: '-1',
      SQUADTRACE_CONCURRENCY: '0',
      SQUADTRACE_HTTP_TIMEOUT_MS: '0'
    });

    expect(config).toMatchObject({ recursiveDepth: 5, commentPages: 1, concurrency: 1, httpTimeoutMs: 30000 });
    expect(console.warn).toHaveBeenCalledTimes(4);
    expect(console.warn).toHaveBeenCalledWith(
      expect.stringContaining("[ENV] SQUADTRACE_RECURSIVE_DEPTH expects an integer >= 0, got '-2', using 5")
    );
    expect(console.warn).toHaveBeenCalledWith(
      expect.stringContaining("[ENV] SQUADTRACE_HTTP_TIMEOUT_MS expects an integer >= 1, got '0', using 30000")
    );
  });

  it('should accept the minimum values', () => {
    const config = loadEnvConfig({ SQUADTRACE_RECURSIVE_DEPTH: '0', SQUADTRACE_COMMENT_PAGES: '0', SQUADTRACE_CONCURRENCY: '1' });

    expect(config).toMatchObject({ recursiveDepth: 0, commentPages: 0, concurrency: 1 });
    expect(console.warn).not.toHaveBeenCalled();
  });

  it('should warn when only the unprefixed variable is set', () => {
    expect(loadEnvConfig({ COMMENT_PAGES: '4' }).commentPages).toBe(4);

    expect(console.warn).toHaveBeenCalledTimes(1);
    expect(console.warn).toHaveBeenCalledWith(
      expect.stringContaining("Using unprefixed environment variable 'COMMENT_PAGES'")
    );
  });

  it('should prefer the prefixed variable', () => {
    expect(loadEnvConfig({ SQUADTRACE_CONFIG_FILE: 'a.json', CONFIG_FILE: 'b.json' }).configFile).toBe('a.json');
    expect(console.warn).not.toHaveBeenCalled();
  });
});
