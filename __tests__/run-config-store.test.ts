import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationError } from '../src/errors';
import { mergeRunConfig, RunConfigStore } from '../src/run-config-store';

describe('RunConfigStore', () => {
  let dir: string;
  let store: RunConfigStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'squadtrace-config-'));
    store = new RunConfigStore('squadtrace.json', dir);
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should resolve the file against the base directory', () => {
    expect(store.configPath).toBe(path.join(dir, 'squadtrace.json'));
  });

  it('should load nothing when no file exists', async () => {
    expect(await store.load()).toEqual({});
  });

  it('should save pretty-printed JSON and load it back', async () => {
    await store.save({ battlemetricsId: '1234', steamIds: ['76561190000000001'] });

    expect(await fs.readFile(store.configPath, 'utf-8')).toBe(
      '{\n  "battlemetricsId": "1234",\n  "steamIds": [\n    "76561190000000001"\n  ]\n}\n'
    );
    expect(await store.load()).toEqual({ battlemetricsId: '1234', steamIds: ['76561190000000001'] });
  });

  it('should create missing directories on save', async () => {
    const nested = new RunConfigStore(path.join('a', 'b', 'saved.json'), dir);
    await nested.save({ battlemetricsId: '1', steamIds: ['x'] });

    expect(await nested.load()).toEqual({ battlemetricsId: '1', steamIds: ['x'] });
  });

  it('should accept a numeric server id and a single steam id', async () => {
    await fs.writeFile(store.configPath, '{"battlemetricsId": 1234, "steamIds": "alice-a"}');

    expect(await store.load()).toEqual({ battlemetricsId: '1234', steamIds: ['alice-a'] });
  });

  it('should ignore unknown and null fields', async () => {
    await fs.writeFile(store.configPath, '{"battlemetricsId": null, "theme": "dark"}');

    expect(await store.load()).toEqual({});
  });

  it.each([
    ['invalid JSON', '{"battlemetricsId": '],
    ['a list', '["1234"]'],
    ['non-string steam ids', '{"steamIds": [1, 2]}']
  ])('should reject %s', async (_label, content) => {
    await fs.writeFile(store.configPath, content);

    await expect(store.load()).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('mergeRunConfig', () => {
  const saved = { battlemetricsId: '1', steamIds: ['saved-seed'] };

  it('should prefer command line values', () => {
    expect(mergeRunConfig({ battlemetricsId: '2', steamIds: ['cli-seed'] }, saved))
      .toEqual({ battlemetricsId: '2', steamIds: ['cli-seed'] });
  });

  it('should fall back to saved values field by field', () => {
    expect(mergeRunConfig({ battlemetricsId: '2' }, saved)).toEqual({ battlemetricsId: '2', steamIds: ['saved-seed'] });
    expect(mergeRunConfig({ steamIds: [] }, saved)).toEqual(saved);
  });

  it('should fail when either value is missing', () => {
    expect(() => mergeRunConfig({ battlemetricsId: '2' }, {}))
      .toThrow('BattleMetrics Server ID or Steam ID is not provided.');
    expect(() => mergeRunConfig({ steamIds: ['x'] }, {})).toThrow(ConfigurationError);
  });
});
