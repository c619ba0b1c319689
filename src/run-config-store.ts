import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigurationError, errorMessage } from './errors';
import { debug, log } from './logging-utils';

export interface RunConfig {
  battlemetricsId: string;
  steamIds: string[];
}

export type PartialRunConfig = Partial<RunConfig>;

/**
 * The roster reference and seeds of the last successful run, kept as JSON
 * so the next run can omit them on the command line.
 */
export class RunConfigStore {
  readonly configPath: string;

  constructor(configFile: string, baseDir: string = process.cwd()) {
    this.configPath = path.resolve(baseDir, configFile);
  }

  async load(): Promise<PartialRunConfig> {
    if (!(await this.configFileExists())) {
      debug(`[RunConfig] No saved configuration at ${this.configPath}`);
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.readFile(this.configPath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`Could not read ${this.configPath}: ${errorMessage(error)}`);
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new ConfigurationError(`${this.configPath} must contain a JSON object`);
    }

    const config: PartialRunConfig = {};
    if ('battlemetricsId' in parsed && parsed.battlemetricsId !== undefined && parsed.battlemetricsId !== null) {
      config.battlemetricsId = String(parsed.battlemetricsId);
    }
    if ('steamIds' in parsed && parsed.steamIds !== undefined && parsed.steamIds !== null) {
      config.steamIds = this.validateSteamIds(parsed.steamIds);
    }

    debug(`[RunConfig] Loaded saved configuration from ${this.configPath}`);
    return config;
  }

  async save(config: RunConfig): Promise<void> {
    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    await fs.writeFile(this.configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
    log(`💾 Saved run configuration to ${this.configPath}`);
  }

  private validateSteamIds(value: unknown): string[] {
    if (typeof value === 'string') return [value];
    if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
      return value;
    }
    throw new ConfigurationError(`${this.configPath}: steamIds must be a string or a list of strings`);
  }

  private async configFileExists(): Promise<boolean> {
    try {
      await fs.access(this.configPath);
      return true;
    } catch {
      return false;
    }
  }
}

/**
 * Command line values win over saved ones. Both must end up present.
 */
export function mergeRunConfig(cli: PartialRunConfig, saved: PartialRunConfig): RunConfig {
  const battlemetricsId = cli.battlemetricsId ?? saved.battlemetricsId;
  const steamIds = cli.steamIds && cli.steamIds.length > 0 ? cli.steamIds : saved.steamIds;

  if (!battlemetricsId || !steamIds || steamIds.length === 0) {
    throw new ConfigurationError('BattleMetrics Server ID or Steam ID is not provided.');
  }

  return { battlemetricsId, steamIds };
}
