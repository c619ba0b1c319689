import { ExtractionError } from './errors';
import { HttpClient } from './http-client';
import { debug } from './logging-utils';

export interface RosterSource {
  fetchPlayerNames(serverId: string): Promise<string[]>;
}

export const battlemetricsServerUrl = (serverId: string): string =>
  `https://api.battlemetrics.com/servers/${serverId}?include=player`;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Pull active player names out of a BattleMetrics server document
 * (`included[]` entries of type `player`).
 */
export function parseServerPlayers(document: unknown, source: string): string[] {
  if (!isRecord(document) || !Array.isArray(document.included)) {
    throw new ExtractionError('included players', source);
  }

  const players: string[] = [];
  for (const entry of document.included) {
    if (!isRecord(entry)) continue;
    if (entry.type !== undefined && entry.type !== 'player') continue;

    const attributes = entry.attributes;
    if (isRecord(attributes) && typeof attributes.name === 'string') {
      players.push(attributes.name);
    }
  }

  return players;
}

export class BattlemetricsRosterSource implements RosterSource {
  constructor(private readonly http: HttpClient) {}

  async fetchPlayerNames(serverId: string): Promise<string[]> {
    const url = battlemetricsServerUrl(serverId);
    const document = await this.http.getJson(url);
    const players = parseServerPlayers(document, url);

    debug(`[Roster] Server ${serverId} has ${players.length} players online`);
    return players;
  }
}
