import { profileLink } from './steam-page-source';
import { ResolvedProfile } from './types';
import { formatTable } from './utils/table-formatter';

export const NAME_COLUMN_WIDTH = 34;
export const ID_COLUMN_WIDTH = 19;

/**
 * One row per found player, in discovery order.
 */
export function formatResultTable(players: readonly ResolvedProfile[], border: boolean = false): string[] {
  return formatTable<ResolvedProfile>({
    border,
    data: players,
    columns: [
      { title: 'Name:', value: player => player.displayName, width: border ? undefined : NAME_COLUMN_WIDTH },
      { title: 'SteamID:', value: player => player.numericId, width: border ? undefined : ID_COLUMN_WIDTH },
      { title: 'Link:', value: player => profileLink(player.numericId) }
    ]
  });
}
