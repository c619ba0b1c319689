import { debug } from './logging-utils';
import { ProfileIdentity } from './types';

/**
 * Filters related identities down to those whose display name is on the
 * server roster. Matching is exact string equality on the name, so two
 * profiles sharing a name are indistinguishable here: the roster exposes
 * names only.
 */
export class RosterMatcher {
  private readonly names: ReadonlySet<string>;

  constructor(roster: readonly string[]) {
    this.names = new Set(roster);
  }

  get size(): number {
    return this.names.size;
  }

  isOnRoster(displayName: string): boolean {
    return this.names.has(displayName);
  }

  match<T extends ProfileIdentity>(candidates: readonly T[]): T[] {
    const matched = candidates.filter(candidate => this.names.has(candidate.displayName));
    debug(`[RosterMatcher] ${matched.length}/${candidates.length} candidates on roster`);
    return matched;
  }
}
