import { FetchCache } from './fetch-cache';
import { GraphBuilder } from './graph-builder';
import { IdentityResolver } from './identity-resolver';
import { IdentityTable } from './identity-table';
import { RosterMatcher } from './roster-matcher';
import { ProfilePageSource } from './steam-page-source';
import { RelationshipExtractor } from './steam-profile-extractor';
import { CrawlOptions, ResolvedProfile, VisitSnapshot } from './types';

/**
 * All mutable state of one run. Created per run and passed to every
 * component; nothing here outlives the run.
 */
export class CrawlContext {
  readonly identities = new IdentityTable();
  readonly cache: FetchCache;
  readonly resolver: IdentityResolver;
  readonly roster: RosterMatcher;
  readonly graph = new GraphBuilder();

  // Claimed ids, resolved or not; found holds resolved profiles in discovery order
  private readonly claimed = new Set<string>();
  private readonly found: ResolvedProfile[] = [];
  private readonly foundIds = new Set<string>();
  private readonly snapshots: VisitSnapshot[] = [];

  constructor(
    readonly options: CrawlOptions,
    readonly extractor: RelationshipExtractor,
    source: ProfilePageSource,
    readonly rosterNames: readonly string[]
  ) {
    this.cache = new FetchCache(source, extractor, this.identities);
    this.resolver = new IdentityResolver(this.cache, extractor, this.identities);
    this.roster = new RosterMatcher(rosterNames);
  }

  /**
   * Marks the profile as taken by the calling task. Returns false when another
   * task already claimed it. Synchronous, so concurrent tasks cannot both win.
   */
  claim(numericId: string): boolean {
    if (this.claimed.has(numericId)) return false;
    this.claimed.add(numericId);
    return true;
  }

  addFoundPlayer(profile: ResolvedProfile): void {
    if (this.foundIds.has(profile.numericId)) {
      throw new Error(`Profile ${profile.numericId} was already visited`);
    }
    this.foundIds.add(profile.numericId);
    this.found.push(profile);
    this.graph.addNode(profile);
  }

  recordSnapshot(snapshot: VisitSnapshot): void {
    this.snapshots.push(Object.freeze({
      ...snapshot,
      rawRelationships: Object.freeze([...snapshot.rawRelationships])
    }));
  }

  get foundPlayers(): readonly ResolvedProfile[] {
    return this.found;
  }

  get visitSnapshots(): readonly VisitSnapshot[] {
    return this.snapshots;
  }
}
