import { RosterSource } from './battlemetrics-roster-source';
import { CrawlContext } from './crawl-context';
import { CrawlEngine } from './crawl-engine';
import { parseSeedIdentity } from './identity-resolver';
import { debug, log } from './logging-utils';
import { ProfilePageSource } from './steam-page-source';
import { RelationshipExtractor, SteamProfileExtractor } from './steam-profile-extractor';
import { CrawlOptions, CrawlResult } from './types';

export const DEFAULT_CRAWL_OPTIONS: CrawlOptions = {
  maxDepth: 5,
  includeAnnotations: false,
  maxAnnotationPages: 1,
  strategy: 'depth-first',
  concurrency: 1
};

export interface TeamDetectorDeps {
  rosterSource: RosterSource;
  pageSource: ProfilePageSource;
  extractor?: RelationshipExtractor;
}

/**
 * One detection run: read the server roster, then crawl outwards from the
 * seed profiles and build the team graph.
 */
export class TeamDetector {
  private readonly options: CrawlOptions;
  private readonly extractor: RelationshipExtractor;

  constructor(private readonly deps: TeamDetectorDeps, options: Partial<CrawlOptions> = {}) {
    this.options = { ...DEFAULT_CRAWL_OPTIONS, ...options };
    this.extractor = deps.extractor ?? new SteamProfileExtractor();
  }

  async detect(serverId: string, seeds: readonly string[]): Promise<CrawlResult> {
    const seedIdentities = seeds.map(parseSeedIdentity);

    const roster = await this.deps.rosterSource.fetchPlayerNames(serverId);
    log(`📋 Roster of server ${serverId}: ${roster.length} players`);

    const context = new CrawlContext(this.options, this.extractor, this.deps.pageSource, roster);
    const result = await new CrawlEngine(context).run(seedIdentities);

    const cacheStats = context.cache.stats();
    debug(`[TeamDetector] cache profiles ${cacheStats.profiles.hits}/${cacheStats.profiles.misses}, ` +
      `friends ${cacheStats.relationshipLists.hits}/${cacheStats.relationshipLists.misses}, ` +
      `comments ${cacheStats.annotationPages.hits}/${cacheStats.annotationPages.misses} (hits/misses)`);

    return result;
  }
}
