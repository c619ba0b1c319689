import { ExtractionError } from './errors';
import { IdentityTable } from './identity-table';
import { debug } from './logging-utils';
import { ProfilePageSource } from './steam-page-source';
import { RelationshipExtractor } from './steam-profile-extractor';
import { CacheStatistics } from './types';

type MemoName = 'profiles' | 'relationshipLists' | 'annotationPages';

/**
 * Run-scoped memo of raw page content.
 *
 * Entries hold the pending promise, so concurrent callers asking for the
 * same page share one request. A rejected fetch is evicted and rethrown.
 */
export class FetchCache {
  private profiles = new Map<string, Promise<string>>();
  private profilesByAlias = new Map<string, Promise<string>>();
  private relationshipLists = new Map<string, Promise<string>>();
  private annotationPages = new Map<string, Promise<string>>();
  private counters: Record<MemoName, CacheStatistics> = {
    profiles: { hits: 0, misses: 0 },
    relationshipLists: { hits: 0, misses: 0 },
    annotationPages: { hits: 0, misses: 0 }
  };

  constructor(
    private readonly source: ProfilePageSource,
    private readonly extractor: RelationshipExtractor,
    private readonly identities: IdentityTable
  ) {}

  getProfileContent(numericId: string): Promise<string> {
    return this.memoize('profiles', this.profiles, numericId, async () => {
      const content = await this.source.fetchProfile({ kind: 'numeric', id: numericId });
      // Unknown ids still answer 200, with an error page instead of a profile
      if (this.extractor.numericId(content) === undefined) {
        throw new ExtractionError('numeric id', `profile page of ${numericId}`);
      }
      this.identities.bind(this.extractor.aliasId(content), numericId);
      return content;
    });
  }

  getProfileContentByAlias(aliasId: string): Promise<string> {
    const numericId = this.identities.numericFor(aliasId);
    if (numericId !== undefined) {
      return this.getProfileContent(numericId);
    }

    return this.memoize('profiles', this.profilesByAlias, aliasId, async () => {
      const content = await this.source.fetchProfile({ kind: 'alias', id: aliasId });
      const resolved = this.extractor.numericId(content);
      if (resolved === undefined) {
        throw new ExtractionError('numeric id', `profile page of alias '${aliasId}'`);
      }

      this.identities.bind(aliasId, resolved);
      if (!this.profiles.has(resolved)) {
        this.profiles.set(resolved, Promise.resolve(content));
      }
      return content;
    });
  }

  getRelationshipList(numericId: string): Promise<string> {
    return this.memoize('relationshipLists', this.relationshipLists, numericId, async () => {
      const content = await this.source.fetchRelationshipList(numericId);
      for (const friend of this.extractor.relationships(content)) {
        if (friend.aliasId && friend.numericId) {
          this.identities.bind(friend.aliasId, friend.numericId);
        }
      }
      return content;
    });
  }

  getAnnotationsPage(numericId: string, page: number): Promise<string> {
    return this.memoize('annotationPages', this.annotationPages, `${numericId}:${page}`, () =>
      this.source.fetchAnnotationsPage(numericId, page)
    );
  }

  stats(): Record<MemoName, CacheStatistics> {
    return {
      profiles: { ...this.counters.profiles },
      relationshipLists: { ...this.counters.relationshipLists },
      annotationPages: { ...this.counters.annotationPages }
    };
  }

  private memoize(
    name: MemoName,
    memo: Map<string, Promise<string>>,
    key: string,
    fetch: () => Promise<string>
  ): Promise<string> {
    const cached = memo.get(key);
    if (cached) {
      this.counters[name].hits++;
      debug(`[FetchCache] ${name} hit ${key}`);
      return cached;
    }

    this.counters[name].misses++;
    debug(`[FetchCache] ${name} miss ${key}`);
    const pending = fetch().catch((err: unknown) => {
      memo.delete(key);
      throw err;
    });
    memo.set(key, pending);
    return pending;
  }
}
