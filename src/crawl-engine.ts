import fastq from 'fastq';
import { CrawlContext } from './crawl-context';
import { describeIdentity, excludeKnown, removeDuplicates, removeSelf } from './identity-utils';
import { debug, log } from './logging-utils';
import {
  CrawlResult,
  CrawlStatistics,
  CrawlTask,
  ProfileIdentity,
  RelationshipRecord,
  ResolvedProfile,
  VisitOutcome
} from './types';

/**
 * Depth-bounded crawl over the relationship network of the seed profiles.
 *
 * Tasks run on a fastq queue. Depth-first puts new tasks at the head of the
 * queue, breadth-first at the tail; with a concurrency of 1 the crawl is
 * strictly sequential and follows that order exactly.
 */
export class CrawlEngine {
  private queue: fastq.queueAsPromised<CrawlTask, VisitOutcome>;
  private pending = new Set<Promise<void>>();
  private failure: { error: unknown } | undefined;
  private stats: CrawlStatistics = {
    visited: 0,
    skipped: 0,
    stopped: 0,
    directEdges: 0,
    inferredEdges: 0,
    durationMs: 0
  };

  constructor(private readonly context: CrawlContext) {
    this.queue = fastq.promise(this.visit.bind(this), Math.max(1, context.options.concurrency));
  }

  async run(seeds: readonly ProfileIdentity[]): Promise<CrawlResult> {
    const startTime = Date.now();
    const { options } = this.context;
    log(`🚶 Crawling from ${seeds.length} seed(s), max depth ${options.maxDepth}, ${options.strategy}`);

    for (const seed of seeds) {
      this.schedule({ identity: seed, depth: 0 }, false);
    }

    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }

    if (this.failure) {
      throw this.failure.error;
    }

    this.context.graph.inferEdges(this.context.visitSnapshots);
    const edges = this.context.graph.counts();
    this.stats.directEdges = edges.directEdges;
    this.stats.inferredEdges = edges.inferredEdges;
    this.stats.durationMs = Date.now() - startTime;

    log(`✅ Crawl finished in ${this.stats.durationMs}ms: ${this.stats.visited} visited, ${this.stats.skipped} skipped, ${this.stats.stopped} stopped at depth cap`);

    return {
      roster: [...this.context.rosterNames],
      foundPlayers: [...this.context.foundPlayers],
      snapshots: [...this.context.visitSnapshots],
      graph: this.context.graph.getGraph(),
      stats: { ...this.stats }
    };
  }

  private schedule(task: CrawlTask, atHead: boolean): void {
    const queued = atHead ? this.queue.unshift(task) : this.queue.push(task);
    const settled: Promise<void> = queued.then(
      (outcome) => {
        this.stats[outcome]++;
      },
      (error: unknown) => {
        this.failure ??= { error };
      }
    ).finally(() => {
      this.pending.delete(settled);
    });
    this.pending.add(settled);
  }

  private async visit(task: CrawlTask): Promise<VisitOutcome> {
    const { identity, depth } = task;
    const { options, resolver } = this.context;

    // Drain quietly once a task has failed; run() rethrows the failure
    if (this.failure) return 'skipped';

    if (depth >= options.maxDepth) {
      debug(`[CrawlEngine] ${describeIdentity(identity)} at depth ${depth} -> depth cap`);
      return 'stopped';
    }

    const numericId = await resolver.numericIdOf(identity);
    const profile = await this.claim(numericId);
    if (!profile) {
      debug(`[CrawlEngine] ${describeIdentity(identity)} at depth ${depth} -> already searched`);
      return 'skipped';
    }

    debug(`[CrawlEngine] visiting ${describeIdentity(profile)} at depth ${depth}`);
    const people = await this.gatherCandidates(profile);
    this.context.recordSnapshot({ profile, depth, rawRelationships: people });

    const candidates = removeSelf(profile, removeDuplicates(people));
    const matched = this.context.roster.match(candidates);
    this.context.graph.addDirectEdges(profile, matched);

    const next = excludeKnown(matched, this.context.foundPlayers);
    const children = next.map((candidate) => ({ identity: candidate, depth: depth + 1 }));
    if (options.strategy === 'depth-first') {
      // Unshift in reverse so the first candidate is visited first
      for (let i = children.length - 1; i >= 0; i--) {
        this.schedule(children[i], true);
      }
    } else {
      children.forEach((child) => this.schedule(child, false));
    }

    return 'visited';
  }

  /**
   * Steps 2-3 of a visit: skip a claimed profile, otherwise claim, resolve and
   * record it. Only the claim must be atomic; resolution fetches run in parallel.
   */
  private async claim(numericId: string): Promise<ResolvedProfile | undefined> {
    if (!this.context.claim(numericId)) return undefined;

    const profile = await this.context.resolver.resolveProfile({ numericId, displayName: '' });
    this.context.addFoundPlayer(profile);
    return profile;
  }

  private async gatherCandidates(profile: ResolvedProfile): Promise<RelationshipRecord[]> {
    const { cache, extractor, options } = this.context;
    const content = await cache.getProfileContent(profile.numericId);
    const people: RelationshipRecord[] = [];

    if (extractor.relationshipVisibility(content) === 'public') {
      const list = await cache.getRelationshipList(profile.numericId);
      people.push(...extractor.relationships(list));
    }

    if (options.includeAnnotations && options.maxAnnotationPages > 0 &&
        extractor.annotationVisibility(content) === 'public') {
      let remaining = extractor.annotationTotalCount(content);
      for (let page = 1; page <= options.maxAnnotationPages && remaining > 0; page++) {
        const { authorsRead, authors } = extractor.annotationAuthors(
          await cache.getAnnotationsPage(profile.numericId, page)
        );
        remaining -= authorsRead;
        people.push(...authors);
      }
    }

    debug(`[CrawlEngine] ${profile.displayName}: ${people.length} related identities`);
    return people;
  }
}
