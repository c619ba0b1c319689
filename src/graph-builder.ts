import { debug } from './logging-utils';
import { RelationshipGraph } from './relationship-graph';
import { ProfileIdentity, ResolvedProfile, VisitSnapshot } from './types';

/**
 * Builds the team graph in two passes: direct edges recorded while crawling,
 * then edges inferred from the visit snapshots once the crawl is done.
 */
export class GraphBuilder {
  private directEdges = 0;
  private inferredEdges = 0;

  constructor(private readonly graph: RelationshipGraph = new RelationshipGraph()) {}

  addNode(profile: ResolvedProfile): void {
    this.graph.addNode(profile.displayName, profile.numericId);
  }

  /**
   * Pass 1. Edges are kept even when a matched profile is never visited.
   */
  addDirectEdges(profile: ResolvedProfile, matched: readonly ProfileIdentity[]): void {
    for (const candidate of matched) {
      if (this.graph.addEdge(profile.displayName, candidate.displayName)) {
        this.directEdges++;
      }
    }
  }

  /**
   * Pass 2. Connects A and B when A's numeric id or alias shows up among the
   * raw relationships of B's snapshot (or the other way around).
   */
  inferEdges(snapshots: readonly VisitSnapshot[]): void {
    for (const outer of snapshots) {
      for (const inner of snapshots) {
        const a = outer.profile;
        const b = inner.profile;
        if (a.numericId === b.numericId) continue;
        if (a.aliasId !== '' && a.aliasId === b.aliasId) continue;

        const referenced = inner.rawRelationships.some(record =>
          record.numericId === a.numericId || (a.aliasId !== '' && record.aliasId === a.aliasId)
        );

        if (referenced && this.graph.addEdge(a.displayName, b.displayName)) {
          this.inferredEdges++;
          debug(`[GraphBuilder] inferred ${a.displayName} <-> ${b.displayName}`);
        }
      }
    }
  }

  getGraph(): RelationshipGraph {
    return this.graph;
  }

  counts(): { directEdges: number; inferredEdges: number } {
    return { directEdges: this.directEdges, inferredEdges: this.inferredEdges };
  }
}
