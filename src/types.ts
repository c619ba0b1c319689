// Shared types and interfaces for squadtrace

import type { RelationshipGraph } from './relationship-graph';

export const SQUADTRACE_VERSION = '1.0.0';

/**
 * A profile as known at some point of a run.
 *
 * `undefined` identifiers are not yet known. An `aliasId` of `''` means the
 * profile is known to have no alias.
 */
export interface ProfileIdentity {
  numericId?: string;
  aliasId?: string;
  displayName: string;
}

export type Provenance = 'relationship' | 'annotation';

export interface RelationshipRecord extends ProfileIdentity {
  provenance: Provenance;
}

// A profile that reached full visitation
export interface ResolvedProfile {
  numericId: string;
  aliasId: string;
  displayName: string;
}

export interface VisitSnapshot {
  readonly profile: ResolvedProfile;
  readonly depth: number;
  readonly rawRelationships: readonly RelationshipRecord[];
}

export type Visibility = 'public' | 'private';

export type ProfileRef =
  | { kind: 'numeric'; id: string }
  | { kind: 'alias'; id: string };

export interface AnnotationPage {
  authorsRead: number;
  authors: RelationshipRecord[];
}

export type TraversalStrategy = 'depth-first' | 'breadth-first';

export interface CrawlOptions {
  maxDepth: number;
  includeAnnotations: boolean;
  maxAnnotationPages: number;
  strategy: TraversalStrategy;
  concurrency: number;
}

export interface CrawlTask {
  identity: ProfileIdentity;
  depth: number;
}

export interface CrawlResult {
  roster: readonly string[];
  foundPlayers: readonly ResolvedProfile[];
  snapshots: readonly VisitSnapshot[];
  graph: RelationshipGraph;
  stats: CrawlStatistics;
}

export type VisitOutcome = 'visited' | 'skipped' | 'stopped';

export interface CrawlStatistics {
  visited: number;
  skipped: number;
  stopped: number;
  directEdges: number;
  inferredEdges: number;
  durationMs: number;
}

export interface CacheStatistics {
  hits: number;
  misses: number;
}
