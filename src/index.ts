export * from './types';
export * from './errors';
export { HttpClient } from './http-client';
export type { HttpClientConfig } from './http-client';
export { BattlemetricsRosterSource, parseServerPlayers, battlemetricsServerUrl } from './battlemetrics-roster-source';
export type { RosterSource } from './battlemetrics-roster-source';
export { SteamPageSource, steamUrls, profileLink } from './steam-page-source';
export type { ProfilePageSource } from './steam-page-source';
export { SteamProfileExtractor } from './steam-profile-extractor';
export type { RelationshipExtractor } from './steam-profile-extractor';
export { IdentityTable } from './identity-table';
export { FetchCache } from './fetch-cache';
export { IdentityResolver, parseSeedIdentity } from './identity-resolver';
export { sameIdentity, removeDuplicates, removeSelf, excludeKnown } from './identity-utils';
export { RosterMatcher } from './roster-matcher';
export { RelationshipGraph } from './relationship-graph';
export type { GraphNode, GraphEdge } from './relationship-graph';
export { GraphBuilder } from './graph-builder';
export { CrawlContext } from './crawl-context';
export { CrawlEngine } from './crawl-engine';
export { TeamDetector, DEFAULT_CRAWL_OPTIONS } from './team-detector';
export type { TeamDetectorDeps } from './team-detector';
export { formatResultTable } from './result-reporter';
export { renderGraphHtml, writeGraphHtml } from './graph-renderer';
export { RunConfigStore, mergeRunConfig } from './run-config-store';
export type { RunConfig } from './run-config-store';
export { loadEnvConfig } from './env-config';
export type { SquadtraceEnvConfig } from './env-config';
export { logger, setDebugLogging, isDebugLogging } from './logging-utils';
