#!/usr/bin/env node

import { BattlemetricsRosterSource } from '../battlemetrics-roster-source';
import { loadEnvConfig, SquadtraceEnvConfig } from '../env-config';
import { errorMessage } from '../errors';
import { writeGraphHtml } from '../graph-renderer';
import { HttpClient, HttpClientConfig } from '../http-client';
import { log, setDebugLogging } from '../logging-utils';
import { formatResultTable } from '../result-reporter';
import { mergeRunConfig, RunConfigStore } from '../run-config-store';
import { SteamPageSource } from '../steam-page-source';
import { TeamDetector } from '../team-detector';
import { CrawlOptions, SQUADTRACE_VERSION } from '../types';
import { colorize } from '../utils/table-formatter';
import { parseArgs, USAGE } from './args';

export async function main(
  argv: readonly string[] = process.argv.slice(2),
  env: SquadtraceEnvConfig = loadEnvConfig(),
  httpConfig: HttpClientConfig = {}
): Promise<void> {
  const cli = parseArgs(argv);
  if (cli.help) {
    console.log(USAGE);
    return;
  }

  const debug = cli.debug || env.debug;
  setDebugLogging(debug);

  const store = new RunConfigStore(cli.configFile ?? env.configFile);
  const saved = await store.load();
  const runConfig = mergeRunConfig({ battlemetricsId: cli.battlemetricsId, steamIds: cli.steamIds }, saved);

  const crawlOptions: CrawlOptions = {
    maxDepth: cli.recursiveDepth ?? env.recursiveDepth,
    includeAnnotations: cli.comments,
    maxAnnotationPages: cli.commentPages ?? env.commentPages,
    strategy: cli.strategy ?? 'depth-first',
    concurrency: cli.concurrency ?? env.concurrency
  };
  const outputFile = cli.output ?? env.outputFile;

  if (debug) {
    log(`squadtrace ${SQUADTRACE_VERSION}, running with the following arguments:`);
    log(` - Battlemetrics Server ID:     ${runConfig.battlemetricsId}`);
    log(` - Steam ID(s):                 ${runConfig.steamIds.join(', ')}`);
    log(` - Recursive Depth:             ${crawlOptions.maxDepth}`);
    log(` - Comments:                    ${crawlOptions.includeAnnotations}`);
    log(` - Comment Pages:               ${crawlOptions.maxAnnotationPages}`);
    log(` - Strategy:                    ${crawlOptions.strategy}`);
    log(` - Concurrency:                 ${crawlOptions.concurrency}`);
    log(` - Output:                      ${outputFile}`);
  }

  const http = new HttpClient({ timeout: env.httpTimeoutMs, userAgent: env.userAgent, ...httpConfig });
  const detector = new TeamDetector(
    { rosterSource: new BattlemetricsRosterSource(http), pageSource: new SteamPageSource(http) },
    crawlOptions
  );

  const result = await detector.detect(runConfig.battlemetricsId, runConfig.steamIds);

  const written = await writeGraphHtml(result.graph, outputFile);
  console.log(`\nTeam Detector Network written to:\n${written}`);

  console.log(`\n${colorize('Team Detector Result:', 'bright')}\n`);
  formatResultTable(result.foundPlayers).forEach(line => console.log(line));

  await store.save(runConfig);
}

// Handle CLI execution
if (require.main === module) {
  main().catch(error => {
    console.error(`❌ ${errorMessage(error)}`);
    process.exit(1);
  });
}
