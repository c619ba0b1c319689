import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { renderGraphHtml, writeGraphHtml } from '../src/graph-renderer';
import { RelationshipGraph } from '../src/relationship-graph';
import { formatResultTable } from '../src/result-reporter';
import { colorize } from '../src/utils/table-formatter';

describe('formatResultTable', () => {
  const players = [
    { numericId: '76561190000000001', aliasId: 'alice-a', displayName: 'Alice' },
    { numericId: '76561190000000002', aliasId: '', displayName: 'Bob' }
  ];

  it('should left-justify name and id columns', () => {
    expect(formatResultTable(players)).toEqual([
      'Name:                             SteamID:           Link:',
      'Alice                             76561190000000001  https://steamcommunity.com/profiles/76561190000000001/?l=english',
      'Bob                               76561190000000002  https://steamcommunity.com/profiles/76561190000000002/?l=english'
    ]);
  });

  it('should print only the header when nothing was found', () => {
    expect(formatResultTable([])).toEqual(['Name:                             SteamID:           Link:']);
  });

  it('should draw an empty bordered table', () => {
    expect(formatResultTable([], true)).toEqual([
      '┌───────┬──────────┬───────┐',
      '│ Name: │ SteamID: │ Link: │',
      '├───────┼──────────┼───────┤',
      '│ No data available        │',
      '└───────┴──────────┴───────┘'
    ]);
  });
});

describe('colorize', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should leave text alone when colors are disabled', () => {
    vi.stubEnv('NO_COLOR', '1');

    expect(colorize('Result', 'bright')).toBe('Result');
  });

  it('should wrap text in escape codes when colors are forced', () => {
    vi.stubEnv('NO_COLOR', '');
    vi.stubEnv('FORCE_COLOR', '1');

    expect(colorize('Result', 'bright')).toBe('\x1b[1mResult\x1b[0m');
  });
});

describe('graph renderer', () => {
  const graph = (): RelationshipGraph => {
    const g = new RelationshipGraph();
    g.addNode('Alice', '76561190000000001');
    g.addEdge('Alice', 'Bob');
    return g;
  };

  it('should embed nodes and edges as vis-network data sets', () => {
    const html = renderGraphHtml(graph());

    expect(html).toContain('const nodes = new vis.DataSet([' +
      '{"id":"Alice","label":"Alice","title":"https://steamcommunity.com/profiles/76561190000000001/?l=english"},' +
      '{"id":"Bob","label":"Bob","title":"Bob"}]);');
    expect(html).toContain('const edges = new vis.DataSet([{"from":"Alice","to":"Bob"}]);');
    expect(html).toContain("physics: { solver: 'repulsion', repulsion: { damping: 1 } }");
    expect(html).toContain('#network { width: 2000px; height: 2000px;');
  });

  it('should escape names that could close the script block', () => {
    const g = new RelationshipGraph();
    g.addNode('</script><b>');

    expect(renderGraphHtml(g)).toContain('{"id":"\\u003c/script>\\u003cb>"');
  });

  it('should apply size and escaped title options', () => {
    const html = renderGraphHtml(graph(), { width: '800px', height: '600px', title: 'A & B <x>' });

    expect(html).toContain('<title>A &amp; B &lt;x&gt;</title>');
    expect(html).toContain('#network { width: 800px; height: 600px;');
  });

  it('should write the page and return its absolute path', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'squadtrace-graph-'));
    try {
      const file = path.join(dir, 'out', 'team_network.html');
      const written = await writeGraphHtml(graph(), file);

      expect(written).toBe(path.resolve(file));
      expect(await fs.readFile(written, 'utf-8')).toBe(renderGraphHtml(graph()));
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
