import * as fs from 'fs/promises';
import * as path from 'path';
import { RelationshipGraph } from './relationship-graph';
import { profileLink } from './steam-page-source';

export const VIS_NETWORK_SCRIPT = 'https://unpkg.com/vis-network@9.1.9/standalone/umd/vis-network.min.js';

export interface GraphRenderOptions {
  width?: string;
  height?: string;
  title?: string;
}

// JSON embedded in a <script> block must not close the block early
const toScriptJson = (value: unknown): string =>
  JSON.stringify(value).replace(/</g, '\\u003c');

const escapeHtml = (text: string): string =>
  text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

/**
 * Standalone HTML page drawing the graph with vis-network and repulsion
 * physics.
 */
export function renderGraphHtml(graph: RelationshipGraph, options: GraphRenderOptions = {}): string {
  const { width = '2000px', height = '2000px', title = 'Team network' } = options;

  const nodes = graph.getNodes().map(node => ({
    id: node.name,
    label: node.name,
    title: node.numericId ? profileLink(node.numericId) : node.name
  }));
  const edges = graph.getEdges().map(edge => ({ from: edge.source, to: edge.target }));

  return `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8">
<title>${escapeHtml(title)}</title>
<script src="${VIS_NETWORK_SCRIPT}"></script>
<style>#network { width: ${width}; height: ${height}; border: 1px solid lightgray; }</style>
</head>
<body>
<div id="network"></div>
<script>
  const nodes = new vis.DataSet(${toScriptJson(nodes)});
  const edges = new vis.DataSet(${toScriptJson(edges)});
  const options = { physics: { solver: 'repulsion', repulsion: { damping: 1 } } };
  new vis.Network(document.getElementById('network'), { nodes, edges }, options);
</script>
</body>
</html>
`;
}

export async function writeGraphHtml(
  graph: RelationshipGraph,
  outputFile: string,
  options: GraphRenderOptions = {}
): Promise<string> {
  const target = path.resolve(outputFile);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, renderGraphHtml(graph, options), 'utf-8');
  return target;
}
