/**
 * Static HTML pages published next to the JSON endpoints
 */

import type { ApiConfig } from '../config/config.js';
import type { GraphExport } from '../core/types.js';
import type { ApiWriter } from './api-writer.js';
import type { ApiStats } from './health.js';
import { listDocumentedPaths } from './openapi.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
};

export function escapeHtml(value: string | number): string {
  return String(value).replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

function page(title: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)}</title>
  <style>
    body { font-family: system-ui, sans-serif; max-width: 960px; margin: 2rem auto; padding: 0 1rem; color: #222; }
    table { border-collapse: collapse; width: 100%; }
    th, td { border-bottom: 1px solid #ddd; padding: 0.4rem; text-align: left; }
    code { background: #f4f4f4; padding: 0 0.2rem; }
    .metric { display: inline-block; margin-right: 2rem; }
    .metric strong { display: block; font-size: 1.6rem; }
  </style>
</head>
<body>
${body}
</body>
</html>
`;
}

export function renderLandingPage(config: ApiConfig): string {
  const endpoints = listDocumentedPaths()
    .map(path => `    <li><code>${escapeHtml(config.apiBaseUrl + path)}</code></li>`)
    .join('\n');

  return page(config.apiTitle, `  <h1>${escapeHtml(config.apiTitle)}</h1>
  <p>${escapeHtml(config.apiDescription)}</p>
  <p>Version ${escapeHtml(config.apiVersion)}. Start at <a href="index.json">index.json</a> or read the <a href="openapi.json">OpenAPI description</a>.</p>
  <h2>Endpoints</h2>
  <ul>
${endpoints}
  </ul>
  <p><a href="dashboard.html">Status dashboard</a> · <a href="relationships/graph.html">Relationship graph</a></p>`);
}

export function renderDashboard(config: ApiConfig, stats: ApiStats, runId: string, generatedAt: string): string {
  const metric = (label: string, value: string | number) =>
    `  <div class="metric"><strong>${escapeHtml(value)}</strong>${escapeHtml(label)}</div>`;

  return page(`${config.apiTitle} Dashboard`, `  <h1>${escapeHtml(config.apiTitle)} Dashboard</h1>
  <p>Generated ${escapeHtml(generatedAt)} (run <code>${escapeHtml(runId)}</code>)</p>
${metric('Indicators', stats.indicators)}
${metric('Tools', stats.tools)}
${metric('Dimensions', stats.dimensions)}
${metric('OpenAPI', stats.hasOpenApi ? 'available' : 'missing')}
${metric('Relationships', stats.hasRelationships ? 'available' : 'missing')}
  <p><a href="health.json">health.json</a> · <a href="status.json">status.json</a></p>`);
}

/**
 * Edge table of the relationship graph, labelled with entity names where known
 */
export function renderGraphPage(config: ApiConfig, graph: GraphExport): string {
  const nameOf = (id: string): string =>
    graph.nodes.indicators[id]?.name ?? graph.nodes.tools[id]?.name ?? graph.nodes.dimensions[id]?.name ?? id;

  const rows = graph.edges
    .map(edge => `      <tr><td>${escapeHtml(nameOf(edge.source_id))}</td><td>${escapeHtml(edge.source_type)}</td>`
      + `<td>${escapeHtml(edge.relationship_type)}</td>`
      + `<td>${escapeHtml(nameOf(edge.target_id))}</td><td>${escapeHtml(edge.target_type)}</td></tr>`)
    .join('\n');

  const stats = graph.statistics;
  return page(`${config.apiTitle} Relationships`, `  <h1>Relationship graph</h1>
  <p>${escapeHtml(stats.total_indicators)} indicators, ${escapeHtml(stats.total_tools)} tools, ${escapeHtml(stats.total_dimensions)} dimensions, ${escapeHtml(stats.total_relationships)} relationships. Raw data: <a href="graph.json">graph.json</a>.</p>
  <table>
    <thead>
      <tr><th>Source</th><th>Type</th><th>Relationship</th><th>Target</th><th>Type</th></tr>
    </thead>
    <tbody>
${rows}
    </tbody>
  </table>`);
}

export async function writeHtmlPages(
  config: ApiConfig,
  writer: ApiWriter,
  graph: GraphExport,
  stats: ApiStats,
  runId: string,
  generatedAt: string
): Promise<void> {
  await writer.writeText('index.html', renderLandingPage(config));
  await writer.writeText('dashboard.html', renderDashboard(config, stats, runId, generatedAt));
  await writer.writeText('relationships/graph.html', renderGraphPage(config, graph));
  console.log('✓ Generated HTML pages');
}
