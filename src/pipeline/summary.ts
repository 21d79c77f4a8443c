/**
 * Console summary of a built graph: counts, sample queries, validation
 */

import type { LoadedGraph } from './generate-api.js';

const SAMPLE_SIZE = 3;

export function formatGraphSummary({ builder, indicators, tools, dimensions }: LoadedGraph): string[] {
  const relationships = builder.getRelationships().length;
  const lines: string[] = [
    `📊 ${indicators.length} indicators, ${tools.length} tools, ${dimensions.length} dimensions`,
    `🔗 ${relationships} relationships`
  ];

  const indicator = indicators[0];
  if (indicator) {
    lines.push(`🔎 Tools for '${indicator.name}' (${indicator.id}):`);
    const found = builder.getToolsForIndicator(indicator.id);
    if (found.length === 0) {
      lines.push('   - No tools found');
    }
    for (const tool of found.slice(0, SAMPLE_SIZE)) {
      lines.push(`   - ${tool.name} (${tool.ring ?? 'no ring'})`);
    }
  }

  const dimension = dimensions[0];
  if (dimension) {
    lines.push(`🔎 Indicators in '${dimension.name}' (${dimension.id}):`);
    const found = builder.getIndicatorsForDimension(dimension.id);
    if (found.length === 0) {
      lines.push('   - No indicators found');
    }
    for (const contained of found.slice(0, SAMPLE_SIZE)) {
      lines.push(`   - ${contained.name}`);
    }
  }

  const validation = builder.validateRelationships();
  lines.push(`✅ Valid relationships: ${validation.validCount}`);
  if (validation.errors.length > 0) {
    lines.push(`⚠️ Validation errors: ${validation.errors.length}`);
  }

  return lines;
}
