/**
 * Conversion between domain entities and their snake_case wire records
 */

import type {
  Dimension,
  DimensionRecord,
  Indicator,
  IndicatorRecord,
  RelationshipEdge,
  RelationshipEdgeRecord,
  Tool,
  ToolRecord
} from './types.js';

export function serializeIndicator(indicator: Indicator): IndicatorRecord {
  return {
    id: indicator.id,
    name: indicator.name,
    description: indicator.description ?? null,
    dimension: indicator.dimension ?? null,
    category: indicator.category ?? null,
    rationale: indicator.rationale ?? null,
    url: indicator.url ?? null,
    related_tools: [...indicator.relatedTools],
    metadata: { ...indicator.metadata }
  };
}

export function serializeTool(tool: Tool): ToolRecord {
  return {
    id: tool.id,
    name: tool.name,
    description: tool.description ?? null,
    url: tool.url ?? null,
    ring: tool.ring ?? null,
    quadrant: tool.quadrant ?? null,
    related_indicators: [...tool.relatedIndicators],
    metadata: { ...tool.metadata }
  };
}

export function serializeDimension(dimension: Dimension): DimensionRecord {
  return {
    id: dimension.id,
    name: dimension.name,
    description: dimension.description ?? null,
    indicators: [...dimension.indicators],
    metadata: { ...dimension.metadata }
  };
}

export function serializeEdge(edge: RelationshipEdge): RelationshipEdgeRecord {
  return {
    source_id: edge.sourceId,
    source_type: edge.sourceType,
    target_id: edge.targetId,
    target_type: edge.targetType,
    relationship_type: edge.relationshipType
  };
}

export function deserializeEdge(record: RelationshipEdgeRecord): RelationshipEdge {
  return {
    sourceId: record.source_id,
    sourceType: record.source_type,
    targetId: record.target_id,
    targetType: record.target_type,
    relationshipType: record.relationship_type
  };
}

/**
 * Drop null and undefined values, used for individual API documents
 */
export function omitNullish(record: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(record).filter(([, value]) => value !== null && value !== undefined)
  );
}

/**
 * Wire record without the raw metadata bag, used in published endpoints
 */
export function withoutMetadata<T extends { metadata: unknown }>(record: T): Omit<T, 'metadata'> {
  const { metadata: _metadata, ...rest } = record;
  return rest;
}
