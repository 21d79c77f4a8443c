/**
 * Core type definitions for the quality graph API
 *
 * This module defines the entity records fetched from the source repositories,
 * the directed edges derived between them, and the serialized shapes that the
 * renderer and the cache depend on.
 *
 * Domain types use camelCase; every serialized record uses the snake_case wire
 * names published by the API.
 */

/**
 * Entity collections held by the graph
 */
export type EntityType = 'Indicator' | 'Tool' | 'Dimension';

/**
 * Typed relationship between two entities
 *
 * - measures: Tool -> Indicator
 * - measured_by: Indicator -> Tool
 * - contains: Dimension -> Indicator
 * - part_of: Indicator -> Dimension
 */
export type RelationshipType = 'measures' | 'measured_by' | 'contains' | 'part_of';

/**
 * TechRadar adoption rings a tool may be classified in
 */
export const TOOL_RINGS = ['adopt', 'trial', 'assess', 'hold'] as const;
export type ToolRing = (typeof TOOL_RINGS)[number];

/**
 * Opaque bag carrying the raw source record
 */
export type EntityMetadata = Record<string, unknown>;

/**
 * A software quality indicator
 */
export interface Indicator {
  /** URL or alphanumeric/hyphen/underscore token, unique among indicators */
  id: string;
  name: string;
  description?: string;
  /** Dimension id this indicator belongs to */
  dimension?: string;
  category?: string;
  /** Why this indicator matters */
  rationale?: string;
  url?: string;
  /** Tool ids; duplicates allowed */
  relatedTools: string[];
  metadata: EntityMetadata;
}

/**
 * A quality assessment tool listed on the TechRadar
 */
export interface Tool {
  id: string;
  name: string;
  description?: string;
  url?: string;
  /** Kept as written in the source; see validateTool for the allowed values */
  ring?: string;
  quadrant?: string;
  /** Indicator ids the tool claims to measure */
  relatedIndicators: string[];
  metadata: EntityMetadata;
}

/**
 * A quality dimension grouping indicators
 */
export interface Dimension {
  id: string;
  name: string;
  description?: string;
  /** Indicator ids contained in this dimension */
  indicators: string[];
  metadata: EntityMetadata;
}

/**
 * Directed, typed edge between two entities
 * Edges are never deduplicated: the same logical link appears once per
 * direction it was declared from.
 */
export interface RelationshipEdge {
  sourceId: string;
  sourceType: EntityType;
  targetId: string;
  targetType: EntityType;
  relationshipType: RelationshipType;
}

/**
 * Serialized indicator as written to caches and graph exports
 */
export interface IndicatorRecord {
  id: string;
  name: string;
  description: string | null;
  dimension: string | null;
  category: string | null;
  rationale: string | null;
  url: string | null;
  related_tools: string[];
  metadata: EntityMetadata;
}

export interface ToolRecord {
  id: string;
  name: string;
  description: string | null;
  url: string | null;
  ring: string | null;
  quadrant: string | null;
  related_indicators: string[];
  metadata: EntityMetadata;
}

export interface DimensionRecord {
  id: string;
  name: string;
  description: string | null;
  indicators: string[];
  metadata: EntityMetadata;
}

export interface RelationshipEdgeRecord {
  source_id: string;
  source_type: EntityType;
  target_id: string;
  target_type: EntityType;
  relationship_type: RelationshipType;
}

/**
 * Aggregate counts published with the graph export
 */
export interface GraphStatistics {
  total_indicators: number;
  total_tools: number;
  total_dimensions: number;
  total_relationships: number;
}

/**
 * Full graph projection consumed by the endpoint renderer
 */
export interface GraphExport {
  type: 'RelationshipGraph';
  nodes: {
    indicators: Record<string, IndicatorRecord>;
    tools: Record<string, ToolRecord>;
    dimensions: Record<string, DimensionRecord>;
  };
  edges: RelationshipEdgeRecord[];
  statistics: GraphStatistics;
}

/**
 * Lightweight snapshot cached between runs (no node bodies)
 */
export interface RelationshipSnapshot {
  type: 'RelationshipGraph';
  edges: RelationshipEdgeRecord[];
  node_counts: {
    indicators: number;
    tools: number;
    dimensions: number;
  };
  edge_count: number;
}

/**
 * Result of a validation pass
 */
export interface ValidationReport {
  valid: boolean;
  errors: string[];
}

/**
 * Result of checking stored edges against the entity mappings
 */
export interface RelationshipValidation {
  /** Edges whose source and target both resolve */
  validCount: number;
  /** One message per failing edge, in edge order */
  errors: string[];
}
