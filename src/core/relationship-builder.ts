/**
 * Relationship graph over indicators, tools and dimensions
 *
 * Holds three id-keyed entity maps and an append-only edge list. Edges are
 * derived by scanning the reference fields each entity declares
 * (relatedIndicators, relatedTools, indicators, dimension). The four passes are
 * independent: a tool claiming an indicator does not imply the indicator
 * claims the tool back, and the builder never reconciles the two.
 *
 * All operations are synchronous apart from the cache round trip. Add entities
 * and either build once or restore a cached snapshot, then query.
 */

import {
  deserializeEdge,
  serializeDimension,
  serializeEdge,
  serializeIndicator,
  serializeTool
} from './serialization.js';
import type {
  Dimension,
  EntityType,
  GraphExport,
  Indicator,
  RelationshipEdge,
  RelationshipSnapshot,
  RelationshipType,
  RelationshipValidation,
  Tool
} from './types.js';
import { describeIssues, relationshipSnapshotSchema } from '../sources/schemas.js';
import type { CacheStore } from '../storage/types.js';

export const RELATIONSHIPS_CACHE_KEY = 'relationships';

export class RelationshipBuilder {
  private indicators: Map<string, Indicator> = new Map();
  private tools: Map<string, Tool> = new Map();
  private dimensions: Map<string, Dimension> = new Map();

  // Insertion order is build order
  private relationships: RelationshipEdge[] = [];
  private warnings: string[] = [];

  /**
   * Add indicators keyed by id
   * Later calls for the same id silently replace the earlier entity.
   */
  addIndicators(indicators: Indicator[]): void {
    assertArray(indicators, 'indicators');
    for (const indicator of indicators) {
      this.indicators.set(indicator.id, indicator);
    }
    console.log(`📥 Added ${indicators.length} indicators`);
  }

  addTools(tools: Tool[]): void {
    assertArray(tools, 'tools');
    for (const tool of tools) {
      this.tools.set(tool.id, tool);
    }
    console.log(`📥 Added ${tools.length} tools`);
  }

  addDimensions(dimensions: Dimension[]): void {
    assertArray(dimensions, 'dimensions');
    for (const dimension of dimensions) {
      this.dimensions.set(dimension.id, dimension);
    }
    console.log(`📥 Added ${dimensions.length} dimensions`);
  }

  /**
   * Tool -> Indicator edges from each tool's relatedIndicators
   */
  buildToolToIndicatorRelationships(): number {
    let count = 0;
    for (const [toolId, tool] of this.tools) {
      for (const indicatorId of tool.relatedIndicators) {
        if (this.indicators.has(indicatorId)) {
          this.appendEdge(toolId, 'Tool', indicatorId, 'Indicator', 'measures');
          count++;
        } else {
          this.warn(`Tool ${toolId} references unknown indicator ${indicatorId}`);
        }
      }
    }
    console.log(`🔗 Created ${count} tool → indicator relationships`);
    return count;
  }

  /**
   * Indicator -> Tool edges from each indicator's relatedTools
   */
  buildIndicatorToToolRelationships(): number {
    let count = 0;
    for (const [indicatorId, indicator] of this.indicators) {
      for (const toolId of indicator.relatedTools) {
        if (this.tools.has(toolId)) {
          this.appendEdge(indicatorId, 'Indicator', toolId, 'Tool', 'measured_by');
          count++;
        } else {
          this.warn(`Indicator ${indicatorId} references unknown tool ${toolId}`);
        }
      }
    }
    console.log(`🔗 Created ${count} indicator → tool relationships`);
    return count;
  }

  /**
   * Dimension -> Indicator edges from each dimension's indicators list
   */
  buildDimensionToIndicatorRelationships(): number {
    let count = 0;
    for (const [dimensionId, dimension] of this.dimensions) {
      for (const indicatorId of dimension.indicators) {
        if (this.indicators.has(indicatorId)) {
          this.appendEdge(dimensionId, 'Dimension', indicatorId, 'Indicator', 'contains');
          count++;
        } else {
          this.warn(`Dimension ${dimensionId} references unknown indicator ${indicatorId}`);
        }
      }
    }
    console.log(`🔗 Created ${count} dimension → indicator relationships`);
    return count;
  }

  /**
   * Indicator -> Dimension edges from each indicator's dimension field
   */
  buildIndicatorToDimensionRelationships(): number {
    let count = 0;
    for (const [indicatorId, indicator] of this.indicators) {
      if (!indicator.dimension) {
        continue;
      }
      if (this.dimensions.has(indicator.dimension)) {
        this.appendEdge(indicatorId, 'Indicator', indicator.dimension, 'Dimension', 'part_of');
        count++;
      } else {
        this.warn(`Indicator ${indicatorId} references unknown dimension ${indicator.dimension}`);
      }
    }
    console.log(`🔗 Created ${count} indicator → dimension relationships`);
    return count;
  }

  /**
   * Run all four passes
   *
   * Not idempotent: a second call appends a second full set of edges.
   * Callers build once per run.
   */
  buildAllRelationships(): void {
    console.log('🏗️  Building all relationships...');
    this.buildToolToIndicatorRelationships();
    this.buildIndicatorToToolRelationships();
    this.buildDimensionToIndicatorRelationships();
    this.buildIndicatorToDimensionRelationships();
    console.log(`✅ Total relationships built: ${this.relationships.length}`);
  }

  /**
   * Tools that are the source of a `measures` edge into the indicator
   */
  getToolsForIndicator(indicatorId: string): Tool[] {
    const toolIds = new Set<string>();
    for (const edge of this.relationships) {
      if (edge.targetId === indicatorId && edge.relationshipType === 'measures') {
        toolIds.add(edge.sourceId);
      }
    }
    return resolveIds(toolIds, this.tools);
  }

  /**
   * Indicators the tool points at through `measures` edges
   */
  getIndicatorsForTool(toolId: string): Indicator[] {
    const indicatorIds = new Set<string>();
    for (const edge of this.relationships) {
      if (edge.sourceId === toolId && edge.relationshipType === 'measures') {
        indicatorIds.add(edge.targetId);
      }
    }
    return resolveIds(indicatorIds, this.indicators);
  }

  getIndicatorsForDimension(dimensionId: string): Indicator[] {
    const indicatorIds = new Set<string>();
    for (const edge of this.relationships) {
      if (edge.sourceId === dimensionId && edge.relationshipType === 'contains') {
        indicatorIds.add(edge.targetId);
      }
    }
    return resolveIds(indicatorIds, this.indicators);
  }

  getIndicator(id: string): Indicator | undefined {
    return this.indicators.get(id);
  }

  getTool(id: string): Tool | undefined {
    return this.tools.get(id);
  }

  getDimension(id: string): Dimension | undefined {
    return this.dimensions.get(id);
  }

  getRelationships(): RelationshipEdge[] {
    return [...this.relationships];
  }

  /**
   * Dangling references skipped while building
   */
  getWarnings(): string[] {
    return [...this.warnings];
  }

  /**
   * Check that every stored edge still resolves on both ends
   *
   * The source is checked first; an edge with a dangling source gets exactly
   * one error and its target is not looked at.
   */
  validateRelationships(): RelationshipValidation {
    let validCount = 0;
    const errors: string[] = [];

    for (const edge of this.relationships) {
      if (!this.hasEntity(edge.sourceType, edge.sourceId)) {
        errors.push(`Relationship references unknown ${edge.sourceType.toLowerCase()} ${edge.sourceId}`);
        continue;
      }
      if (!this.hasEntity(edge.targetType, edge.targetId)) {
        errors.push(`Relationship references unknown ${edge.targetType.toLowerCase()} ${edge.targetId}`);
        continue;
      }
      validCount++;
    }

    console.log(`🔍 Validated ${validCount} relationships`);
    if (errors.length > 0) {
      console.warn(`⚠️ Found ${errors.length} relationship validation errors`);
    }

    return { validCount, errors };
  }

  /**
   * Read-only projection of every node and edge with aggregate counts
   */
  exportGraph(): GraphExport {
    return {
      type: 'RelationshipGraph',
      nodes: {
        indicators: Object.fromEntries(
          Array.from(this.indicators, ([id, indicator]) => [id, serializeIndicator(indicator)])
        ),
        tools: Object.fromEntries(
          Array.from(this.tools, ([id, tool]) => [id, serializeTool(tool)])
        ),
        dimensions: Object.fromEntries(
          Array.from(this.dimensions, ([id, dimension]) => [id, serializeDimension(dimension)])
        )
      },
      edges: this.relationships.map(serializeEdge),
      statistics: {
        total_indicators: this.indicators.size,
        total_tools: this.tools.size,
        total_dimensions: this.dimensions.size,
        total_relationships: this.relationships.length
      }
    };
  }

  /**
   * Edge list and node counts, without node bodies
   */
  toSnapshot(): RelationshipSnapshot {
    return {
      type: 'RelationshipGraph',
      edges: this.relationships.map(serializeEdge),
      node_counts: {
        indicators: this.indicators.size,
        tools: this.tools.size,
        dimensions: this.dimensions.size
      },
      edge_count: this.relationships.length
    };
  }

  /**
   * Persist the snapshot for the next run
   * @returns Path of the written cache file
   */
  async saveToCache(store: CacheStore): Promise<string> {
    return store.save(RELATIONSHIPS_CACHE_KEY, this.toSnapshot());
  }

  /**
   * Replace the edge list with the edges of a snapshot, verbatim
   *
   * Nothing is re-derived or checked against the current entities; run
   * validateRelationships() to find edges that no longer resolve.
   * @returns Number of restored edges
   */
  restoreSnapshot(snapshot: RelationshipSnapshot): number {
    this.relationships = snapshot.edges.map(deserializeEdge);
    console.log(`♻️  Restored ${this.relationships.length} relationships from snapshot`);
    return this.relationships.length;
  }

  /**
   * Restore the snapshot saved by saveToCache()
   * @returns false when the cache holds no usable snapshot
   */
  async loadFromCache(store: CacheStore): Promise<boolean> {
    const cached = await store.load(RELATIONSHIPS_CACHE_KEY);
    if (cached === undefined) {
      return false;
    }

    const snapshot = relationshipSnapshotSchema.safeParse(cached);
    if (!snapshot.success) {
      console.warn(`⚠️ Ignoring malformed relationship snapshot: ${describeIssues(snapshot.error)}`);
      return false;
    }
    this.restoreSnapshot(snapshot.data);
    return true;
  }

  private appendEdge(
    sourceId: string,
    sourceType: EntityType,
    targetId: string,
    targetType: EntityType,
    relationshipType: RelationshipType
  ): void {
    this.relationships.push({ sourceId, sourceType, targetId, targetType, relationshipType });
  }

  private hasEntity(type: EntityType, id: string): boolean {
    switch (type) {
      case 'Indicator': return this.indicators.has(id);
      case 'Tool': return this.tools.has(id);
      case 'Dimension': return this.dimensions.has(id);
    }
  }

  private warn(message: string): void {
    this.warnings.push(message);
    console.warn(`⚠️ ${message}`);
  }
}

function resolveIds<T>(ids: Set<string>, entities: Map<string, T>): T[] {
  const resolved: T[] = [];
  for (const id of ids) {
    const entity = entities.get(id);
    if (entity) {
      resolved.push(entity);
    }
  }
  return resolved;
}

function assertArray(value: unknown, label: string): void {
  if (!Array.isArray(value)) {
    throw new TypeError(`Expected an array of ${label}, received ${value === null ? 'null' : typeof value}`);
  }
}
