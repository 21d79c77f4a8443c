/**
 * Unit tests for the relationship graph builder
 *
 * Covers:
 * - Edge derivation for all four passes
 * - Dangling references (skipped and warned, never thrown)
 * - Query deduplication
 * - Validation and export
 */

import { RELATIONSHIPS_CACHE_KEY, RelationshipBuilder } from '../../core/relationship-builder.js';
import { deserializeEdge } from '../../core/serialization.js';
import type { RelationshipSnapshot } from '../../core/types.js';
import type { CacheStore } from '../../storage/types.js';
import { TestHelpers } from '../setup.js';

describe('RelationshipBuilder', () => {
  let builder: RelationshipBuilder;

  beforeEach(() => {
    builder = new RelationshipBuilder();
  });

  describe('License scenario', () => {
    beforeEach(() => {
      builder.addIndicators([TestHelpers.indicator('license', { dimension: 'legal' })]);
      builder.addTools([TestHelpers.tool('howfairis', { relatedIndicators: ['license'] })]);
      builder.addDimensions([TestHelpers.dimension('legal', { indicators: ['license'] })]);
      builder.buildAllRelationships();
    });

    test('should produce exactly three edges in pass order', () => {
      expect(builder.getRelationships()).toEqual([
        { sourceId: 'howfairis', sourceType: 'Tool', targetId: 'license', targetType: 'Indicator', relationshipType: 'measures' },
        { sourceId: 'legal', sourceType: 'Dimension', targetId: 'license', targetType: 'Indicator', relationshipType: 'contains' },
        { sourceId: 'license', sourceType: 'Indicator', targetId: 'legal', targetType: 'Dimension', relationshipType: 'part_of' }
      ]);
    });

    test('should not create a measured_by edge without a related_tools entry', () => {
      const measuredBy = builder.getRelationships().filter(edge => edge.relationshipType === 'measured_by');
      expect(measuredBy).toHaveLength(0);
    });

    test('should answer queries from the graph', () => {
      expect(builder.getToolsForIndicator('license').map(tool => tool.id)).toEqual(['howfairis']);
      expect(builder.getIndicatorsForTool('howfairis').map(indicator => indicator.id)).toEqual(['license']);
      expect(builder.getIndicatorsForDimension('legal').map(indicator => indicator.id)).toEqual(['license']);
    });

    test('should record no warnings', () => {
      expect(builder.getWarnings()).toEqual([]);
    });
  });

  describe('Dangling references', () => {
    test('should skip a tool reference to an unknown indicator with one warning', () => {
      builder.addIndicators([]);
      builder.addTools([TestHelpers.tool('howfairis', { relatedIndicators: ['missing'] })]);
      builder.addDimensions([]);

      expect(() => builder.buildAllRelationships()).not.toThrow();
      expect(builder.getRelationships()).toHaveLength(0);
      expect(builder.getWarnings()).toEqual(['Tool howfairis references unknown indicator missing']);
      expect(console.warn).toHaveBeenCalledWith('⚠️ Tool howfairis references unknown indicator missing');
    });

    test('should warn for each kind of dangling reference and keep the valid edges', () => {
      builder.addIndicators([
        TestHelpers.indicator('license', { relatedTools: ['ghost-tool'], dimension: 'ghost-dimension' })
      ]);
      builder.addTools([TestHelpers.tool('howfairis', { relatedIndicators: ['license', 'ghost-indicator'] })]);
      builder.addDimensions([TestHelpers.dimension('legal', { indicators: ['ghost-indicator'] })]);
      builder.buildAllRelationships();

      expect(builder.getRelationships()).toHaveLength(1);
      expect(builder.getWarnings()).toEqual([
        'Tool howfairis references unknown indicator ghost-indicator',
        'Indicator license references unknown tool ghost-tool',
        'Dimension legal references unknown indicator ghost-indicator',
        'Indicator license references unknown dimension ghost-dimension'
      ]);
    });
  });

  describe('Derivation details', () => {
    test('should keep duplicate references as duplicate edges but deduplicate queries', () => {
      builder.addIndicators([TestHelpers.indicator('license')]);
      builder.addTools([TestHelpers.tool('howfairis', { relatedIndicators: ['license', 'license'] })]);

      expect(builder.buildToolToIndicatorRelationships()).toBe(2);
      expect(builder.getRelationships()).toHaveLength(2);
      expect(builder.getToolsForIndicator('license')).toHaveLength(1);
    });

    test('should create measured_by edges from related tools', () => {
      builder.addIndicators([TestHelpers.indicator('license', { relatedTools: ['howfairis'] })]);
      builder.addTools([TestHelpers.tool('howfairis')]);

      expect(builder.buildIndicatorToToolRelationships()).toBe(1);
      expect(builder.getRelationships()[0]?.relationshipType).toBe('measured_by');
      // measured_by edges do not feed the tool lookup
      expect(builder.getToolsForIndicator('license')).toEqual([]);
    });

    test('should append a second full set of edges when built twice', () => {
      builder.addIndicators([TestHelpers.indicator('license', { dimension: 'legal' })]);
      builder.addTools([TestHelpers.tool('howfairis', { relatedIndicators: ['license'] })]);
      builder.addDimensions([TestHelpers.dimension('legal', { indicators: ['license'] })]);

      builder.buildAllRelationships();
      builder.buildAllRelationships();

      expect(builder.getRelationships()).toHaveLength(6);
      expect(builder.getToolsForIndicator('license')).toHaveLength(1);
    });

    test('should replace entities with the same id on later adds', () => {
      builder.addTools([TestHelpers.tool('howfairis', { name: 'First' })]);
      builder.addTools([TestHelpers.tool('howfairis', { name: 'Second' })]);

      expect(builder.getTool('howfairis')?.name).toBe('Second');
      expect(builder.exportGraph().statistics.total_tools).toBe(1);
    });

    test('should return an empty list for unknown ids', () => {
      expect(builder.getToolsForIndicator('nothing')).toEqual([]);
      expect(builder.getIndicator('nothing')).toBeUndefined();
    });

    test('should throw when a collection is not an array', () => {
      expect(() => builder.addIndicators(JSON.parse('null'))).toThrow(TypeError);
      expect(() => builder.addTools(JSON.parse('{}'))).toThrow('Expected an array of tools, received object');
    });
  });

  describe('Validation and export', () => {
    beforeEach(() => {
      builder.addIndicators([
        TestHelpers.indicator('license', { dimension: 'legal', relatedTools: ['howfairis'] }),
        TestHelpers.indicator('citation')
      ]);
      builder.addTools([TestHelpers.tool('howfairis', { relatedIndicators: ['license'], ring: 'adopt' })]);
      builder.addDimensions([TestHelpers.dimension('legal', { indicators: ['license'] })]);
      builder.buildAllRelationships();
    });

    test('should count every built edge as valid', () => {
      expect(builder.validateRelationships()).toEqual({ validCount: 4, errors: [] });
    });

    test('should export nodes, edges and statistics', () => {
      const graph = builder.exportGraph();

      expect(graph.type).toBe('RelationshipGraph');
      expect(Object.keys(graph.nodes.indicators)).toEqual(['license', 'citation']);
      expect(graph.nodes.tools.howfairis?.ring).toBe('adopt');
      expect(graph.nodes.indicators.citation?.dimension).toBeNull();
      expect(graph.edges[1]).toEqual({
        source_id: 'license',
        source_type: 'Indicator',
        target_id: 'howfairis',
        target_type: 'Tool',
        relationship_type: 'measured_by'
      });
      expect(graph.statistics).toEqual({
        total_indicators: 2,
        total_tools: 1,
        total_dimensions: 1,
        total_relationships: 4
      });
    });

    test('should leave the builder unchanged when exporting', () => {
      const first = builder.exportGraph();
      first.edges.pop();

      expect(builder.exportGraph().edges).toHaveLength(4);
      expect(builder.getRelationships()).toHaveLength(4);
    });

    test('should save a snapshot whose edges deserialize back', async () => {
      const saved = new Map<string, unknown>();
      const store: CacheStore = {
        load: async (key) => saved.get(key),
        save: async (key, data) => {
          saved.set(key, data);
          return `${key}.json`;
        }
      };

      await expect(builder.saveToCache(store)).resolves.toBe('relationships.json');

      const snapshot = builder.toSnapshot();
      expect(saved.get(RELATIONSHIPS_CACHE_KEY)).toEqual(snapshot);
      expect(snapshot.node_counts).toEqual({ indicators: 2, tools: 1, dimensions: 1 });
      expect(snapshot.edge_count).toBe(4);
      expect(snapshot.edges.map(deserializeEdge)).toEqual(builder.getRelationships());
    });
  });

  describe('Restored snapshots', () => {
    const snapshot: RelationshipSnapshot = {
      type: 'RelationshipGraph',
      edges: [
        { source_id: 'howfairis', source_type: 'Tool', target_id: 'license', target_type: 'Indicator', relationship_type: 'measures' },
        { source_id: 'ghost', source_type: 'Tool', target_id: 'retired', target_type: 'Indicator', relationship_type: 'measures' },
        { source_id: 'legal', source_type: 'Dimension', target_id: 'retired', target_type: 'Indicator', relationship_type: 'contains' },
        { source_id: 'license', source_type: 'Indicator', target_id: 'legal', target_type: 'Dimension', relationship_type: 'part_of' }
      ],
      node_counts: { indicators: 2, tools: 2, dimensions: 1 },
      edge_count: 4
    };

    function storeWith(value: unknown): CacheStore {
      return {
        load: async () => value,
        save: async (key) => `${key}.json`
      };
    }

    beforeEach(() => {
      builder.addIndicators([TestHelpers.indicator('license', { dimension: 'legal' })]);
      builder.addTools([]);
      builder.addDimensions([TestHelpers.dimension('legal', { indicators: ['license'] })]);
    });

    test('should restore edges verbatim without deriving new ones', () => {
      expect(builder.restoreSnapshot(snapshot)).toBe(4);
      expect(builder.getRelationships()).toEqual(snapshot.edges.map(deserializeEdge));
    });

    test('should report one error per dangling edge, checking the source first', () => {
      builder.restoreSnapshot(snapshot);

      expect(builder.validateRelationships()).toEqual({
        validCount: 1,
        errors: [
          'Relationship references unknown tool howfairis',
          'Relationship references unknown tool ghost',
          'Relationship references unknown indicator retired'
        ]
      });
    });

    test('should drop entities that are gone from query results', () => {
      builder.restoreSnapshot(snapshot);

      expect(builder.getToolsForIndicator('license')).toEqual([]);
      expect(builder.getIndicatorsForDimension('legal')).toEqual([]);
    });

    test('should load a saved snapshot from the cache', async () => {
      await expect(builder.loadFromCache(storeWith(snapshot))).resolves.toBe(true);

      expect(builder.getRelationships()).toHaveLength(4);
    });

    test('should ignore a missing or malformed cached snapshot', async () => {
      await expect(builder.loadFromCache(storeWith(undefined))).resolves.toBe(false);
      await expect(builder.loadFromCache(storeWith({ type: 'RelationshipGraph', edges: 'none' }))).resolves.toBe(false);

      expect(builder.getRelationships()).toEqual([]);
      expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('Ignoring malformed relationship snapshot'));
    });
  });
});
