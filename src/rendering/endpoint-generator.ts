/**
 * Static JSON endpoint generator
 *
 * Turns the entity collections and the relationship graph into JSON-LD flavoured
 * documents: the API root, paged collections, one document per entity,
 * filtered views, the graph export and the OpenAPI description.
 *
 * Filtered views that follow relationships (tools by indicator, indicators by
 * tool, indicators of a dimension) are answered by the graph builder, so they
 * only list entities that actually exist. Every entity gets its views, empty or
 * not, so each `_links` entry names a file that was written.
 *
 * Entity ids that would overwrite a collection page or each other are rejected
 * before anything in their directory is written.
 */

import type { ApiConfig } from '../config/config.js';
import type { RelationshipBuilder } from '../core/relationship-builder.js';
import {
  omitNullish,
  serializeDimension,
  serializeIndicator,
  serializeTool,
  withoutMetadata
} from '../core/serialization.js';
import type { Dimension, Indicator, Tool } from '../core/types.js';
import type { ApiWriter } from './api-writer.js';
import { buildOpenApiDocument } from './openapi.js';
import {
  buildPageLinks,
  findFileNameConflicts,
  groupBy,
  pageFileName,
  paginate,
  safeFileName,
  type LinkMap
} from './links.js';

export type Clock = () => Date;

type Document = Record<string, unknown>;

interface CollectionLayout<T> {
  /** Directory under the API root, e.g. `indicators` */
  segment: string;
  type: string;
  name: string;
  description: string;
  items: T[];
  toItem: (entity: T) => Document;
  extraLinks?: LinkMap;
}

export class EndpointGenerator {
  private config: ApiConfig;
  private writer: ApiWriter;
  private clock: Clock;

  constructor(config: ApiConfig, writer: ApiWriter, clock: Clock = () => new Date()) {
    this.config = config;
    this.writer = writer;
    this.clock = clock;
  }

  /**
   * Absolute URL of a path under the API root
   */
  url(path: string): string {
    return `${this.config.apiBaseUrl}/${path}`;
  }

  async generateRoot(): Promise<void> {
    const endpoint = (path: string, description: string) => ({ url: this.url(path), description });

    await this.writer.writeJson('index.json', this.envelope('APIRoot', {
      version: this.config.apiVersion,
      title: this.config.apiTitle,
      description: this.config.apiDescription,
      endpoints: {
        indicators: endpoint('indicators/index.json', 'Quality indicators'),
        tools: endpoint('tools/index.json', 'Assessment tools'),
        dimensions: endpoint('dimensions/index.json', 'Quality dimensions'),
        relationships: endpoint('relationships/graph.json', 'Entity relationships'),
        openapi: endpoint('openapi.json', 'OpenAPI specification'),
        health: endpoint('health.json', 'Health check'),
        status: endpoint('status.json', 'Generation status')
      },
      _links: {
        self: this.url('index.json'),
        indicators: this.url('indicators/index.json'),
        tools: this.url('tools/index.json'),
        dimensions: this.url('dimensions/index.json'),
        relationships: this.url('relationships/graph.json'),
        openapi: this.url('openapi.json')
      }
    }));
    console.log('✓ Generated API root');
  }

  async generateIndicators(indicators: Indicator[], builder: RelationshipBuilder): Promise<void> {
    assertDistinctFileNames('indicators', indicators.map(indicator => indicator.id));
    await this.writeCollection({
      segment: 'indicators',
      type: 'IndicatorCollection',
      name: 'Indicators',
      description: 'Collection of all quality indicators',
      items: indicators,
      toItem: indicator => ({
        ...withoutMetadata(serializeIndicator(indicator)),
        _links: this.indicatorLinks(indicator, builder)
      })
    });

    for (const indicator of indicators) {
      await this.writer.writeJson(`indicators/${safeFileName(indicator.id)}.json`, this.envelope('Indicator', {
        ...omitNullish(withoutMetadata(serializeIndicator(indicator))),
        _links: {
          ...this.indicatorLinks(indicator, builder),
          collection: this.url('indicators/index.json')
        }
      }));
    }
    console.log(`✓ Generated ${indicators.length} individual indicator files`);

    await this.generateToolsByIndicator(indicators, builder);
  }

  async generateTools(tools: Tool[], builder: RelationshipBuilder): Promise<void> {
    assertDistinctFileNames('tools', tools.map(tool => tool.id));
    await this.writeCollection({
      segment: 'tools',
      type: 'ToolCollection',
      name: 'Tools',
      description: 'Collection of all quality assessment tools',
      items: tools,
      toItem: tool => ({
        ...withoutMetadata(serializeTool(tool)),
        _links: this.toolLinks(tool)
      }),
      extraLinks: { 'by-ring': this.url('tools/by-ring/index.json') }
    });

    for (const tool of tools) {
      await this.writer.writeJson(`tools/${safeFileName(tool.id)}.json`, this.envelope('Tool', {
        ...omitNullish(withoutMetadata(serializeTool(tool))),
        _links: {
          ...this.toolLinks(tool),
          collection: this.url('tools/index.json')
        }
      }));
    }
    console.log(`✓ Generated ${tools.length} individual tool files`);

    await this.generateToolsByRing(tools);
    await this.generateIndicatorsByTool(tools, builder);
  }

  async generateDimensions(dimensions: Dimension[], builder: RelationshipBuilder): Promise<void> {
    assertDistinctFileNames('dimensions', dimensions.map(dimension => dimension.id));
    await this.writeCollection({
      segment: 'dimensions',
      type: 'DimensionCollection',
      name: 'Dimensions',
      description: 'Collection of all quality dimensions',
      items: dimensions,
      toItem: dimension => ({
        ...withoutMetadata(serializeDimension(dimension)),
        indicator_count: dimension.indicators.length,
        _links: this.dimensionLinks(dimension)
      })
    });

    for (const dimension of dimensions) {
      const fileName = safeFileName(dimension.id);
      await this.writer.writeJson(`dimensions/${fileName}.json`, this.envelope('Dimension', {
        ...omitNullish(withoutMetadata(serializeDimension(dimension))),
        indicator_count: dimension.indicators.length,
        _links: {
          ...this.dimensionLinks(dimension),
          collection: this.url('dimensions/index.json')
        }
      }));

      const contained = builder.getIndicatorsForDimension(dimension.id);
      await this.writer.writeJson(`dimensions/${fileName}/indicators.json`, this.envelope('IndicatorCollection', {
        dimension: dimension.id,
        description: `Indicators contained in dimension ${dimension.name}`,
        totalItems: contained.length,
        items: contained.map(indicator => this.indicatorSummary(indicator)),
        _links: {
          self: this.url(`dimensions/${fileName}/indicators.json`),
          dimension: this.url(`dimensions/${fileName}.json`)
        }
      }));
    }
    console.log(`✓ Generated ${dimensions.length} individual dimension files`);
  }

  async generateRelationshipsGraph(builder: RelationshipBuilder): Promise<void> {
    await this.writer.writeJson('relationships/graph.json', this.envelope('Graph', {
      name: 'Entity Relationships',
      description: 'Knowledge graph of relationships between indicators, tools, and dimensions',
      ...builder.exportGraph()
    }));
    console.log('✓ Generated relationships graph');
  }

  async generateOpenApiSpec(): Promise<void> {
    await this.writer.writeJson('openapi.json', buildOpenApiDocument(this.config));
    console.log('✓ Generated OpenAPI specification');
  }

  private async generateToolsByIndicator(indicators: Indicator[], builder: RelationshipBuilder): Promise<void> {
    for (const indicator of indicators) {
      const tools = builder.getToolsForIndicator(indicator.id);
      const fileName = safeFileName(indicator.id);
      await this.writer.writeJson(`tools/by-indicator/${fileName}.json`, this.envelope('ToolCollection', {
        indicator: indicator.id,
        description: `Tools that measure indicator ${indicator.id}`,
        totalItems: tools.length,
        items: tools.map(tool => ({ ...this.toolSummary(tool), ring: tool.ring ?? null })),
        _links: {
          self: this.url(`tools/by-indicator/${fileName}.json`),
          collection: this.url('tools/index.json'),
          indicator: this.url(`indicators/${fileName}.json`)
        }
      }));
    }
    console.log(`✓ Generated ${indicators.length} by-indicator views`);
  }

  private async generateIndicatorsByTool(tools: Tool[], builder: RelationshipBuilder): Promise<void> {
    for (const tool of tools) {
      const indicators = builder.getIndicatorsForTool(tool.id);
      const fileName = safeFileName(tool.id);
      await this.writer.writeJson(`indicators/by-tool/${fileName}.json`, this.envelope('IndicatorCollection', {
        tool: tool.id,
        description: `Indicators measured by tool ${tool.id}`,
        totalItems: indicators.length,
        items: indicators.map(indicator => this.indicatorSummary(indicator)),
        _links: {
          self: this.url(`indicators/by-tool/${fileName}.json`),
          collection: this.url('indicators/index.json'),
          tool: this.url(`tools/${fileName}.json`)
        }
      }));
    }
    console.log(`✓ Generated ${tools.length} by-tool views`);
  }

  private async generateToolsByRing(tools: Tool[]): Promise<void> {
    const byRing = groupBy(tools, tool => (tool.ring ? [tool.ring] : []));
    const rings = Array.from(byRing.keys()).sort();
    assertDistinctFileNames('tools/by-ring', rings);

    for (const ring of rings) {
      const ringTools = byRing.get(ring) ?? [];
      const fileName = safeFileName(ring);
      await this.writer.writeJson(`tools/by-ring/${fileName}.json`, this.envelope('ToolCollection', {
        ring,
        description: `Tools in ${ring} ring`,
        totalItems: ringTools.length,
        items: ringTools.map(tool => this.toolSummary(tool)),
        _links: {
          self: this.url(`tools/by-ring/${fileName}.json`),
          collection: this.url('tools/index.json')
        }
      }));
    }

    await this.writer.writeJson('tools/by-ring/index.json', this.envelope('RingCollection', {
      description: 'Tool rings with the number of tools in each',
      totalItems: rings.length,
      items: rings.map(ring => ({
        ring,
        totalItems: byRing.get(ring)?.length ?? 0,
        _links: { self: this.url(`tools/by-ring/${safeFileName(ring)}.json`) }
      })),
      _links: {
        self: this.url('tools/by-ring/index.json'),
        collection: this.url('tools/index.json')
      }
    }));
    console.log(`✓ Generated ${rings.length} by-ring views`);
  }

  private async writeCollection<T>(layout: CollectionLayout<T>): Promise<void> {
    const pages = paginate(layout.items, this.config.pageSize);
    const collectionUrl = this.url(layout.segment);

    for (const { page, totalPages, items } of pages) {
      await this.writer.writeJson(`${layout.segment}/${pageFileName(page)}`, this.envelope(layout.type, {
        name: layout.name,
        description: layout.description,
        totalItems: layout.items.length,
        page,
        perPage: this.config.pageSize,
        totalPages,
        items: items.map(layout.toItem),
        _links: { ...buildPageLinks(collectionUrl, page, totalPages), ...layout.extraLinks }
      }));
    }
    console.log(`✓ Generated ${layout.segment} collection (${pages.length} pages)`);
  }

  private indicatorLinks(indicator: Indicator, builder: RelationshipBuilder): LinkMap {
    const fileName = safeFileName(indicator.id);
    const links: LinkMap = {
      self: this.url(`indicators/${fileName}.json`),
      tools: this.url(`tools/by-indicator/${fileName}.json`)
    };
    // Only dimensions that exist have a document
    if (indicator.dimension && builder.getDimension(indicator.dimension)) {
      links.dimension = this.url(`dimensions/${safeFileName(indicator.dimension)}.json`);
    }
    return links;
  }

  private toolLinks(tool: Tool): LinkMap {
    return {
      self: this.url(`tools/${safeFileName(tool.id)}.json`),
      indicators: this.url(`indicators/by-tool/${safeFileName(tool.id)}.json`)
    };
  }

  private dimensionLinks(dimension: Dimension): LinkMap {
    const fileName = safeFileName(dimension.id);
    return {
      self: this.url(`dimensions/${fileName}.json`),
      indicators: this.url(`dimensions/${fileName}/indicators.json`)
    };
  }

  private indicatorSummary(indicator: Indicator): Document {
    return {
      id: indicator.id,
      name: indicator.name,
      _links: { self: this.url(`indicators/${safeFileName(indicator.id)}.json`) }
    };
  }

  private toolSummary(tool: Tool): Document {
    return {
      id: tool.id,
      name: tool.name,
      _links: { self: this.url(`tools/${safeFileName(tool.id)}.json`) }
    };
  }

  private envelope(type: string, body: Document): Document {
    return {
      '@context': this.config.apiContext,
      '@type': type,
      ...body,
      generated: this.clock().toISOString()
    };
  }
}

function assertDistinctFileNames(segment: string, ids: string[]): void {
  const conflicts = findFileNameConflicts(segment, ids);
  if (conflicts.length > 0) {
    throw new Error(`Conflicting file names under ${segment}: ${conflicts.join('; ')}`);
  }
}
