/**
 * OpenAPI 3.0 description of the generated static API
 */

import type { ApiConfig } from '../config/config.js';
import { TOOL_RINGS } from '../core/types.js';

type Tag = 'Root' | 'Indicators' | 'Tools' | 'Dimensions' | 'Relationships' | 'Monitoring';

interface PathDescriptor {
  path: string;
  operationId: string;
  summary: string;
  tag: Tag;
  /** Path parameter name, if any */
  param?: string;
  /** Response schema reference */
  schema?: 'Indicator' | 'Tool' | 'Dimension' | 'Collection' | 'Graph';
  notFound?: boolean;
}

const PATHS: PathDescriptor[] = [
  { path: '/index.json', operationId: 'getApiRoot', summary: 'API root with links to all endpoints', tag: 'Root' },
  { path: '/indicators/index.json', operationId: 'listIndicators', summary: 'First page of quality indicators', tag: 'Indicators', schema: 'Collection' },
  { path: '/indicators/{id}.json', operationId: 'getIndicator', summary: 'Indicator details', tag: 'Indicators', param: 'id', schema: 'Indicator', notFound: true },
  { path: '/indicators/by-tool/{tool_id}.json', operationId: 'listIndicatorsForTool', summary: 'Indicators measured by a tool', tag: 'Indicators', param: 'tool_id', schema: 'Collection', notFound: true },
  { path: '/tools/index.json', operationId: 'listTools', summary: 'First page of quality assessment tools', tag: 'Tools', schema: 'Collection' },
  { path: '/tools/{id}.json', operationId: 'getTool', summary: 'Tool details', tag: 'Tools', param: 'id', schema: 'Tool', notFound: true },
  { path: '/tools/by-ring/index.json', operationId: 'listRings', summary: 'TechRadar rings with their tool counts', tag: 'Tools', schema: 'Collection' },
  { path: '/tools/by-ring/{ring}.json', operationId: 'listToolsByRing', summary: 'Tools in a TechRadar ring', tag: 'Tools', param: 'ring', schema: 'Collection', notFound: true },
  { path: '/tools/by-indicator/{indicator_id}.json', operationId: 'listToolsForIndicator', summary: 'Tools that measure an indicator', tag: 'Tools', param: 'indicator_id', schema: 'Collection', notFound: true },
  { path: '/dimensions/index.json', operationId: 'listDimensions', summary: 'First page of quality dimensions', tag: 'Dimensions', schema: 'Collection' },
  { path: '/dimensions/{id}.json', operationId: 'getDimension', summary: 'Dimension details', tag: 'Dimensions', param: 'id', schema: 'Dimension', notFound: true },
  { path: '/dimensions/{id}/indicators.json', operationId: 'listIndicatorsForDimension', summary: 'Indicators contained in a dimension', tag: 'Dimensions', param: 'id', schema: 'Collection', notFound: true },
  { path: '/relationships/graph.json', operationId: 'getRelationshipGraph', summary: 'Relationship graph of all entities', tag: 'Relationships', schema: 'Graph' },
  { path: '/health.json', operationId: 'getHealth', summary: 'Health of the generated API', tag: 'Monitoring' },
  { path: '/status.json', operationId: 'getStatus', summary: 'Generation run status', tag: 'Monitoring' }
];

const stringProp = { type: 'string' };
const stringList = { type: 'array', items: { type: 'string' } };
const linksProp = { type: 'object', additionalProperties: { type: 'string' } };

export function buildOpenApiDocument(config: ApiConfig): Record<string, unknown> {
  const paths: Record<string, unknown> = {};
  for (const descriptor of PATHS) {
    paths[descriptor.path] = { get: describeOperation(descriptor) };
  }

  return {
    openapi: '3.0.0',
    info: {
      title: config.apiTitle,
      description: config.apiDescription,
      version: config.apiVersion,
      license: { name: 'Apache 2.0', url: 'https://www.apache.org/licenses/LICENSE-2.0' }
    },
    servers: [{ url: config.apiBaseUrl, description: config.apiTitle }],
    paths,
    components: {
      schemas: {
        Indicator: {
          type: 'object',
          properties: {
            id: stringProp,
            name: stringProp,
            description: stringProp,
            dimension: stringProp,
            category: stringProp,
            rationale: stringProp,
            url: { type: 'string', format: 'uri' },
            related_tools: stringList,
            _links: linksProp
          },
          required: ['id', 'name']
        },
        Tool: {
          type: 'object',
          properties: {
            id: stringProp,
            name: stringProp,
            description: stringProp,
            url: { type: 'string', format: 'uri' },
            ring: { type: 'string', enum: [...TOOL_RINGS] },
            quadrant: stringProp,
            related_indicators: stringList,
            _links: linksProp
          },
          required: ['id', 'name']
        },
        Dimension: {
          type: 'object',
          properties: {
            id: stringProp,
            name: stringProp,
            description: stringProp,
            indicators: stringList,
            indicator_count: { type: 'integer' },
            _links: linksProp
          },
          required: ['id', 'name']
        },
        Collection: {
          type: 'object',
          properties: {
            '@context': stringProp,
            '@type': stringProp,
            totalItems: { type: 'integer' },
            page: { type: 'integer' },
            perPage: { type: 'integer' },
            totalPages: { type: 'integer' },
            items: { type: 'array', items: { type: 'object' } },
            _links: linksProp
          }
        },
        Graph: {
          type: 'object',
          properties: {
            nodes: {
              type: 'object',
              properties: {
                indicators: { type: 'object', additionalProperties: { $ref: '#/components/schemas/Indicator' } },
                tools: { type: 'object', additionalProperties: { $ref: '#/components/schemas/Tool' } },
                dimensions: { type: 'object', additionalProperties: { $ref: '#/components/schemas/Dimension' } }
              }
            },
            edges: {
              type: 'array',
              items: {
                type: 'object',
                properties: {
                  source_id: stringProp,
                  source_type: { type: 'string', enum: ['Indicator', 'Tool', 'Dimension'] },
                  target_id: stringProp,
                  target_type: { type: 'string', enum: ['Indicator', 'Tool', 'Dimension'] },
                  relationship_type: { type: 'string', enum: ['measures', 'measured_by', 'contains', 'part_of'] }
                }
              }
            },
            statistics: { type: 'object', additionalProperties: { type: 'integer' } }
          }
        }
      }
    },
    tags: [
      { name: 'Root', description: 'API root endpoint' },
      { name: 'Indicators', description: 'Quality indicators' },
      { name: 'Tools', description: 'Quality assessment tools' },
      { name: 'Dimensions', description: 'Quality dimensions' },
      { name: 'Relationships', description: 'Entity relationship graph' },
      { name: 'Monitoring', description: 'Health and status documents' }
    ]
  };
}

/**
 * Every documented path, for consumers listing the endpoints
 */
export function listDocumentedPaths(): string[] {
  return PATHS.map(descriptor => descriptor.path);
}

function describeOperation(descriptor: PathDescriptor): Record<string, unknown> {
  const responses: Record<string, unknown> = {
    '200': {
      description: descriptor.summary,
      content: {
        'application/json': {
          schema: descriptor.schema ? { $ref: `#/components/schemas/${descriptor.schema}` } : { type: 'object' }
        }
      }
    }
  };
  if (descriptor.notFound) {
    responses['404'] = { description: 'Not found' };
  }

  const operation: Record<string, unknown> = {
    operationId: descriptor.operationId,
    summary: descriptor.summary,
    tags: [descriptor.tag],
    responses
  };
  if (descriptor.param) {
    operation.parameters = [{
      name: descriptor.param,
      in: 'path',
      required: true,
      schema: { type: 'string' }
    }];
  }
  return operation;
}
