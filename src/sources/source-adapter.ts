/**
 * Source adapter: fetches, parses and caches entity collections
 *
 * Indicators and dimensions come from the indicators repository, tools from the
 * TechRadar repository. Each collection is read from the cache when allowed;
 * otherwise every `.json` file of the configured directory is downloaded,
 * parsed, and the surviving entities are written back to the cache.
 */

import type { z } from 'zod';
import type { ApiConfig, SourceKind } from '../config/config.js';
import { serializeDimension, serializeIndicator, serializeTool } from '../core/serialization.js';
import type { Dimension, Indicator, Tool } from '../core/types.js';
import type { CacheStore } from '../storage/types.js';
import { ErrorCategory, ErrorHandler, ErrorSeverity } from '../utils/error-handler.js';
import { GitHubClient } from './github-client.js';
import { parseDimensions, parseIndicators, parseTools, type ParseReport } from './record-parser.js';
import {
  describeIssues,
  dimensionCollectionSchema,
  indicatorCollectionSchema,
  toolCollectionSchema
} from './schemas.js';

export interface LoadOptions {
  /** Try the cache before fetching (default true) */
  useCache?: boolean;
}

/**
 * How one entity kind is fetched, parsed and cached
 */
interface CollectionCodec<T> {
  kind: SourceKind;
  collectionType: string;
  parse: (records: unknown[]) => ParseReport<T>;
  serialize: (entity: T) => object;
  fromCache: (document: unknown) => T[] | undefined;
}

export class SourceAdapter {
  private config: Pick<ApiConfig, 'sources'>;
  private client: GitHubClient;
  private cache: CacheStore;

  // Parse errors of the last fetch, per kind
  private parseErrors: Map<SourceKind, string[]> = new Map();

  constructor(config: Pick<ApiConfig, 'sources'>, client: GitHubClient, cache: CacheStore) {
    this.config = config;
    this.client = client;
    this.cache = cache;
  }

  async loadIndicators(options: LoadOptions = {}): Promise<Indicator[]> {
    return this.load(INDICATOR_CODEC, options);
  }

  async loadTools(options: LoadOptions = {}): Promise<Tool[]> {
    return this.load(TOOL_CODEC, options);
  }

  async loadDimensions(options: LoadOptions = {}): Promise<Dimension[]> {
    return this.load(DIMENSION_CODEC, options);
  }

  /**
   * Download every JSON record of one source directory
   */
  async fetchRawRecords(kind: SourceKind): Promise<unknown[]> {
    const source = this.config.sources[kind];
    console.log(`🌐 Fetching ${kind} from ${source.owner}/${source.repo}/${source.path}...`);

    const files = await this.client.listFiles(source.owner, source.repo, source.path);
    if (files.length === 0) {
      console.error(`❌ Failed to list ${kind} files from GitHub`);
      return [];
    }

    const records: unknown[] = [];
    for (const file of files) {
      if (!file.name.endsWith('.json')) {
        continue;
      }

      const url = this.client.rawUrl(source.owner, source.repo, file.path, source.branch);
      const record = await this.client.fetchJson(url);
      if (record) {
        records.push(record);
      } else {
        console.warn(`⚠️ Failed to fetch ${file.name}`);
      }
    }

    console.log(`✅ Successfully fetched ${records.length} ${kind}`);
    return records;
  }

  /**
   * Parse errors collected during the last fetch of a kind
   */
  getParseErrors(kind: SourceKind): string[] {
    return [...(this.parseErrors.get(kind) ?? [])];
  }

  private async load<T>(codec: CollectionCodec<T>, options: LoadOptions): Promise<T[]> {
    const useCache = options.useCache ?? true;

    if (useCache) {
      const cached = codec.fromCache(await this.cache.load(codec.kind));
      if (cached && cached.length > 0) {
        console.log(`📦 Loaded ${cached.length} ${codec.kind} from cache`);
        return cached;
      }
    }

    const records = await this.fetchRawRecords(codec.kind);
    const report = codec.parse(records);
    this.parseErrors.set(codec.kind, report.errors);

    if (report.entities.length > 0) {
      await this.writeCache(codec, report.entities);
    }

    return report.entities;
  }

  private async writeCache<T>(codec: CollectionCodec<T>, entities: T[]): Promise<void> {
    const document = {
      type: codec.collectionType,
      items: entities.map(codec.serialize),
      count: entities.length
    };

    const result = await ErrorHandler.wrapOperation(
      () => this.cache.save(codec.kind, document),
      ErrorCategory.STORAGE,
      `save ${codec.kind} cache`
    );
    if (!result.success) {
      console.warn(`⚠️ Continuing without ${codec.kind} cache`);
    }
  }
}

/**
 * Decode a cached collection document, logging when it does not match
 */
function decodeCollection<D>(
  kind: SourceKind,
  schema: z.ZodType<D, z.ZodTypeDef, unknown>,
  document: unknown
): D | undefined {
  if (document === undefined) {
    return undefined;
  }

  const parsed = schema.safeParse(document);
  if (!parsed.success) {
    ErrorHandler.handle(
      ErrorCategory.STORAGE,
      ErrorSeverity.MEDIUM,
      `Failed to load ${kind} cache`,
      undefined,
      { kind },
      'Delete the cache file or run with --skip-cache',
      [describeIssues(parsed.error)]
    );
    return undefined;
  }
  return parsed.data;
}

const INDICATOR_CODEC: CollectionCodec<Indicator> = {
  kind: 'indicators',
  collectionType: 'IndicatorCollection',
  parse: records => parseIndicators(records),
  serialize: serializeIndicator,
  fromCache: document => decodeCollection('indicators', indicatorCollectionSchema, document)?.items.map(item => ({
    id: item.id,
    name: item.name,
    description: item.description ?? undefined,
    dimension: item.dimension ?? undefined,
    category: item.category ?? undefined,
    rationale: item.rationale ?? undefined,
    url: item.url ?? undefined,
    relatedTools: item.related_tools,
    metadata: item.metadata
  }))
};

const TOOL_CODEC: CollectionCodec<Tool> = {
  kind: 'tools',
  collectionType: 'ToolCollection',
  parse: records => parseTools(records),
  serialize: serializeTool,
  fromCache: document => decodeCollection('tools', toolCollectionSchema, document)?.items.map(item => ({
    id: item.id,
    name: item.name,
    description: item.description ?? undefined,
    url: item.url ?? undefined,
    ring: item.ring ?? undefined,
    quadrant: item.quadrant ?? undefined,
    relatedIndicators: item.related_indicators,
    metadata: item.metadata
  }))
};

const DIMENSION_CODEC: CollectionCodec<Dimension> = {
  kind: 'dimensions',
  collectionType: 'DimensionCollection',
  parse: records => parseDimensions(records),
  serialize: serializeDimension,
  fromCache: document => decodeCollection('dimensions', dimensionCollectionSchema, document)?.items.map(item => ({
    id: item.id,
    name: item.name,
    description: item.description ?? undefined,
    indicators: item.indicators,
    metadata: item.metadata
  }))
};
