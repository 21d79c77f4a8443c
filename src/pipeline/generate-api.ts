/**
 * End-to-end API generation
 *
 * load entities → validate → build relationships → render endpoints → check the deployment
 */

import { v4 as uuidv4 } from 'uuid';
import type { ApiConfig } from '../config/config.js';
import { validateCollections } from '../core/entity-validation.js';
import { RelationshipBuilder } from '../core/relationship-builder.js';
import type { Dimension, Indicator, Tool } from '../core/types.js';
import { ApiWriter } from '../rendering/api-writer.js';
import { validateApiFiles, validateDeployment } from '../rendering/api-validation.js';
import { EndpointGenerator, type Clock } from '../rendering/endpoint-generator.js';
import { writeHealthDocuments } from '../rendering/health.js';
import { writeHtmlPages } from '../rendering/html-pages.js';
import { findFileNameConflicts } from '../rendering/links.js';
import { GitHubClient, type FetchFn } from '../sources/github-client.js';
import { SourceAdapter, type LoadOptions } from '../sources/source-adapter.js';
import { createCache } from '../storage/factory.js';
import type { CacheStore } from '../storage/types.js';
import {
  ErrorCategory,
  ErrorHandler,
  ErrorSeverity,
  type OperationResult
} from '../utils/error-handler.js';

/**
 * Anything that can hand over the three parsed collections
 */
export interface EntitySource {
  loadIndicators(options?: LoadOptions): Promise<Indicator[]>;
  loadTools(options?: LoadOptions): Promise<Tool[]>;
  loadDimensions(options?: LoadOptions): Promise<Dimension[]>;
}

export interface PipelineDeps {
  source: EntitySource;
  cache: CacheStore;
  clock?: Clock;
  createRunId?: () => string;
}

export interface PipelineOptions {
  /** Fetch from the sources even when cached collections exist */
  skipCache?: boolean;
  /** Reuse the cached relationship snapshot instead of rebuilding the edges */
  fromSnapshot?: boolean;
}

export interface LoadedGraph {
  builder: RelationshipBuilder;
  indicators: Indicator[];
  tools: Tool[];
  dimensions: Dimension[];
}

export interface GenerationSummary {
  runId: string;
  outputDir: string;
  indicators: number;
  tools: number;
  dimensions: number;
  relationships: number;
  validRelationships: number;
  filesWritten: number;
}

/**
 * Wire the default GitHub-backed source and the JSON file cache
 */
export async function createDefaultDeps(config: ApiConfig, fetchFn?: FetchFn): Promise<PipelineDeps> {
  const cache = await createCache(config.cacheDir);
  const client = new GitHubClient(config, fetchFn);
  return {
    source: new SourceAdapter(config, client, cache),
    cache
  };
}

/**
 * Load the three collections and build the relationship graph, or restore its
 * edges from the cached snapshot when asked to
 * Fails when any collection comes back empty.
 */
export async function loadGraph(
  deps: Pick<PipelineDeps, 'source'> & Partial<Pick<PipelineDeps, 'cache'>>,
  options: PipelineOptions = {}
): Promise<OperationResult<LoadedGraph>> {
  const loadOptions: LoadOptions = { useCache: !options.skipCache };

  console.log('📥 Loading source data...');
  const indicators = await deps.source.loadIndicators(loadOptions);
  const tools = await deps.source.loadTools(loadOptions);
  const dimensions = await deps.source.loadDimensions(loadOptions);

  if (indicators.length === 0 || tools.length === 0 || dimensions.length === 0) {
    return ErrorHandler.createErrorResult<LoadedGraph>(
      ErrorCategory.NETWORK,
      ErrorSeverity.CRITICAL,
      'Failed to fetch required data',
      undefined,
      { indicators: indicators.length, tools: tools.length, dimensions: dimensions.length },
      undefined,
      'Check network access to the source repositories, or rerun without --skip-cache'
    );
  }

  const builder = new RelationshipBuilder();
  builder.addIndicators(indicators);
  builder.addTools(tools);
  builder.addDimensions(dimensions);

  const restored = options.fromSnapshot && deps.cache ? await builder.loadFromCache(deps.cache) : false;
  if (options.fromSnapshot && !restored) {
    console.warn('⚠️ No relationship snapshot cached, building relationships instead');
  }
  if (!restored) {
    builder.buildAllRelationships();
  }

  return ErrorHandler.createSuccessResult({ builder, indicators, tools, dimensions });
}

export async function generateApi(
  config: ApiConfig,
  deps: PipelineDeps,
  options: PipelineOptions = {}
): Promise<OperationResult<GenerationSummary>> {
  const clock = deps.clock ?? (() => new Date());
  const runId = deps.createRunId ? deps.createRunId() : uuidv4();
  console.log(`🚀 Generating API (run ${runId}) into ${config.apiDir}`);

  const loaded = await loadGraph(deps, options);
  if (!loaded.success) {
    return { success: false, error: loaded.error };
  }
  const { builder, indicators, tools, dimensions } = loaded.data;

  const entityValidation = validateCollections(indicators, tools, dimensions);
  if (!entityValidation.valid) {
    return ErrorHandler.createErrorResult<GenerationSummary>(
      ErrorCategory.VALIDATION,
      ErrorSeverity.HIGH,
      'Entity validation failed',
      undefined,
      { errors: entityValidation.errors.length },
      undefined,
      'Fix the listed records in the source repositories',
      entityValidation.errors
    );
  }

  const fileNameConflicts = [
    ...findFileNameConflicts('indicators', indicators.map(indicator => indicator.id)),
    ...findFileNameConflicts('tools', tools.map(tool => tool.id)),
    ...findFileNameConflicts('dimensions', dimensions.map(dimension => dimension.id))
  ];
  if (fileNameConflicts.length > 0) {
    return ErrorHandler.createErrorResult<GenerationSummary>(
      ErrorCategory.VALIDATION,
      ErrorSeverity.HIGH,
      'Entity file names conflict',
      undefined,
      { conflicts: fileNameConflicts.length },
      undefined,
      'Rename the listed ids so each maps to its own file',
      fileNameConflicts
    );
  }

  if (config.verbose) {
    for (const warning of builder.getWarnings()) {
      console.debug(`   ${warning}`);
    }
  }

  const relationshipValidation = builder.validateRelationships();
  for (const error of relationshipValidation.errors) {
    console.warn(`⚠️ ${error}`);
  }

  const snapshotSaved = await ErrorHandler.wrapOperation(
    () => builder.saveToCache(deps.cache),
    ErrorCategory.STORAGE,
    'save relationship snapshot'
  );
  if (!snapshotSaved.success) {
    console.warn('⚠️ Continuing without a relationship snapshot');
  }

  const writer = new ApiWriter(config.apiDir);
  const rendered = await ErrorHandler.wrapOperation(
    async () => {
      const generator = new EndpointGenerator(config, writer, clock);
      await generator.generateRoot();
      await generator.generateIndicators(indicators, builder);
      await generator.generateTools(tools, builder);
      await generator.generateDimensions(dimensions, builder);
      await generator.generateRelationshipsGraph(builder);
      await generator.generateOpenApiSpec();

      const stats = await writeHealthDocuments(config, writer, runId, clock);
      await writeHtmlPages(config, writer, builder.exportGraph(), stats, runId, clock().toISOString());
    },
    ErrorCategory.RENDERING,
    'render API endpoints',
    { apiDir: config.apiDir }
  );
  if (!rendered.success) {
    return { success: false, error: rendered.error };
  }

  const fileValidation = await validateApiFiles(config.apiDir);
  if (!fileValidation.valid) {
    return ErrorHandler.createErrorResult<GenerationSummary>(
      ErrorCategory.VALIDATION,
      ErrorSeverity.HIGH,
      'Generated API is incomplete',
      undefined,
      { apiDir: config.apiDir },
      undefined,
      undefined,
      fileValidation.errors
    );
  }

  const deployment = await validateDeployment(config.apiDir, config.apiBaseUrl);
  if (!deployment.valid) {
    return ErrorHandler.createErrorResult<GenerationSummary>(
      ErrorCategory.VALIDATION,
      ErrorSeverity.HIGH,
      'Generated API failed deployment checks',
      undefined,
      { apiDir: config.apiDir, errors: deployment.errors.length },
      undefined,
      undefined,
      deployment.errors
    );
  }

  const summary: GenerationSummary = {
    runId,
    outputDir: config.apiDir,
    indicators: indicators.length,
    tools: tools.length,
    dimensions: dimensions.length,
    relationships: builder.getRelationships().length,
    validRelationships: relationshipValidation.validCount,
    filesWritten: writer.getWrittenFiles().length
  };

  console.log('🎉 API generation complete');
  console.log(`📊 ${summary.indicators} indicators, ${summary.tools} tools, ${summary.dimensions} dimensions, ${summary.relationships} relationships`);
  console.log(`📁 ${summary.filesWritten} files written to ${summary.outputDir}`);

  return ErrorHandler.createSuccessResult(summary);
}
