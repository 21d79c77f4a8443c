/**
 * Core exports for the quality graph API
 *
 * Relationship graph over indicators, tools and dimensions, the sources that
 * feed it and the static API rendered from it.
 */

// Relationship graph
export { RelationshipBuilder, RELATIONSHIPS_CACHE_KEY } from './core/relationship-builder.js';
export {
  isKnownRing,
  isValidEntityId,
  validateCollections,
  validateDimension,
  validateIndicator,
  validateTool
} from './core/entity-validation.js';
export {
  serializeDimension,
  serializeEdge,
  serializeIndicator,
  serializeTool,
  deserializeEdge
} from './core/serialization.js';

// Sources
export { GitHubClient, HttpStatusError } from './sources/github-client.js';
export { SourceAdapter } from './sources/source-adapter.js';
export { parseDimensions, parseIndicators, parseTools } from './sources/record-parser.js';

// Rendering
export { ApiWriter } from './rendering/api-writer.js';
export { EndpointGenerator } from './rendering/endpoint-generator.js';
export { buildOpenApiDocument } from './rendering/openapi.js';
export { DeploymentValidator, validateApiFiles, validateDeployment } from './rendering/api-validation.js';
export type { DeploymentReport } from './rendering/api-validation.js';
export { findFileNameConflicts, safeFileName } from './rendering/links.js';

// Pipeline, configuration and server
export { createConfig, validateConfig, DEFAULT_SOURCES } from './config/config.js';
export { createDefaultDeps, generateApi, loadGraph } from './pipeline/generate-api.js';
export { createApp } from './server/api.js';
export { startServer } from './server/index.js';

// Error handling
export { ErrorHandler, ErrorCategory, ErrorSeverity } from './utils/error-handler.js';

// Storage
export * from './storage/index.js';

// Type definitions
export type {
  EntityType,
  RelationshipType,
  ToolRing,
  EntityMetadata,
  Indicator,
  Tool,
  Dimension,
  RelationshipEdge,
  IndicatorRecord,
  ToolRecord,
  DimensionRecord,
  RelationshipEdgeRecord,
  GraphStatistics,
  GraphExport,
  RelationshipSnapshot,
  ValidationReport,
  RelationshipValidation
} from './core/types.js';
export type { ApiConfig, ApiConfigOverrides, SourceKind, SourceLocation } from './config/config.js';
export type { EntitySource, GenerationSummary, LoadedGraph, PipelineDeps, PipelineOptions } from './pipeline/generate-api.js';
export type { OperationResult, ErrorInfo } from './utils/error-handler.js';
