/**
 * Health and status documents for the generated API
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import type { ApiConfig } from '../config/config.js';
import { isMissingFile } from '../utils/error-handler.js';
import type { ApiWriter } from './api-writer.js';
import type { Clock } from './endpoint-generator.js';
import { isCollectionPageName } from './links.js';

export interface ApiStats {
  indicators: number;
  tools: number;
  dimensions: number;
  hasOpenApi: boolean;
  hasRelationships: boolean;
}

/**
 * Count the entity documents already written under an API directory
 * Collection pages (`index*.json`) and sub-directories are not counted.
 */
export async function collectApiStats(apiDir: string): Promise<ApiStats> {
  return {
    indicators: await countEntityFiles(join(apiDir, 'indicators')),
    tools: await countEntityFiles(join(apiDir, 'tools')),
    dimensions: await countEntityFiles(join(apiDir, 'dimensions')),
    hasOpenApi: await fileExists(join(apiDir, 'openapi.json')),
    hasRelationships: await fileExists(join(apiDir, 'relationships', 'graph.json'))
  };
}

export async function writeHealthDocuments(
  config: ApiConfig,
  writer: ApiWriter,
  runId: string,
  clock: Clock = () => new Date()
): Promise<ApiStats> {
  const stats = await collectApiStats(writer.getRootDir());
  const timestamp = clock().toISOString();
  const url = (path: string) => `${config.apiBaseUrl}/${path}`;
  const dataHealthy = stats.indicators > 0 && stats.tools > 0 && stats.dimensions > 0;

  await writer.writeJson('health.json', {
    '@context': config.apiContext,
    '@type': 'HealthCheck',
    name: `${config.apiTitle} Health`,
    version: config.apiVersion,
    timestamp,
    status: dataHealthy && stats.hasOpenApi && stats.hasRelationships ? 'healthy' : 'degraded',
    runId,
    components: {
      data: {
        status: dataHealthy ? 'healthy' : 'degraded',
        indicators: stats.indicators,
        tools: stats.tools,
        dimensions: stats.dimensions
      },
      openapi: {
        status: stats.hasOpenApi ? 'healthy' : 'missing',
        available: stats.hasOpenApi
      },
      relationships: {
        status: stats.hasRelationships ? 'healthy' : 'empty',
        available: stats.hasRelationships
      }
    },
    metrics: {
      total_endpoints: 3 + stats.indicators + stats.tools + stats.dimensions
    },
    _links: {
      self: url('health.json'),
      api: url('index.json'),
      docs: url('openapi.json')
    }
  });
  console.log('✓ Generated health endpoint');

  await writer.writeJson('status.json', {
    '@context': config.apiContext,
    '@type': 'Status',
    name: `${config.apiTitle} Status`,
    version: config.apiVersion,
    timestamp,
    runId,
    deployment: {
      status: 'active',
      last_update: timestamp
    },
    _links: {
      self: url('status.json'),
      health: url('health.json'),
      api: url('index.json')
    }
  });
  console.log('✓ Generated status endpoint');

  return stats;
}

async function countEntityFiles(dir: string): Promise<number> {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries.filter(entry =>
      entry.isFile() && entry.name.endsWith('.json') && !isCollectionPageName(entry.name.slice(0, -'.json'.length))
    ).length;
  } catch (error) {
    if (isMissingFile(error)) {
      return 0;
    }
    throw error;
  }
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    await fs.access(path);
    return true;
  } catch {
    return false;
  }
}
