/**
 * Cache factory for creating and validating cache instances
 */

import { promises as fs } from 'fs';
import type { CacheConfig, CacheFactory, CacheStore } from './types.js';
import { JsonFileCache } from './json-file-cache.js';

/**
 * Default cache factory implementation
 */
export class DefaultCacheFactory implements CacheFactory {
  /**
   * Create a cache instance, making sure its directory exists
   */
  async create(config: CacheConfig): Promise<CacheStore> {
    const validation = this.validateConfig(config);
    if (!validation.valid) {
      throw new Error(`Invalid cache configuration: ${validation.errors.join(', ')}`);
    }

    await fs.mkdir(config.directory, { recursive: true });
    return new JsonFileCache(config);
  }

  validateConfig(config: CacheConfig): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (!config.directory || config.directory.trim().length === 0) {
      errors.push('Directory is required');
    }

    if (!Number.isInteger(config.indent) || config.indent < 0) {
      errors.push('Indent must be a non-negative integer');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }
}

/**
 * Create a default cache configuration
 */
export function createDefaultCacheConfig(directory: string): CacheConfig {
  return {
    directory,
    indent: 2
  };
}

/**
 * Create a cache instance with default configuration
 */
export async function createCache(directory: string): Promise<CacheStore> {
  const factory = new DefaultCacheFactory();
  return factory.create(createDefaultCacheConfig(directory));
}
