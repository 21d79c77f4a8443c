/**
 * Storage module for the quality graph API
 *
 * Flat-file cache of fetched collections and relationship snapshots.
 */

export type {
  CacheConfig,
  CacheFactory,
  CacheStore
} from './types.js';

export { JsonFileCache } from './json-file-cache.js';
export {
  DefaultCacheFactory,
  createDefaultCacheConfig,
  createCache
} from './factory.js';
