/**
 * Storage module types for the quality graph API
 *
 * The cache keeps fetched entity collections and the relationship snapshot
 * between runs as flat JSON files, one file per key.
 */

/**
 * Key/value cache of JSON documents
 */
export interface CacheStore {
  /**
   * Load the document stored under a key
   * Resolves to undefined when the key is absent or unreadable.
   */
  load(key: string): Promise<unknown>;

  /**
   * Store a document under a key
   * @returns Path of the written file
   */
  save(key: string, data: unknown): Promise<string>;
}

/**
 * Cache configuration options
 */
export interface CacheConfig {
  /** Base directory for cache files */
  directory: string;
  /** Spaces used when pretty-printing JSON */
  indent: number;
}

/**
 * Cache factory for creating cache instances
 */
export interface CacheFactory {
  create(config: CacheConfig): Promise<CacheStore>;

  validateConfig(config: CacheConfig): { valid: boolean; errors: string[] };
}
