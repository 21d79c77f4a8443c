/**
 * JSON file cache for fetched collections and relationship snapshots
 *
 * Each key maps to `<directory>/<key>.json`. A missing or corrupt file reads as
 * absent so that the caller falls back to fetching.
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { isMissingFile } from '../utils/error-handler.js';
import type { CacheConfig, CacheStore } from './types.js';

export class JsonFileCache implements CacheStore {
  private config: CacheConfig;

  constructor(config: CacheConfig) {
    this.config = config;
  }

  /**
   * Path of the file backing a key
   */
  pathFor(key: string): string {
    return join(this.config.directory, `${key}.json`);
  }

  async load(key: string): Promise<unknown> {
    const filePath = this.pathFor(key);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        console.warn(`⚠️ Cache file not found: ${filePath}`);
        return undefined;
      }
      throw error;
    }

    try {
      return JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`❌ Failed to parse JSON from ${filePath}: ${reason}`);
      return undefined;
    }
  }

  async save(key: string, data: unknown): Promise<string> {
    const filePath = this.pathFor(key);
    await fs.mkdir(this.config.directory, { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(data, null, this.config.indent), 'utf-8');
    console.log(`💾 Saved JSON to ${filePath}`);
    return filePath;
  }
}
