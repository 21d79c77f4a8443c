/**
 * Unit tests for the JSON file cache and its factory
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { DefaultCacheFactory, createCache, createDefaultCacheConfig } from '../../storage/factory.js';
import { JsonFileCache } from '../../storage/json-file-cache.js';
import { TestHelpers } from '../setup.js';

describe('JsonFileCache', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await TestHelpers.createTempDir();
  });

  afterEach(async () => {
    await TestHelpers.removeTempDir(tempDir);
  });

  test('should round-trip a document through a key', async () => {
    const cache = await createCache(join(tempDir, 'cache'));
    const document = { type: 'ToolCollection', items: [{ id: 'howfairis' }], count: 1 };

    const path = await cache.save('tools', document);

    expect(path).toBe(join(tempDir, 'cache', 'tools.json'));
    await expect(cache.load('tools')).resolves.toEqual(document);
  });

  test('should write with the configured indent', async () => {
    const cache = new JsonFileCache({ directory: tempDir, indent: 4 });
    await cache.save('small', { a: 1 });

    await expect(fs.readFile(join(tempDir, 'small.json'), 'utf-8')).resolves.toBe('{\n    "a": 1\n}');
  });

  test('should read a missing key as undefined', async () => {
    const cache = new JsonFileCache(createDefaultCacheConfig(tempDir));

    await expect(cache.load('absent')).resolves.toBeUndefined();
    expect(console.warn).toHaveBeenCalledWith(`⚠️ Cache file not found: ${join(tempDir, 'absent.json')}`);
  });

  test('should read invalid JSON as undefined', async () => {
    await fs.writeFile(join(tempDir, 'broken.json'), '{ nope', 'utf-8');
    const cache = new JsonFileCache(createDefaultCacheConfig(tempDir));

    await expect(cache.load('broken')).resolves.toBeUndefined();
  });

  test('should reject invalid factory configuration', async () => {
    const factory = new DefaultCacheFactory();

    expect(factory.validateConfig({ directory: ' ', indent: -1 })).toEqual({
      valid: false,
      errors: ['Directory is required', 'Indent must be a non-negative integer']
    });
    await expect(factory.create({ directory: '', indent: 2 }))
      .rejects.toThrow('Invalid cache configuration: Directory is required');
  });
});
