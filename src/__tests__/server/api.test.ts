/**
 * Preview server tests through Hono's in-process request API
 */

import type { Hono } from 'hono';
import { ApiWriter } from '../../rendering/api-writer.js';
import { createApp } from '../../server/api.js';
import { TestHelpers } from '../setup.js';

describe('Preview server', () => {
  let tempDir: string;
  let app: Hono;

  beforeEach(async () => {
    tempDir = await TestHelpers.createTempDir();
    const writer = new ApiWriter(tempDir);
    await writer.writeJson('index.json', { '@type': 'APIRoot' });
    await writer.writeJson('tools/howfairis.json', { id: 'howfairis' });
    await writer.writeText('relationships/index.html', '<h1>Graph</h1>');
    app = createApp(tempDir);
  });

  afterEach(async () => {
    await TestHelpers.removeTempDir(tempDir);
  });

  test('should report its own health', async () => {
    const res = await app.request('/api/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', apiDir: tempDir });
  });

  test('should serve a JSON file', async () => {
    const res = await app.request('/tools/howfairis.json');

    expect(res.status).toBe(200);
    expect(res.headers.get('Content-Type')).toBe('application/json; charset=utf-8');
    expect(await res.json()).toEqual({ id: 'howfairis' });
  });

  test('should serve index.json for the root', async () => {
    const res = await app.request('/');

    expect(await res.json()).toEqual({ '@type': 'APIRoot' });
  });

  test('should fall back to index.html for a directory', async () => {
    const res = await app.request('/relationships/');

    expect(res.status).toBe(200);
    expect(res.headers.get('Content-Type')).toBe('text/html; charset=utf-8');
    expect(await res.text()).toBe('<h1>Graph</h1>');
  });

  test('should answer 404 with the path for missing files', async () => {
    const res = await app.request('/tools/missing.json');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found', path: '/tools/missing.json' });
  });

  test('should answer 404 for a directory without a trailing slash', async () => {
    const res = await app.request('/tools');

    expect(res.status).toBe(404);
  });

  test('should reject encoded parent segments', async () => {
    const res = await app.request('/..%2Fsecret.json');

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: 'Invalid path' });
  });
});
