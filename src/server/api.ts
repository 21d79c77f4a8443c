/**
 * Hono app serving a generated API directory for local preview
 *
 * Request paths map onto files under the directory. A path ending in `/`
 * serves its `index.json`, or `index.html` when there is no JSON index.
 */

import { promises as fs } from 'fs';
import { extname, join } from 'path';
import { Hono } from 'hono';
import { isMissingFile } from '../utils/error-handler.js';

const CONTENT_TYPES: Record<string, string> = {
  '.json': 'application/json; charset=utf-8',
  '.html': 'text/html; charset=utf-8'
};

export function createApp(apiDir: string): Hono {
  const app = new Hono();

  /**
   * GET /api/health
   * Liveness of the preview server itself
   */
  app.get('/api/health', (c) => {
    return c.json({ status: 'ok', apiDir });
  });

  /**
   * GET *
   * Static files of the generated API
   */
  app.get('*', async (c) => {
    const requestPath = decodePath(new URL(c.req.url).pathname);
    if (requestPath === undefined || requestPath.split('/').includes('..')) {
      return c.json({ error: 'Invalid path', path: c.req.path }, 400);
    }

    const candidates = requestPath.endsWith('/')
      ? [`${requestPath}index.json`, `${requestPath}index.html`]
      : [requestPath];

    for (const candidate of candidates) {
      const content = await readApiFile(apiDir, candidate);
      if (content !== undefined) {
        return c.body(content, 200, {
          'Content-Type': CONTENT_TYPES[extname(candidate)] ?? 'text/plain; charset=utf-8'
        });
      }
    }

    return c.json({ error: 'Not found', path: requestPath }, 404);
  });

  return app;
}

function decodePath(pathname: string): string | undefined {
  try {
    return decodeURIComponent(pathname);
  } catch {
    return undefined;
  }
}

async function readApiFile(apiDir: string, requestPath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(join(apiDir, requestPath), 'utf-8');
  } catch (error) {
    if (isMissingFile(error) || isDirectory(error)) {
      return undefined;
    }
    throw error;
  }
}

function isDirectory(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EISDIR';
}
