/**
 * Preview server entry point
 *
 * Serves a generated API directory over HTTP with @hono/node-server.
 */

import { serve, type ServerType } from '@hono/node-server';
import type { ApiConfig } from '../config/config.js';
import { createApp } from './api.js';

export function startServer(config: Pick<ApiConfig, 'apiDir' | 'server'>): ServerType {
  const { port, host } = config.server;

  console.log('📡 Starting API preview server...');
  console.log(`📁 Serving ${config.apiDir}`);
  console.log('🔗 Endpoints:');
  console.log('   GET  /api/health - Preview server health');
  console.log('   GET  /<path> - Generated API files');

  const server = serve({
    fetch: createApp(config.apiDir).fetch,
    port,
    hostname: host
  }, (info) => {
    console.log(`✅ API preview running on http://${info.address}:${info.port}`);
    console.log(`🚀 Try http://${host}:${info.port}/index.json`);
  });

  const shutdown = () => {
    console.log('\n🛑 Shutting down API preview server...');
    server.close();
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  return server;
}
