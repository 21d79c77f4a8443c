/**
 * Runtime configuration for the quality graph API
 *
 * Built once at process start from defaults, the environment and explicit
 * overrides (CLI flags), then passed by parameter to the source adapter,
 * the renderer and the server. The relationship builder takes none of it.
 */

import { resolve } from 'path';

/**
 * Where one entity collection lives in its source repository
 */
export interface SourceLocation {
  owner: string;
  repo: string;
  /** Directory inside the repository holding one JSON file per record */
  path: string;
  branch: string;
}

export type SourceKind = 'indicators' | 'tools' | 'dimensions';

export type ApiConfig = {
  /** Published base URL used in every link */
  apiBaseUrl: string;
  /** JSON-LD context URL placed in every document */
  apiContext: string;
  apiVersion: string;
  apiTitle: string;
  apiDescription: string;
  /** Output directory for the generated API */
  apiDir: string;
  /** Directory for cached collections and snapshots */
  cacheDir: string;
  /** Items per page in paged collections */
  pageSize: number;
  sources: Record<SourceKind, SourceLocation>;
  github: {
    apiBase: string;
    rawBase: string;
    token?: string;
  };
  http: {
    timeoutMs: number;
    maxRetries: number;
    /** Delay before the first retry; doubles on each further retry */
    retryBackoffMs: number;
  };
  server: {
    port: number;
    host: string;
  };
  verbose: boolean;
}

export type ApiConfigOverrides = Partial<Omit<ApiConfig, 'github' | 'http' | 'server' | 'sources'>> & {
  github?: Partial<ApiConfig['github']>;
  http?: Partial<ApiConfig['http']>;
  server?: Partial<ApiConfig['server']>;
  sources?: Partial<Record<SourceKind, SourceLocation>>;
};

const SOURCE_OWNER = 'EVERSE-ResearchSoftware';

export const DEFAULT_SOURCES: Record<SourceKind, SourceLocation> = {
  indicators: { owner: SOURCE_OWNER, repo: 'indicators', path: 'indicators', branch: 'main' },
  tools: { owner: SOURCE_OWNER, repo: 'TechRadar', path: 'data/software-tools', branch: 'main' },
  dimensions: { owner: SOURCE_OWNER, repo: 'indicators', path: 'dimensions', branch: 'main' }
};

/**
 * Build the configuration
 * Precedence: overrides, then environment, then defaults.
 */
export function createConfig(
  overrides: ApiConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): ApiConfig {
  return {
    apiBaseUrl: trimTrailingSlash(overrides.apiBaseUrl ?? env.API_BASE_URL ?? 'http://localhost:3001/api/v1'),
    apiContext: overrides.apiContext ?? env.API_CONTEXT ?? 'https://w3id.org/everse/api/v1/context.jsonld',
    apiVersion: overrides.apiVersion ?? 'v1',
    apiTitle: overrides.apiTitle ?? 'Research Software Quality API',
    apiDescription: overrides.apiDescription
      ?? 'Unified API for research software quality indicators, tools and dimensions',
    apiDir: resolve(overrides.apiDir ?? env.API_DIR ?? 'api/v1'),
    cacheDir: resolve(overrides.cacheDir ?? env.CACHE_DIR ?? '.cache'),
    pageSize: overrides.pageSize ?? 50,
    sources: { ...DEFAULT_SOURCES, ...overrides.sources },
    github: {
      apiBase: overrides.github?.apiBase ?? 'https://api.github.com',
      rawBase: overrides.github?.rawBase ?? 'https://raw.githubusercontent.com',
      token: overrides.github?.token ?? (env.GITHUB_TOKEN || undefined)
    },
    http: {
      timeoutMs: overrides.http?.timeoutMs ?? readInt(env.HTTP_TIMEOUT_MS, 30000),
      maxRetries: overrides.http?.maxRetries ?? readInt(env.MAX_RETRIES, 3),
      retryBackoffMs: overrides.http?.retryBackoffMs ?? readInt(env.RETRY_BACKOFF_MS, 2000)
    },
    server: {
      port: overrides.server?.port ?? readInt(env.PORT, 3001),
      host: overrides.server?.host ?? env.HOST ?? '127.0.0.1'
    },
    verbose: overrides.verbose ?? false
  };
}

/**
 * Validate configuration values
 */
export function validateConfig(config: ApiConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!/^https?:\/\//.test(config.apiBaseUrl)) {
    errors.push(`API base URL must be an http(s) URL: ${config.apiBaseUrl}`);
  }

  if (!Number.isInteger(config.pageSize) || config.pageSize <= 0) {
    errors.push('Page size must be a positive integer');
  }

  if (config.http.timeoutMs <= 0) {
    errors.push('HTTP timeout must be positive');
  }

  if (!Number.isInteger(config.http.maxRetries) || config.http.maxRetries < 1) {
    errors.push('Max retries must be at least 1');
  }

  if (config.http.retryBackoffMs < 0) {
    errors.push('Retry backoff cannot be negative');
  }

  if (!Number.isInteger(config.server.port) || config.server.port < 0 || config.server.port > 65535) {
    errors.push(`Invalid server port: ${config.server.port}`);
  }

  for (const [kind, source] of Object.entries(config.sources)) {
    if (!source.owner || !source.repo) {
      errors.push(`Source ${kind} needs an owner and a repo`);
    }
  }

  return {
    valid: errors.length === 0,
    errors
  };
}

function readInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}
