/**
 * Minimal GitHub client for reading JSON records out of public repositories
 *
 * Lists a directory through the contents API and downloads each file from the
 * raw content host. Transient failures (network errors, 429 and 5xx responses)
 * are retried with exponential backoff. Every other failure, including a body
 * that is not JSON, is logged and reported as an absent result.
 */

import type { ApiConfig } from '../config/config.js';
import { ErrorCategory, ErrorHandler } from '../utils/error-handler.js';
import { describeIssues, githubDirectoryListingSchema, type GitHubContentEntry } from './schemas.js';

const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

export type FetchFn = typeof fetch;

/**
 * HTTP response outside the 2xx range
 */
export class HttpStatusError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string, statusText: string) {
    super(`HTTP ${status} ${statusText} for ${url}`);
    this.name = 'HttpStatusError';
    this.status = status;
    this.url = url;
  }

  get retryable(): boolean {
    return RETRYABLE_STATUSES.has(this.status);
  }
}

export class GitHubClient {
  private config: Pick<ApiConfig, 'github' | 'http'>;
  private fetchFn: FetchFn;

  constructor(config: Pick<ApiConfig, 'github' | 'http'>, fetchFn: FetchFn = fetch) {
    this.config = config;
    this.fetchFn = fetchFn;
  }

  /**
   * Raw download URL of a file
   */
  rawUrl(owner: string, repo: string, path: string, branch: string = 'main'): string {
    return `${this.config.github.rawBase}/${owner}/${repo}/${branch}/${path}`;
  }

  /**
   * List the entries of a repository directory
   * Resolves to an empty list when the listing cannot be fetched.
   */
  async listFiles(owner: string, repo: string, path: string = ''): Promise<GitHubContentEntry[]> {
    const url = `${this.config.github.apiBase}/repos/${owner}/${repo}/contents/${path}`;
    const body = await this.fetchJson(url);
    if (body === undefined) {
      return [];
    }

    const listing = githubDirectoryListingSchema.safeParse(body);
    if (!listing.success) {
      console.error(`❌ Unexpected directory listing from ${url}: ${describeIssues(listing.error)}`);
      return [];
    }
    return listing.data;
  }

  /**
   * Fetch and parse a JSON document
   * Resolves to undefined after retries are exhausted or on a non-retryable failure.
   */
  async fetchJson(url: string): Promise<unknown> {
    const result = await ErrorHandler.wrapOperationWithRetry(
      () => this.request(url),
      ErrorCategory.NETWORK,
      `fetch ${url}`,
      { url },
      {
        maxRetries: this.config.http.maxRetries,
        baseDelayMs: this.config.http.retryBackoffMs,
        shouldRetry: isTransient
      }
    );

    return result.success ? result.data : undefined;
  }

  private async request(url: string): Promise<unknown> {
    const response = await this.fetchFn(url, {
      headers: this.buildHeaders(),
      signal: AbortSignal.timeout(this.config.http.timeoutMs)
    });

    if (!response.ok) {
      throw new HttpStatusError(response.status, url, response.statusText);
    }

    const body: unknown = JSON.parse(await response.text());
    return body;
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': 'quality-graph-api'
    };
    if (this.config.github.token) {
      headers.Authorization = `token ${this.config.github.token}`;
    }
    return headers;
  }
}

/**
 * Network errors and 429/5xx responses; a malformed body will not change on retry
 */
function isTransient(error: Error): boolean {
  if (error instanceof SyntaxError) {
    return false;
  }
  return !(error instanceof HttpStatusError) || error.retryable;
}
