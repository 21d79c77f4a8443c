/**
 * Checks run against a generated API directory
 *
 * validateApiFiles() is the quick presence check the pipeline runs after
 * rendering. validateDeployment() is the full pre-publish check: directory
 * layout, every published endpoint, `_links` on the entry documents, the
 * JSON-LD context, the OpenAPI document, entity counts, and that every link
 * under the API base URL names a file that exists.
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import type { ValidationReport } from '../core/types.js';
import { toError } from '../utils/error-handler.js';
import { collectApiStats, fileExists } from './health.js';

export const REQUIRED_API_FILES = [
  'index.json',
  'indicators/index.json',
  'tools/index.json',
  'dimensions/index.json',
  'relationships/graph.json'
] as const;

export const REQUIRED_DIRECTORIES = ['indicators', 'tools', 'dimensions', 'relationships'] as const;

export const REQUIRED_ENDPOINTS = [
  ...REQUIRED_API_FILES,
  'openapi.json',
  'health.json',
  'status.json'
] as const;

/** Documents expected to carry `_links` */
const LINKED_ENTRY_DOCUMENTS = ['index.json', 'indicators/index.json', 'tools/index.json'] as const;

const LINK_FORMAT = /^(https?:\/\/|\/)\S+$/;

export interface DeploymentReport extends ValidationReport {
  warnings: string[];
  passed: string[];
}

export async function validateApiFiles(apiDir: string): Promise<ValidationReport> {
  const errors: string[] = [];

  for (const file of REQUIRED_API_FILES) {
    if (!(await fileExists(join(apiDir, file)))) {
      errors.push(`Missing required API file: ${file}`);
    }
  }

  if (errors.length === 0) {
    console.log(`✅ All ${REQUIRED_API_FILES.length} required API files present`);
  }
  return { valid: errors.length === 0, errors };
}

export async function validateDeployment(apiDir: string, apiBaseUrl: string): Promise<DeploymentReport> {
  return new DeploymentValidator(apiDir, apiBaseUrl).validate();
}

type JsonObject = Record<string, unknown>;

export class DeploymentValidator {
  private apiDir: string;
  private linkPrefix: string;
  private errors: string[] = [];
  private warnings: string[] = [];
  private passed: string[] = [];
  // Parsed once per run; null marks a file that is not valid JSON
  private documents: Map<string, unknown> = new Map();
  private existing: Map<string, boolean> = new Map();

  constructor(apiDir: string, apiBaseUrl: string) {
    this.apiDir = apiDir;
    this.linkPrefix = `${apiBaseUrl.replace(/\/+$/, '')}/`;
  }

  async validate(): Promise<DeploymentReport> {
    console.log(`🔍 Validating API deployment in ${this.apiDir}`);

    if (!(await isDirectory(this.apiDir))) {
      this.errors.push(`Missing API directory: ${this.apiDir}`);
      return this.finish();
    }

    await this.checkStructure();
    await this.checkRequiredEndpoints();
    await this.checkEntryLinks();
    await this.checkJsonLdContext();
    await this.checkOpenApi();
    await this.checkDataIntegrity();
    await this.checkLinkIntegrity();

    return this.finish();
  }

  private async checkStructure(): Promise<void> {
    for (const dir of REQUIRED_DIRECTORIES) {
      if (await isDirectory(join(this.apiDir, dir))) {
        this.passed.push(`Directory exists: ${dir}`);
      } else {
        this.errors.push(`Missing directory: ${dir}`);
      }
    }
  }

  private async checkRequiredEndpoints(): Promise<void> {
    for (const file of REQUIRED_ENDPOINTS) {
      if (await this.exists(file)) {
        this.passed.push(`Endpoint exists: ${file}`);
      } else {
        this.errors.push(`Missing endpoint: ${file}`);
      }
    }
  }

  private async checkEntryLinks(): Promise<void> {
    let linkCount = 0;
    for (const file of LINKED_ENTRY_DOCUMENTS) {
      const document = await this.readObject(file);
      if (document === undefined) {
        continue;
      }
      const links = document._links;
      if (isObject(links)) {
        linkCount += Object.keys(links).length;
      } else {
        this.warnings.push(`No _links in ${file}`);
      }
    }

    if (linkCount > 0) {
      this.passed.push(`Found ${linkCount} HATEOAS links`);
    } else {
      this.errors.push('No HATEOAS links found');
    }
  }

  private async checkJsonLdContext(): Promise<void> {
    const root = await this.readObject('index.json');
    if (root === undefined) {
      return;
    }
    if ('@context' in root) {
      this.passed.push('JSON-LD context found in root');
    } else {
      this.errors.push('Missing @context in root endpoint');
    }
  }

  private async checkOpenApi(): Promise<void> {
    if (!(await this.exists('openapi.json'))) {
      this.errors.push('OpenAPI specification not found');
      return;
    }
    const spec = await this.readObject('openapi.json');
    if (spec === undefined) {
      return;
    }

    const missing = ['openapi', 'info', 'paths'].filter(field => !(field in spec));
    if (missing.length > 0) {
      this.errors.push(`Missing OpenAPI fields: ${missing.join(', ')}`);
    } else {
      const paths = isObject(spec.paths) ? Object.keys(spec.paths).length : 0;
      this.passed.push(`OpenAPI document has ${paths} paths`);
    }

    const version = typeof spec.openapi === 'string' ? spec.openapi : '';
    if (version.startsWith('3.')) {
      this.passed.push(`Using OpenAPI ${version}`);
    } else {
      this.errors.push(`Unexpected OpenAPI version: ${version}`);
    }
  }

  private async checkDataIntegrity(): Promise<void> {
    const stats = await collectApiStats(this.apiDir);
    const counts = [
      ['indicators', stats.indicators],
      ['tools', stats.tools],
      ['dimensions', stats.dimensions]
    ] as const;

    for (const [kind, count] of counts) {
      if (count === 0) {
        this.errors.push(`No ${kind} found`);
      } else {
        this.passed.push(`Found ${count} ${kind}`);
      }
    }
  }

  /**
   * Every `_links` value in every rendered document (one with `@context`)
   */
  private async checkLinkIntegrity(): Promise<void> {
    let checked = 0;
    const before = this.errors.length;

    for (const file of await listJsonFiles(this.apiDir)) {
      const document = await this.readObject(file);
      if (document === undefined || !('@context' in document)) {
        continue;
      }

      for (const [name, target] of collectLinks(document)) {
        checked++;
        if (typeof target !== 'string' || !LINK_FORMAT.test(target)) {
          this.errors.push(`Invalid link in ${file}: ${name} -> ${String(target)}`);
          continue;
        }
        if (!target.startsWith(this.linkPrefix)) {
          continue;
        }
        const path = target.slice(this.linkPrefix.length);
        if (!(await this.exists(path))) {
          this.errors.push(`Broken link in ${file}: ${name} -> ${path}`);
        }
      }
    }

    if (this.errors.length === before) {
      this.passed.push(`All ${checked} links resolve`);
    }
  }

  private async readObject(file: string): Promise<JsonObject | undefined> {
    if (!this.documents.has(file)) {
      this.documents.set(file, await this.parse(file));
    }
    const document = this.documents.get(file);
    return isObject(document) ? document : undefined;
  }

  private async parse(file: string): Promise<unknown> {
    let text: string;
    try {
      text = await fs.readFile(join(this.apiDir, file), 'utf-8');
    } catch {
      return undefined;
    }

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      this.errors.push(`Invalid JSON in ${file}: ${toError(error).message}`);
      return null;
    }
  }

  private async exists(path: string): Promise<boolean> {
    const known = this.existing.get(path);
    if (known !== undefined) {
      return known;
    }
    const found = await fileExists(join(this.apiDir, path));
    this.existing.set(path, found);
    return found;
  }

  private finish(): DeploymentReport {
    const report: DeploymentReport = {
      valid: this.errors.length === 0,
      errors: [...this.errors],
      warnings: [...this.warnings],
      passed: [...this.passed]
    };

    console.log(`✅ Passed (${report.passed.length})`);
    for (const warning of report.warnings) {
      console.warn(`⚠️ ${warning}`);
    }
    for (const error of report.errors) {
      console.error(`❌ ${error}`);
    }
    console.log(report.valid
      ? '✅ All validation checks passed'
      : `❌ ${report.errors.length} validation error(s) found`);

    return report;
  }
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await fs.stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Name and value of every `_links` entry, nested documents included
 */
function collectLinks(value: unknown, found: Array<[string, unknown]> = []): Array<[string, unknown]> {
  if (Array.isArray(value)) {
    value.forEach(item => collectLinks(item, found));
  } else if (isObject(value)) {
    for (const [key, child] of Object.entries(value)) {
      if (key === '_links' && isObject(child)) {
        found.push(...Object.entries(child));
      } else {
        collectLinks(child, found);
      }
    }
  }
  return found;
}

/**
 * Relative paths of all JSON files under a directory, sorted per level
 */
async function listJsonFiles(root: string, prefix: string = ''): Promise<string[]> {
  const entries = await fs.readdir(join(root, prefix), { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    const path = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...(await listJsonFiles(root, path)));
    } else if (entry.isFile() && entry.name.endsWith('.json')) {
      files.push(path);
    }
  }
  return files;
}
