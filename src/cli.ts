#!/usr/bin/env node
/**
 * quality-graph-api command line
 *
 *   generate [--skip-cache] [--verbose] [--out <dir>]
 *   summary [--skip-cache] [--from-snapshot]
 *   validate [--out <dir>]
 *   serve [--port <n>] [--host <h>]
 */

import { createConfig, validateConfig, type ApiConfigOverrides } from './config/config.js';
import { createDefaultDeps, generateApi, loadGraph } from './pipeline/generate-api.js';
import { validateDeployment } from './rendering/api-validation.js';
import { formatGraphSummary } from './pipeline/summary.js';
import { startServer } from './server/index.js';

export const USAGE = `Usage: quality-graph-api <command> [options]

Commands:
  generate [--skip-cache] [--verbose] [--out <dir>]  Fetch sources and write the static API
  summary [--skip-cache] [--from-snapshot]           Build the graph and print counts and sample queries
  validate [--out <dir>]                             Check a generated API directory before publishing
  serve [--port <n>] [--host <h>]                    Preview the generated API over HTTP`;

export type CommandName = 'generate' | 'summary' | 'validate' | 'serve';

export interface ParsedArgs {
  command?: CommandName;
  help: boolean;
  skipCache: boolean;
  fromSnapshot: boolean;
  overrides: ApiConfigOverrides;
  errors: string[];
}

const COMMANDS: readonly CommandName[] = ['generate', 'summary', 'validate', 'serve'];

function isCommand(value: string): value is CommandName {
  return COMMANDS.some(command => command === value);
}

export function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { help: false, skipCache: false, fromSnapshot: false, overrides: {}, errors: [] };
  const [first, ...rest] = argv;

  if (first === undefined || first === '--help' || first === '-h') {
    parsed.help = true;
    return parsed;
  }
  if (!isCommand(first)) {
    parsed.errors.push(`Unknown command: ${first}`);
    return parsed;
  }
  parsed.command = first;

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    const takeValue = (): string | undefined => {
      const value = rest[i + 1];
      if (value === undefined || value.startsWith('--')) {
        parsed.errors.push(`Missing value for ${arg}`);
        return undefined;
      }
      i++;
      return value;
    };

    switch (arg) {
      case '--help':
      case '-h':
        parsed.help = true;
        break;
      case '--skip-cache':
        parsed.skipCache = true;
        break;
      case '--from-snapshot':
        parsed.fromSnapshot = true;
        break;
      case '--verbose':
        parsed.overrides.verbose = true;
        break;
      case '--out': {
        const value = takeValue();
        if (value !== undefined) parsed.overrides.apiDir = value;
        break;
      }
      case '--port': {
        const value = takeValue();
        if (value === undefined) break;
        const port = Number.parseInt(value, 10);
        if (Number.isNaN(port)) {
          parsed.errors.push(`Invalid port: ${value}`);
        } else {
          parsed.overrides.server = { ...parsed.overrides.server, port };
        }
        break;
      }
      case '--host': {
        const value = takeValue();
        if (value !== undefined) parsed.overrides.server = { ...parsed.overrides.server, host: value };
        break;
      }
      default:
        parsed.errors.push(`Unknown option: ${arg}`);
    }
  }

  return parsed;
}

/**
 * Run a command and resolve to the process exit code
 * `serve` resolves once the server is listening and keeps the process alive.
 */
export async function runCli(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const args = parseArgs(argv);

  if (args.errors.length > 0) {
    args.errors.forEach(error => console.error(`❌ ${error}`));
    console.error(USAGE);
    return 1;
  }
  if (args.help || !args.command) {
    console.log(USAGE);
    return 0;
  }

  const config = createConfig(args.overrides, env);
  const configCheck = validateConfig(config);
  if (!configCheck.valid) {
    configCheck.errors.forEach(error => console.error(`❌ ${error}`));
    return 1;
  }

  switch (args.command) {
    case 'generate': {
      const result = await generateApi(config, await createDefaultDeps(config), { skipCache: args.skipCache });
      if (!result.success) {
        console.error(`❌ ${result.error.message}`);
        return 1;
      }
      return 0;
    }
    case 'summary': {
      const loaded = await loadGraph(await createDefaultDeps(config), {
        skipCache: args.skipCache,
        fromSnapshot: args.fromSnapshot
      });
      if (!loaded.success) {
        console.error(`❌ ${loaded.error.message}`);
        return 1;
      }
      formatGraphSummary(loaded.data).forEach(line => console.log(line));
      return 0;
    }
    case 'validate': {
      const report = await validateDeployment(config.apiDir, config.apiBaseUrl);
      return report.valid ? 0 : 1;
    }
    case 'serve':
      startServer(config);
      return 0;
  }
}

async function main() {
  const code = await runCli(process.argv.slice(2));
  if (code !== 0) {
    process.exit(code);
  }
}

if (require.main === module) main().catch(err => { console.error(err); process.exit(1); });
