#!/usr/bin/env node
/**
 * CLI entry point for pdf-fetch-cache
 */
import { fileURLToPath } from 'url';
import { realpathSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { isPdfCacheError } from './errors.js';
import { createRuntime, type Runtime } from './runtime.js';

/** Read version from package.json */
function getVersion(): string {
  const srcDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = join(srcDir, '..', 'package.json');
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return 'unknown';
  } catch {
    return 'unknown';
  }
}

export type CliCommand =
  | { command: 'info'; source: string; json: boolean; refresh: boolean }
  | { command: 'read'; source: string; pages?: string; json: boolean; refresh: boolean }
  | { command: 'cache-stats'; json: boolean }
  | { command: 'cache-clear'; json: boolean };

type ParseResult =
  | { kind: 'ok'; cmd: CliCommand; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

export function parseArgs(args: string[]): ParseResult {
  const positional: string[] = [];
  const warnings: string[] = [];
  let json = false;
  let refresh = false;
  let pages: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--json':
        json = true;
        break;
      case '--refresh':
        refresh = true;
        break;
      case '-p':
      case '--pages':
        if (i + 1 >= args.length) return { kind: 'error', message: '--pages requires a value' };
        pages = args[++i];
        break;
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-v':
      case '--version':
        return { kind: 'version' };
      default:
        if (arg.startsWith('-')) {
          warnings.push(`Unknown option: ${arg}`);
        } else {
          positional.push(arg);
        }
    }
  }

  const [command, target] = positional;
  if (command === undefined) return { kind: 'error', message: 'Missing command' };

  switch (command) {
    case 'info':
    case 'read': {
      if (!target) return { kind: 'error', message: `Missing required <source> argument for ${command}` };
      if (pages !== undefined && command === 'info') warnings.push('--pages is ignored by info');
      const cmd: CliCommand =
        command === 'info'
          ? { command, source: target, json, refresh }
          : { command, source: target, pages, json, refresh };
      return { kind: 'ok', cmd, warnings };
    }
    case 'cache':
      if (target === 'stats') return { kind: 'ok', cmd: { command: 'cache-stats', json }, warnings };
      if (target === 'clear') return { kind: 'ok', cmd: { command: 'cache-clear', json }, warnings };
      return { kind: 'error', message: 'cache requires a subcommand: stats or clear' };
    default:
      return { kind: 'error', message: `Unknown command: ${command}` };
  }
}

function printUsage(): void {
  console.log(`Usage: pdf-fetch-cache info <source> [options]
       pdf-fetch-cache read <source> [--pages <range>] [options]
       pdf-fetch-cache cache stats|clear [--json]

<source> is a local PDF path or an http(s) URL. URLs are validated against
private/internal addresses on every redirect hop and cached on disk.

Options:
  -p, --pages <range> Pages to read, 1-based (e.g. "1-3,5"); default all
  --refresh           Re-download URL sources even if cached
  --json              JSON output
  -v, --version       Show version number
  -h, --help          Show this help message

Environment:
  PDF_CACHE_DIR, PDF_CONTENT_CACHE_DIR, PDF_HTTP_TIMEOUT (seconds),
  PDF_MAX_DOWNLOAD_BYTES, PDF_MAX_REDIRECTS, PDF_CACHE_TTL_HOURS, LOG_LEVEL`);
}

async function runCommand(runtime: Runtime, cmd: CliCommand): Promise<void> {
  const { reader } = runtime;

  switch (cmd.command) {
    case 'info': {
      const info = await reader.getInfo(cmd.source, { forceRefresh: cmd.refresh });
      if (cmd.json) {
        console.log(JSON.stringify(info, null, 2));
        return;
      }
      console.log(`Path: ${info.path}`);
      console.log(`Pages: ${info.pageCount}`);
      for (const [key, value] of Object.entries(info.metadata)) {
        if (value !== null && value !== '') console.log(`${key}: ${value}`);
      }
      if (info.toc.length > 0) {
        console.log('---');
        for (const entry of info.toc) {
          const page = entry.page === null ? '' : ` (p. ${entry.page})`;
          console.log(`${'  '.repeat(entry.level - 1)}${entry.title}${page}`);
        }
      }
      return;
    }
    case 'read': {
      const result = await reader.readPages(cmd.source, {
        pages: cmd.pages,
        forceRefresh: cmd.refresh,
      });
      if (cmd.json) {
        console.log(JSON.stringify(result, null, 2));
        return;
      }
      for (const page of result.pages) {
        console.log(`--- Page ${page.page} ---`);
        console.log(page.text);
      }
      return;
    }
    case 'cache-stats': {
      const stats = await reader.cacheStats();
      if (cmd.json) {
        console.log(JSON.stringify(stats, null, 2));
        return;
      }
      console.log(`Downloads: ${stats.downloads.fileCount} files, ${stats.downloads.totalMb} MB (${stats.downloads.cacheDir})`);
      console.log(
        `Documents: ${stats.documents.totalFiles} documents, ${stats.documents.totalPages} pages, ${stats.documents.cacheSizeBytes} bytes (${stats.documents.cacheFile})`
      );
      return;
    }
    case 'cache-clear': {
      const { downloadsDeleted } = await reader.clearCaches();
      if (cmd.json) {
        console.log(JSON.stringify({ downloadsDeleted }));
        return;
      }
      console.log(`Deleted ${downloadsDeleted} cached downloads; document cache cleared`);
      return;
    }
  }
}

/** Run the CLI and resolve to the process exit code. */
export async function main(rawArgs: string[] = process.argv.slice(2)): Promise<number> {
  const result = parseArgs(rawArgs);

  switch (result.kind) {
    case 'version':
      console.log(`pdf-fetch-cache ${getVersion()}`);
      return 0;
    case 'help':
      printUsage();
      return 0;
    case 'error':
      console.error(`Error: ${result.message}`);
      printUsage();
      return 1;
  }

  for (const warning of result.warnings) {
    console.error(`Warning: ${warning}`);
  }

  let runtime: Runtime | undefined;
  try {
    runtime = await createRuntime();
    await runCommand(runtime, result.cmd);
    return 0;
  } catch (error) {
    if (isPdfCacheError(error)) {
      console.error(`Error [${error.code}]: ${error.message}`);
    } else {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    return 1;
  } finally {
    runtime?.close();
  }
}

const isDirectRun =
  process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);
if (isDirectRun) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error(`Fatal: ${err}`);
      process.exitCode = 1;
    });
}
