#!/usr/bin/env node
import path from 'node:path';
import { loadCarriers } from './carriers';
import { loadConfig, loadHeuristics } from './config';
import { runCoordinator, type RunResult } from './coordinator';
import type { DiscoverFn } from './discovery';
import { playwrightRendererFactory, type RendererFactory } from './renderer';
import { printRunSummary, writeReports } from './report';

const USAGE =
  'Usage: location-scout --carriers <csv> [--workers <n>] [--start <n>] [--resume] [--max-pages <n>] [--limit <n>]';

/** Parsed crawl CLI arguments. */
export interface RunArgs {
  carriers: string | null;
  workers: number | null;
  start: number | null;
  resume: boolean;
  maxPages: number | null;
  limit: number | null;
}

function readNumber(flag: string, raw: string | undefined): number {
  const val = parseInt(raw ?? '', 10);
  if (isNaN(val) || val < 0) throw new Error(`${flag} requires a number, got: ${raw}`);
  return val;
}

/**
 * Parses crawl CLI flags from an args array (pass process.argv.slice(2)).
 * Throws with a descriptive message if numeric flags receive non-numeric values.
 * @param argv - Raw CLI argument strings.
 * @returns Parsed flag values.
 */
export function parseArgs(argv: string[]): RunArgs {
  const result: RunArgs = { carriers: null, workers: null, start: null, resume: false, maxPages: null, limit: null };
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === '--carriers') {
      result.carriers = argv[++i] ?? null;
    } else if (argv[i] === '--workers') {
      result.workers = readNumber('--workers', argv[++i]);
    } else if (argv[i] === '--start') {
      result.start = readNumber('--start', argv[++i]);
    } else if (argv[i] === '--resume') {
      result.resume = true;
    } else if (argv[i] === '--max-pages') {
      result.maxPages = readNumber('--max-pages', argv[++i]);
    } else if (argv[i] === '--limit') {
      result.limit = readNumber('--limit', argv[++i]);
    }
  }
  return result;
}

// ---------------------------------------------------------------------------
// Main entry point
// ---------------------------------------------------------------------------

/** Options passed to run(). */
interface RunOptions {
  args?: RunArgs;
  env?: Record<string, string | undefined>;
  rendererFactory?: RendererFactory;
  discover?: DiscoverFn;
}

/**
 * Main crawl entry point.
 * Throws on invalid arguments rather than calling process.exit().
 * @param opts - Optional pre-parsed args and injected collaborators (useful for tests).
 * @returns The coordinator's result once reports are written.
 */
export async function run(opts: RunOptions = {}): Promise<RunResult> {
  const args = opts.args || parseArgs(process.argv.slice(2));
  if (!args.carriers) throw new Error(`--carriers is required. ${USAGE}`);

  const overrides = {
    ...(args.workers !== null ? { concurrency: args.workers } : {}),
    ...(args.maxPages !== null ? { maxPagesPerSite: args.maxPages } : {}),
  };
  const config = loadConfig(opts.env ?? process.env, overrides);
  const heuristics = loadHeuristics();

  let carriers = await loadCarriers(args.carriers);
  if (args.limit !== null) carriers = carriers.slice(0, (args.start ?? 0) + args.limit);
  console.log(`Loaded ${carriers.length} carriers from ${args.carriers}`);
  console.log(`Workers: ${config.concurrency}, max pages per site: ${config.maxPagesPerSite}`);

  const result = await runCoordinator({
    carriers,
    config,
    heuristics,
    rendererFactory: opts.rendererFactory ?? playwrightRendererFactory(config),
    discover: opts.discover,
    startIndex: args.start ?? 0,
    resume: args.resume,
  });

  const outDir = path.join(config.outputDir, 'reports');
  const files = await writeReports(outDir, result.reports, result.outcomes, heuristics.acceptThreshold);
  printRunSummary(result);
  console.log(`\nReports written to ${outDir} (${files.length} files)`);
  return result;
}

if (require.main === module) {
  // eslint-disable-next-line @typescript-eslint/no-require-imports
  require('dotenv').config();
  run().catch((err: Error) => {
    console.error('Fatal error:', err.message);
    process.exit(1);
  });
}
