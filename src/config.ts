import defaultHeuristics from './heuristics.json';
import type { Config, Heuristics } from './types';

export const DEFAULT_CONFIG: Readonly<Config> = Object.freeze({
  maxPagesPerSite: 200,
  concurrency: 8,
  pageTimeoutMs: 30000,
  requestTimeoutMs: 15000,
  requestDelayMs: 0,
  settleDelayMs: 2000,
  scrollSettleMs: 500,
  maxOtherSeeds: 50,
  maxChildSitemaps: 10,
  checkpointBatchSize: 20,
  userAgent: 'Mozilla/5.0 (compatible; LocationScout/1.0)',
  outputDir: 'data',
  headless: true,
  respectRobotsTxt: false,
});

export const DEFAULT_HEURISTICS: Readonly<Heuristics> = Object.freeze(defaultHeuristics);

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, { allowZero = false } = {}): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0 || (value === 0 && !allowZero)) {
    const expected = allowZero ? 'a non-negative integer' : 'a positive integer';
    throw new Error(`${name} must be ${expected}, got: ${raw}`);
  }
  return value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return fallback;
  if (['1', 'true', 'yes'].includes(raw)) return true;
  if (['0', 'false', 'no'].includes(raw)) return false;
  throw new Error(`${name} must be true or false, got: ${env[name]}`);
}

/**
 * Builds the runtime config: defaults, then environment variables, then explicit overrides.
 * Call `require('dotenv').config()` first if values should come from a .env file.
 * @param env - Variable source; defaults to process.env.
 * @param overrides - Values that win over both defaults and environment.
 * @returns A fresh Config object.
 */
export function loadConfig(env: Env = process.env, overrides: Partial<Config> = {}): Config {
  return {
    ...DEFAULT_CONFIG,
    maxPagesPerSite: readInt(env, 'MAX_PAGES_PER_SITE', DEFAULT_CONFIG.maxPagesPerSite),
    concurrency: readInt(env, 'CONCURRENCY', DEFAULT_CONFIG.concurrency),
    pageTimeoutMs: readInt(env, 'PAGE_TIMEOUT_MS', DEFAULT_CONFIG.pageTimeoutMs),
    requestTimeoutMs: readInt(env, 'REQUEST_TIMEOUT_MS', DEFAULT_CONFIG.requestTimeoutMs),
    requestDelayMs: readInt(env, 'REQUEST_DELAY_MS', DEFAULT_CONFIG.requestDelayMs, { allowZero: true }),
    userAgent: env.USER_AGENT?.trim() || DEFAULT_CONFIG.userAgent,
    outputDir: env.OUTPUT_DIR?.trim() || DEFAULT_CONFIG.outputDir,
    headless: readBool(env, 'HEADLESS', DEFAULT_CONFIG.headless),
    respectRobotsTxt: readBool(env, 'RESPECT_ROBOTS_TXT', DEFAULT_CONFIG.respectRobotsTxt),
    ...overrides,
  };
}

/**
 * Returns the default heuristics with the given fields replaced.
 * Lists are replaced wholesale, not merged.
 */
export function loadHeuristics(overrides: Partial<Heuristics> = {}): Heuristics {
  return { ...DEFAULT_HEURISTICS, ...overrides };
}
