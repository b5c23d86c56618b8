import { test } from 'node:test';
import assert from 'node:assert/strict';
import { DEFAULT_CONFIG, DEFAULT_HEURISTICS, loadConfig, loadHeuristics } from '../src/config';

// ---------------------------------------------------------------------------
// loadConfig
// ---------------------------------------------------------------------------

test('loadConfig: empty environment gives the defaults', () => {
  assert.deepEqual(loadConfig({}), { ...DEFAULT_CONFIG });
});

test('loadConfig: reads numbers, booleans and strings from the environment', () => {
  const config = loadConfig({
    MAX_PAGES_PER_SITE: '50',
    CONCURRENCY: '4',
    REQUEST_DELAY_MS: '0',
    HEADLESS: 'false',
    RESPECT_ROBOTS_TXT: 'yes',
    OUTPUT_DIR: ' out ',
  });
  assert.equal(config.maxPagesPerSite, 50);
  assert.equal(config.concurrency, 4);
  assert.equal(config.requestDelayMs, 0);
  assert.equal(config.headless, false);
  assert.equal(config.respectRobotsTxt, true);
  assert.equal(config.outputDir, 'out');
});

test('loadConfig: blank values fall back to defaults', () => {
  const config = loadConfig({ CONCURRENCY: '', USER_AGENT: '  ' });
  assert.equal(config.concurrency, DEFAULT_CONFIG.concurrency);
  assert.equal(config.userAgent, DEFAULT_CONFIG.userAgent);
});

test('loadConfig: rejects zero and non-numeric counts', () => {
  assert.throws(() => loadConfig({ CONCURRENCY: '0' }), /CONCURRENCY must be a positive integer, got: 0/);
  assert.throws(() => loadConfig({ MAX_PAGES_PER_SITE: 'lots' }), /MAX_PAGES_PER_SITE must be a positive integer, got: lots/);
  assert.throws(() => loadConfig({ REQUEST_DELAY_MS: '-5' }), /REQUEST_DELAY_MS must be a non-negative integer, got: -5/);
});

test('loadConfig: rejects unrecognised booleans', () => {
  assert.throws(() => loadConfig({ HEADLESS: 'maybe' }), /HEADLESS must be true or false, got: maybe/);
});

test('loadConfig: explicit overrides win over the environment', () => {
  assert.equal(loadConfig({ CONCURRENCY: '4' }, { concurrency: 2 }).concurrency, 2);
});

// ---------------------------------------------------------------------------
// loadHeuristics
// ---------------------------------------------------------------------------

test('loadHeuristics: replaces only the given fields', () => {
  const heuristics = loadHeuristics({ acceptThreshold: 5, denylist: ['/blog'] });
  assert.equal(heuristics.acceptThreshold, 5);
  assert.deepEqual(heuristics.denylist, ['/blog']);
  assert.equal(heuristics.minHtmlBytes, DEFAULT_HEURISTICS.minHtmlBytes);
});

test('DEFAULT_HEURISTICS: ships the documented thresholds', () => {
  assert.equal(DEFAULT_HEURISTICS.acceptThreshold, 3);
  assert.equal(DEFAULT_HEURISTICS.minHtmlBytes, 2000);
  assert.equal(DEFAULT_HEURISTICS.addressListMin, 5);
  assert.deepEqual(DEFAULT_HEURISTICS.documentExtensions, ['.pdf']);
});
