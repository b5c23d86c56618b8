import { test } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';
import { parseArgs, run } from '../src/run';
import type { DiscoverFn } from '../src/discovery';
import { FakeRenderer, pageHtml, tmpDir } from './helpers';

const BETA_PAGES = {
  'https://beta-freight.test/': pageHtml('<a href="/locations">Locations</a><a href="/terminals">Terminals</a>'),
  'https://beta-freight.test/locations': pageHtml('<h1>Locations</h1>'),
  'https://beta-freight.test/terminals': pageHtml('<h1>Terminals</h1>'),
};

const fakeDiscover: DiscoverFn = async (siteRoot) => ({
  urls: new Set([siteRoot]),
  priority: new Set<string>(),
  sitemapUrls: new Set<string>(),
});

function writeCarriers(dir: string): string {
  const file = path.join(dir, 'carriers.csv');
  fs.writeFileSync(file, 'name,website\nBeta Freight,beta-freight.test\nBad Row,ftp://bad.test\n');
  return file;
}

// ---------------------------------------------------------------------------
// parseArgs
// ---------------------------------------------------------------------------

test('parseArgs: reads every flag', () => {
  const args = parseArgs([
    '--carriers', 'fleet.csv',
    '--workers', '4',
    '--start', '10',
    '--resume',
    '--max-pages', '50',
    '--limit', '5',
  ]);
  assert.deepEqual(args, { carriers: 'fleet.csv', workers: 4, start: 10, resume: true, maxPages: 50, limit: 5 });
});

test('parseArgs: defaults when no flags are given', () => {
  assert.deepEqual(parseArgs([]), { carriers: null, workers: null, start: null, resume: false, maxPages: null, limit: null });
});

test('parseArgs: numeric flags reject non-numbers', () => {
  assert.throws(() => parseArgs(['--workers', 'many']), /--workers requires a number, got: many/);
  assert.throws(() => parseArgs(['--limit']), /--limit requires a number, got: undefined/);
});

// ---------------------------------------------------------------------------
// run
// ---------------------------------------------------------------------------

test('run: requires a carriers file', async () => {
  await assert.rejects(run({ args: parseArgs([]) }), /--carriers is required/);
});

test('run: crawls, classifies and writes reports', async () => {
  const dir = tmpDir();
  const renderers: FakeRenderer[] = [];
  const result = await run({
    args: parseArgs(['--carriers', writeCarriers(dir)]),
    env: { OUTPUT_DIR: dir, CONCURRENCY: '1' },
    rendererFactory: async () => {
      const renderer = new FakeRenderer(BETA_PAGES);
      renderers.push(renderer);
      return renderer;
    },
    discover: fakeDiscover,
  });

  assert.equal(result.counts['success-with-locations'], 1);
  assert.equal(result.counts['skipped-invalid-url'], 1);
  assert.equal(renderers.length, 1);

  const reportsDir = path.join(dir, 'reports');
  for (const name of ['modality_report.txt', 'modality_report.json', 'crawl_results.json', 'crawl_results.csv', 'top_pages.csv']) {
    assert.ok(fs.existsSync(path.join(reportsDir, name)), name);
  }
  const text = fs.readFileSync(path.join(reportsDir, 'modality_report.txt'), 'utf8');
  assert.ok(text.includes('Carriers with Location Pages: 1\n'));
});

test('run: --limit keeps only the first carriers', async () => {
  const dir = tmpDir();
  const result = await run({
    args: parseArgs(['--carriers', writeCarriers(dir), '--limit', '1']),
    env: { OUTPUT_DIR: dir },
    rendererFactory: async () => new FakeRenderer(BETA_PAGES),
    discover: fakeDiscover,
  });
  assert.deepEqual(result.outcomes.map((o) => o.name), ['Beta Freight']);
});
