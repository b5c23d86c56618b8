import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  normalizeUrl,
  isSameDomain,
  extractDomain,
  isHttpUrl,
  isIndexPath,
  isPdfOrMap,
  isToolSubdomain,
  hasLocationKeyword,
} from '../src/url';

const BASE = 'https://acme-freight.test/about';

// ---------------------------------------------------------------------------
// normalizeUrl
// ---------------------------------------------------------------------------

test('normalizeUrl: resolves relative links and strips the trailing slash', () => {
  assert.equal(normalizeUrl('/Locations/', 'https://Acme-Freight.test/about'), 'https://acme-freight.test/Locations');
});

test('normalizeUrl: drops the fragment and keeps the query', () => {
  assert.equal(normalizeUrl('/terminals?state=tx#map', BASE), 'https://acme-freight.test/terminals?state=tx');
});

test('normalizeUrl: keeps the root path as a single slash', () => {
  assert.equal(normalizeUrl('https://acme-freight.test', BASE), 'https://acme-freight.test/');
  assert.equal(normalizeUrl('/', BASE), 'https://acme-freight.test/');
});

test('normalizeUrl: protocol-relative links become https', () => {
  assert.equal(normalizeUrl('//acme-freight.test/terminals', 'http://acme-freight.test/'), 'https://acme-freight.test/terminals');
});

test('normalizeUrl: keeps an explicit port', () => {
  assert.equal(normalizeUrl('http://acme-freight.test:8080/a/', BASE), 'http://acme-freight.test:8080/a');
});

test('normalizeUrl: equivalent spellings normalize to the same URL', () => {
  assert.equal(
    normalizeUrl('https://acme-freight.test/locations/', BASE),
    normalizeUrl('https://ACME-FREIGHT.test/locations#top', BASE)
  );
});

test('normalizeUrl: rejects denylisted, empty and non-HTTP values', () => {
  assert.equal(normalizeUrl('/blog/2024/new-terminal', BASE), null);
  assert.equal(normalizeUrl('mailto:dispatch@acme-freight.test', BASE), null);
  assert.equal(normalizeUrl('/files/terminal-map.pdf', BASE), null);
  assert.equal(normalizeUrl('   ', BASE), null);
  assert.equal(normalizeUrl('ftp://acme-freight.test/rates', BASE, []), null);
});

test('normalizeUrl: an empty denylist lets documents through', () => {
  assert.equal(normalizeUrl('/files/terminal-map.pdf', BASE, []), 'https://acme-freight.test/files/terminal-map.pdf');
});

// ---------------------------------------------------------------------------
// Domain helpers
// ---------------------------------------------------------------------------

test('isSameDomain: ignores www and accepts subdomains', () => {
  assert.equal(isSameDomain('https://www.acme-freight.test/x', 'acme-freight.test'), true);
  assert.equal(isSameDomain('https://tools.acme-freight.test/', 'www.acme-freight.test'), true);
});

test('isSameDomain: rejects look-alike hosts and unparsable URLs', () => {
  assert.equal(isSameDomain('https://acme-freight.test.other.test/', 'acme-freight.test'), false);
  assert.equal(isSameDomain('https://notacme-freight.test/', 'acme-freight.test'), false);
  assert.equal(isSameDomain('not a url', 'acme-freight.test'), false);
});

test('extractDomain: lower-cases the host and drops www', () => {
  assert.equal(extractDomain('https://WWW.Acme-Freight.test/path'), 'acme-freight.test');
});

test('extractDomain: throws on an unparsable URL', () => {
  assert.throws(() => extractDomain('nope'));
});

test('isHttpUrl: accepts only absolute http(s) URLs with a host', () => {
  assert.equal(isHttpUrl('https://acme-freight.test'), true);
  assert.equal(isHttpUrl('HTTP://acme-freight.test/x'), true);
  assert.equal(isHttpUrl('ftp://acme-freight.test'), false);
  assert.equal(isHttpUrl('acme-freight.test'), false);
  assert.equal(isHttpUrl('https://'), false);
});

// ---------------------------------------------------------------------------
// URL predicates
// ---------------------------------------------------------------------------

test('isIndexPath: matches listing suffixes and service-map PDFs', () => {
  assert.equal(isIndexPath('https://acme-freight.test/terminals/'), true);
  assert.equal(isIndexPath('https://acme-freight.test/docs/ServiceMap.pdf'), true);
  assert.equal(isIndexPath('https://acme-freight.test/about'), false);
  assert.equal(isIndexPath('https://acme-freight.test/terminals/dallas'), false);
});

test('isPdfOrMap: needs a PDF with a location-ish word', () => {
  assert.equal(isPdfOrMap('https://acme-freight.test/files/terminal-directory.pdf'), true);
  assert.equal(isPdfOrMap('https://acme-freight.test/files/brochure.pdf'), false);
  assert.equal(isPdfOrMap('https://acme-freight.test/terminal-directory'), false);
});

test('isToolSubdomain: matches markers in the host only', () => {
  assert.equal(isToolSubdomain('https://tools.acme-freight.test/finder'), true);
  assert.equal(isToolSubdomain('https://www.app.acme-freight.test/'), true);
  assert.equal(isToolSubdomain('https://acme-freight.test/tools/finder'), false);
});

test('hasLocationKeyword: looks for location words anywhere in the URL', () => {
  assert.equal(hasLocationKeyword('https://acme-freight.test/our-terminals'), true);
  assert.equal(hasLocationKeyword('https://acme-freight.test/about'), false);
});
