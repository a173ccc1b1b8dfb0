/**
 * ResultExtractor 单元测试
 */

import { describe, expect, test, vi } from 'vitest';
import type { Page } from 'puppeteer-core';
import {
  cleanText,
  firstMatch,
  isExcludedLink,
  normalizeResultUrl,
  type Probe,
  ResultExtractor,
} from '../../core/result-extractor';

const CONTAINER_HTML = `
<html><body>
  <div id="result-stats">About 1,230 results  (0.41 seconds)</div>
  <div class="g"><a href="https://example.com/a"><h3>Alpha   Title</h3></a><div class="VwiC3b">Alpha description</div></div>
  <div class="g"><a href="/url?q=https://example.org/b&amp;sa=U"><h3>Beta</h3></a><div class="VwiC3b">Beta
    text</div></div>
  <div class="g"><a href="https://example.com/a"><h3>Duplicate</h3></a></div>
  <div class="g"><span>no link here</span></div>
  <div class="g"><a href="https://example.net/c"><h3>Gamma</h3></a></div>
  <a id="pnnext" href="/search?q=test&amp;start=10">Next</a>
</body></html>`;

const FALLBACK_HTML = `
<html><body>
  <div><a href="https://www.google.com/preferences">Settings</a></div>
  <div class="r"><a href="https://site.example/one"><h3>One Result</h3></a> One Result snippet text</div>
  <div><a href="https://site.example/two">Two Link</a></div>
  <a href="https://accounts.example/login">Sign in</a>
  <a href="https://site.example/empty"><img src="x.png"></a>
</body></html>`;

describe('ResultExtractor', () => {
  const extractor = new ResultExtractor();

  describe('container strategy', () => {
    test('should extract title, url and description from each container', () => {
      const result = extractor.extractFromHtml(CONTAINER_HTML, { maxResults: 10, pageNumber: 1 });

      expect(result.strategy).toBe('containers');
      expect(result.containerSelector).toBe('div.g');
      expect(result.items).toEqual([
        { title: 'Alpha Title', url: 'https://example.com/a', description: 'Alpha description', page: 1 },
        { title: 'Beta', url: 'https://example.org/b', description: 'Beta text', page: 1 },
        { title: 'Gamma', url: 'https://example.net/c', description: '', page: 1 },
      ]);
    });

    test('should read stats text and detect the next page link', () => {
      const result = extractor.extractFromHtml(CONTAINER_HTML, { maxResults: 10, pageNumber: 1 });

      expect(result.statsText).toBe('About 1,230 results (0.41 seconds)');
      expect(result.hasNextPage).toBe(true);
    });

    test('should stop at maxResults', () => {
      const result = extractor.extractFromHtml(CONTAINER_HTML, { maxResults: 2, pageNumber: 3 });

      expect(result.items.map((item) => item.url)).toEqual(['https://example.com/a', 'https://example.org/b']);
      expect(result.items.every((item) => item.page === 3)).toBe(true);
    });

    test('should skip urls already collected on previous pages', () => {
      const result = extractor.extractFromHtml(CONTAINER_HTML, {
        maxResults: 10,
        pageNumber: 2,
        seenUrls: new Set(['https://example.com/a']),
      });

      expect(result.items.map((item) => item.url)).toEqual(['https://example.org/b', 'https://example.net/c']);
    });

    test('should take the first absolute link when the container starts with a relative one', () => {
      const html = `<div class="g"><a href="/search?q=x">Related</a><a href="https://site.example/">Site</a><h3>T</h3></div>`;

      const result = extractor.extractFromHtml(html, { maxResults: 10, pageNumber: 1 });

      expect(result.strategy).toBe('containers');
      expect(result.items.map((item) => [item.title, item.url])).toEqual([['T', 'https://site.example/']]);
    });
  });

  describe('fallback strategy', () => {
    test('should scan external links when no container matches', () => {
      const result = extractor.extractFromHtml(FALLBACK_HTML, { maxResults: 10, pageNumber: 1 });

      expect(result.strategy).toBe('fallback');
      expect(result.containerSelector).toBeUndefined();
      expect(result.items).toEqual([
        { title: 'One Result', url: 'https://site.example/one', description: 'snippet text', page: 1 },
        { title: 'Two Link', url: 'https://site.example/two', description: '', page: 1 },
      ]);
    });

    test('should report no next page and no stats', () => {
      const result = extractor.extractFromHtml(FALLBACK_HTML, { maxResults: 10, pageNumber: 1 });

      expect(result.hasNextPage).toBe(false);
      expect(result.statsText).toBeNull();
    });

    test('should respect maxResults', () => {
      const result = extractor.extractFromHtml(FALLBACK_HTML, { maxResults: 1, pageNumber: 1 });

      expect(result.items).toHaveLength(1);
      expect(result.items[0].url).toBe('https://site.example/one');
    });
  });

  test('should return nothing for an empty document', () => {
    const result = extractor.extractFromHtml('<html><body></body></html>', { maxResults: 5, pageNumber: 1 });

    expect(result.items).toEqual([]);
    expect(result.hasNextPage).toBe(false);
  });

  test('extract should read html from the page', async () => {
    const page = { content: vi.fn().mockResolvedValue(CONTAINER_HTML) } as unknown as Page;

    const result = await extractor.extract(page, { maxResults: 1, pageNumber: 1 });

    expect(page.content).toHaveBeenCalledTimes(1);
    expect(result.items[0].title).toBe('Alpha Title');
  });
});

describe('firstMatch', () => {
  test('should return the first non-empty value', () => {
    const probes: Array<Probe<undefined, string>> = [() => null, () => '', () => 'second', () => 'third'];
    expect(firstMatch(probes, undefined)).toBe('second');
  });

  test('should treat a throwing probe as a miss', () => {
    const probes: Array<Probe<undefined, string>> = [
      () => {
        throw new Error('bad selector');
      },
      () => 'ok',
    ];
    expect(firstMatch(probes, undefined)).toBe('ok');
  });

  test('should return null when nothing matches', () => {
    const probes: Array<Probe<number, string>> = [() => undefined];
    expect(firstMatch(probes, 1)).toBeNull();
  });
});

describe('normalizeResultUrl', () => {
  test('should unwrap redirect links', () => {
    expect(normalizeResultUrl('/url?q=https://x.example/p&sa=U')).toBe('https://x.example/p');
    expect(normalizeResultUrl('/url?url=http://y.example/')).toBe('http://y.example/');
  });

  test('should reject relative and non-http links', () => {
    expect(normalizeResultUrl('/search?q=foo')).toBeNull();
    expect(normalizeResultUrl('ftp://files.example/a')).toBeNull();
    expect(normalizeResultUrl('/url?q=/relative')).toBeNull();
    expect(normalizeResultUrl(undefined)).toBeNull();
  });

  test('should trim absolute links', () => {
    expect(normalizeResultUrl('  https://a.example/page ')).toBe('https://a.example/page');
  });
});

describe('helpers', () => {
  test('cleanText should collapse whitespace', () => {
    expect(cleanText('  a \n\t b  ')).toBe('a b');
  });

  test('isExcludedLink should match engine hosts and service prefixes', () => {
    expect(isExcludedLink('https://www.google.com/search?q=x')).toBe(true);
    expect(isExcludedLink('https://maps.example/place')).toBe(true);
    expect(isExcludedLink('https://site.example/')).toBe(false);
  });
});
