/**
 * CLI 输出格式测试
 */

import { describe, expect, test } from 'vitest';
import { buildProgram, formatOutcome } from '../../cmd/cli';
import type { SearchOutcome } from '../../core/search-service';

function outcome(overrides: Partial<SearchOutcome['bundle']> = {}, blocked = false): SearchOutcome {
  return {
    bundle: {
      query: 'pizza',
      results: [
        { title: 'Pizzeria Da Michele', url: 'https://michele.example/', description: 'Dal 1870', page: 1 },
        { title: '', url: 'https://untitled.example/', description: '', page: 2 },
      ],
      statsText: 'Circa 1.000 risultati',
      pagesFetched: 2,
      ...overrides,
    },
    blocked,
    attempts: 1,
    elapsedMs: 3400,
  };
}

describe('formatOutcome', () => {
  test('should list numbered results with stats', () => {
    expect(formatOutcome(outcome()).split('\n')).toEqual([
      'Circa 1.000 risultati',
      '2 results from 2 pages (3400ms)',
      '',
      '1. Pizzeria Da Michele',
      '   https://michele.example/',
      '   Dal 1870',
      '2. (untitled)',
      '   https://untitled.example/',
    ]);
  });

  test('should lead with the block marker when blocked', () => {
    const text = formatOutcome(
      outcome({ results: [], statsText: '[BLOCKED] /sorry/', pagesFetched: 1 }, true)
    );

    expect(text.split('\n')).toEqual(['Blocked: [BLOCKED] /sorry/', '0 results from 1 pages (3400ms)', '']);
  });

  test('should skip an empty stats line', () => {
    expect(formatOutcome(outcome({ statsText: '' })).split('\n')[0]).toBe('2 results from 2 pages (3400ms)');
  });
});

describe('buildProgram', () => {
  test('should register the search command and its options', () => {
    const search = buildProgram().commands.find((command) => command.name() === 'search');

    expect(search).toBeDefined();
    expect(search?.options.map((option) => option.long)).toEqual([
      '--lang',
      '--results',
      '--pages',
      '--sleep',
      '--retries',
      '--proxy',
      '--no-stealth',
      '--screenshot',
      '--json',
      '--debug',
    ]);
  });
});
