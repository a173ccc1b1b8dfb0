#!/usr/bin/env node

/**
 * SERP Crawler CLI
 * 单次搜索并输出结果
 */

import * as fs from 'fs';
import * as path from 'path';
import { Command } from 'commander';
import { createSearchDependencies } from '../core/search-dependencies';
import type { SearchOutcome } from '../core/search-service';
import { resetSessionPool } from '../core/session-pool';
import { mapSearchError } from '../routes/search';
import { getConfigManager } from '../utils/config-manager';
import { closeLogger, setLogLevel, toError } from '../utils/logger';

interface SearchCommandOptions {
  lang?: string;
  results?: string;
  pages?: string;
  sleep?: string;
  retries?: string;
  proxy: boolean;
  stealth: boolean;
  screenshot?: string;
  json: boolean;
  debug: boolean;
}

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_BLOCKED = 2;

export function formatOutcome(outcome: SearchOutcome): string {
  const { bundle } = outcome;
  const lines: string[] = [];

  if (outcome.blocked) {
    lines.push(`Blocked: ${bundle.statsText}`);
  } else if (bundle.statsText) {
    lines.push(bundle.statsText);
  }
  lines.push(`${bundle.results.length} results from ${bundle.pagesFetched} pages (${outcome.elapsedMs}ms)`);
  lines.push('');

  bundle.results.forEach((item, index) => {
    lines.push(`${index + 1}. ${item.title || '(untitled)'}`);
    lines.push(`   ${item.url}`);
    if (item.description) {
      lines.push(`   ${item.description}`);
    }
  });

  return lines.join('\n');
}

export function buildProgram(): Command {
  const program = new Command();

  program.name('serp-crawler').description('Paginated search result crawler').version('1.0.0');

  program
    .command('search')
    .description('Run a single search and print the results')
    .argument('<query>', 'search query')
    .option('-l, --lang <lang>', 'interface language, e.g. it or en-US')
    .option('-n, --results <number>', 'results per page (1-20)')
    .option('-p, --pages <number>', 'maximum pages (1-10)')
    .option('-s, --sleep <seconds>', 'base sleep interval in seconds')
    .option('-r, --retries <number>', 'retry count after the first attempt')
    .option('--proxy', 'route the search through the proxy pool', false)
    .option('--no-stealth', 'disable fingerprint randomization')
    .option('--screenshot <file>', 'write the first-page screenshot (PNG) to this file')
    .option('--json', 'print the raw result as JSON', false)
    .option('-d, --debug', 'enable debug logs', false)
    .action(async (query: string, options: SearchCommandOptions) => {
      process.exitCode = await runSearch(query, options);
    });

  return program;
}

async function runSearch(query: string, options: SearchCommandOptions): Promise<number> {
  const configManager = getConfigManager();
  setLogLevel(options.debug ? 'debug' : configManager.getLoggingConfig().level);
  const { searchService } = createSearchDependencies(configManager);

  try {
    const outcome = await searchService.search({
      query,
      lang: options.lang,
      resultsPerPage: options.results,
      maxPages: options.pages,
      sleepInterval: options.sleep,
      retryCount: options.retries,
      useProxy: options.proxy,
      useStealth: options.stealth,
      includeScreenshot: Boolean(options.screenshot),
    });

    if (options.screenshot && outcome.bundle.screenshotBase64) {
      const target = path.resolve(options.screenshot);
      fs.writeFileSync(target, Buffer.from(outcome.bundle.screenshotBase64, 'base64'));
      console.error(`Screenshot saved to ${target}`);
    }

    if (options.json) {
      const { screenshotBase64: _screenshot, ...printable } = outcome.bundle;
      console.log(JSON.stringify({ ...printable, blocked: outcome.blocked }, null, 2));
    } else {
      console.log(formatOutcome(outcome));
    }
    return outcome.blocked ? EXIT_BLOCKED : EXIT_OK;
  } catch (error) {
    const mapped = mapSearchError(error);
    console.error(`❌ ${mapped.code}: ${mapped.message}`);
    return EXIT_FAILED;
  } finally {
    try {
      await resetSessionPool();
    } catch (error) {
      console.error(`Browser shutdown failed: ${toError(error).message}`);
    }
    await closeLogger();
  }
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(toError(error).message);
      process.exitCode = EXIT_FAILED;
    });
}
