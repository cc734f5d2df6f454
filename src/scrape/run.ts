/**
 * run.ts
 *
 * Runs the end-to-end scrape:
 * - opens one HTTP client for the run
 * - fetches each course's syllabus page for the start year, a few at a time
 * - parses the exam table and keeps upcoming dates
 * - turns fetch/parse failures into per-course report entries instead of aborting
 */

import type { APIRequestContext } from '@playwright/test';
import { createHttpClient, fetchCoursePage } from './api';
import { FetchError, ParseError, describeError } from './errors';
import { log } from './log';
import { parseCoursePage } from './parse';
import { filterUpcoming } from './report';
import type { CourseReport, ScrapeConfig } from './types';

export type RunDeps = {
  createClient: (cfg: ScrapeConfig) => Promise<APIRequestContext>;
  now: () => Date;
};

const defaultDeps: RunDeps = {
  createClient: createHttpClient,
  now: () => new Date(),
};

const PROGRESS_EVERY = 10;

// Simple worker pool: `limit` workers pull the next index until the list is drained.
// Results come back in input order.
export async function mapWithConcurrency<T, R>(items: T[], limit: number, fn: (item: T, index: number) => Promise<R>): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  async function worker() {
    while (next < items.length) {
      const idx = next++;
      results[idx] = await fn(items[idx], idx);
    }
  }

  const workers: Promise<void>[] = [];
  for (let w = 0; w < Math.min(Math.max(limit, 1), items.length); w++) {
    workers.push(worker());
  }
  await Promise.all(workers);
  return results;
}

export async function scrapeCourse(client: APIRequestContext, cfg: ScrapeConfig, code: string, now: Date): Promise<CourseReport> {
  let url = '';
  try {
    const page = await fetchCoursePage(client, cfg, code);
    url = page.url;
    const { title, entries } = parseCoursePage(page.html, code);
    log.debug(`${code}: ${entries.length} exam date(s) on page`);
    return { status: 'ok', code, title, entries: filterUpcoming(entries, now) };
  } catch (err) {
    if (err instanceof FetchError) {
      log.warning(`Could not fetch ${code}: ${err.message}`);
      return { status: 'fetch-error', code, url: err.url, message: err.message };
    }
    if (err instanceof ParseError) {
      log.warning(`Could not parse ${code}: ${err.message}`);
      return { status: 'parse-error', code, url, message: err.message };
    }
    throw err;
  }
}

export async function runScrape(cfg: ScrapeConfig, courses: string[], deps: Partial<RunDeps> = {}): Promise<CourseReport[]> {
  const { createClient, now } = { ...defaultDeps, ...deps };
  if (courses.length === 0) return [];

  log.info(`Looking up ${courses.length} course(s) for ${cfg.year}/${cfg.year + 1}: ${courses.join(', ')}`);
  const startedAt = now();
  const client = await createClient(cfg);

  let done = 0;
  try {
    return await mapWithConcurrency(courses, cfg.concurrency, async (code) => {
      const report = await scrapeCourse(client, cfg, code, startedAt);
      done++;
      if (done % PROGRESS_EVERY === 0) log.info(`Progress: ${done}/${courses.length}`);
      return report;
    });
  } finally {
    await client.dispose().catch((err: unknown) => log.debug(`dispose failed: ${describeError(err)}`));
    log.info(`Done. ${done}/${courses.length} course(s) processed`);
  }
}
