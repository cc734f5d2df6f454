/**
 * api.ts
 *
 * HTTP client for the syllabus pages
 *
 * - builds the per-course syllabus URL for an academic start year
 * - creates one Playwright request context for the whole run (no browser involved)
 * - GETs a course page, retrying transient failures with exponential backoff
 */

import { request, type APIRequestContext } from '@playwright/test';
import { setTimeout as delay } from 'node:timers/promises';
import { FetchError, describeError, isRetryableStatus } from './errors';
import { log } from './log';
import type { FetchResult, ScrapeConfig } from './types';

// Fill {code}, {year} and {nextYear} into the pattern.
// The academic year is passed as "2024/2025", hence nextYear.
export function buildCourseUrl(pattern: string, code: string, year: number): string {
  return pattern
    .replace(/\{code\}/g, encodeURIComponent(code))
    .replace(/\{year\}/g, String(year))
    .replace(/\{nextYear\}/g, String(year + 1));
}

export async function createHttpClient(cfg: ScrapeConfig): Promise<APIRequestContext> {
  return request.newContext({
    timeout: cfg.timeoutMs,
    userAgent: cfg.userAgent,
    extraHTTPHeaders: { Accept: 'text/html' },
  });
}

type Attempt =
  | { ok: true; result: FetchResult }
  | { ok: false; retryable: boolean; status: number | null; error: string };

async function attemptGet(client: APIRequestContext, url: string, timeoutMs: number): Promise<Attempt> {
  try {
    const res = await client.get(url, { timeout: timeoutMs, failOnStatusCode: false });
    const status = res.status();
    if (!res.ok()) {
      await res.dispose();
      return { ok: false, retryable: isRetryableStatus(status), status, error: `HTTP ${status}` };
    }
    const html = await res.text();
    await res.dispose();
    return { ok: true, result: { url, status, html } };
  } catch (err) {
    // connection refused, reset, timed out...
    return { ok: false, retryable: true, status: null, error: describeError(err) };
  }
}

export async function fetchCoursePage(client: APIRequestContext, cfg: ScrapeConfig, code: string): Promise<FetchResult> {
  const url = buildCourseUrl(cfg.urlPattern, code, cfg.year);

  for (let attempt = 0; ; attempt++) {
    log.debug(`GET ${url} (attempt ${attempt + 1})`);
    const outcome = await attemptGet(client, url, cfg.timeoutMs);
    if (outcome.ok) return outcome.result;

    if (!outcome.retryable || attempt >= cfg.retries) {
      throw new FetchError(code, url, `${code}: ${outcome.error} (${url})`, outcome.status);
    }

    const wait = cfg.retryDelayMs * 2 ** attempt;
    log.info(`${code}: ${outcome.error}, retrying in ${wait}ms`);
    await delay(wait);
  }
}
