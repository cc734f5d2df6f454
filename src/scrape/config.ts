/**
 * config.ts
 * Config for scraping, layered as defaults -> REEXAM_* env vars -> command line
 */

import path from 'node:path';
import { ConfigError } from './errors';
import { isLogLevel } from './log';
import type { Paths, ScrapeConfig } from './types';

export const DEFAULT_URL_PATTERN =
  'https://www.chalmers.se/en/education/your-studies/find-course-and-programme-syllabi/course-syllabus/{code}/?acYear={year}%2F{nextYear}';

export const MAX_CONCURRENCY = 8;
export const MIN_YEAR = 1900;

// year is a placeholder here; the command line always supplies it
export function getDefaultConfig(): ScrapeConfig {
  return {
    year: new Date().getFullYear(),
    urlPattern: DEFAULT_URL_PATTERN,
    timeoutMs: 20_000,
    retries: 2,
    retryDelayMs: 500,
    concurrency: 4,
    logLevel: 'warning',
    userAgent: 'reexam-finder/1.0 (+personal use)',
  };
}

export type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, min: number): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  if (!/^\d+$/.test(raw) || Number(raw) < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return Number(raw);
}

export function parseYear(raw: string): number {
  const value = raw.trim();
  if (!/^\d{4}$/.test(value)) {
    throw new ConfigError(`Start year must be a four-digit integer, got "${raw}"`);
  }
  const year = Number(value);
  if (year < MIN_YEAR) throw new ConfigError(`Start year must be ${MIN_YEAR} or later, got ${year}`);
  return year;
}

export function loadConfig(overrides: Partial<ScrapeConfig> = {}, env: Env = process.env): ScrapeConfig {
  const cfg = getDefaultConfig();

  const urlPattern = env.REEXAM_URL_PATTERN?.trim();
  if (urlPattern) cfg.urlPattern = urlPattern;

  cfg.timeoutMs = readInt(env, 'REEXAM_TIMEOUT_MS', 1) ?? cfg.timeoutMs;
  cfg.retries = readInt(env, 'REEXAM_RETRIES', 0) ?? cfg.retries;
  cfg.retryDelayMs = readInt(env, 'REEXAM_RETRY_DELAY_MS', 0) ?? cfg.retryDelayMs;
  cfg.concurrency = readInt(env, 'REEXAM_CONCURRENCY', 1) ?? cfg.concurrency;

  const level = env.REEXAM_LOG_LEVEL?.trim();
  if (level) {
    if (!isLogLevel(level)) throw new ConfigError(`REEXAM_LOG_LEVEL must be debug, info, warning or error, got "${level}"`);
    cfg.logLevel = level;
  }

  const merged: ScrapeConfig = { ...cfg, ...overrides };
  merged.concurrency = Math.min(Math.max(merged.concurrency, 1), MAX_CONCURRENCY);

  if (!merged.urlPattern.includes('{code}')) {
    throw new ConfigError(`URL pattern must contain {code}: ${merged.urlPattern}`);
  }
  return merged;
}

// The course list defaults to courses.txt in the working directory
export function getPaths(cwd: string = process.cwd()): Paths {
  return { coursesPath: path.join(cwd, 'courses.txt') };
}
