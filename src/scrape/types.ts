/**
 * types.ts
 *
 * Shared TypeScript types used across the scraper modules.
 *
 */

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

export type ScrapeConfig = {
  year: number;
  urlPattern: string;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
  concurrency: number;
  logLevel: LogLevel;
  userAgent: string;
};

export type Paths = {
  coursesPath: string;
};

export type ExamSession = 'am' | 'pm';

export type CourseEntry = {
  code: string;
  title: string | null;
  date: Date;
  session: ExamSession;
  kind: string;
};

export type FetchResult = {
  url: string;
  status: number;
  html: string;
};

export type ParsedCoursePage = {
  title: string | null;
  entries: CourseEntry[];
};

export type CourseReport =
  | { status: 'ok'; code: string; title: string | null; entries: CourseEntry[] }
  | { status: 'fetch-error'; code: string; url: string; message: string }
  | { status: 'parse-error'; code: string; url: string; message: string };
