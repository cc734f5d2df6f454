/**
 * io.ts
 *
 * Contains all filesystem I/O for scraper
 * - read courses.txt input into normalized course codes
 * - expand --course arguments that point at list files
 */

import fs from 'node:fs/promises';
import { ConfigError, describeError } from './errors';

export const COMMENT_MARKER = '#';

// "tda 357 " -> "TDA357"
export function normalizeCourseCode(raw: string): string {
  return raw.replace(/\s+/g, '').toUpperCase();
}

export function dedupe(codes: Iterable<string>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const code of codes) {
    if (!code || seen.has(code)) continue;
    seen.add(code);
    out.push(code);
  }
  return out;
}

export function parseCourseList(raw: string): string[] {
  const codes = raw
    .split(/\r?\n/)
    .map((s) => s.trim())
    .filter((s) => s && !s.startsWith(COMMENT_MARKER))
    .map(normalizeCourseCode);
  return dedupe(codes);
}

// Read courses.txt into a normalized list of course codes.
// An empty list is fine; a missing file is not.
export async function loadCourses(coursesPath: string): Promise<string[]> {
  let raw: string;
  try {
    raw = await fs.readFile(coursesPath, 'utf8');
  } catch (err) {
    throw new ConfigError(`Cannot read course list ${coursesPath}: ${describeError(err)}`);
  }
  return parseCourseList(raw);
}

// Each argument is either a course code or a path to a list file (anything with a dot in it).
export async function resolveCourseArgs(args: string[]): Promise<string[]> {
  const codes: string[] = [];
  for (const arg of args) {
    if (arg.includes('.')) {
      codes.push(...(await loadCourses(arg)));
    } else {
      codes.push(normalizeCourseCode(arg));
    }
  }
  return dedupe(codes);
}
