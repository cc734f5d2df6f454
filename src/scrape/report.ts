/**
 * report.ts
 *
 * Turns per-course results into the text (or JSON) printed on stdout.
 * Output only depends on the reports passed in, never on the clock.
 */

import type { CourseEntry, CourseReport } from './types';

export const NO_COURSES = 'No courses provided';
export const NO_EXAMS = 'No upcoming exams found';

const pad = (n: number) => String(n).padStart(2, '0');

// 2025-01-14 08:30, local time
export function formatDateTime(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}`
  );
}

export function filterUpcoming(entries: CourseEntry[], now: Date): CourseEntry[] {
  return entries.filter((e) => e.date.getTime() >= now.getTime());
}

export function sortEntries(entries: CourseEntry[]): CourseEntry[] {
  return [...entries].sort((a, b) => a.date.getTime() - b.date.getTime() || a.kind.localeCompare(b.kind));
}

function sectionHeader(report: CourseReport): string {
  if (report.status === 'ok' && report.title) return `${report.code} - ${report.title}`;
  return report.code;
}

function sectionBody(report: CourseReport): string[] {
  switch (report.status) {
    case 'fetch-error':
      return [`\tUnavailable: ${report.message}`];
    case 'parse-error':
      return [`\tCould not parse: ${report.message}`];
    case 'ok':
      if (!report.entries.length) return [`\t${NO_EXAMS}`];
      return sortEntries(report.entries).map((e) => `\t${formatDateTime(e.date)} - ${e.kind}`);
  }
}

export function formatReport(reports: CourseReport[]): string {
  if (!reports.length) return NO_COURSES;
  return reports.map((r) => [sectionHeader(r), ...sectionBody(r)].join('\n')).join('\n\n');
}

export function formatReportJson(reports: CourseReport[]): string {
  const out = reports.map((r) =>
    r.status === 'ok'
      ? {
          code: r.code,
          status: r.status,
          title: r.title,
          exams: sortEntries(r.entries).map((e) => ({ date: e.date.toISOString(), session: e.session, kind: e.kind })),
        }
      : { code: r.code, status: r.status, url: r.url, error: r.message },
  );
  return JSON.stringify(out, null, 2);
}
