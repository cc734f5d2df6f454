/**
 * parse.ts
 *
 * Extracts examination dates from a course syllabus page.
 *
 * Everything that depends on how the site lays out its pages is pinned in PAGE_LAYOUT,
 * so a redesign of the syllabus pages only touches this file.
 */

import * as cheerio from 'cheerio';
import { ParseError } from './errors';
import type { CourseEntry, ExamSession, ParsedCoursePage } from './types';

export const PAGE_LAYOUT = {
  main: 'main',
  heading: 'h1',
  headingPrefix: ['course', 'syllabus', 'for'],
  examTableLabel: 'Examination dates',
  examRowMarker: 'Examination',
  dateCellIndex: 7,
} as const;

const SWEDISH_MONTHS: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  maj: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  okt: 10,
  nov: 11,
  dec: 12,
};

// Exams run in two fixed half-day slots
const SESSION_START: Record<ExamSession, { hour: number; minute: number }> = {
  am: { hour: 8, minute: 30 },
  pm: { hour: 14, minute: 0 },
};

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Parse "14 jan 2025 am" into the exam's start time.
 * Tokens after the session (e.g. a campus letter) are ignored; any session other than "am" is the afternoon slot.
 */
export function parseExamDate(text: string, code = ''): { date: Date; session: ExamSession } {
  const parts = collapse(text).toLowerCase().split(' ');
  if (parts.length < 4) throw new ParseError(code, `Unrecognized exam date "${text}"`);

  const [dayStr, monthStr, yearStr, sessionStr] = parts;
  const month: number | undefined = SWEDISH_MONTHS[monthStr];
  if (!/^\d{1,2}$/.test(dayStr) || !/^\d{4}$/.test(yearStr) || month === undefined) {
    throw new ParseError(code, `Unrecognized exam date "${text}"`);
  }
  const session: ExamSession = sessionStr === 'am' ? 'am' : 'pm';

  const day = Number(dayStr);
  const year = Number(yearStr);
  const { hour, minute } = SESSION_START[session];
  const date = new Date(year, month - 1, day, hour, minute);
  if (date.getDate() !== day || date.getMonth() !== month - 1) {
    throw new ParseError(code, `Exam date "${text}" does not exist`);
  }
  return { date, session };
}

// "Course syllabus for TDA357 Databases" -> "Databases"
export function extractTitle(heading: string, code: string): string | null {
  let words = collapse(heading).split(' ').filter(Boolean);
  const prefix = words.slice(0, PAGE_LAYOUT.headingPrefix.length).map((w) => w.toLowerCase());
  if (prefix.join(' ') === PAGE_LAYOUT.headingPrefix.join(' ')) {
    words = words.slice(PAGE_LAYOUT.headingPrefix.length);
  }
  if (words[0]?.toUpperCase() === code) words = words.slice(1);
  if (words[0] === '-') words = words.slice(1);
  return words.length ? words.join(' ') : null;
}

export function mentionsCourse(text: string, code: string): boolean {
  return new RegExp(`(^|[^A-Z0-9])${escapeRegExp(code)}($|[^A-Z0-9])`).test(text.toUpperCase());
}

export function parseCoursePage(html: string, code: string): ParsedCoursePage {
  const $ = cheerio.load(html);
  const main = $(PAGE_LAYOUT.main).first();
  if (!main.length) {
    throw new ParseError(code, `${code}: page has no <${PAGE_LAYOUT.main}> element, the site layout may have changed`);
  }

  // The site serves a generic page for codes it does not know
  if (!mentionsCourse(main.text(), code)) {
    return { title: null, entries: [] };
  }

  const heading = main.find(PAGE_LAYOUT.heading).first();
  const title = heading.length ? extractTitle(heading.text(), code) : null;

  const labels = main
    .find('*')
    .filter((_, el) => $(el).children().length === 0 && collapse($(el).text()) === PAGE_LAYOUT.examTableLabel);

  const entries: CourseEntry[] = [];
  const seen = new Set<string>();

  labels.each((_, label) => {
    // The table is the first one after the label: climb from the label towards <main>
    // and take the nearest following sibling that is, or holds, a table body.
    const chain = [label, ...$(label).parents().toArray()];
    const stop = chain.findIndex((el) => $(el).is(PAGE_LAYOUT.main));
    const following = (stop === -1 ? chain : chain.slice(0, stop))
      .map((el) =>
        $(el)
          .nextAll()
          .filter((_, sib) => $(sib).is('tbody') || $(sib).find('tbody').length > 0)
          .first(),
      )
      .find((next) => next.length > 0);
    if (!following) {
      throw new ParseError(code, `${code}: "${PAGE_LAYOUT.examTableLabel}" has no table body`);
    }

    const body = following.is('tbody') ? following : following.find('tbody').first();
    body
      .children('tr')
      .each((_, tr) => {
        const cells = $(tr).children('td');
        const kind = collapse(cells.first().text());
        if (!kind.includes(PAGE_LAYOUT.examRowMarker)) return;

        if (cells.length <= PAGE_LAYOUT.dateCellIndex) {
          throw new ParseError(code, `${code}: exam row "${kind}" has ${cells.length} cells, expected at least ${PAGE_LAYOUT.dateCellIndex + 1}`);
        }

        const dateCell = cells.eq(PAGE_LAYOUT.dateCellIndex);
        const holder = dateCell.children().first();
        const texts = !holder.length
          ? [dateCell.text()]
          : holder.children().length
            ? holder.children().map((_, el) => $(el).text()).get()
            : [holder.text()];

        for (const text of texts) {
          if (!collapse(text)) continue;
          const { date, session } = parseExamDate(text, code);
          const key = `${date.getTime()}|${kind}`;
          if (seen.has(key)) continue;
          seen.add(key);
          entries.push({ code, title, date, session, kind });
        }
      });
  });

  return { title, entries };
}
