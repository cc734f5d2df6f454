import { test, expect } from '@playwright/test';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { main, USAGE, type CliIo } from '../src/cli';
import { createHttpClient } from '../src/scrape/api';
import type { RunDeps } from '../src/scrape/run';
import { fixture, html, startSyllabusServer, status, type SyllabusServer } from './support/server';

let server: SyllabusServer;
let dir: string;

test.beforeAll(async () => {
  server = await startSyllabusServer({
    TDA357: html(fixture('tda357.html')),
    GONE: status(404),
  });
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'reexam-cli-'));
});

test.afterAll(async () => {
  await server.close();
  await fs.rm(dir, { recursive: true, force: true });
});

function capture(overrides: Partial<CliIo> = {}) {
  const out: string[] = [];
  const err: string[] = [];
  const io: Partial<CliIo> = {
    out: (text) => out.push(text),
    err: (text) => err.push(text),
    cwd: dir,
    env: { REEXAM_URL_PATTERN: server.urlPattern, REEXAM_RETRIES: '0' },
    ...overrides,
  };
  return { io, out, err };
}

// fails the test if the run ever reaches the network
const offline: Partial<RunDeps> = {
  createClient: async () => {
    throw new Error('network access attempted');
  },
};

const fixedClock: Partial<RunDeps> = { now: () => new Date(2025, 3, 1) };

test('a non-integer year exits 1 before any network access', async () => {
  const { io, out, err } = capture();
  expect(await main(['-y', '20x4', '-c', 'TDA357'], io, offline)).toBe(1);
  expect(out).toEqual([]);
  expect(err[0]).toBe('error: Start year must be a four-digit integer, got "20x4"');
});

test('the year is required', async () => {
  const { io, err } = capture();
  expect(await main(['-c', 'TDA357'], io, offline)).toBe(1);
  expect(err[0]).toBe('error: Missing required option -y/--year');
});

test('an unknown option exits 1 with usage', async () => {
  const { io, err } = capture();
  expect(await main(['-y', '2024', '--bogus'], io, offline)).toBe(1);
  expect(err[1]).toBe(USAGE);
});

test('an unknown log level exits 1', async () => {
  const { io, err } = capture();
  expect(await main(['-y', '2024', '-l', 'loud'], io, offline)).toBe(1);
  expect(err[0]).toBe('error: --logging must be one of debug, info, warning, error, got "loud"');
});

test('a missing courses.txt exits 1', async () => {
  const { io, err } = capture();
  expect(await main(['-y', '2024'], io, offline)).toBe(1);
  expect(err[0].startsWith(`error: Cannot read course list ${path.join(dir, 'courses.txt')}:`)).toBe(true);
});

test('--help prints usage', async () => {
  const { io, out } = capture();
  expect(await main(['--help'], io, offline)).toBe(0);
  expect(out).toEqual([USAGE]);
});

test('an empty course list exits 0 without fetching', async () => {
  const file = path.join(dir, 'empty.txt');
  await fs.writeFile(file, '# nothing\n', 'utf8');
  const { io, out } = capture();
  expect(await main(['-y', '2024', '-c', file], io, offline)).toBe(0);
  expect(out).toEqual(['No courses provided']);
});

test('reads courses.txt from the working directory and reports per course', async () => {
  const cwd = await fs.mkdtemp(path.join(dir, 'run-'));
  await fs.writeFile(path.join(cwd, 'courses.txt'), 'tda357\nGONE\nTDA357\n', 'utf8');
  const { io, out } = capture({ cwd });

  expect(await main(['-y', '2024'], io, fixedClock)).toBe(0);
  expect(out).toEqual([
    [
      'TDA357 - Databases',
      '\t2025-04-08 14:00 - 0107 Examination 7.5 c',
      '\t2025-08-19 08:30 - 0107 Examination 7.5 c',
      '',
      'GONE',
      `\tUnavailable: GONE: HTTP 404 (${server.origin}/GONE/?acYear=2024%2F2025)`,
    ].join('\n'),
  ]);
});

test('--json prints one object per course', async () => {
  const { io, out } = capture();
  const deps: Partial<RunDeps> = { ...fixedClock, createClient: createHttpClient };

  expect(await main(['-y', '2024', '-c', 'TDA357', '-c', 'GONE', '--json'], io, deps)).toBe(0);
  const parsed: unknown = JSON.parse(out[0]);
  expect(parsed).toEqual([
    {
      code: 'TDA357',
      status: 'ok',
      title: 'Databases',
      exams: [
        { date: new Date(2025, 3, 8, 14, 0).toISOString(), session: 'pm', kind: '0107 Examination 7.5 c' },
        { date: new Date(2025, 7, 19, 8, 30).toISOString(), session: 'am', kind: '0107 Examination 7.5 c' },
      ],
    },
    {
      code: 'GONE',
      status: 'fetch-error',
      url: `${server.origin}/GONE/?acYear=2024%2F2025`,
      error: `GONE: HTTP 404 (${server.origin}/GONE/?acYear=2024%2F2025)`,
    },
  ]);
});
