#!/usr/bin/env node
/**
 * cli.ts
 *
 * reexam-finder -y <START_YEAR> [-c <code|file>...] [-l level] [--json]
 *
 * Prints upcoming re-exam dates for the courses in courses.txt (or the given codes/files).
 * Exits 1 on bad arguments or an unreadable course list, 0 otherwise,
 * even when some courses could not be fetched or parsed.
 */

import dotenv from 'dotenv';
import { parseArgs } from 'node:util';
import { getPaths, loadConfig, parseYear } from './scrape/config';
import { ConfigError, describeError } from './scrape/errors';
import { resolveCourseArgs } from './scrape/io';
import { LOG_LEVELS, isLogLevel, log, setLogLevel } from './scrape/log';
import { formatReport, formatReportJson } from './scrape/report';
import { runScrape, type RunDeps } from './scrape/run';
import type { LogLevel } from './scrape/types';

export const USAGE = `Usage: reexam-finder -y <START_YEAR> [options]

Options:
  -y, --year <year>       academic start year, e.g. 2024 for 2024/2025 (required)
  -c, --course <code|file> course code, or a file with one code per line (repeatable, default: courses.txt)
  -l, --logging <level>   ${LOG_LEVELS.join(' | ')} (default: warning)
      --json              print JSON instead of text
  -h, --help              show this help`;

export type CliIo = {
  out: (text: string) => void;
  err: (text: string) => void;
  cwd: string;
  env: Record<string, string | undefined>;
};

const defaultIo: CliIo = {
  out: (text) => process.stdout.write(text + '\n'),
  err: (text) => process.stderr.write(text + '\n'),
  cwd: process.cwd(),
  env: process.env,
};

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        year: { type: 'string', short: 'y' },
        course: { type: 'string', short: 'c', multiple: true },
        logging: { type: 'string', short: 'l' },
        json: { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (err) {
    throw new ConfigError(describeError(err));
  }
}

export async function main(argv: string[], io: Partial<CliIo> = {}, deps: Partial<RunDeps> = {}): Promise<number> {
  const { out, err, cwd, env } = { ...defaultIo, ...io };

  try {
    const args = readArgs(argv);
    if (args.help) {
      out(USAGE);
      return 0;
    }

    if (args.year === undefined) throw new ConfigError('Missing required option -y/--year');
    const year = parseYear(args.year);

    let logLevel: LogLevel | undefined;
    if (args.logging !== undefined) {
      if (!isLogLevel(args.logging)) {
        throw new ConfigError(`--logging must be one of ${LOG_LEVELS.join(', ')}, got "${args.logging}"`);
      }
      logLevel = args.logging;
    }

    const cfg = loadConfig(logLevel ? { year, logLevel } : { year }, env);
    setLogLevel(cfg.logLevel);
    log.info(`Running with ${JSON.stringify(cfg)}`);

    const courseArgs = args.course?.length ? args.course : [getPaths(cwd).coursesPath];
    const courses = await resolveCourseArgs(courseArgs);
    log.info(`Course codes: (${courses.join(', ')})`);

    const reports = await runScrape(cfg, courses, deps);
    out(args.json ? formatReportJson(reports) : formatReport(reports));
    return 0;
  } catch (e) {
    if (e instanceof ConfigError) {
      err(`error: ${e.message}`);
      err(USAGE);
      return 1;
    }
    err(`unexpected error: ${e instanceof Error && e.stack ? e.stack : describeError(e)}`);
    return 1;
  }
}

if (require.main === module) {
  dotenv.config();
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      console.error(e);
      process.exitCode = 1;
    },
  );
}
