/**
 * errors.ts
 *
 * Centralizes error types and detection
 * - ConfigError: bad arguments or course list, fatal
 * - FetchError / ParseError: per-course, caught by the runner
 * - deciding which HTTP responses are worth retrying
 */

export class ReexamError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigError extends ReexamError {}

export class FetchError extends ReexamError {
  readonly code: string;
  readonly url: string;
  readonly status: number | null;

  constructor(code: string, url: string, message: string, status: number | null = null) {
    super(message);
    this.code = code;
    this.url = url;
    this.status = status;
  }
}

export class ParseError extends ReexamError {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.code = code;
  }
}

// 5xx and 429 are transient on the syllabus site, other statuses will not change on retry
export function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status <= 599);
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
