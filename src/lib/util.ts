/**
 * Shared utility functions.
 */

export { normalizePath, stripLeadingSlash, parentPath, parseDate, defaultDate, sleep };

function normalizePath(path: string): string;
function normalizePath(path: string | undefined): string | undefined;
function normalizePath(path: string | undefined): string | undefined {
  if (path === undefined) return undefined;
  return path.replace(/^\/+/, '').replace(/\/+$/, '');
}

// Only one slash: `//a` stays `/a`.
function stripLeadingSlash(path: string): string {
  return path.startsWith('/') ? path.slice(1) : path;
}

/**
 * Directory part of a repository path. `/README.md` yields `/`, a bare file
 * name yields the empty string (the repository root).
 */
function parentPath(path: string): string {
  let idx = path.lastIndexOf('/');
  if (idx < 0) return '';
  if (idx === 0) return '/';
  return path.slice(0, idx);
}

/**
 * Parse a `YYYY-MM-DD` calendar date as UTC midnight.
 */
function parseDate(value: string): Date {
  let match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) throw Error(`invalid date (expected YYYY-MM-DD): ${value}`);
  let year = Number(match[1]);
  let month = Number(match[2]);
  let day = Number(match[3]);
  let date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    throw Error(`invalid date: ${value}`);
  }
  return date;
}

function defaultDate(): Date {
  return parseDate('1970-01-01');
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function asRecord(obj: unknown): Record<string, unknown> {
  return typeof obj !== 'object' || obj === null ? {} : (obj as Record<string, unknown>);
}
