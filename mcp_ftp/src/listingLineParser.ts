import { parseDosListingDate, parseUnixListingDate } from './listingDates.js';
import type { DirectoryEntry } from './types.js';

export type ListingParseOptions = {
  /** Anchors year inference for `Mon DD HH:MM` dates. Defaults to now. */
  referenceDate?: Date;
};

/** One listing format. Returns undefined when the line is not in this format. */
export type ListingDialect = (line: string, referenceDate: Date) => DirectoryEntry | undefined;

type TokenSpan = {
  text: string;
  end: number;
};

const PERMISSION_PREFIX = /^[d-][rwxsStTlL-]{9}/;
const ATTRIBUTE_MARKER = /^[+@.]/;
const INTEGER = /^\d+$/;

function tokenize(input: string): TokenSpan[] {
  const spans: TokenSpan[] = [];
  for (const match of input.matchAll(/\S+/g)) {
    const start = match.index ?? 0;
    spans.push({ text: match[0], end: start + match[0].length });
  }
  return spans;
}

// sizes past 2^53 would round silently
function parseSize(token: string): number | undefined {
  const value = Number(token);
  return Number.isSafeInteger(value) ? value : undefined;
}

function buildEntry(
  rawLine: string,
  name: string,
  isDirectory: boolean,
  fields: { size?: number; modifiedAt?: Date; permissions?: string },
): DirectoryEntry {
  const entry: DirectoryEntry = { name, isDirectory, rawLine };
  if (fields.size !== undefined) {
    entry.size = fields.size;
  }
  if (fields.modifiedAt !== undefined) {
    entry.modifiedAt = fields.modifiedAt;
  }
  if (fields.permissions !== undefined) {
    entry.permissions = fields.permissions;
  }
  return entry;
}

/**
 * `drwxr-xr-x  2 owner group  4096 Jan 10 10:00 name`
 *
 * Fields after the permission prefix are walked with a cursor; link count and
 * size are skipped over when they are not integers. The name is everything
 * after the consumed fields, rejoined with single spaces.
 */
export const parseUnixLine: ListingDialect = (line, referenceDate) => {
  if (line.length < 10) {
    return undefined;
  }
  const permissions = PERMISSION_PREFIX.exec(line)?.[0];
  if (!permissions) {
    return undefined;
  }

  let remainder = line.slice(permissions.length);
  if (ATTRIBUTE_MARKER.test(remainder)) {
    remainder = remainder.slice(1);
  }
  const tokens = tokenize(remainder).map((span) => span.text);

  let cursor = 0;
  if (INTEGER.test(tokens[cursor] ?? '')) {
    cursor += 1;
  }
  // owner, group
  cursor = Math.min(cursor + 2, tokens.length);

  let size: number | undefined;
  const sizeToken = tokens[cursor];
  if (sizeToken !== undefined && INTEGER.test(sizeToken)) {
    size = parseSize(sizeToken);
    cursor += 1;
  }

  let modifiedAt: Date | undefined;
  if (cursor + 2 < tokens.length) {
    const [month = '', day = '', timeOrYear = ''] = tokens.slice(cursor, cursor + 3);
    cursor += 3;
    modifiedAt = parseUnixListingDate(month, day, timeOrYear, referenceDate);
  }

  let name = tokens.slice(cursor).join(' ').trim();
  if (name.length === 0) {
    name = tokens[tokens.length - 1] ?? '';
  }
  if (name.length === 0) {
    return undefined;
  }

  return buildEntry(line, name, permissions.startsWith('d'), { size, modifiedAt, permissions });
};

/**
 * `01-10-23  02:14PM       <DIR>          name`
 * `01-10-23  02:14PM                1234 name`
 *
 * The date is what identifies this format, so an unparseable date rejects the
 * line. The name is cut from the original line so whitespace runs inside it
 * survive.
 */
export const parseDosLine: ListingDialect = (line) => {
  const spans = tokenize(line);
  const [date, time, sizeOrDir, firstNameToken] = spans;
  if (!date || !time || !sizeOrDir || !firstNameToken) {
    return undefined;
  }

  const modifiedAt = parseDosListingDate(date.text, time.text);
  if (!modifiedAt) {
    return undefined;
  }

  const name = line.slice(sizeOrDir.end).trim();
  if (name.length === 0) {
    return undefined;
  }

  if (sizeOrDir.text.toUpperCase() === '<DIR>') {
    return buildEntry(line, name, true, { modifiedAt });
  }

  const size = INTEGER.test(sizeOrDir.text) ? parseSize(sizeOrDir.text) : undefined;
  return buildEntry(line, name, false, { size, modifiedAt });
};

export const LISTING_DIALECTS: readonly ListingDialect[] = [parseUnixLine, parseDosLine];

export function fallbackEntry(line: string): DirectoryEntry {
  return { name: line.trim(), isDirectory: false, rawLine: line };
}

export function parseListingLine(line: string, options: ListingParseOptions = {}): DirectoryEntry {
  if (typeof line !== 'string') {
    throw new TypeError('parseListingLine expects a string line');
  }
  const referenceDate = options.referenceDate ?? new Date();
  for (const dialect of LISTING_DIALECTS) {
    const entry = dialect(line, referenceDate);
    if (entry) {
      return entry;
    }
  }
  return fallbackEntry(line);
}
