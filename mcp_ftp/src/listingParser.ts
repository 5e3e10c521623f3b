import { parseListingLine, type ListingParseOptions } from './listingLineParser.js';
import type { DirectoryEntry } from './types.js';

export function splitListingLines(rawListing: string): string[] {
  if (rawListing.length === 0) {
    return [];
  }
  const lines = rawListing.split(/\r\n|\n|\r/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Parses a complete LIST response. Yields exactly one entry per line, in
 * order; lines no dialect recognizes come back as fallback entries.
 */
export function parseListing(rawListing: string, options: ListingParseOptions = {}): DirectoryEntry[] {
  if (typeof rawListing !== 'string') {
    throw new TypeError('parseListing expects the listing as a string');
  }
  const referenceDate = options.referenceDate ?? new Date();
  return splitListingLines(rawListing).map((line) => parseListingLine(line, { referenceDate }));
}
