import { describe, expect, it } from 'vitest';

import { parseDosLine, parseListingLine, parseUnixLine } from '../src/listingLineParser.js';

const referenceDate = new Date(Date.UTC(2026, 5, 15, 12, 0, 0));
const parse = (line: string) => parseListingLine(line, { referenceDate });

describe('parseListingLine – Unix dialect', () => {
  it('parses a directory with a clock time', () => {
    const line = 'drwxr-xr-x 2 u g 4096 Jan 10 10:00 folder';
    expect(parse(line)).toEqual({
      name: 'folder',
      isDirectory: true,
      size: 4096,
      modifiedAt: new Date(Date.UTC(2026, 0, 10, 10, 0, 0)),
      permissions: 'drwxr-xr-x',
      rawLine: line,
    });
  });

  it('keeps spaces inside file names', () => {
    const entry = parse('-rw-r--r-- 1 u g 1234 Jan 20 2023 my file.txt');
    expect(entry.name).toBe('my file.txt');
    expect(entry.isDirectory).toBe(false);
    expect(entry.size).toBe(1234);
    expect(entry.modifiedAt).toEqual(new Date(Date.UTC(2023, 0, 20)));
    expect(entry.permissions).toBe('-rw-r--r--');
  });

  it('collapses whitespace runs inside names to single spaces', () => {
    expect(parse('-rw-r--r--  1 u  g   10 Feb  3  2024 two   spaces').name).toBe('two spaces');
  });

  it('places a future month in the previous year', () => {
    const entry = parse('-rw-r--r-- 1 u g 10 Dec 24 18:30 notes.txt');
    expect(entry.modifiedAt).toEqual(new Date(Date.UTC(2025, 11, 24, 18, 30, 0)));
  });

  it('tolerates a missing link count', () => {
    const entry = parse('-rw-r--r-- owner group 512 Mar 03 2024 data.csv');
    expect(entry.name).toBe('data.csv');
    expect(entry.size).toBe(512);
    expect(entry.modifiedAt).toEqual(new Date(Date.UTC(2024, 2, 3)));
  });

  it('drops an unreadable date but keeps the rest of the entry', () => {
    const entry = parse('-rw-r--r-- 1 u g 99 Foo 99 99:99 weird.bin');
    expect(entry.name).toBe('weird.bin');
    expect(entry.size).toBe(99);
    expect(entry.modifiedAt).toBeUndefined();
    expect(entry.permissions).toBe('-rw-r--r--');
  });

  it('leaves size absent when the size field is not a number', () => {
    const entry = parse('-rw-r--r-- 1 u g Jan 20 2023 x');
    expect(entry.size).toBeUndefined();
    expect(entry.modifiedAt).toEqual(new Date(Date.UTC(2023, 0, 20)));
    expect(entry.name).toBe('x');
  });

  it('leaves size absent when it exceeds the safe integer range', () => {
    const entry = parse('-rw-r--r-- 1 u g 99999999999999999999 Jan 20 2023 huge.img');
    expect(entry.size).toBeUndefined();
    expect(entry.modifiedAt).toEqual(new Date(Date.UTC(2023, 0, 20)));
    expect(entry.name).toBe('huge.img');
  });

  it('skips an ACL marker after the permission bits', () => {
    const entry = parse('drwxr-xr-x+ 3 u g 4096 Feb 01 09:15 shared');
    expect(entry.name).toBe('shared');
    expect(entry.permissions).toBe('drwxr-xr-x');
    expect(entry.isDirectory).toBe(true);
  });

  it('rejects a permission prefix without a name', () => {
    expect(parseUnixLine('drwxr-xr-x', referenceDate)).toBeUndefined();
    expect(parse('drwxr-xr-x')).toEqual({ name: 'drwxr-xr-x', isDirectory: false, rawLine: 'drwxr-xr-x' });
  });

  it('leaves symbolic links to the fallback', () => {
    const line = 'lrwxrwxrwx 1 u g 7 Jan 10 10:00 current -> v2';
    expect(parse(line)).toEqual({ name: line, isDirectory: false, rawLine: line });
  });

  it('gives the same entry when its raw line is parsed again', () => {
    const lines = [
      'drwxr-xr-x 2 u g 4096 Jan 10 10:00 folder',
      '-rw-r--r-- 1 u g 1234 Jan 20 2023 my file.txt',
      '-rw-r--r-- owner group 512 Mar 03 2024 data.csv',
    ];
    for (const line of lines) {
      const first = parse(line);
      expect(parse(first.rawLine)).toEqual(first);
    }
  });
});

describe('parseListingLine – DOS dialect', () => {
  it('parses a directory', () => {
    const line = '01-10-23  02:14PM  <DIR>  archive';
    expect(parse(line)).toEqual({
      name: 'archive',
      isDirectory: true,
      modifiedAt: new Date(Date.UTC(2023, 0, 10, 14, 14, 0)),
      rawLine: line,
    });
  });

  it('parses a file and keeps whitespace runs in its name', () => {
    const entry = parse('01-10-23  02:14PM       1234 my   report.txt');
    expect(entry.name).toBe('my   report.txt');
    expect(entry.size).toBe(1234);
    expect(entry.isDirectory).toBe(false);
    expect(entry.permissions).toBeUndefined();
  });

  it('reads 12AM as midnight and a lowercase directory marker', () => {
    expect(parse('01-01-24  12:05AM  77 midnight.log').modifiedAt).toEqual(new Date(Date.UTC(2024, 0, 1, 0, 5, 0)));
    expect(parse('01-01-24  09:00AM  <dir>  lower').isDirectory).toBe(true);
  });

  it('leaves size absent when the third field is neither a size nor a directory marker', () => {
    const entry = parse('01-10-23  02:14PM  <JUNCTION>  link');
    expect(entry.name).toBe('link');
    expect(entry.isDirectory).toBe(false);
    expect(entry.size).toBeUndefined();
    expect(entry.modifiedAt).toEqual(new Date(Date.UTC(2023, 0, 10, 14, 14, 0)));
    expect(parse('01-10-23  02:14PM  12345678901234567890 big.iso').size).toBeUndefined();
  });

  it('accepts ISO dates with a 24-hour clock', () => {
    const entry = parse('2024-02-29 23:59 <DIR> leap');
    expect(entry.modifiedAt).toEqual(new Date(Date.UTC(2024, 1, 29, 23, 59, 0)));
    expect(entry.name).toBe('leap');
  });

  it('rejects lines whose date does not parse', () => {
    expect(parseDosLine('13-45-23  02:14PM  <DIR>  x', referenceDate)).toBeUndefined();
    expect(parse('13-45-23  02:14PM  <DIR>  x').name).toBe('13-45-23  02:14PM  <DIR>  x');
  });
});

describe('parseListingLine – fallback', () => {
  it('keeps an unrecognized line as the name', () => {
    expect(parse('not a listing line at all')).toEqual({
      name: 'not a listing line at all',
      isDirectory: false,
      rawLine: 'not a listing line at all',
    });
  });

  it('trims only the ends of the raw line', () => {
    const entry = parse('  total   12  ');
    expect(entry.name).toBe('total   12');
    expect(entry.rawLine).toBe('  total   12  ');
  });
});
