import { EncodingProvidersNotRegisteredError, ToolInputError } from './errors.js';

// Labels the charset detector can report, plus the common Unicode forms.
const KNOWN_LABELS = [
  'utf-8',
  'utf-16le',
  'utf-16be',
  'utf-32le',
  'utf-32be',
  'windows-1250',
  'windows-1251',
  'windows-1252',
  'windows-1253',
  'windows-1255',
  'iso-8859-1',
  'iso-8859-2',
  'iso-8859-5',
  'iso-8859-7',
  'iso-8859-8',
  'koi8-r',
  'ibm855',
  'ibm866',
  'maccyrillic',
  'tis-620',
  'shift_jis',
  'euc-jp',
  'iso-2022-jp',
  'iso-2022-kr',
  'iso-2022-cn',
  'euc-kr',
  'euc-tw',
  'gb2312',
  'gb18030',
  'hz-gb-2312',
  'big5',
];

// ascii is a strict subset of utf-8; TextDecoder would map it to windows-1252.
const ALIASES = new Map<string, string>([
  ['ascii', 'utf-8'],
  ['us-ascii', 'utf-8'],
]);

let registry: Map<string, string | null> | undefined;

function probe(label: string): string | null {
  try {
    return new TextDecoder(label).encoding;
  } catch (error) {
    if (error instanceof RangeError) {
      return null;
    }
    throw error;
  }
}

/**
 * Records which code pages this runtime can decode. Legacy single- and
 * multi-byte encodings are only available on ICU-enabled Node builds, so the
 * set is probed once per process. Safe to call repeatedly.
 *
 * @returns the canonical names of every decodable encoding
 */
export function registerEncodingProviders(): string[] {
  if (!registry) {
    const probed = new Map<string, string | null>();
    for (const label of KNOWN_LABELS) {
      probed.set(label, probe(label));
    }
    registry = probed;
  }
  return supportedEncodings(registry);
}

function supportedEncodings(entries: Map<string, string | null>): string[] {
  const names = new Set<string>();
  for (const canonical of entries.values()) {
    if (canonical) {
      names.add(canonical);
    }
  }
  return [...names].sort();
}

export function encodingProvidersRegistered(): boolean {
  return registry !== undefined;
}

function requireRegistry(): Map<string, string | null> {
  if (!registry) {
    throw new EncodingProvidersNotRegisteredError();
  }
  return registry;
}

/** WHATWG name for a detector or user label, undefined when the runtime cannot decode it. */
export function canonicalEncodingName(label: string): string | undefined {
  const entries = requireRegistry();
  const key = label.trim().toLowerCase();
  const aliased = ALIASES.get(key) ?? key;

  let canonical = entries.get(aliased);
  if (canonical === undefined) {
    canonical = probe(aliased);
    entries.set(aliased, canonical);
  }
  return canonical ?? undefined;
}

type WriteEncoding = {
  buffer: BufferEncoding;
  name: string;
};

const WRITE_ENCODINGS = new Map<string, WriteEncoding>([
  ['utf-8', { buffer: 'utf8', name: 'utf-8' }],
  ['utf8', { buffer: 'utf8', name: 'utf-8' }],
  ['utf-16le', { buffer: 'utf16le', name: 'utf-16le' }],
  ['utf16le', { buffer: 'utf16le', name: 'utf-16le' }],
  ['ucs-2', { buffer: 'utf16le', name: 'utf-16le' }],
  ['latin1', { buffer: 'latin1', name: 'iso-8859-1' }],
  ['iso-8859-1', { buffer: 'latin1', name: 'iso-8859-1' }],
  ['ascii', { buffer: 'ascii', name: 'us-ascii' }],
  ['us-ascii', { buffer: 'ascii', name: 'us-ascii' }],
]);

/** Encodes text for upload. No byte-order mark is written. */
export function encodeText(content: string, encoding?: string): { bytes: Buffer; encodingName: string } {
  const key = encoding?.trim().toLowerCase() || 'utf-8';
  const target = WRITE_ENCODINGS.get(key);
  if (!target) {
    throw new ToolInputError(
      `Unsupported encoding '${encoding ?? ''}'. Use one of: ${[...WRITE_ENCODINGS.keys()].join(', ')}`,
    );
  }
  return { bytes: Buffer.from(content, target.buffer), encodingName: target.name };
}
