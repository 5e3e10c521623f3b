import * as jschardet from 'jschardet';

import { canonicalEncodingName, encodingProvidersRegistered } from './encodings.js';
import { EncodingProvidersNotRegisteredError } from './errors.js';
import type { ClassificationResult } from './types.js';

export const TEXT_CONFIDENCE_THRESHOLD = 0.8;
export const BINARY_ENCODING_NAME = 'base64';

// jschardet is pure JS and slows down sharply on large inputs
const DETECTION_SAMPLE_BYTES = 64 * 1024;

const WIDE_BOMS: readonly number[][] = [
  [0xff, 0xfe],
  [0xfe, 0xff],
  [0x00, 0x00, 0xfe, 0xff],
];

export type EncodingGuess = {
  encoding: string | null;
  confidence: number;
};

export type ClassifyOptions = {
  threshold?: number;
};

function startsWith(bytes: Uint8Array, prefix: readonly number[]): boolean {
  return prefix.length <= bytes.length && prefix.every((value, index) => bytes[index] === value);
}

function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

/**
 * Statistical first guess at the buffer's encoding. NUL bytes outside a
 * UTF-16/32 stream are treated as a binary signature and short-circuit with
 * zero confidence.
 */
export function detectEncoding(bytes: Uint8Array): EncodingGuess {
  if (bytes.length === 0) {
    return { encoding: 'utf-8', confidence: 1 };
  }
  if (bytes.includes(0) && !WIDE_BOMS.some((bom) => startsWith(bytes, bom))) {
    return { encoding: null, confidence: 0 };
  }

  const sample = Buffer.from(bytes.buffer, bytes.byteOffset, Math.min(bytes.byteLength, DETECTION_SAMPLE_BYTES));
  const detected = jschardet.detect(sample);
  if (!detected.encoding) {
    return { encoding: null, confidence: 0 };
  }

  const encoding = detected.encoding.toLowerCase() === 'ascii' ? 'utf-8' : detected.encoding;
  return { encoding, confidence: clampConfidence(detected.confidence) };
}

export function acceptsGuess(
  guess: EncodingGuess,
  threshold: number = TEXT_CONFIDENCE_THRESHOLD,
): guess is EncodingGuess & { encoding: string } {
  return guess.encoding !== null && guess.confidence >= threshold;
}

/** Decodes without substitution; any invalid or truncated sequence yields undefined. */
export function decodeStrict(bytes: Uint8Array, encoding: string): string | undefined {
  const canonical = canonicalEncodingName(encoding);
  if (!canonical) {
    return undefined;
  }
  try {
    return new TextDecoder(canonical, { fatal: true }).decode(bytes);
  } catch (error) {
    if (error instanceof TypeError) {
      return undefined;
    }
    throw error;
  }
}

function binaryResult(confidence: number): ClassificationResult {
  return { isText: false, encodingName: BINARY_ENCODING_NAME, confidence };
}

/**
 * Text or binary? A detector guess is trusted only above the confidence
 * threshold and only if the whole buffer decodes under it without a single
 * replacement character.
 */
export function classifyContent(bytes: Uint8Array, options: ClassifyOptions = {}): ClassificationResult {
  if (!(bytes instanceof Uint8Array)) {
    throw new TypeError('classifyContent expects a Uint8Array');
  }
  if (!encodingProvidersRegistered()) {
    throw new EncodingProvidersNotRegisteredError();
  }

  if (bytes.length === 0) {
    return { isText: true, encodingName: 'utf-8', decodedText: '', confidence: 1 };
  }

  const guess = detectEncoding(bytes);
  if (!acceptsGuess(guess, options.threshold)) {
    return binaryResult(guess.confidence);
  }

  const encodingName = canonicalEncodingName(guess.encoding);
  const decodedText = encodingName ? decodeStrict(bytes, encodingName) : undefined;
  if (!encodingName || decodedText === undefined) {
    return binaryResult(guess.confidence);
  }

  return { isText: true, encodingName, decodedText, confidence: guess.confidence };
}
