import { describe, expect, it } from 'vitest';

import {
  canonicalEncodingName,
  encodeText,
  encodingProvidersRegistered,
  registerEncodingProviders,
} from '../src/encodings.js';
import { EncodingProvidersNotRegisteredError, ToolInputError } from '../src/errors.js';

describe('encoding registry', () => {
  it('refuses lookups before registration', () => {
    expect(encodingProvidersRegistered()).toBe(false);
    expect(() => canonicalEncodingName('utf-8')).toThrow(EncodingProvidersNotRegisteredError);
  });

  it('registers once and returns the decodable encodings', () => {
    const first = registerEncodingProviders();
    expect(encodingProvidersRegistered()).toBe(true);
    expect(first).toContain('utf-8');
    expect(first).toContain('utf-16le');
    expect(registerEncodingProviders()).toEqual(first);
  });

  it('maps detector labels to WHATWG names', () => {
    registerEncodingProviders();
    expect(canonicalEncodingName('UTF-8')).toBe('utf-8');
    expect(canonicalEncodingName(' ascii ')).toBe('utf-8');
    expect(canonicalEncodingName('ISO-8859-1')).toBe('windows-1252');
    expect(canonicalEncodingName('x-no-such-charset')).toBeUndefined();
  });
});

describe('encodeText', () => {
  it('defaults to UTF-8', () => {
    const { bytes, encodingName } = encodeText('héllo');
    expect(encodingName).toBe('utf-8');
    expect([...bytes]).toEqual([0x68, 0xc3, 0xa9, 0x6c, 0x6c, 0x6f]);
    expect(encodeText('x', '  ').encodingName).toBe('utf-8');
  });

  it('writes Latin-1 and UTF-16LE without a byte-order mark', () => {
    expect([...encodeText('café', 'latin1').bytes]).toEqual([0x63, 0x61, 0x66, 0xe9]);
    expect(encodeText('café', 'Latin1').encodingName).toBe('iso-8859-1');
    expect([...encodeText('hi', 'UTF-16LE').bytes]).toEqual([0x68, 0x00, 0x69, 0x00]);
  });

  it('rejects encodings it cannot write', () => {
    expect(() => encodeText('x', 'ebcdic')).toThrow(ToolInputError);
    expect(() => encodeText('x', 'constructor')).toThrow(ToolInputError);
  });
});
