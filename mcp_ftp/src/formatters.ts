import { BINARY_ENCODING_NAME } from './contentClassifier.js';
import type { ClassificationResult, DirectoryEntry } from './types.js';

export type ListedItem = {
  name: string;
  isDirectory: boolean;
  size: number | null;
  modified: string | null;
  permissions: string | null;
  raw: string;
};

export type DownloadedFile = {
  path: string;
  size: number;
  contentType: string;
  encoding: string;
  content: string;
};

export function formatListing(entries: readonly DirectoryEntry[]): ListedItem[] {
  return entries.map((entry) => ({
    name: entry.name,
    isDirectory: entry.isDirectory,
    size: entry.size ?? null,
    modified: entry.modifiedAt ? entry.modifiedAt.toISOString() : null,
    permissions: entry.permissions ?? null,
    raw: entry.rawLine,
  }));
}

export function formatDownload(
  remotePath: string,
  bytes: Buffer,
  classification: ClassificationResult,
  contentType: string,
): DownloadedFile {
  const text = classification.isText ? classification.decodedText : undefined;
  return {
    path: remotePath,
    size: bytes.length,
    contentType,
    encoding: text !== undefined ? classification.encodingName : BINARY_ENCODING_NAME,
    content: text ?? bytes.toString('base64'),
  };
}
