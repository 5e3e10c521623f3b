import type { TransferProtocol } from './types.js';

/**
 * Canonical form of a user-supplied remote path: forward slashes, rooted.
 * Blank input falls back to `fallbackPath`, then to `/`.
 * `..` segments are passed through untouched.
 */
export function normalizeRemotePath(rawPath: string | undefined, fallbackPath?: string): string {
  let resolved = rawPath !== undefined && rawPath.trim().length > 0 ? rawPath : fallbackPath;
  if (resolved === undefined || resolved.trim().length === 0) {
    resolved = '/';
  }

  resolved = resolved.replace(/\\/g, '/');

  if (!resolved.startsWith('/')) {
    resolved = `/${resolved}`;
  }

  return resolved;
}

export function siblingPath(remotePath: string, newName: string): string {
  const normalized = remotePath.length > 0 ? remotePath : '/';
  const lastSlash = normalized.lastIndexOf('/');
  let directory = lastSlash > 0 ? normalized.slice(0, lastSlash) : '/';
  if (!directory.endsWith('/')) {
    directory += '/';
  }
  return directory + newName;
}

export function buildRemoteUri(protocol: TransferProtocol, host: string, port: number, remotePath: string): string {
  const rooted = normalizeRemotePath(remotePath);
  const escaped = rooted
    .split('/')
    .map((segment) => (segment.length > 0 ? encodeURIComponent(segment) : segment))
    .join('/');
  return `${protocol}://${host}:${port}${escaped}`;
}
