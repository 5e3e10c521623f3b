import { lookup } from 'mime-types';

export const GENERIC_BINARY_TYPE = 'application/octet-stream';

export function resolveContentType(remotePath: string, isText: boolean): string {
  const byExtension = lookup(remotePath) || GENERIC_BINARY_TYPE;
  if (isText && byExtension === GENERIC_BINARY_TYPE) {
    return 'text/plain';
  }
  return byExtension;
}
