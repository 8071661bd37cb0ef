import { createHash } from 'node:crypto';

export function requestChecksum(method: string, url: string): string {
  return createHash('sha256').update(`${method.toUpperCase()} ${url}`).digest('hex');
}
