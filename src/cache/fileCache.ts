import { promises as fs } from 'node:fs';
import path from 'node:path';
import { isErrnoException } from '../errors.js';
import type { CacheClient, CacheEntry, CacheWriteInput } from './cache.js';

export interface FileCacheOptions {
  baseDir?: string;
}

/** One JSON document per entry at `<baseDir>/<namespace>/<checksum>.json`. */
export class FileCache implements CacheClient {
  private readonly baseDir: string;

  constructor(options: FileCacheOptions = {}) {
    this.baseDir = options.baseDir ?? '.cache';
  }

  async read(namespace: string, checksum: string): Promise<CacheEntry | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.entryPath(namespace, checksum), 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      // Truncated or corrupt entries count as misses.
      if (error instanceof SyntaxError) {
        return null;
      }
      throw error;
    }
    if (!isCacheEntry(parsed)) {
      return null;
    }
    return parsed;
  }

  async write(namespace: string, entry: CacheWriteInput): Promise<void> {
    const target = this.entryPath(namespace, entry.checksum);
    await fs.mkdir(path.dirname(target), { recursive: true });
    const stored: CacheEntry = { ...entry, storedAt: new Date().toISOString() };
    await fs.writeFile(target, JSON.stringify(stored, null, 2), 'utf8');
  }

  private entryPath(namespace: string, checksum: string): string {
    return path.join(this.baseDir, namespace, `${checksum}.json`);
  }
}

function isCacheEntry(value: unknown): value is CacheEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'checksum' in value &&
    typeof value.checksum === 'string' &&
    'url' in value &&
    typeof value.url === 'string' &&
    'status' in value &&
    typeof value.status === 'number' &&
    'storedAt' in value &&
    typeof value.storedAt === 'string' &&
    'body' in value &&
    typeof value.body === 'string'
  );
}
