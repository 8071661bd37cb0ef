/** A raw source response as it came off the wire. */
export interface CacheEntry {
  checksum: string;
  url: string;
  status: number;
  body: string;
  storedAt: string;
}

export type CacheWriteInput = Omit<CacheEntry, 'storedAt'>;

/** Checksum-addressed store for raw source responses, grouped by namespace. */
export interface CacheClient {
  read(namespace: string, checksum: string): Promise<CacheEntry | null>;
  write(namespace: string, entry: CacheWriteInput): Promise<void>;
}
