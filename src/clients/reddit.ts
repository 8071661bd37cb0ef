import { requestChecksum } from '../utils/hash.js';
import { sleep } from '../utils/sleep.js';
import { jot, type InferJot } from '../jot.js';
import { SourceUnavailableError, describeError } from '../errors.js';
import type { CacheClient } from '../cache/cache.js';
import type { Logger } from '../utils/logger.js';
import type { PostSource, RawPost } from '../types/index.js';

const listingNode = jot.object({
  data: jot.object({
    after: jot.withDefault(jot.nullable(jot.string()), null),
    children: jot.array(
      jot.object({
        data: jot.object({
          id: jot.string({ nonEmpty: true }),
          subreddit: jot.string(),
          title: jot.withDefault(jot.string(), ''),
          selftext: jot.withDefault(jot.string(), ''),
          score: jot.withDefault(jot.number(), 0),
          num_comments: jot.withDefault(jot.number(), 0),
          created_utc: jot.number(),
          permalink: jot.string(),
        }),
      }),
    ),
  }),
});

type RedditListing = InferJot<typeof listingNode>;

export interface RedditSearchClientOptions {
  userAgent: string;
  requestSpacingMs: number;
  cache?: CacheClient | undefined;
  namespace?: string;
  pageSize?: number;
  baseUrl?: string;
  signal?: AbortSignal | undefined;
  logger?: Logger;
}

const DEFAULT_BASE_URL = 'https://www.reddit.com';
const MAX_PAGE_SIZE = 100;

/**
 * Post source backed by Reddit's public subreddit search. Every live request
 * waits until `requestSpacingMs` has passed since the previous one; cached
 * pages are served without waiting.
 */
export class RedditSearchClient implements PostSource {
  private readonly cache: CacheClient | undefined;
  private readonly namespace: string;
  private readonly pageSize: number;
  private readonly baseUrl: string;
  private readonly logger: Logger | undefined;
  private lastRequestTime = 0;

  constructor(private readonly options: RedditSearchClientOptions) {
    this.cache = options.cache;
    this.namespace = options.namespace ?? 'reddit-search';
    this.pageSize = Math.min(options.pageSize ?? MAX_PAGE_SIZE, MAX_PAGE_SIZE);
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.logger = options.logger;
  }

  async search(query: string, scope: string, limit: number): Promise<RawPost[]> {
    const results: RawPost[] = [];
    let after: string | null = null;

    while (results.length < limit) {
      const url = this.buildUrl(query, scope, Math.min(this.pageSize, limit - results.length), after);
      const listing = await this.fetchListing(url, query, scope);
      const page = listing.data.children.map(({ data }) => ({
        id: data.id,
        source: `r/${data.subreddit || scope}`,
        title: data.title,
        body: data.selftext.length > 0 ? data.selftext : null,
        score: Math.max(0, Math.floor(data.score)),
        numComments: Math.max(0, Math.floor(data.num_comments)),
        createdUtc: Math.floor(data.created_utc),
        permalink: data.permalink,
      } satisfies RawPost));

      results.push(...page);
      after = listing.data.after;
      if (page.length === 0 || !after || this.options.signal?.aborted) {
        break;
      }
    }

    return results.slice(0, limit);
  }

  private buildUrl(query: string, scope: string, limit: number, after: string | null): string {
    const params = new URLSearchParams({
      q: query,
      sort: 'relevance',
      limit: String(limit),
      restrict_sr: 'on',
    });
    if (after) {
      params.set('after', after);
    }
    return `${this.baseUrl}/r/${encodeURIComponent(scope)}/search.json?${params.toString()}`;
  }

  private async fetchListing(url: string, query: string, scope: string): Promise<RedditListing> {
    const checksum = requestChecksum('GET', url);
    const cached = await this.cache?.read(this.namespace, checksum);
    if (cached) {
      return this.parseListing(cached.body, query, scope);
    }

    const elapsed = Date.now() - this.lastRequestTime;
    if (this.lastRequestTime > 0 && elapsed < this.options.requestSpacingMs) {
      await sleep(this.options.requestSpacingMs - elapsed, this.options.signal);
    }

    let response: Response;
    try {
      this.logger?.(`GET ${url}`);
      response = await fetch(url, {
        headers: { 'User-Agent': this.options.userAgent },
        ...(this.options.signal ? { signal: this.options.signal } : {}),
      });
    } catch (error) {
      throw new SourceUnavailableError(query, scope, `request failed (${describeError(error)})`, { cause: error });
    } finally {
      this.lastRequestTime = Date.now();
    }

    if (response.status !== 200) {
      throw new SourceUnavailableError(query, scope, `unexpected HTTP status ${response.status}`);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new SourceUnavailableError(query, scope, `response body unreadable (${describeError(error)})`, { cause: error });
    }
    const listing = this.parseListing(text, query, scope);
    await this.cache?.write(this.namespace, { checksum, url, status: response.status, body: text });
    return listing;
  }

  private parseListing(body: string, query: string, scope: string): RedditListing {
    try {
      return listingNode.parse(JSON.parse(body), 'listing');
    } catch (error) {
      throw new SourceUnavailableError(query, scope, `malformed payload (${describeError(error)})`, { cause: error });
    }
  }
}
