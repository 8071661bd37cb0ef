import { describeError } from '../errors.js';
import { epochToIso } from '../utils/time.js';
import type { Logger } from '../utils/logger.js';
import type { Post, PostSource, RawPost, SearchTarget } from '../types/index.js';

export interface CollectOptions {
  limit: number;
  signal?: AbortSignal | undefined;
  logger?: Logger;
}

export interface QueryFailure {
  target: SearchTarget;
  reason: string;
}

export interface CollectionResult {
  posts: Post[];
  failures: QueryFailure[];
  interrupted: boolean;
}

export function toPost(raw: RawPost, searchTerm: string): Post {
  return {
    id: raw.id,
    url: `https://reddit.com${raw.permalink}`,
    source: raw.source,
    title: raw.title,
    body: raw.body,
    score: raw.score,
    numComments: raw.numComments,
    createdAt: epochToIso(raw.createdUtc),
    searchTerm,
  };
}

/** Collapses records sharing an id; the first occurrence is kept. */
export function dedupePosts(posts: Iterable<Post>): Post[] {
  const seen = new Map<string, Post>();
  for (const post of posts) {
    if (!seen.has(post.id)) {
      seen.set(post.id, post);
    }
  }
  return [...seen.values()];
}

/**
 * Runs every search target against the source in order. A failing query is
 * logged and skipped; an abort stops before the next query and returns what
 * was gathered so far.
 */
export async function collectCorpus(
  source: PostSource,
  targets: readonly SearchTarget[],
  options: CollectOptions,
): Promise<CollectionResult> {
  const collected: Post[] = [];
  const failures: QueryFailure[] = [];

  for (const [index, target] of targets.entries()) {
    if (options.signal?.aborted) {
      break;
    }

    options.logger?.(`(${index + 1}/${targets.length}) Searching r/${target.scope} for '${target.query}'...`);
    try {
      const raw = await source.search(target.query, target.scope, options.limit);
      collected.push(...raw.map((post) => toPost(post, target.query)));
      options.logger?.(`Collected ${raw.length} posts from r/${target.scope} for '${target.query}'`);
    } catch (error) {
      if (options.signal?.aborted) {
        break;
      }
      const reason = describeError(error);
      failures.push({ target, reason });
      options.logger?.(`Skipping query after error: ${reason}`);
    }
  }

  return {
    posts: dedupePosts(collected),
    failures,
    interrupted: options.signal?.aborted ?? false,
  };
}
