import { containsAny } from '../utils/text.js';
import { monthKey } from '../utils/time.js';
import type { ResearchProfile, StopwordResource } from '../config/profile.js';
import type {
  CategoryStat,
  ClassifiedPost,
  CorpusStatistics,
  CountBucket,
  DatasetOverview,
  Post,
  SolutionMention,
} from '../types/index.js';
import type { CategoryTagger } from './categoryTagger.js';
import { wordFrequency } from './wordFrequency.js';

export interface AggregateOptions {
  tagger: CategoryTagger;
  stopwords: StopwordResource;
  wordFrequency: ResearchProfile['wordFrequency'];
  quotes: Pick<ResearchProfile['quotes'], 'keywords' | 'limit'>;
}

export function aggregate(corpus: readonly ClassifiedPost[], options: AggregateOptions): CorpusStatistics {
  const posts = corpus.map((entry) => entry.post);
  const quoteCandidates =
    options.quotes.keywords.length === 0
      ? posts
      : corpus.filter((entry) => containsAny(entry.combinedText, options.quotes.keywords).length > 0).map((entry) => entry.post);

  return {
    totalPosts: corpus.length,
    overview: describeDataset(posts),
    categories: categoryStats(corpus, options.tagger),
    solutions: solutionMentions(corpus, options.tagger),
    topEngagement: topByEngagement(quoteCandidates, options.quotes.limit),
    wordFrequency: wordFrequency(
      corpus.map((entry) => entry.combinedText),
      options.stopwords,
      options.wordFrequency,
    ),
    sourceCounts: sortByCountDescending(countBy(posts.map((post) => post.source))),
    monthlyCounts: countBy(posts.map((post) => monthKey(post.createdAt))).sort((a, b) => a.key.localeCompare(b.key)),
    scores: posts.map((post) => post.score),
  };
}

export function categoryStats(corpus: readonly ClassifiedPost[], tagger: CategoryTagger): CategoryStat[] {
  const total = corpus.length;
  return tagger.problemCategories.map((category) => {
    const affected = corpus.filter((entry) => entry.categories.has(category.slug));
    const totalMentions = corpus.reduce((sum, entry) => sum + tagger.countMentions(category.slug, entry.combinedText), 0);
    return {
      slug: category.slug,
      label: category.label,
      postsAffected: affected.length,
      percentage: total === 0 ? undefined : (100 * affected.length) / total,
      totalMentions,
      avgScore: mean(affected.map((entry) => entry.post.score)),
    };
  });
}

export function solutionMentions(corpus: readonly ClassifiedPost[], tagger: CategoryTagger): SolutionMention[] {
  return tagger.solutionCategories.map((category) => ({
    slug: category.slug,
    label: category.label,
    mentions: corpus.reduce((sum, entry) => sum + tagger.solutionKeywordHits(category.slug, entry.combinedText), 0),
  }));
}

export function describeDataset(posts: readonly Post[]): DatasetOverview | undefined {
  const [first] = posts;
  if (!first) {
    return undefined;
  }

  let earliest = first;
  let latest = first;
  let highest = first;
  for (const post of posts) {
    const created = Date.parse(post.createdAt);
    if (created < Date.parse(earliest.createdAt)) {
      earliest = post;
    }
    if (created > Date.parse(latest.createdAt)) {
      latest = post;
    }
    if (post.score > highest.score) {
      highest = post;
    }
  }

  const sources = sortByCountDescending(countBy(posts.map((post) => post.source)));
  return {
    earliest: earliest.createdAt,
    latest: latest.createdAt,
    sourceCount: sources.length,
    avgScore: mean(posts.map((post) => post.score)) ?? 0,
    avgComments: mean(posts.map((post) => post.numComments)) ?? 0,
    mostActiveSource: sources[0]?.key ?? first.source,
    highestScoredTitle: highest.title,
  };
}

/**
 * Highest `score + numComments` first. Equal engagement keeps corpus order;
 * the input array is not reordered.
 */
export function topByEngagement<T extends Pick<Post, 'score' | 'numComments'>>(posts: readonly T[], n: number): T[] {
  return posts
    .map((post, index) => ({ post, index, engagement: post.score + post.numComments }))
    .sort((a, b) => b.engagement - a.engagement || a.index - b.index)
    .slice(0, Math.max(0, n))
    .map((entry) => entry.post);
}

function countBy(values: readonly string[]): CountBucket[] {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return [...counts.entries()].map(([key, count]) => ({ key, count }));
}

function sortByCountDescending(buckets: CountBucket[]): CountBucket[] {
  return buckets.sort((a, b) => b.count - a.count);
}

function mean(values: readonly number[]): number | undefined {
  if (values.length === 0) {
    return undefined;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}
