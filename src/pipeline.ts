import { CategoryTagger, classifyCorpus } from './analysis/categoryTagger.js';
import { RelevanceFilter, describeVerdict, type RelevanceVerdict } from './analysis/relevanceFilter.js';
import { aggregate } from './analysis/aggregator.js';
import { renderReport, synthesizeReport, type Report } from './report/synthesizer.js';
import { truncate } from './utils/text.js';
import type { ResearchProfile, StopwordResource } from './config/profile.js';
import type { Logger } from './utils/logger.js';
import type { CorpusStatistics, Post } from './types/index.js';

const LOGGED_TITLE_LENGTH = 60;

export interface CleaningResult {
  kept: Post[];
  verdicts: Array<{ post: Post; verdict: RelevanceVerdict }>;
}

export function cleanCorpus(posts: readonly Post[], filter: RelevanceFilter, logger?: Logger): CleaningResult {
  const kept: Post[] = [];
  const verdicts: CleaningResult['verdicts'] = [];
  for (const post of posts) {
    const verdict = filter.explain(post);
    verdicts.push({ post, verdict });
    const title = truncate(post.title, LOGGED_TITLE_LENGTH);
    if (verdict.relevant) {
      kept.push(post);
      logger?.(`KEEP: "${title}" (${post.score} upvotes)`);
    } else {
      logger?.(`DELETE: "${title}" (${describeVerdict(verdict)})`);
    }
  }
  return { kept, verdicts };
}

/** Highest score first, corpus order among equal scores. */
export function topByScore(posts: readonly Post[], n: number): Post[] {
  return posts
    .map((post, index) => ({ post, index }))
    .sort((a, b) => b.post.score - a.post.score || a.index - b.index)
    .slice(0, n)
    .map((entry) => entry.post);
}

export interface AnalysisOptions {
  stopwords: StopwordResource;
  generatedAt: Date;
  relevantOnly?: boolean;
}

export interface AnalysisRun {
  stats: CorpusStatistics;
  report: Report;
  text: string;
}

/** Classifies, aggregates and synthesizes the report for one corpus. */
export function analyzeCorpus(posts: readonly Post[], profile: ResearchProfile, options: AnalysisOptions): AnalysisRun {
  const filter = new RelevanceFilter(profile.relevance);
  const tagger = new CategoryTagger(profile.problemCategories, profile.solutionCategories);
  const classified = classifyCorpus(posts, filter, tagger);
  const corpus = options.relevantOnly ? classified.filter((entry) => entry.isRelevant) : classified;

  const stats = aggregate(corpus, {
    tagger,
    stopwords: options.stopwords,
    wordFrequency: profile.wordFrequency,
    quotes: profile.quotes,
  });
  const report = synthesizeReport(stats, profile, options.generatedAt);
  return { stats, report, text: renderReport(report) };
}
