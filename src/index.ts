#!/usr/bin/env node
import path from 'node:path';
import { Command } from 'commander';
import dotenv from 'dotenv';
import { FileCache } from './cache/fileCache.js';
import { RedditSearchClient } from './clients/reddit.js';
import { collectCorpus } from './collection/collector.js';
import { readCorpus, writeCorpus } from './csv/corpus.js';
import { RelevanceFilter } from './analysis/relevanceFilter.js';
import { analyzeCorpus, cleanCorpus, topByScore } from './pipeline.js';
import { writeDashboard } from './report/charts.js';
import { writeTimestampedFile } from './report/sink.js';
import { loadProfile, loadStopwords, type ResearchProfile } from './config/profile.js';
import { CorpusMissingError, CorpusUnreadableError, describeError } from './errors.js';
import { createLogger } from './utils/logger.js';
import { fileStamp } from './utils/time.js';
import { containsAny, truncate } from './utils/text.js';
import type { Post } from './types/index.js';

dotenv.config();

const DEFAULT_USER_AGENT = 'problem-radar/0.1.0';

const program = new Command();
program
  .name('problem-radar')
  .description('Collect Reddit posts about a problem space, filter the genuine ones, and write a keyword-frequency research report.');

configureCollectOptions(
  configureCommonOptions(program.command('collect').description('Search Reddit with the profile queries and save the raw corpus as CSV.')),
).action(async (rawOptions: RawCollectOptions) => {
  await handleCollect(rawOptions);
});

configureCommonOptions(
  program.command('clean').description('Keep only posts that pass the relevance filter.').argument('<input>', 'Raw corpus CSV.'),
)
  .option('-o, --output <path>', 'Path of the cleaned CSV (default <output-dir>/clean_posts_<stamp>.csv).')
  .action(async (input: string, rawOptions: RawCleanOptions) => {
    await handleClean(input, rawOptions);
  });

configureAnalyzeOptions(
  configureCommonOptions(
    program.command('analyze').description('Aggregate a corpus and write the text report and dashboard.').argument('<input>', 'Corpus CSV.'),
  ),
).action(async (input: string, rawOptions: RawAnalyzeOptions) => {
  await handleAnalyze(input, rawOptions);
});

configureAnalyzeOptions(
  configureCollectOptions(configureCommonOptions(program.command('run').description('Collect, clean and analyze in one pass.'))),
).action(async (rawOptions: RawCollectOptions & RawAnalyzeOptions) => {
  await handleRun(rawOptions);
});

program.parseAsync().catch((error: unknown) => {
  console.error(describeError(error));
  process.exitCode = 1;
});

interface RawCommonOptions {
  profile?: string;
  outputDir: string;
}

interface RawCollectOptions extends RawCommonOptions {
  limit?: string;
  requestSpacing?: string;
  cacheDir: string;
  cache: boolean;
  userAgent?: string;
}

interface RawCleanOptions extends RawCommonOptions {
  output?: string;
}

interface RawAnalyzeOptions extends RawCommonOptions {
  stopwords?: string;
  charts: boolean;
  relevantOnly?: boolean;
}

function configureCommonOptions(command: Command): Command {
  return command
    .option('--profile <path>', 'Research profile JSON (default: bundled email-organization profile).')
    .option('--output-dir <dir>', 'Directory for corpora, reports and charts.', 'output');
}

function configureCollectOptions(command: Command): Command {
  return command
    .option('--limit <number>', 'Maximum posts per search query (default 25).')
    .option('--request-spacing <ms>', 'Minimum delay between Reddit requests in ms (default 3000).')
    .option('--cache-dir <dir>', 'Directory for cached Reddit responses.', '.cache')
    .option('--no-cache', 'Always fetch live responses.')
    .option('--user-agent <value>', 'User-Agent header for Reddit (default $REDDIT_USER_AGENT).');
}

function configureAnalyzeOptions(command: Command): Command {
  return command
    .option('--stopwords <path>', 'Stopword list JSON (default: bundled English list).')
    .option('--no-charts', 'Skip the SVG dashboard.')
    .option('--relevant-only', 'Aggregate only posts that pass the relevance filter.');
}

async function handleCollect(rawOptions: RawCollectOptions) {
  const profile = await loadProfile(rawOptions.profile);
  await collectToFile(profile, rawOptions);
}

async function handleClean(input: string, rawOptions: RawCleanOptions) {
  const profile = await loadProfile(rawOptions.profile);
  const posts = await readCorpusOrReport(path.resolve(input));
  if (!posts) {
    return;
  }
  const outputPath = rawOptions.output
    ? path.resolve(rawOptions.output)
    : path.join(rawOptions.outputDir, `clean_posts_${fileStamp(new Date())}.csv`);
  await cleanToFile(profile, posts, outputPath);
}

async function handleAnalyze(input: string, rawOptions: RawAnalyzeOptions) {
  const profile = await loadProfile(rawOptions.profile);
  const posts = await readCorpusOrReport(path.resolve(input));
  if (!posts) {
    return;
  }
  await analyzeToFiles(profile, posts, rawOptions);
}

async function handleRun(rawOptions: RawCollectOptions & RawAnalyzeOptions) {
  const profile = await loadProfile(rawOptions.profile);
  const collected = await collectToFile(profile, rawOptions);
  if (!collected || collected.interrupted) {
    return;
  }
  const posts = await readCorpusOrReport(collected.outputPath);
  if (!posts) {
    return;
  }
  const cleanPath = path.join(rawOptions.outputDir, `clean_posts_${fileStamp(new Date())}.csv`);
  const kept = await cleanToFile(profile, posts, cleanPath);
  await analyzeToFiles(profile, kept, rawOptions);
}

interface CollectedFile {
  outputPath: string;
  interrupted: boolean;
}

async function collectToFile(profile: ResearchProfile, rawOptions: RawCollectOptions): Promise<CollectedFile | undefined> {
  const limit = parsePositiveInteger(rawOptions.limit, 25, 'limit');
  const requestSpacingMs = parsePositiveInteger(rawOptions.requestSpacing, 3000, 'request-spacing');
  const userAgent = rawOptions.userAgent?.trim() || process.env.REDDIT_USER_AGENT?.trim() || DEFAULT_USER_AGENT;
  const logger = createLogger('collect');

  const controller = new AbortController();
  const onInterrupt = () => {
    logger('Interrupted; saving what has been collected so far.');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  console.log(`Searching Reddit for ${profile.name.toLowerCase()} posts (${profile.searches.length} queries)...`);
  const client = new RedditSearchClient({
    userAgent,
    requestSpacingMs,
    cache: rawOptions.cache ? new FileCache({ baseDir: rawOptions.cacheDir }) : undefined,
    signal: controller.signal,
    logger: createLogger('reddit'),
  });
  const result = await collectCorpus(client, profile.searches, { limit, signal: controller.signal, logger }).finally(() => {
    process.removeListener('SIGINT', onInterrupt);
  });

  if (result.failures.length > 0) {
    logger(`${result.failures.length} of ${profile.searches.length} queries failed and were skipped.`);
  }
  if (result.posts.length === 0) {
    console.log('No data collected!');
    return undefined;
  }

  const outputPath = path.join(rawOptions.outputDir, `reddit_raw_posts_${fileStamp(new Date())}.csv`);
  await writeCorpus(outputPath, result.posts);
  printCollectionSummary(profile, result.posts, outputPath, result.interrupted);
  return { outputPath, interrupted: result.interrupted };
}

async function cleanToFile(profile: ResearchProfile, posts: Post[], outputPath: string): Promise<Post[]> {
  console.log(`Starting with ${posts.length} posts`);
  const { kept } = cleanCorpus(posts, new RelevanceFilter(profile.relevance), createLogger('clean'));
  await writeCorpus(outputPath, kept);

  console.log('\nRESULTS:');
  console.log(`Original: ${posts.length} posts`);
  console.log(`Cleaned: ${kept.length} posts`);
  console.log(`Saved to: ${outputPath}`);
  if (kept.length > 0) {
    console.log('\nTOP POSTS IN CLEANED DATA:');
    for (const post of topByScore(kept, 5)) {
      console.log(`• "${post.title}" (${post.score} upvotes)`);
    }
  }
  return kept;
}

async function analyzeToFiles(profile: ResearchProfile, posts: Post[], rawOptions: RawAnalyzeOptions) {
  const logger = createLogger('analyze');
  console.log(`Loaded ${posts.length} posts`);
  const stopwords = await loadStopwords(rawOptions.stopwords ? path.resolve(rawOptions.stopwords) : undefined);
  if (stopwords.status === 'unavailable') {
    logger(`${stopwords.reason}; word frequency will show a placeholder.`);
  }

  const generatedAt = new Date();
  const run = analyzeCorpus(posts, profile, {
    stopwords,
    generatedAt,
    relevantOnly: rawOptions.relevantOnly ?? false,
  });
  if (run.stats.totalPosts === 0) {
    logger('No data to analyze; writing a placeholder report.');
  }

  const reportPath = await writeTimestampedFile(rawOptions.outputDir, profile.report.filePrefix, 'txt', run.text, generatedAt);
  console.log(`Report saved to: ${reportPath}`);
  console.log(`Report contains ${run.text.split('\n').length - 1} lines of analysis`);

  if (rawOptions.charts) {
    await writeDashboard(run.stats, {
      outputDir: rawOptions.outputDir,
      filePrefix: profile.report.filePrefix,
      title: `${profile.name} Problems Dashboard`,
      generatedAt,
      logger: createLogger('charts'),
    });
  }
}

async function readCorpusOrReport(filePath: string): Promise<Post[] | undefined> {
  try {
    const posts = await readCorpus(filePath, createLogger('corpus'));
    console.log(`Loaded ${posts.length} posts from ${filePath}`);
    return posts;
  } catch (error) {
    if (error instanceof CorpusMissingError || error instanceof CorpusUnreadableError) {
      console.error(`${error.message}. No data to analyze.`);
      process.exitCode = 1;
      return undefined;
    }
    throw error;
  }
}

function printCollectionSummary(profile: ResearchProfile, posts: Post[], outputPath: string, interrupted: boolean) {
  const bySource = new Map<string, number>();
  for (const post of posts) {
    bySource.set(post.source, (bySource.get(post.source) ?? 0) + 1);
  }

  console.log(`\n${'='.repeat(60)}`);
  console.log(interrupted ? 'PARTIAL REDDIT DATA COLLECTION (INTERRUPTED)' : 'RAW REDDIT DATA COLLECTION COMPLETE');
  console.log('='.repeat(60));
  console.log(`Collected ${posts.length} unique posts`);
  console.log(`Saved to: ${outputPath}`);
  console.log(`Sources: ${[...bySource.entries()].map(([source, count]) => `${source}=${count}`).join(', ')}`);
  console.log('\nSAMPLE POSTS:');
  for (const post of posts.slice(0, 10)) {
    const anchored = containsAny(post.title.toLowerCase(), profile.relevance.titleAnchors).length > 0;
    console.log(`${anchored ? '✓' : '?'} "${truncate(post.title, 70)}" (${post.score} upvotes, ${post.source})`);
  }
}

function parsePositiveInteger(value: string | undefined, fallback: number, flagName: string): number {
  if (value === undefined) {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Option --${flagName} must be a positive number.`);
  }
  return Math.floor(parsed);
}
