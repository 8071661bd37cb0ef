import { promises as fs } from 'node:fs';
import { CorpusMissingError, CorpusUnreadableError, describeError, isErrnoException } from '../errors.js';
import { parseIsoTimestamp } from '../utils/time.js';
import type { Logger } from '../utils/logger.js';
import type { Post } from '../types/index.js';
import { dedupePosts } from '../collection/collector.js';
import { CsvParseError, parseCsv } from './reader.js';
import { CsvStreamWriter, type CsvRow } from './writer.js';

export const CORPUS_COLUMNS = [
  'id',
  'url',
  'source',
  'title',
  'body',
  'score',
  'num_comments',
  'created_at',
  'search_term',
] as const;

type CorpusColumn = (typeof CORPUS_COLUMNS)[number];

// Older exports name the body `text` and the timestamp `created_date`, and
// carry no id column.
const COLUMN_ALIASES: Record<CorpusColumn, readonly string[]> = {
  id: ['id', 'url'],
  url: ['url'],
  source: ['source'],
  title: ['title'],
  body: ['body', 'text'],
  score: ['score'],
  num_comments: ['num_comments'],
  created_at: ['created_at', 'created_date'],
  search_term: ['search_term'],
};

const REQUIRED_COLUMNS: readonly CorpusColumn[] = ['id', 'source', 'title', 'score', 'num_comments', 'created_at'];

export function postToRow(post: Post): CsvRow<CorpusColumn> {
  return {
    id: post.id,
    url: post.url,
    source: post.source,
    title: post.title,
    body: post.body ?? '',
    score: post.score,
    num_comments: post.numComments,
    created_at: post.createdAt,
    search_term: post.searchTerm,
  };
}

export async function writeCorpus(filePath: string, posts: readonly Post[]): Promise<void> {
  const writer = await CsvStreamWriter.create(filePath, CORPUS_COLUMNS);
  for (const post of posts) {
    await writer.writeRow(postToRow(post));
  }
  await writer.close();
}

/**
 * Reads a corpus CSV. Rows with an unusable score, comment count or
 * timestamp are skipped and logged; duplicate ids keep the first row.
 */
export async function readCorpus(filePath: string, logger?: Logger): Promise<Post[]> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new CorpusMissingError(filePath);
    }
    throw new CorpusUnreadableError(filePath, describeError(error), { cause: error });
  }

  let rows: string[][];
  try {
    rows = parseCsv(text);
  } catch (error) {
    if (error instanceof CsvParseError) {
      throw new CorpusUnreadableError(filePath, error.message, { cause: error });
    }
    throw error;
  }

  const [header, ...records] = rows;
  if (!header) {
    throw new CorpusUnreadableError(filePath, 'missing header row');
  }

  const columns = resolveColumns(header);
  const missing = REQUIRED_COLUMNS.filter((column) => columns[column] === undefined);
  if (missing.length > 0) {
    throw new CorpusUnreadableError(filePath, `missing column(s): ${missing.join(', ')}`);
  }

  const posts: Post[] = [];
  records.forEach((record, index) => {
    const cell = (column: CorpusColumn): string => {
      const position = columns[column];
      return position === undefined ? '' : record[position] ?? '';
    };
    const rowLabel = `row ${index + 2}`;

    const score = parseCount(cell('score'));
    const numComments = parseCount(cell('num_comments'));
    const createdAt = parseIsoTimestamp(cell('created_at'));
    const id = cell('id');
    if (!id || score === undefined || numComments === undefined || createdAt === undefined) {
      logger?.(`Skipping ${rowLabel}: missing id or invalid score, comment count or timestamp.`);
      return;
    }

    const body = cell('body');
    posts.push({
      id,
      url: cell('url') || id,
      source: cell('source'),
      title: cell('title'),
      body: body.length > 0 ? body : null,
      score,
      numComments,
      createdAt,
      searchTerm: cell('search_term'),
    });
  });

  const unique = dedupePosts(posts);
  if (unique.length < posts.length) {
    logger?.(`Dropped ${posts.length - unique.length} duplicate row(s).`);
  }
  return unique;
}

function resolveColumns(header: readonly string[]): Partial<Record<CorpusColumn, number>> {
  const normalized = header.map((name) => name.trim().toLowerCase());
  const resolved: Partial<Record<CorpusColumn, number>> = {};
  for (const column of CORPUS_COLUMNS) {
    const position = COLUMN_ALIASES[column]
      .map((alias) => normalized.indexOf(alias))
      .find((candidate) => candidate >= 0);
    if (position !== undefined) {
      resolved[column] = position;
    }
  }
  return resolved;
}

function parseCount(value: string): number | undefined {
  const trimmed = value.trim();
  if (trimmed === '') {
    return undefined;
  }
  const parsed = Number(trimmed);
  if (!Number.isFinite(parsed) || parsed < 0) {
    return undefined;
  }
  return Math.floor(parsed);
}
