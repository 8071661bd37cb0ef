import { promises as fs } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { jot, type InferJot } from '../jot.js';
import { ProfileError, describeError, isErrnoException } from '../errors.js';
import type { CategoryDefinition, SearchTarget } from '../types/index.js';

export const DEFAULT_PROFILE_PATH = fileURLToPath(new URL('../../config/email-organization.json', import.meta.url));
export const DEFAULT_STOPWORDS_PATH = fileURLToPath(new URL('../../data/stopwords.json', import.meta.url));

export interface RelevanceRules {
  include: readonly string[];
  exclude: readonly string[];
  titleAnchors: readonly string[];
}

export interface NarrativeSection {
  heading: string;
  lines: readonly string[];
}

export interface ReportTemplate {
  title: string;
  subtitle: string;
  filePrefix: string;
  summary: readonly string[];
  narrative: readonly NarrativeSection[];
}

export interface ResearchProfile {
  name: string;
  searches: readonly SearchTarget[];
  relevance: RelevanceRules;
  problemCategories: readonly CategoryDefinition[];
  solutionCategories: readonly CategoryDefinition[];
  wordFrequency: {
    domainStopwords: readonly string[];
    minTokenLength: number;
    limit: number;
  };
  quotes: {
    keywords: readonly string[];
    limit: number;
    titleLength: number;
    previewLength: number;
  };
  report: ReportTemplate;
}

export type StopwordResource =
  | { status: 'ok'; words: ReadonlySet<string> }
  | { status: 'unavailable'; reason: string };

const phraseList = jot.array(jot.string({ nonEmpty: true }), { minItems: 1 });

const categoryNode = jot.object({
  slug: jot.string({ nonEmpty: true }),
  label: jot.string({ nonEmpty: true }),
  keywords: phraseList,
});

const profileNode = jot.object({
  name: jot.string({ nonEmpty: true }),
  searches: jot.array(jot.object({ scope: jot.string({ nonEmpty: true }), query: jot.string({ nonEmpty: true }) })),
  relevance: jot.object({
    include: phraseList,
    exclude: jot.withDefault(jot.array(jot.string({ nonEmpty: true })), []),
    titleAnchors: phraseList,
  }),
  problemCategories: jot.array(categoryNode, { minItems: 1 }),
  solutionCategories: jot.withDefault(jot.array(categoryNode), []),
  wordFrequency: jot.object({
    domainStopwords: jot.withDefault(jot.array(jot.string()), []),
    minTokenLength: jot.withDefault(jot.integer({ min: 1 }), 3),
    limit: jot.withDefault(jot.integer({ min: 1 }), 15),
  }),
  quotes: jot.object({
    keywords: jot.withDefault(jot.array(jot.string({ nonEmpty: true })), []),
    limit: jot.withDefault(jot.integer({ min: 1 }), 5),
    titleLength: jot.withDefault(jot.integer({ min: 4 }), 100),
    previewLength: jot.withDefault(jot.integer({ min: 4 }), 200),
  }),
  report: jot.object({
    title: jot.string({ nonEmpty: true }),
    subtitle: jot.withDefault(jot.string(), ''),
    filePrefix: jot.string({ nonEmpty: true }),
    summary: jot.withDefault(jot.array(jot.string()), []),
    narrative: jot.withDefault(
      jot.array(jot.object({ heading: jot.string({ nonEmpty: true }), lines: jot.array(jot.string()) })),
      [],
    ),
  }),
});

export type ProfilePayload = InferJot<typeof profileNode>;

const PERCENT_PLACEHOLDER = /\{\{percent:([^}]+)\}\}/g;

export async function loadProfile(filePath: string = DEFAULT_PROFILE_PATH): Promise<ResearchProfile> {
  const raw = await readJson(filePath, (message) => new ProfileError(`Research profile ${filePath}: ${message}`));
  let payload: ProfilePayload;
  try {
    payload = profileNode.parse(raw, 'profile');
  } catch (error) {
    throw new ProfileError(`Research profile ${filePath} is invalid: ${describeError(error)}`, { cause: error });
  }
  return normalizeProfile(payload);
}

export function normalizeProfile(payload: ProfilePayload): ResearchProfile {
  assertUniqueSlugs(payload.problemCategories, 'problemCategories');
  assertUniqueSlugs(payload.solutionCategories, 'solutionCategories');

  const knownSlugs = new Set(payload.problemCategories.map((category) => category.slug));
  const templates = [...payload.report.summary, ...payload.report.narrative.flatMap((section) => section.lines)];
  for (const line of templates) {
    for (const match of line.matchAll(PERCENT_PLACEHOLDER)) {
      const slug = match[1] ?? '';
      if (!knownSlugs.has(slug)) {
        throw new ProfileError(`Report template references unknown category "${slug}".`);
      }
    }
  }

  return {
    ...payload,
    problemCategories: payload.problemCategories.map(lowercaseKeywords),
    solutionCategories: payload.solutionCategories.map(lowercaseKeywords),
    relevance: {
      include: payload.relevance.include.map((phrase) => phrase.toLowerCase()),
      exclude: payload.relevance.exclude.map((phrase) => phrase.toLowerCase()),
      titleAnchors: payload.relevance.titleAnchors.map((token) => token.toLowerCase()),
    },
    wordFrequency: {
      ...payload.wordFrequency,
      domainStopwords: payload.wordFrequency.domainStopwords.map((word) => word.toLowerCase()),
    },
  };
}

/**
 * The stopword list is optional: when it cannot be read the caller falls
 * back to a placeholder word-frequency result.
 */
export async function loadStopwords(filePath: string = DEFAULT_STOPWORDS_PATH): Promise<StopwordResource> {
  try {
    const raw = await readJson(filePath, (message) => new Error(message));
    const words = jot.array(jot.string()).parse(raw, 'stopwords');
    return { status: 'ok', words: new Set(words.map((word) => word.toLowerCase())) };
  } catch (error) {
    return { status: 'unavailable', reason: `Stopword list ${filePath}: ${describeError(error)}` };
  }
}

async function readJson(filePath: string, wrap: (message: string) => Error): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw wrap('file not found');
    }
    throw wrap(describeError(error));
  }

  try {
    return JSON.parse(raw) as unknown;
  } catch (error) {
    throw wrap(`invalid JSON (${describeError(error)})`);
  }
}

function lowercaseKeywords(category: CategoryDefinition): CategoryDefinition {
  return { ...category, keywords: category.keywords.map((keyword) => keyword.toLowerCase()) };
}

function assertUniqueSlugs(categories: readonly CategoryDefinition[], field: string): void {
  const seen = new Set<string>();
  for (const category of categories) {
    if (seen.has(category.slug)) {
      throw new ProfileError(`Duplicate category slug "${category.slug}" in ${field}.`);
    }
    seen.add(category.slug);
  }
}
