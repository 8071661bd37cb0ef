import { combinedText, escapeRegExp } from '../utils/text.js';
import type { CategoryDefinition, ClassifiedPost, Post } from '../types/index.js';
import type { RelevanceFilter } from './relevanceFilter.js';

interface CompiledCategory {
  definition: CategoryDefinition;
  anyKeyword: RegExp;
  everyMatch: RegExp;
  perKeyword: RegExp[];
}

export interface TagResult {
  categories: Set<string>;
  solutionTags: Set<string>;
}

// Whole-word matching, unlike the relevance filter's substring checks:
// "mail" tags "mail" but not "maillist" or "mailé". Word characters are
// Unicode letters, digits and underscore.
function wordPattern(keywords: readonly string[], flags = 'u'): RegExp {
  return new RegExp(`(?<![\\p{L}\\p{N}_])(?:${keywords.map(escapeRegExp).join('|')})(?![\\p{L}\\p{N}_])`, flags);
}

function compile(definition: CategoryDefinition): CompiledCategory {
  return {
    definition,
    anyKeyword: wordPattern(definition.keywords),
    everyMatch: wordPattern(definition.keywords, 'gu'),
    perKeyword: definition.keywords.map((keyword) => wordPattern([keyword])),
  };
}

export class CategoryTagger {
  private readonly problems: readonly CompiledCategory[];
  private readonly solutions: readonly CompiledCategory[];

  constructor(problemCategories: readonly CategoryDefinition[], solutionCategories: readonly CategoryDefinition[] = []) {
    this.problems = problemCategories.map(compile);
    this.solutions = solutionCategories.map(compile);
  }

  get problemCategories(): CategoryDefinition[] {
    return this.problems.map((category) => category.definition);
  }

  get solutionCategories(): CategoryDefinition[] {
    return this.solutions.map((category) => category.definition);
  }

  tag(post: Pick<Post, 'title' | 'body'>): TagResult {
    return this.tagText(combinedText(post));
  }

  tagText(text: string): TagResult {
    return {
      categories: matchingSlugs(this.problems, text),
      solutionTags: matchingSlugs(this.solutions, text),
    };
  }

  /** Non-overlapping keyword occurrences of a problem category in `text`. */
  countMentions(slug: string, text: string): number {
    const category = this.problems.find((candidate) => candidate.definition.slug === slug);
    if (!category) {
      return 0;
    }
    return text.match(category.everyMatch)?.length ?? 0;
  }

  /** How many distinct keywords of a solution category appear in `text`. */
  solutionKeywordHits(slug: string, text: string): number {
    const category = this.solutions.find((candidate) => candidate.definition.slug === slug);
    if (!category) {
      return 0;
    }
    return category.perKeyword.filter((pattern) => pattern.test(text)).length;
  }
}

function matchingSlugs(categories: readonly CompiledCategory[], text: string): Set<string> {
  const slugs = new Set<string>();
  for (const category of categories) {
    if (category.anyKeyword.test(text)) {
      slugs.add(category.definition.slug);
    }
  }
  return slugs;
}

/** Derives the classified view of each post; the posts themselves are untouched. */
export function classifyCorpus(
  posts: readonly Post[],
  filter: RelevanceFilter,
  tagger: CategoryTagger,
): ClassifiedPost[] {
  return posts.map((post) => {
    const text = combinedText(post);
    const { categories, solutionTags } = tagger.tagText(text);
    return {
      post,
      combinedText: text,
      isRelevant: filter.classify(post),
      categories,
      solutionTags,
    };
  });
}
