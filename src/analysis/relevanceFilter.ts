import { combinedText, containsAny } from '../utils/text.js';
import type { RelevanceRules } from '../config/profile.js';
import type { Post } from '../types/index.js';

export type RelevanceOutcome = 'kept' | 'excluded' | 'no-target-problem' | 'no-title-anchor';

export interface RelevanceVerdict {
  relevant: boolean;
  outcome: RelevanceOutcome;
  matchedInclude: string[];
  matchedExclude: string[];
  matchedAnchors: string[];
}

/**
 * Keeps a post when its combined text names a target problem, names no
 * excluded topic, and its title carries an anchor token. Every check is a
 * plain substring test; exclusion is evaluated even when inclusion matched.
 */
export class RelevanceFilter {
  constructor(private readonly rules: RelevanceRules) {}

  classify(post: Pick<Post, 'title' | 'body'>): boolean {
    return this.explain(post).relevant;
  }

  explain(post: Pick<Post, 'title' | 'body'>): RelevanceVerdict {
    const text = combinedText(post);
    const title = typeof post.title === 'string' ? post.title.toLowerCase() : '';

    const matchedInclude = containsAny(text, this.rules.include);
    const matchedExclude = containsAny(text, this.rules.exclude);
    const matchedAnchors = containsAny(title, this.rules.titleAnchors);

    let outcome: RelevanceOutcome = 'kept';
    if (matchedExclude.length > 0) {
      outcome = 'excluded';
    } else if (matchedInclude.length === 0) {
      outcome = 'no-target-problem';
    } else if (matchedAnchors.length === 0) {
      outcome = 'no-title-anchor';
    }

    return {
      relevant: outcome === 'kept',
      outcome,
      matchedInclude,
      matchedExclude,
      matchedAnchors,
    };
  }
}

export function describeVerdict(verdict: RelevanceVerdict): string {
  switch (verdict.outcome) {
    case 'kept':
      return `matched ${verdict.matchedInclude.map((phrase) => `"${phrase}"`).join(', ')}`;
    case 'excluded':
      return `excluded by ${verdict.matchedExclude.map((phrase) => `"${phrase}"`).join(', ')}`;
    case 'no-target-problem':
      return 'no target problem phrase';
    case 'no-title-anchor':
      return 'title lacks an anchor token';
  }
}
