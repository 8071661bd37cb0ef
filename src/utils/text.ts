import type { Post } from '../types/index.js';

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }

  return `${text.slice(0, maxLength - 1)}…`;
}

/**
 * Lowercased `title + " " + body`, the input of every text rule. A missing
 * title or body contributes an empty string.
 */
export function combinedText(post: Pick<Post, 'title' | 'body'>): string {
  const title = typeof post.title === 'string' ? post.title : '';
  const body = typeof post.body === 'string' ? post.body : '';
  return `${title.toLowerCase()} ${body.toLowerCase()}`;
}

export function containsAny(text: string, phrases: readonly string[]): string[] {
  return phrases.filter((phrase) => text.includes(phrase.toLowerCase()));
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function formatNumber(value: number, fractionDigits = 0): string {
  return value.toLocaleString('en-US', {
    minimumFractionDigits: fractionDigits,
    maximumFractionDigits: fractionDigits,
  });
}
