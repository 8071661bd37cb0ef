import { describe, expect, it } from 'vitest';
import { makePost } from '../test-support/posts.js';
import { CategoryTagger, classifyCorpus } from './categoryTagger.js';
import { RelevanceFilter } from './relevanceFilter.js';

const problems = [
  { slug: 'spam', label: 'Spam', keywords: ['spam', 'newsletter'] },
  { slug: 'organize', label: 'Organize', keywords: ['organize', 'folder'] },
  { slug: 'mail', label: 'Mail', keywords: ['mail', 'too many'] },
];

const solutions = [
  { slug: 'clients', label: 'Clients', keywords: ['outlook', 'apple mail'] },
  { slug: 'tools', label: 'Tools', keywords: ['hey.com'] },
];

describe('CategoryTagger', () => {
  const tagger = new CategoryTagger(problems, solutions);

  it('assigns every matching category', () => {
    const result = tagger.tag({ title: 'Organize the spam', body: 'one newsletter per folder' });
    expect([...result.categories]).toEqual(['spam', 'organize']);
    expect([...result.solutionTags]).toEqual([]);
  });

  it('matches whole words only', () => {
    expect(tagger.tag({ title: 'My maillist', body: null }).categories.has('mail')).toBe(false);
    expect(tagger.tag({ title: 'Where is my mail?', body: null }).categories.has('mail')).toBe(true);
    expect(tagger.tag({ title: 'Spammers', body: null }).categories.size).toBe(0);
  });

  it('treats accented letters as part of a word', () => {
    expect(tagger.tag({ title: 'spamé', body: null }).categories.has('spam')).toBe(false);
    expect(tagger.tag({ title: 'éspam', body: null }).categories.has('spam')).toBe(false);
    expect(tagger.tag({ title: 'naïve spam!', body: null }).categories.has('spam')).toBe(true);
    expect(tagger.countMentions('spam', 'spam spamé über-spam')).toBe(2);
  });

  it('matches multi-word keywords and escapes regex characters', () => {
    expect(tagger.tag({ title: 'Way too many alerts', body: null }).categories.has('mail')).toBe(true);
    expect(tagger.tag({ title: 'Trying hey.com', body: null }).solutionTags.has('tools')).toBe(true);
    expect(tagger.tag({ title: 'Trying heyxcom', body: null }).solutionTags.has('tools')).toBe(false);
  });

  it('counts every occurrence of a category keyword', () => {
    expect(tagger.countMentions('spam', 'spam, more spam and a newsletter')).toBe(3);
    expect(tagger.countMentions('spam', 'nothing here')).toBe(0);
    expect(tagger.countMentions('unknown', 'spam')).toBe(0);
  });

  it('counts distinct solution keywords present in a text', () => {
    expect(tagger.solutionKeywordHits('clients', 'outlook, then apple mail, then outlook again')).toBe(2);
    expect(tagger.solutionKeywordHits('clients', 'thunderbird')).toBe(0);
  });
});

describe('classifyCorpus', () => {
  it('derives text, relevance and tags without touching the posts', () => {
    const tagger = new CategoryTagger(problems, solutions);
    const filter = new RelevanceFilter({ include: ['newsletter'], exclude: [], titleAnchors: ['mail'] });
    const post = makePost({ title: 'Mail SPAM', body: 'A Newsletter in Outlook' });
    const snapshot = { ...post };

    const [classified] = classifyCorpus([post], filter, tagger);

    expect(classified?.combinedText).toBe('mail spam a newsletter in outlook');
    expect(classified?.isRelevant).toBe(true);
    expect([...(classified?.categories ?? [])]).toEqual(['spam', 'mail']);
    expect([...(classified?.solutionTags ?? [])]).toEqual(['clients']);
    expect(post).toEqual(snapshot);
  });
});
