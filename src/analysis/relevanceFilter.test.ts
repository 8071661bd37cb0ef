import { beforeAll, describe, expect, it } from 'vitest';
import { loadProfile, type RelevanceRules } from '../config/profile.js';
import { RelevanceFilter, describeVerdict } from './relevanceFilter.js';

const rules: RelevanceRules = {
  include: ['inbox', 'too many emails'],
  exclude: ['newsletter', 'spam'],
  titleAnchors: ['mail'],
};

describe('RelevanceFilter', () => {
  const filter = new RelevanceFilter(rules);

  it('keeps a post with a target problem, no exclusion and an anchored title', () => {
    const verdict = filter.explain({ title: 'Gmail is a mess', body: 'My inbox has too many emails' });
    expect(verdict).toEqual({
      relevant: true,
      outcome: 'kept',
      matchedInclude: ['inbox', 'too many emails'],
      matchedExclude: [],
      matchedAnchors: ['mail'],
    });
  });

  it('lets an exclusion win over a matching include phrase and anchor', () => {
    const verdict = filter.explain({ title: 'Mail help', body: 'My inbox is full of spam' });
    expect(verdict.relevant).toBe(false);
    expect(verdict.outcome).toBe('excluded');
    expect(verdict.matchedInclude).toEqual(['inbox']);
    expect(verdict.matchedExclude).toEqual(['spam']);
  });

  it('requires the anchor in the title, not the body', () => {
    const verdict = filter.explain({ title: 'Help with my workflow', body: 'my mail inbox is a mess' });
    expect(verdict.outcome).toBe('no-title-anchor');
    expect(filter.classify({ title: 'Help with my workflow', body: 'my mail inbox is a mess' })).toBe(false);
  });

  it('reports a missing target problem before a missing anchor', () => {
    expect(filter.explain({ title: 'Weekend plans', body: null }).outcome).toBe('no-target-problem');
  });

  it('treats a null body and an empty title as empty text', () => {
    expect(filter.explain({ title: '', body: null }).outcome).toBe('no-target-problem');
    expect(filter.explain({ title: '', body: 'inbox chaos' }).outcome).toBe('no-title-anchor');
    expect(filter.classify({ title: 'Mail inbox', body: null })).toBe(true);
  });

  it('matches case-insensitively on substrings', () => {
    expect(filter.classify({ title: 'EMAIL', body: 'INBOXES everywhere' })).toBe(true);
  });

  it('is deterministic', () => {
    const post = { title: 'Mail inbox', body: 'spam spam' };
    expect(filter.classify(post)).toBe(filter.classify(post));
    expect(filter.explain(post)).toEqual(filter.explain(post));
  });

  it('describes each outcome', () => {
    expect(describeVerdict(filter.explain({ title: 'Mail', body: 'inbox' }))).toBe('matched "inbox"');
    expect(describeVerdict(filter.explain({ title: 'Mail', body: 'inbox spam' }))).toBe('excluded by "spam"');
    expect(describeVerdict(filter.explain({ title: 'Hi', body: null }))).toBe('no target problem phrase');
    expect(describeVerdict(filter.explain({ title: 'Hi', body: 'inbox' }))).toBe('title lacks an anchor token');
  });
});

describe('RelevanceFilter with the bundled email profile', () => {
  let filter: RelevanceFilter;

  beforeAll(async () => {
    const profile = await loadProfile();
    filter = new RelevanceFilter(profile.relevance);
  });

  it('deletes a productivity-hack post even though the title names gmail', () => {
    const verdict = filter.explain({
      title: 'Organize your gmail inbox with this productivity hack',
      body: 'I had too many emails',
    });
    expect(verdict.outcome).toBe('excluded');
    expect(verdict.matchedInclude).toEqual(['too many emails']);
    expect(verdict.matchedExclude).toEqual(['productivity hack']);
  });

  it('deletes a post whose only email signal is in the body', () => {
    const verdict = filter.explain({
      title: 'Help with my workflow',
      body: 'my gmail inbox is a mess, too many emails',
    });
    expect(verdict.outcome).toBe('no-title-anchor');
  });

  it('keeps a genuine inbox organization question', () => {
    const verdict = filter.explain({
      title: 'How do I organize my cluttered Gmail inbox?',
      body: "I have thousands of emails and can't find email receipts anymore.",
    });
    expect(verdict.relevant).toBe(true);
    expect(verdict.matchedInclude).toEqual(["can't find email", 'find email', 'thousands of email']);
    expect(verdict.matchedAnchors).toEqual(['gmail', 'inbox', 'mail']);
  });

  it('needs an include phrase beyond the title keywords', () => {
    const verdict = filter.explain({ title: 'How do I organize my cluttered Gmail inbox?', body: null });
    expect(verdict.outcome).toBe('no-target-problem');
    expect(verdict.matchedAnchors).toEqual(['gmail', 'inbox', 'mail']);
  });

  it('excludes on a phrase hidden inside a longer word', () => {
    const verdict = filter.explain({ title: 'Too many emails in my gmail inbox', body: 'I tried a different approach' });
    expect(verdict.outcome).toBe('excluded');
    expect(verdict.matchedExclude).toEqual(['rent']);
  });
});
