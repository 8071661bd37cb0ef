import { describe, expect, it } from 'vitest';
import { aggregate } from '../analysis/aggregator.js';
import { CategoryTagger } from '../analysis/categoryTagger.js';
import { makeProfile } from '../test-support/profile.js';
import { makeStats } from '../test-support/stats.js';
import { fillTemplate, formatPercent, renderReport, synthesizeReport } from './synthesizer.js';

const generatedAt = new Date('2024-03-09T14:15:02Z');
const profile = makeProfile();

function section(report: ReturnType<typeof synthesizeReport>, heading: string): string[] | undefined {
  return report.sections.find((candidate) => candidate.heading === heading)?.lines;
}

describe('formatPercent', () => {
  it('formats finite values and marks missing ones', () => {
    expect(formatPercent(100 / 3)).toBe('33.3%');
    expect(formatPercent(50, 0)).toBe('50%');
    expect(formatPercent(undefined)).toBe('no data');
    expect(formatPercent(Number.NaN)).toBe('no data');
  });
});

describe('fillTemplate', () => {
  it('expands placeholders from the statistics', () => {
    expect(fillTemplate('{{percent:spam}} of {{posts}} posts in {{sources}} places', makeStats())).toBe(
      '25% of 4 posts in 2 places',
    );
    expect(fillTemplate('{{percent:unknown}}', makeStats())).toBe('no data');
  });
});

describe('synthesizeReport', () => {
  const report = synthesizeReport(makeStats(), profile, generatedAt);

  it('builds the header from the profile', () => {
    expect(report.header).toEqual(['REPORT', 'Sub', 'Generated on: 2024-03-09 14:15 UTC']);
    expect(report.sections.map((candidate) => candidate.heading)).toEqual([
      'EXECUTIVE SUMMARY',
      'DATASET OVERVIEW',
      'PROBLEM BREAKDOWN',
      'TOP USER COMPLAINTS',
      'EXISTING SOLUTIONS MENTIONED',
      'MOST COMMON WORDS IN COMPLAINTS',
      'NEXT STEPS',
    ]);
  });

  it('summarizes the dataset', () => {
    expect(section(report, 'EXECUTIVE SUMMARY')).toEqual([
      'This report analyzes 4 user posts about email organization problems',
      'from 2 different communities. Key findings:',
      '• 75% feel overloaded',
    ]);
    expect(section(report, 'DATASET OVERVIEW')).toEqual([
      'Total posts analyzed: 4',
      'Date range: 2024-01-02 to 2024-03-20',
      'Communities covered: 2',
      'Average engagement: 12.5 upvotes',
      'Average comments: 4.5',
      'Most active source: r/gmail',
      'Highest scored post: "Inbox chaos"',
    ]);
  });

  it('ranks categories by percentage', () => {
    expect(section(report, 'PROBLEM BREAKDOWN')).toEqual([
      'Ranked by frequency of mentions across all posts:',
      '1. Email Overload: 75.0% of posts (3 posts, 5 keyword mentions)',
      '   Average engagement: 14.0 upvotes',
      '2. Spam & Clutter: 25.0% of posts (1 posts, 1 keyword mentions)',
      '   Average engagement: 8.0 upvotes',
      '3. Mobile Issues: 0.0% of posts (0 posts, 0 keyword mentions)',
    ]);
  });

  it('quotes the most engaging posts with a collapsed preview', () => {
    expect(section(report, 'TOP USER COMPLAINTS')).toEqual([
      '1. "Inbox chaos"',
      '   Engagement: 30 upvotes, 7 comments',
      '   Source: r/gmail',
      '   Preview: I get hundreds of e…',
    ]);
  });

  it('lists mentioned solutions and common words', () => {
    expect(section(report, 'EXISTING SOLUTIONS MENTIONED')).toEqual([
      '• Productivity Tools: 6 mentions',
      '• Gmail Features: 4 mentions',
    ]);
    expect(section(report, 'MOST COMMON WORDS IN COMPLAINTS')).toEqual([
      "• 'inbox': 9 occurrences",
      "• 'labels': 4 occurrences",
    ]);
    expect(section(report, 'NEXT STEPS')).toEqual(['Covering 4 posts from 2 sources']);
  });

  it('notes a placeholder word list', () => {
    const placeholder = synthesizeReport(
      makeStats({
        wordFrequency: { status: 'unavailable', reason: 'no stopwords', words: [{ word: 'analysis', count: 1 }] },
      }),
      profile,
      generatedAt,
    );
    expect(section(placeholder, 'MOST COMMON WORDS IN COMPLAINTS')).toEqual([
      'Word frequency unavailable (no stopwords); showing placeholder.',
      "• 'analysis': 1 occurrences",
    ]);
  });

  it('renders an empty corpus with explicit no-data markers', () => {
    const tagger = new CategoryTagger(profile.problemCategories, profile.solutionCategories);
    const empty = aggregate([], {
      tagger,
      stopwords: { status: 'ok', words: new Set<string>() },
      wordFrequency: profile.wordFrequency,
      quotes: profile.quotes,
    });
    const emptyReport = synthesizeReport(empty, profile, generatedAt);

    expect(section(emptyReport, 'EXECUTIVE SUMMARY')).toEqual(['No data to analyze.', '• no data feel overloaded']);
    expect(section(emptyReport, 'DATASET OVERVIEW')).toEqual(['No data to analyze.']);
    expect(section(emptyReport, 'PROBLEM BREAKDOWN')).toEqual([
      'No data to analyze.',
      '1. Email Overload: no data',
      '2. Spam & Clutter: no data',
      '3. Mobile Issues: no data',
    ]);
    expect(section(emptyReport, 'TOP USER COMPLAINTS')).toEqual(['No data to analyze.']);
    expect(section(emptyReport, 'EXISTING SOLUTIONS MENTIONED')).toEqual(['No data to analyze.']);
    expect(section(emptyReport, 'MOST COMMON WORDS IN COMPLAINTS')).toEqual(['No data to analyze.']);
    expect(renderReport(emptyReport)).not.toContain('NaN');
  });
});

describe('renderReport', () => {
  it('frames the header and sections with rules', () => {
    const text = renderReport({
      header: ['TITLE', 'Generated on: 2024-03-09 14:15 UTC'],
      sections: [{ heading: 'ONE', lines: ['a', 'b'] }],
    });
    const heavy = '='.repeat(80);
    expect(text).toBe(
      [
        heavy,
        'TITLE',
        'Generated on: 2024-03-09 14:15 UTC',
        heavy,
        '',
        'ONE',
        '-'.repeat(40),
        'a',
        'b',
        '',
        heavy,
        'END OF REPORT',
        heavy,
        '',
      ].join('\n'),
    );
  });
});
