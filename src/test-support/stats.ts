import type { CorpusStatistics } from '../types/index.js';
import { makePost } from './posts.js';

export function makeStats(overrides: Partial<CorpusStatistics> = {}): CorpusStatistics {
  return {
    totalPosts: 4,
    overview: {
      earliest: '2024-01-02T08:00:00.000Z',
      latest: '2024-03-20T18:30:00.000Z',
      sourceCount: 2,
      avgScore: 12.5,
      avgComments: 4.5,
      mostActiveSource: 'r/gmail',
      highestScoredTitle: 'Inbox chaos',
    },
    categories: [
      { slug: 'overload', label: 'Email Overload', postsAffected: 3, percentage: 75, totalMentions: 5, avgScore: 14 },
      { slug: 'spam', label: 'Spam & Clutter', postsAffected: 1, percentage: 25, totalMentions: 1, avgScore: 8 },
      { slug: 'mobile', label: 'Mobile Issues', postsAffected: 0, percentage: 0, totalMentions: 0, avgScore: undefined },
    ],
    solutions: [
      { slug: 'filters', label: 'Gmail Features', mentions: 4 },
      { slug: 'clients', label: 'Email Clients', mentions: 0 },
      { slug: 'tools', label: 'Productivity Tools', mentions: 6 },
    ],
    topEngagement: [
      makePost({
        id: 'q1',
        title: 'Inbox chaos',
        body: 'I get  hundreds\nof emails a day',
        score: 30,
        numComments: 7,
        source: 'r/gmail',
      }),
    ],
    wordFrequency: {
      status: 'ok',
      words: [
        { word: 'inbox', count: 9 },
        { word: 'labels', count: 4 },
      ],
    },
    sourceCounts: [
      { key: 'r/gmail', count: 3 },
      { key: 'r/productivity', count: 1 },
    ],
    monthlyCounts: [
      { key: '2024-01', count: 1 },
      { key: '2024-03', count: 3 },
    ],
    scores: [30, 12, 0, 8],
    ...overrides,
  };
}
