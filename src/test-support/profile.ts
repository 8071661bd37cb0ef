import type { ResearchProfile } from '../config/profile.js';

export function makeProfile(overrides: Partial<ResearchProfile> = {}): ResearchProfile {
  return {
    name: 'Email organization',
    searches: [{ scope: 'gmail', query: 'inbox' }],
    relevance: { include: ['inbox'], exclude: [], titleAnchors: ['inbox'] },
    problemCategories: [
      { slug: 'overload', label: 'Email Overload', keywords: ['too many', 'overwhelmed'] },
      { slug: 'spam', label: 'Spam & Clutter', keywords: ['spam'] },
      { slug: 'mobile', label: 'Mobile Issues', keywords: ['iphone'] },
    ],
    solutionCategories: [
      { slug: 'filters', label: 'Gmail Features', keywords: ['filter', 'label'] },
      { slug: 'clients', label: 'Email Clients', keywords: ['outlook'] },
      { slug: 'tools', label: 'Productivity Tools', keywords: ['sanebox'] },
    ],
    wordFrequency: { domainStopwords: [], minTokenLength: 3, limit: 15 },
    quotes: { keywords: [], limit: 5, titleLength: 100, previewLength: 20 },
    report: {
      title: 'REPORT',
      subtitle: 'Sub',
      filePrefix: 'report',
      summary: ['• {{percent:overload}} feel overloaded'],
      narrative: [{ heading: 'NEXT STEPS', lines: ['Covering {{posts}} posts from {{sources}} sources'] }],
    },
    ...overrides,
  };
}
