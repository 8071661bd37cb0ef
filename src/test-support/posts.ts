import type { Post } from '../types/index.js';

let sequence = 0;

export function makePost(overrides: Partial<Post> = {}): Post {
  sequence += 1;
  const id = overrides.id ?? `t3_${sequence}`;
  return {
    id,
    url: `https://reddit.com/r/gmail/comments/${id}/`,
    source: 'r/gmail',
    title: 'Untitled',
    body: null,
    score: 0,
    numComments: 0,
    createdAt: '2024-01-15T12:00:00.000Z',
    searchTerm: 'organize',
    ...overrides,
  };
}
