export interface Post {
  id: string;
  url: string;
  source: string;
  title: string;
  body: string | null;
  score: number;
  numComments: number;
  createdAt: string;
  searchTerm: string;
}

export interface RawPost {
  id: string;
  source: string;
  title: string;
  body: string | null;
  score: number;
  numComments: number;
  createdUtc: number;
  permalink: string;
}

export interface PostSource {
  search(query: string, scope: string, limit: number): Promise<RawPost[]>;
}

export interface SearchTarget {
  scope: string;
  query: string;
}

export interface CategoryDefinition {
  slug: string;
  label: string;
  keywords: readonly string[];
}

export interface ClassifiedPost {
  post: Post;
  combinedText: string;
  isRelevant: boolean;
  categories: ReadonlySet<string>;
  solutionTags: ReadonlySet<string>;
}

export interface CategoryStat {
  slug: string;
  label: string;
  postsAffected: number;
  percentage: number | undefined;
  totalMentions: number;
  avgScore: number | undefined;
}

export interface SolutionMention {
  slug: string;
  label: string;
  mentions: number;
}

export interface DatasetOverview {
  earliest: string;
  latest: string;
  sourceCount: number;
  avgScore: number;
  avgComments: number;
  mostActiveSource: string;
  highestScoredTitle: string;
}

export interface WordCount {
  word: string;
  count: number;
}

export type WordFrequencyResult =
  | { status: 'ok'; words: WordCount[] }
  | { status: 'unavailable'; reason: string; words: WordCount[] };

export interface CountBucket {
  key: string;
  count: number;
}

export interface CorpusStatistics {
  totalPosts: number;
  overview: DatasetOverview | undefined;
  categories: CategoryStat[];
  solutions: SolutionMention[];
  topEngagement: Post[];
  wordFrequency: WordFrequencyResult;
  sourceCounts: CountBucket[];
  monthlyCounts: CountBucket[];
  scores: number[];
}
