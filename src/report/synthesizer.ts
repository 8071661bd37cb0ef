import { collapseWhitespace, formatNumber, truncate } from '../utils/text.js';
import { formatDay, formatTimestamp } from '../utils/time.js';
import type { ResearchProfile } from '../config/profile.js';
import type { CorpusStatistics } from '../types/index.js';

export interface ReportSection {
  heading: string;
  lines: string[];
}

export interface Report {
  header: string[];
  sections: ReportSection[];
}

const NO_DATA = 'no data';
const NO_DATA_LINE = 'No data to analyze.';
const HEAVY_RULE = '='.repeat(80);
const LIGHT_RULE = '-'.repeat(40);

export function formatPercent(value: number | undefined, fractionDigits = 1): string {
  if (value === undefined || !Number.isFinite(value)) {
    return NO_DATA;
  }
  return `${value.toFixed(fractionDigits)}%`;
}

/** Expands `{{percent:<slug>}}`, `{{posts}}` and `{{sources}}`. */
export function fillTemplate(line: string, stats: CorpusStatistics): string {
  return line
    .replace(/\{\{percent:([^}]+)\}\}/g, (_match, slug: string) =>
      formatPercent(stats.categories.find((category) => category.slug === slug)?.percentage, 0),
    )
    .replace(/\{\{posts\}\}/g, formatNumber(stats.totalPosts))
    .replace(/\{\{sources\}\}/g, formatNumber(stats.overview?.sourceCount ?? 0));
}

export function synthesizeReport(
  stats: CorpusStatistics,
  profile: ResearchProfile,
  generatedAt: Date,
): Report {
  const template = profile.report;
  const header = [template.title];
  if (template.subtitle) {
    header.push(template.subtitle);
  }
  header.push(`Generated on: ${formatTimestamp(generatedAt)}`);

  return {
    header,
    sections: [
      { heading: 'EXECUTIVE SUMMARY', lines: summaryLines(stats, profile) },
      { heading: 'DATASET OVERVIEW', lines: overviewLines(stats) },
      { heading: 'PROBLEM BREAKDOWN', lines: breakdownLines(stats) },
      { heading: 'TOP USER COMPLAINTS', lines: quoteLines(stats, profile) },
      { heading: 'EXISTING SOLUTIONS MENTIONED', lines: solutionLines(stats) },
      { heading: 'MOST COMMON WORDS IN COMPLAINTS', lines: wordLines(stats) },
      ...template.narrative.map((section) => ({
        heading: section.heading,
        lines: section.lines.map((line) => fillTemplate(line, stats)),
      })),
    ],
  };
}

export function renderReport(report: Report): string {
  const lines = [HEAVY_RULE, ...report.header, HEAVY_RULE];
  for (const section of report.sections) {
    lines.push('', section.heading, LIGHT_RULE, ...section.lines);
  }
  lines.push('', HEAVY_RULE, 'END OF REPORT', HEAVY_RULE);
  return `${lines.join('\n')}\n`;
}

function summaryLines(stats: CorpusStatistics, profile: ResearchProfile): string[] {
  const intro =
    stats.totalPosts === 0
      ? [NO_DATA_LINE]
      : [
          `This report analyzes ${formatNumber(stats.totalPosts)} user posts about ${profile.name.toLowerCase()} problems`,
          `from ${formatNumber(stats.overview?.sourceCount ?? 0)} different communities. Key findings:`,
        ];
  return [...intro, ...profile.report.summary.map((line) => fillTemplate(line, stats))];
}

function overviewLines(stats: CorpusStatistics): string[] {
  const overview = stats.overview;
  if (!overview) {
    return [NO_DATA_LINE];
  }
  return [
    `Total posts analyzed: ${formatNumber(stats.totalPosts)}`,
    `Date range: ${formatDay(overview.earliest)} to ${formatDay(overview.latest)}`,
    `Communities covered: ${formatNumber(overview.sourceCount)}`,
    `Average engagement: ${overview.avgScore.toFixed(1)} upvotes`,
    `Average comments: ${overview.avgComments.toFixed(1)}`,
    `Most active source: ${overview.mostActiveSource}`,
    `Highest scored post: "${overview.highestScoredTitle}"`,
  ];
}

function breakdownLines(stats: CorpusStatistics): string[] {
  if (stats.totalPosts === 0) {
    return [NO_DATA_LINE, ...stats.categories.map((category, index) => `${index + 1}. ${category.label}: ${NO_DATA}`)];
  }

  const ranked = [...stats.categories].sort(
    (a, b) => (b.percentage ?? Number.NEGATIVE_INFINITY) - (a.percentage ?? Number.NEGATIVE_INFINITY),
  );
  const lines = ['Ranked by frequency of mentions across all posts:'];
  ranked.forEach((category, index) => {
    lines.push(
      `${index + 1}. ${category.label}: ${formatPercent(category.percentage)} of posts (${category.postsAffected} posts, ${category.totalMentions} keyword mentions)`,
    );
    if (category.avgScore !== undefined) {
      lines.push(`   Average engagement: ${category.avgScore.toFixed(1)} upvotes`);
    }
  });
  return lines;
}

function quoteLines(stats: CorpusStatistics, profile: ResearchProfile): string[] {
  if (stats.topEngagement.length === 0) {
    return [stats.totalPosts === 0 ? NO_DATA_LINE : 'No matching posts.'];
  }

  const { titleLength, previewLength } = profile.quotes;
  const lines: string[] = [];
  stats.topEngagement.forEach((post, index) => {
    if (index > 0) {
      lines.push('');
    }
    lines.push(`${index + 1}. "${truncate(post.title, titleLength)}"`);
    lines.push(`   Engagement: ${post.score} upvotes, ${post.numComments} comments`);
    lines.push(`   Source: ${post.source}`);
    const preview = collapseWhitespace(post.body ?? '');
    if (preview) {
      lines.push(`   Preview: ${truncate(preview, previewLength)}`);
    }
  });
  return lines;
}

function solutionLines(stats: CorpusStatistics): string[] {
  const mentioned = stats.solutions
    .filter((solution) => solution.mentions > 0)
    .sort((a, b) => b.mentions - a.mentions);
  if (mentioned.length === 0) {
    return [stats.totalPosts === 0 ? NO_DATA_LINE : 'No existing solutions mentioned.'];
  }
  return mentioned.map((solution) => `• ${solution.label}: ${solution.mentions} mentions`);
}

function wordLines(stats: CorpusStatistics): string[] {
  const result = stats.wordFrequency;
  const lines: string[] = [];
  if (result.status === 'unavailable') {
    lines.push(`Word frequency unavailable (${result.reason}); showing placeholder.`);
  } else if (result.words.length === 0) {
    return [NO_DATA_LINE];
  }
  for (const { word, count } of result.words) {
    lines.push(`• '${word}': ${count} occurrences`);
  }
  return lines;
}
