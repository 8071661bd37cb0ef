import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ProfileError } from '../errors.js';
import { loadProfile, loadStopwords } from './profile.js';

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'profile-'));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

function minimalProfile(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    name: 'Minimal',
    searches: [{ scope: 'gmail', query: 'inbox' }],
    relevance: { include: ['Too Many Emails'], titleAnchors: ['Mail'] },
    problemCategories: [{ slug: 'overload', label: 'Overload', keywords: ['Too Many'] }],
    solutionCategories: [{ slug: 'clients', label: 'Clients', keywords: ['Outlook', 'Apple Mail'] }],
    wordFrequency: { domainStopwords: ['Gmail'] },
    quotes: {},
    report: { title: 'T', filePrefix: 'r', summary: ['{{percent:overload}} overloaded'] },
    ...overrides,
  };
}

async function writeProfile(payload: unknown): Promise<string> {
  const file = path.join(dir, 'profile.json');
  await fs.writeFile(file, JSON.stringify(payload));
  return file;
}

describe('loadProfile', () => {
  it('loads the bundled email organization profile', async () => {
    const profile = await loadProfile();

    expect(profile.name).toBe('Email organization');
    expect(profile.searches).toHaveLength(27);
    expect(profile.problemCategories.map((category) => category.slug)).toEqual([
      'missing-important-emails',
      'email-overload',
      'spam-and-clutter',
      'organization-issues',
      'time-management',
      'stress-and-anxiety',
      'mobile-technical-issues',
    ]);
    expect(profile.solutionCategories).toHaveLength(5);
    expect(profile.relevance.titleAnchors).toEqual(['email', 'gmail', 'inbox', 'mail']);
    expect(profile.report.filePrefix).toBe('email_productivity_analysis_report');
  });

  it('fills defaults and lowercases matching phrases', async () => {
    const profile = await loadProfile(await writeProfile(minimalProfile()));

    expect(profile.relevance).toEqual({ include: ['too many emails'], exclude: [], titleAnchors: ['mail'] });
    expect(profile.problemCategories).toEqual([{ slug: 'overload', label: 'Overload', keywords: ['too many'] }]);
    expect(profile.solutionCategories).toEqual([
      { slug: 'clients', label: 'Clients', keywords: ['outlook', 'apple mail'] },
    ]);
    expect(profile.wordFrequency).toEqual({ domainStopwords: ['gmail'], minTokenLength: 3, limit: 15 });
    expect(profile.quotes).toEqual({ keywords: [], limit: 5, titleLength: 100, previewLength: 200 });
    expect(profile.report).toEqual({
      title: 'T',
      subtitle: '',
      filePrefix: 'r',
      summary: ['{{percent:overload}} overloaded'],
      narrative: [],
    });
  });

  it('rejects a template that names an unknown category', async () => {
    const file = await writeProfile(
      minimalProfile({ report: { title: 'T', filePrefix: 'r', summary: ['{{percent:missing}}'] } }),
    );

    await expect(loadProfile(file)).rejects.toThrow('Report template references unknown category "missing".');
  });

  it('rejects duplicate category slugs', async () => {
    const category = { slug: 'overload', label: 'Overload', keywords: ['too many'] };
    const file = await writeProfile(minimalProfile({ problemCategories: [category, category] }));

    await expect(loadProfile(file)).rejects.toThrow('Duplicate category slug "overload" in problemCategories.');
  });

  it('reports invalid, unparsable and missing files as ProfileError', async () => {
    const invalid = await writeProfile(minimalProfile({ problemCategories: [] }));
    await expect(loadProfile(invalid)).rejects.toThrow(
      `Research profile ${invalid} is invalid: profile.problemCategories must contain at least 1 item(s)`,
    );

    const broken = path.join(dir, 'broken.json');
    await fs.writeFile(broken, '{ nope');
    await expect(loadProfile(broken)).rejects.toBeInstanceOf(ProfileError);

    const missing = path.join(dir, 'missing.json');
    await expect(loadProfile(missing)).rejects.toThrow(`Research profile ${missing}: file not found`);
  });
});

describe('loadStopwords', () => {
  it('loads the bundled list', async () => {
    const stopwords = await loadStopwords();

    expect(stopwords.status).toBe('ok');
    if (stopwords.status === 'ok') {
      expect(stopwords.words.has('the')).toBe(true);
    }
  });

  it('reports a missing or malformed list as unavailable', async () => {
    const missing = path.join(dir, 'missing.json');
    expect(await loadStopwords(missing)).toEqual({
      status: 'unavailable',
      reason: `Stopword list ${missing}: file not found`,
    });

    const malformed = path.join(dir, 'stopwords.json');
    await fs.writeFile(malformed, '{"a":1}');
    expect(await loadStopwords(malformed)).toEqual({
      status: 'unavailable',
      reason: `Stopword list ${malformed}: stopwords must be an array`,
    });
  });
});
