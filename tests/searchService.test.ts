import { describe, expect, it, vi } from 'vitest';
import { InvalidQueryError, SearchUnavailableError } from '../src/errors';
import type { ContentRepository } from '../src/repositories/contentRepository';
import { InMemoryContentRepository } from '../src/repositories/contentRepository';
import { CandidateProvider } from '../src/services/candidateProvider';
import { formatResult } from '../src/services/responseFormatter';
import { pickBest, SearchService } from '../src/services/searchService';
import type { Candidate, ScoredCandidate, SelectionResult } from '../src/types';
import {
  ALL_COLLECTIONS,
  FlakyRepository,
  chartImage,
  overviewVideo,
  reportText,
  resolveUrl,
  silentLogger,
  type Seed
} from './fixtures';

const noSleep = vi.fn(async (_ms: number) => {});

function serviceFor(repository: ContentRepository, sleep = noSleep) {
  return new SearchService({
    provider: new CandidateProvider(repository, resolveUrl),
    logger: silentLogger,
    retry: { sleep }
  });
}

function search(seed: Seed, query: string): Promise<SelectionResult> {
  return serviceFor(new InMemoryContentRepository(seed)).search(query);
}

function selected(result: SelectionResult): ScoredCandidate {
  if (result.status !== 'selected') throw new Error('expected a selected result');
  return result.result;
}

function fillerWords(count: number): string {
  return Array.from({ length: count }, (_, i) => `w${i}`).join(' ');
}

function textOf(content: string, id = 1) {
  return { id, source_file: 'notes.pdf', page: 1, content };
}

describe('SearchService', () => {
  it('rejects blank queries', async () => {
    await expect(search({}, '   ')).rejects.toBeInstanceOf(InvalidQueryError);
  });

  it('selects the matching text passage', async () => {
    const result = selected(await search({ pdf_text: [reportText] }, '  revenue growth '));
    expect(result.candidate.type).toBe('text');
    expect(result.score).toBeGreaterThan(0);

    const payload = formatResult(result, 'revenue growth');
    const serialized = JSON.stringify(payload);
    expect(serialized).toContain('revenue growth');
    expect(serialized).toContain('report.pdf');
  });

  it('returns the best video for explicit video requests even when text scores higher', async () => {
    const result = selected(
      await search({ pdf_text: [textOf('play the demo video')], videos: [overviewVideo] }, 'play the demo video')
    );
    expect(result.candidate.type).toBe('video');
    // Only "the" overlaps: (1/5) / 4 query words.
    expect(result.score).toBeCloseTo(0.05, 10);
  });

  it('returns a zero-scoring video for explicit video requests', async () => {
    const video = { ...overviewVideo, title: 'Quarterly numbers', description: '' };
    const result = selected(await search({ videos: [video] }, 'watch something'));
    expect(result.candidate.type).toBe('video');
    expect(result.score).toBe(0);
  });

  it('falls back to general search when a video request finds no videos', async () => {
    const content = 'video show a video show b video show c d';
    const result = selected(await search({ pdf_text: [textOf(content)] }, 'show video'));
    expect(result.candidate.type).toBe('text');
    expect(result.score).toBeCloseTo(0.3, 10);
  });

  it('applies the low video threshold outside of video requests', async () => {
    const result = selected(await search({ videos: [overviewVideo] }, 'company results'));
    expect(result.candidate.type).toBe('video');
    expect(result.score).toBeCloseTo(0.1, 10);
  });

  it('returns empty when nothing overlaps', async () => {
    const result = await search(
      { pdf_text: [reportText], pdf_images: [chartImage], videos: [overviewVideo] },
      'xyzzy nonsense'
    );
    expect(result).toEqual({ status: 'empty' });
  });

  it('excludes text scoring exactly the threshold', async () => {
    const atThreshold = textOf('alpha one two three four five six seven eight nine');
    expect(await search({ pdf_text: [atThreshold] }, 'alpha beta')).toEqual({ status: 'empty' });
  });

  it('includes text scoring just above the threshold', async () => {
    const aboveThreshold = textOf('alpha one two three four five six seven eight');
    const result = selected(await search({ pdf_text: [aboveThreshold] }, 'alpha beta'));
    expect(result.score).toBeCloseTo(1 / 18, 10);
  });

  it('never matches an image stored with an empty description', async () => {
    const image = { ...chartImage, source_file: 'chart.pdf', description: '' };
    expect(await search({ pdf_images: [image] }, 'chart')).toEqual({ status: 'empty' });
  });

  it('excludes an image scoring exactly its threshold', async () => {
    // "alpha" is 1 of 50 words and "beta" is absent: (1/50) / 2 = 0.01.
    const image = { ...chartImage, description: `alpha ${fillerWords(49)}` };
    expect(await search({ pdf_images: [image] }, 'alpha beta')).toEqual({ status: 'empty' });
  });

  it('includes an image scoring just above its threshold', async () => {
    const image = { ...chartImage, description: `alpha ${fillerWords(48)}` };
    const result = selected(await search({ pdf_images: [image] }, 'alpha beta'));
    expect(result.candidate.type).toBe('image');
    expect(result.score).toBeCloseTo(1 / 98, 10);
  });

  it('drops a video scoring exactly its threshold outside of video requests', async () => {
    // Title plus description give 500 words: (1/500) / 2 = 0.001.
    const video = { ...overviewVideo, title: 'alpha', description: fillerWords(499) };
    expect(await search({ videos: [video] }, 'alpha beta')).toEqual({ status: 'empty' });
  });

  it('keeps a video scoring just above its threshold outside of video requests', async () => {
    const video = { ...overviewVideo, title: 'alpha', description: fillerWords(498) };
    const result = selected(await search({ videos: [video] }, 'alpha beta'));
    expect(result.candidate.type).toBe('video');
    expect(result.score).toBeCloseTo(1 / 998, 10);
  });

  it('falls back to general search when videos cannot be fetched for a video request', async () => {
    const repository = new FlakyRepository({ pdf_text: [reportText], videos: [overviewVideo] }, ['videos']);
    const result = selected(await serviceFor(repository).search('watch revenue growth'));
    expect(result.candidate.type).toBe('text');
    expect(result.candidate.source).toBe('report.pdf');
    // "revenue" and "growth" are each 1 of 6 words, "watch" is absent: (2/6) / 3.
    expect(result.score).toBeCloseTo(1 / 9, 10);
    // Videos once for the request, then text and images; videos are not fetched again.
    expect(repository.calls).toBe(3);
  });

  it('keeps searching when one content type fails', async () => {
    const repository = new FlakyRepository({ pdf_text: [reportText], pdf_images: [chartImage] }, ['pdf_text']);
    const result = selected(await serviceFor(repository).search('revenue chart'));
    expect(result.candidate.type).toBe('image');
  });

  it('retries when every content type fails and recovers', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const repository = new FlakyRepository({ pdf_text: [reportText] }, ALL_COLLECTIONS, 3);
    const result = selected(await serviceFor(repository, sleep).search('revenue growth'));
    expect(result.candidate.type).toBe('text');
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(2000);
  });

  it('gives up after three attempts with capped exponential backoff', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const repository = new FlakyRepository({}, ALL_COLLECTIONS);
    await expect(serviceFor(repository, sleep).search('revenue growth')).rejects.toBeInstanceOf(
      SearchUnavailableError
    );
    expect(repository.calls).toBe(9);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 4000]);
  });
});

describe('pickBest', () => {
  const entry = (type: Candidate['type'], value: number, source: string = type): ScoredCandidate => {
    const base = { source, searchableText: '' };
    const candidate: Candidate =
      type === 'text'
        ? { ...base, type, content: '', page: 1 }
        : type === 'image'
          ? { ...base, type, description: '', imageUrl: '', page: 1 }
          : { ...base, type, title: '', description: '', videoUrl: '', duration: '', views: 0 };
    return { candidate, score: value };
  };

  it('returns null for an empty pool', () => {
    expect(pickBest([])).toBeNull();
  });

  it('picks the highest score', () => {
    expect(pickBest([entry('image', 0.2), entry('text', 0.9), entry('video', 0.4)])?.score).toBe(0.9);
  });

  it('breaks ties video, then text, then image', () => {
    expect(pickBest([entry('image', 0.5), entry('text', 0.5), entry('video', 0.5)])?.candidate.type).toBe('video');
    expect(pickBest([entry('image', 0.5), entry('text', 0.5)])?.candidate.type).toBe('text');
  });

  it('keeps the first candidate among equal scores of one type', () => {
    expect(pickBest([entry('text', 0.5, 'a.pdf'), entry('text', 0.5, 'b.pdf')])?.candidate.source).toBe('a.pdf');
  });
});
