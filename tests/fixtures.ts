import pino from 'pino';
import { COLLECTIONS, type CollectionName } from '../src/config/search/constants';
import { InMemoryContentRepository } from '../src/repositories/contentRepository';
import { CandidateProvider } from '../src/services/candidateProvider';
import { createPublicUrlResolver } from '../src/services/storageUrl';
import type { RawRecord } from '../src/types';

export const silentLogger = pino({ level: 'silent' });

export const resolveUrl = createPublicUrlResolver({
  baseUrl: 'https://storage.example.test',
  bucket: 'docs',
  now: () => 1_700_000_000_000
});

export const reportText: RawRecord = {
  id: 1,
  source_file: 'report.pdf',
  page: 3,
  content: 'The quarterly report shows revenue growth'
};

export const chartImage: RawRecord = {
  id: 1,
  source_file: 'report.pdf',
  page: 4,
  image_path: 'extracted_images/report.pdf_p3_i0.png',
  description: 'Contains: Revenue chart, Bar chart'
};

export const overviewVideo: RawRecord = {
  id: 1,
  title: 'Company overview',
  description: 'Meet the team',
  video_url: 'https://videos.example.test/overview',
  duration: '3:15',
  views: 1200
};

export type Seed = Partial<Record<CollectionName, RawRecord[]>>;

/** Throws for the listed collections while `failuresLeft` is positive. */
export class FlakyRepository extends InMemoryContentRepository {
  calls = 0;

  constructor(
    seed: Seed,
    private readonly failing: CollectionName[],
    private failuresLeft = Number.POSITIVE_INFINITY
  ) {
    super(seed);
  }

  async fetchAll(collection: CollectionName): Promise<RawRecord[]> {
    this.calls += 1;
    if (this.failing.includes(collection) && this.failuresLeft > 0) {
      this.failuresLeft -= 1;
      throw new Error(`connection reset while reading ${collection}`);
    }
    return super.fetchAll(collection);
  }
}

export function providerFor(seed: Seed): CandidateProvider {
  return new CandidateProvider(new InMemoryContentRepository(seed), resolveUrl);
}

export const ALL_COLLECTIONS = Object.values(COLLECTIONS);
