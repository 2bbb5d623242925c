import type { BaseLogger } from 'pino';
import { SCORE_THRESHOLDS, SEARCH_RETRY, TYPE_PRIORITY } from '../config/search/constants';
import {
  InvalidQueryError,
  PartialFetchFailure,
  RepositoryUnavailableError,
  SearchUnavailableError
} from '../errors';
import { RetryExhaustedError, type RetryPolicy, cappedExponentialBackoff, withRetry } from '../utils/retry';
import type { CandidateProvider } from './candidateProvider';
import { isVideoRequest } from './intent';
import { score } from './scoring';
import type { Candidate, CandidateType, ScoredCandidate, SelectionResult } from '../types';

export interface SearchServiceOptions {
  provider: CandidateProvider;
  logger: BaseLogger;
  retry?: Partial<RetryPolicy>;
}

function scoreAll<C extends Candidate>(query: string, candidates: C[]): ScoredCandidate<C>[] {
  return candidates.map((candidate) => ({ candidate, score: score(query, candidate.searchableText) }));
}

function aboveThreshold<C extends Candidate>(scored: ScoredCandidate<C>[], type: CandidateType): ScoredCandidate<C>[] {
  const threshold = SCORE_THRESHOLDS[type];
  return scored.filter((s) => s.score > threshold);
}

/**
 * Highest score wins. Ties go to the type listed first in TYPE_PRIORITY, then
 * to the candidate encountered first within that type.
 */
export function pickBest(pool: ScoredCandidate[]): ScoredCandidate | null {
  const ordered = TYPE_PRIORITY.flatMap((type) => pool.filter((s) => s.candidate.type === type));
  let best: ScoredCandidate | null = null;
  for (const entry of ordered) {
    if (!best || entry.score > best.score) best = entry;
  }
  return best;
}

export class SearchService {
  private readonly provider: CandidateProvider;
  private readonly logger: BaseLogger;
  private readonly retry: RetryPolicy;

  constructor(options: SearchServiceOptions) {
    this.provider = options.provider;
    this.logger = options.logger;
    this.retry = {
      attempts: options.retry?.attempts ?? SEARCH_RETRY.attempts,
      backoffMs: options.retry?.backoffMs ?? cappedExponentialBackoff(SEARCH_RETRY.maxBackoffMs),
      sleep: options.retry?.sleep,
      onRetry: options.retry?.onRetry
    };
  }

  async search(rawQuery: string, log: BaseLogger = this.logger): Promise<SelectionResult> {
    const query = rawQuery.trim();
    if (!query) throw new InvalidQueryError();

    const videoIntent = isVideoRequest(query);
    log.info({ query, videoIntent }, 'Starting search');

    if (videoIntent) {
      const videos = scoreAll(query, await this.fetchOrEmpty('video', () => this.provider.fetchVideos(log), log));
      this.logVideoScores(videos, log);
      // Explicit video requests take the best video regardless of threshold.
      const forced = pickBest(videos);
      if (forced) {
        log.info({ score: forced.score }, 'Returning best video for explicit video request');
        return { status: 'selected', result: forced };
      }
      log.info('No videos available for video request, falling back to general search');
    }

    try {
      return await withRetry(() => this.generalSearch(query, videoIntent, log), {
        ...this.retry,
        onRetry: (info) => {
          log.warn({ attempt: info.attempt, delayMs: info.delayMs, err: info.error }, 'Retrying search');
          this.retry.onRetry?.(info);
        }
      });
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        log.error({ err: err.cause }, 'Search retries exhausted');
        throw new SearchUnavailableError(err.attempts, err.cause);
      }
      throw err;
    }
  }

  private async generalSearch(query: string, videoIntent: boolean, log: BaseLogger): Promise<SelectionResult> {
    const failures: PartialFetchFailure[] = [];
    const texts = aboveThreshold(
      scoreAll(query, await this.fetchOrEmpty('text', () => this.provider.fetchTexts(log), log, failures)),
      'text'
    );
    const images = aboveThreshold(
      scoreAll(query, await this.fetchOrEmpty('image', () => this.provider.fetchImages(log), log, failures)),
      'image'
    );

    let videos: ScoredCandidate[] = [];
    let attempted = 2;
    if (!videoIntent) {
      attempted += 1;
      const scored = scoreAll(
        query,
        await this.fetchOrEmpty('video', () => this.provider.fetchVideos(log), log, failures)
      );
      this.logVideoScores(scored, log);
      videos = aboveThreshold(scored, 'video');
    }

    // Every content type failing means the repository itself is down.
    if (failures.length === attempted) {
      throw new RepositoryUnavailableError(failures);
    }

    log.info({ texts: texts.length, images: images.length, videos: videos.length }, 'Eligible candidates');

    const best = pickBest([...videos, ...texts, ...images]);
    if (!best) {
      log.info('No results found');
      return { status: 'empty' };
    }
    log.info({ type: best.candidate.type, score: best.score }, 'Found best match');
    return { status: 'selected', result: best };
  }

  private async fetchOrEmpty<C extends Candidate>(
    type: CandidateType,
    fetcher: () => Promise<C[]>,
    log: BaseLogger,
    failures: PartialFetchFailure[] = []
  ): Promise<C[]> {
    try {
      return await fetcher();
    } catch (err) {
      const failure = new PartialFetchFailure(type, err);
      failures.push(failure);
      log.error({ err: failure }, failure.message);
      return [];
    }
  }

  private logVideoScores(videos: ScoredCandidate[], log: BaseLogger): void {
    for (const { candidate, score: value } of videos) {
      if (candidate.type === 'video') log.debug({ title: candidate.title, score: value }, 'Video scored');
    }
  }
}
