import type { CandidateType } from '../../types';

export const COLLECTIONS = {
  text: 'pdf_text',
  image: 'pdf_images',
  video: 'videos'
} as const;

export type CollectionName = (typeof COLLECTIONS)[keyof typeof COLLECTIONS];

// Minimum score a candidate must exceed (strictly) in the general search.
export const SCORE_THRESHOLDS: Record<CandidateType, number> = {
  text: 0.05,
  image: 0.01,
  video: 0.001
};

export const SCORE_BONUSES = {
  exactMatch: 1.0,
  titleMatch: 0.5
};

export const TITLE_MARKER = 'title';

export const VIDEO_INTENT_KEYWORDS = ['video', 'watch', 'play', 'show video'] as const;

// Equal scores resolve to the earliest type in this list.
export const TYPE_PRIORITY: readonly CandidateType[] = ['video', 'text', 'image'];

export const SEARCH_RETRY = {
  attempts: 3,
  maxBackoffMs: 10_000
};

export const FALLBACK_LABELS = {
  source: 'Unknown',
  page: 'N/A',
  imageSource: 'unknown document'
};
