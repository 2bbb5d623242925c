export type CandidateType = 'text' | 'image' | 'video';

/** Page number as stored, or the `'N/A'` label when a row carries none. */
export type PageRef = number | string;

interface CandidateBase {
  source: string;
  searchableText: string;
}

export interface TextCandidate extends CandidateBase {
  type: 'text';
  content: string;
  page: PageRef;
}

export interface ImageCandidate extends CandidateBase {
  type: 'image';
  description: string;
  imageUrl: string;
  page: PageRef;
}

export interface VideoCandidate extends CandidateBase {
  type: 'video';
  title: string;
  description: string;
  videoUrl: string;
  duration: string;
  views: number;
}

export type Candidate = TextCandidate | ImageCandidate | VideoCandidate;

export interface ScoredCandidate<C extends Candidate = Candidate> {
  candidate: C;
  score: number;
}

export type SelectionResult =
  | { status: 'selected'; result: ScoredCandidate }
  | { status: 'empty' };

export type RawRecord = Record<string, unknown>;

export interface SessionParameters {
  has_image: boolean;
  has_video: boolean;
  query?: string;
  image_url?: string;
  source?: string;
  page?: PageRef;
  video_title?: string;
  video_url?: string;
  video_description?: string;
  video_duration?: string;
  video_views?: number;
}

export interface RichContentItem {
  type: 'image' | 'video';
  rawUrl: string;
  accessibilityText: string;
}

export type ResponseMessage =
  | { text: { text: string[] } }
  | { payload: { richContent: RichContentItem[][] } };

export interface WebhookResponse {
  sessionInfo: { parameters: SessionParameters };
  fulfillmentResponse: { messages: ResponseMessage[] };
}
