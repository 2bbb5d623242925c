import { VIDEO_INTENT_KEYWORDS } from '../config/search/constants';

export function isVideoRequest(query: string): boolean {
  const lowered = query.toLowerCase();
  return VIDEO_INTENT_KEYWORDS.some((keyword) => lowered.includes(keyword));
}
