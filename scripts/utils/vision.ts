import { z } from 'zod';
import { VISION_LIMITS } from '../../src/config/ingest/constants';
import { fetchWithRetry } from './retry';

const annotateResponseSchema = z.object({
  responses: z
    .array(
      z.object({
        labelAnnotations: z.array(z.object({ description: z.string() })).optional(),
        localizedObjectAnnotations: z.array(z.object({ name: z.string() })).optional(),
        textAnnotations: z.array(z.object({ description: z.string() })).optional(),
        error: z.object({ message: z.string() }).optional()
      })
    )
    .default([])
});

export type ImageAnnotations = z.infer<typeof annotateResponseSchema>['responses'][number];

export const VISION_FEATURES = ['LABEL_DETECTION', 'TEXT_DETECTION', 'OBJECT_LOCALIZATION'] as const;

export function describeAnnotations(annotations: ImageAnnotations): string | null {
  const parts: string[] = [];

  const labels = (annotations.labelAnnotations ?? []).slice(0, VISION_LIMITS.labels).map((l) => l.description);
  if (labels.length) parts.push(`Contains: ${labels.join(', ')}`);

  const objects = (annotations.localizedObjectAnnotations ?? []).slice(0, VISION_LIMITS.objects).map((o) => o.name);
  if (objects.length) parts.push(`Objects: ${objects.join(', ')}`);

  const text = annotations.textAnnotations?.[0]?.description.replace(/\n/g, ' ').slice(0, VISION_LIMITS.textChars);
  if (text) parts.push(`Text: ${text}`);

  return parts.length ? parts.join(' | ') : null;
}

export interface VisionClientOptions {
  endpoint: string;
  apiKey?: string;
}

export async function annotateImage(content: Buffer, options: VisionClientOptions): Promise<ImageAnnotations> {
  const url = options.apiKey ? `${options.endpoint}?key=${encodeURIComponent(options.apiKey)}` : options.endpoint;
  const res = await fetchWithRetry(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({
      requests: [
        {
          image: { content: content.toString('base64') },
          features: VISION_FEATURES.map((type) => ({ type }))
        }
      ]
    })
  });

  const data = annotateResponseSchema.parse(await res.json());
  const first = data.responses[0] ?? {};
  if (first.error) {
    throw new Error(`Vision annotate failed: ${first.error.message}`);
  }
  return first;
}

export async function describeImage(content: Buffer, options: VisionClientOptions): Promise<string | null> {
  return describeAnnotations(await annotateImage(content, options));
}
