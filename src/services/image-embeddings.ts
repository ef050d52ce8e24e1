// Image embedding client
// Talks to a CLIP embedding service over HTTP: POST { image: <base64> } -> { embedding: number[] }

import { z } from 'zod';
import type { ImageEmbedder } from './embeddings.js';
import { ProviderFailure } from '../utils/errors.js';

const EmbeddingResponseSchema = z.object({
  embedding: z.array(z.number()).min(1),
});

/**
 * Decode a base64 image, accepting both bare base64 and data URLs
 * ("data:image/png;base64,....").
 */
export function decodeBase64Image(value: string): Buffer {
  const commaIndex = value.indexOf(',');
  const payload = commaIndex >= 0 ? value.slice(commaIndex + 1) : value;
  const bytes = Buffer.from(payload.trim(), 'base64');
  if (bytes.length === 0) {
    throw new Error('Image payload is empty or not base64');
  }
  return bytes;
}

export class HttpImageEmbedder implements ImageEmbedder {
  constructor(
    private endpoint: string,
    private timeoutMs: number = 30000,
  ) {}

  async embedImage(image: Buffer): Promise<number[]> {
    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify({ image: image.toString('base64') }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw ProviderFailure.wrap('image-embeddings', error);
    }

    if (!response.ok) {
      const error = await response.text();
      throw new ProviderFailure('image-embeddings', `Image embedding service error (${response.status}): ${error}`);
    }

    const parsed = EmbeddingResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderFailure('image-embeddings', 'Image embedding service returned a malformed response');
    }

    return parsed.data.embedding;
  }
}
