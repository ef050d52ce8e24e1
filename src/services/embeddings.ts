/**
 * Embedding Service
 * Generates text embeddings with the OpenAI embeddings API
 */

import OpenAI from 'openai';
import { ProviderFailure } from '../utils/errors.js';

export interface TextEmbedder {
  embedText(text: string): Promise<number[]>;
  embedTexts(texts: string[]): Promise<number[][]>;
}

export interface ImageEmbedder {
  embedImage(image: Buffer): Promise<number[]>;
}

export interface OpenAIEmbedderOptions {
  model: string;
  /** OpenAI accepts up to 2048 inputs per request */
  batchSize?: number;
  /** Pause between batches to stay under rate limits */
  batchDelayMs?: number;
}

export class OpenAIEmbedder implements TextEmbedder {
  private model: string;
  private batchSize: number;
  private batchDelayMs: number;

  constructor(
    private client: OpenAI,
    options: OpenAIEmbedderOptions,
  ) {
    this.model = options.model;
    this.batchSize = options.batchSize ?? 100;
    this.batchDelayMs = options.batchDelayMs ?? 100;
  }

  async embedText(text: string): Promise<number[]> {
    const [embedding] = await this.request([text]);
    if (!embedding) {
      throw new ProviderFailure('openai-embeddings', 'Embedding response contained no vectors');
    }
    return embedding;
  }

  /**
   * Generate embeddings for multiple texts, in order, batch by batch
   */
  async embedTexts(texts: string[]): Promise<number[][]> {
    const embeddings: number[][] = [];

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      embeddings.push(...await this.request(batch));

      if (i + this.batchSize < texts.length && this.batchDelayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.batchDelayMs));
      }
    }

    return embeddings;
  }

  private async request(input: string[]): Promise<number[][]> {
    try {
      const response = await this.client.embeddings.create({
        model: this.model,
        input,
        encoding_format: 'float',
      });

      // The API does not promise input order in data; index does
      return [...response.data]
        .sort((a, b) => a.index - b.index)
        .map((d) => d.embedding);
    } catch (error) {
      throw ProviderFailure.wrap('openai-embeddings', error);
    }
  }
}
