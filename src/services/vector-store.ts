/**
 * Vector Store
 * Cosine-similarity search over catalog embeddings, one partition per modality.
 * Partitions live in memory and persist as a JSON snapshot written by the seed script.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { CatalogItemSchema, type CatalogItem } from './catalog.js';
import { StoreQueryFailure } from '../utils/errors.js';

export const PARTITIONS = ['products_text', 'products_images'] as const;

export type Partition = (typeof PARTITIONS)[number];

export interface SimilarityMatch {
  id: string;
  similarity: number;
  metadata: CatalogItem;
}

export interface SimilarityStore {
  upsert(partition: Partition, id: string, vector: number[], metadata: CatalogItem): Promise<void>;
  /** Ranked best-first, at most `limit` entries. */
  query(partition: Partition, vector: number[], limit: number): Promise<SimilarityMatch[]>;
  count(partition: Partition): Promise<number>;
}

interface StoredVector {
  id: string;
  vector: number[];
  metadata: CatalogItem;
}

const StoredVectorSchema = z.object({
  id: z.string(),
  vector: z.array(z.number()),
  metadata: CatalogItemSchema,
});

const SnapshotSchema = z.object({
  version: z.literal(1),
  partitions: z.object({
    products_text: z.array(StoredVectorSchema).default([]),
    products_images: z.array(StoredVectorSchema).default([]),
  }),
});

type Snapshot = z.infer<typeof SnapshotSchema>;

/**
 * Calculate cosine similarity between two vectors
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vectors must have the same length (${a.length} vs ${b.length})`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  normA = Math.sqrt(normA);
  normB = Math.sqrt(normB);

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dotProduct / (normA * normB);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class InMemoryVectorStore implements SimilarityStore {
  private partitions: Record<Partition, Map<string, StoredVector>> = {
    products_text: new Map(),
    products_images: new Map(),
  };

  async upsert(partition: Partition, id: string, vector: number[], metadata: CatalogItem): Promise<void> {
    this.partitions[partition].set(id, { id, vector: [...vector], metadata });
  }

  async query(partition: Partition, vector: number[], limit: number): Promise<SimilarityMatch[]> {
    if (limit <= 0) {
      return [];
    }

    const scored: SimilarityMatch[] = [];
    try {
      for (const entry of this.partitions[partition].values()) {
        scored.push({
          id: entry.id,
          similarity: cosineSimilarity(vector, entry.vector),
          metadata: entry.metadata,
        });
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new StoreQueryFailure(partition, `Query against ${partition} failed: ${message}`, error);
    }

    // Array.prototype.sort is stable: equal scores keep insertion order
    scored.sort((a, b) => b.similarity - a.similarity);
    return scored.slice(0, limit);
  }

  async count(partition: Partition): Promise<number> {
    return this.partitions[partition].size;
  }

  clear(): void {
    for (const partition of PARTITIONS) {
      this.partitions[partition].clear();
    }
  }

  /**
   * Replace the store contents with a snapshot file.
   * Returns false when the file does not exist (store left empty).
   */
  async load(filePath: string): Promise<boolean> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw error;
    }

    const parsed = SnapshotSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Invalid vector store snapshot ${filePath}: ${parsed.error.message}`);
    }

    this.clear();
    for (const partition of PARTITIONS) {
      for (const entry of parsed.data.partitions[partition]) {
        this.partitions[partition].set(entry.id, entry);
      }
    }
    return true;
  }

  async save(filePath: string): Promise<void> {
    const snapshot: Snapshot = {
      version: 1,
      partitions: {
        products_text: Array.from(this.partitions.products_text.values()),
        products_images: Array.from(this.partitions.products_images.values()),
      },
    };

    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(snapshot), 'utf-8');
  }
}
