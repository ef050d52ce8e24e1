/**
 * Retrieval Service
 * Routes a search to the text or image index of the catalog.
 *
 * Text queries are embedded with the text model and matched against
 * `products_text`; images are embedded with the image model and matched
 * against `products_images`. The two partitions are never mixed, and the
 * store's ranking is returned as-is.
 */

import type { CatalogItem } from './catalog.js';
import type { ImageEmbedder, TextEmbedder } from './embeddings.js';
import { decodeBase64Image } from './image-embeddings.js';
import type { Partition, SimilarityStore } from './vector-store.js';

export type SearchModality = 'text' | 'image';

const PARTITION_BY_MODALITY: Record<SearchModality, Partition> = {
  text: 'products_text',
  image: 'products_images',
};

export interface RetrievalRouterDeps {
  textEmbedder: TextEmbedder;
  imageEmbedder: ImageEmbedder;
  store: SimilarityStore;
}

export class RetrievalRouter {
  constructor(private deps: RetrievalRouterDeps) {}

  /**
   * @param query - free text for `text`, base64 image (bare or data URL) for `image`
   * @param limit - maximum number of items returned
   */
  async search(modality: SearchModality, query: string, limit: number): Promise<CatalogItem[]> {
    const vector = await this.embed(modality, query);
    const matches = await this.deps.store.query(PARTITION_BY_MODALITY[modality], vector, limit);
    return matches.map((match) => match.metadata);
  }

  private embed(modality: SearchModality, query: string): Promise<number[]> {
    switch (modality) {
      case 'text':
        return this.deps.textEmbedder.embedText(query);
      case 'image':
        return this.deps.imageEmbedder.embedImage(decodeBase64Image(query));
    }
  }
}
