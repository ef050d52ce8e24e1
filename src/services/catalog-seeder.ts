/**
 * Catalog Seeder
 * Embeds every catalog item into the text partition, and every item whose
 * picture can be read into the image partition.
 */

import * as fs from 'fs/promises';
import type { Logger } from 'pino';
import { catalogSearchText, type CatalogItem } from './catalog.js';
import type { ImageEmbedder, TextEmbedder } from './embeddings.js';
import type { SimilarityStore } from './vector-store.js';

export interface CatalogSeederDeps {
  textEmbedder: TextEmbedder;
  imageEmbedder: ImageEmbedder;
  store: SimilarityStore;
  logger: Logger;
  /** Defaults to reading from disk */
  readImage?: (imagePath: string) => Promise<Buffer>;
}

export interface SeedSummary {
  textCount: number;
  imageCount: number;
  skippedImages: string[];
}

export async function seedCatalog(products: CatalogItem[], deps: CatalogSeederDeps): Promise<SeedSummary> {
  const readImage = deps.readImage ?? ((imagePath: string) => fs.readFile(imagePath));

  deps.logger.info(`Creating text embeddings for ${products.length} products`);
  const vectors = await deps.textEmbedder.embedTexts(products.map(catalogSearchText));
  if (vectors.length !== products.length) {
    throw new Error(`Expected ${products.length} text embeddings, got ${vectors.length}`);
  }

  for (let i = 0; i < products.length; i++) {
    const product = products[i];
    await deps.store.upsert('products_text', product.id, vectors[i], product);
  }

  deps.logger.info('Creating image embeddings');
  const skippedImages: string[] = [];
  let imageCount = 0;

  for (const product of products) {
    let image: Buffer;
    try {
      image = await readImage(product.image_path);
    } catch (err) {
      deps.logger.warn({ err }, `Image not found for ${product.name}: ${product.image_path}`);
      skippedImages.push(product.id);
      continue;
    }

    try {
      const vector = await deps.imageEmbedder.embedImage(image);
      await deps.store.upsert('products_images', product.id, vector, product);
      imageCount++;
    } catch (err) {
      deps.logger.warn({ err }, `Could not process image for ${product.name}`);
      skippedImages.push(product.id);
    }
  }

  if (imageCount === 0) {
    deps.logger.warn('No valid product images found');
  }

  return { textCount: products.length, imageCount, skippedImages };
}
