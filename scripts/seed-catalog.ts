#!/usr/bin/env node
/**
 * Build the catalog index: embed products.json and write the vector store snapshot
 */

import 'dotenv/config';

import fs from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import OpenAI from 'openai';
import { env } from '../src/env.js';
import { createLogger } from '../src/logger.js';
import { loadCatalog } from '../src/services/catalog.js';
import { seedCatalog } from '../src/services/catalog-seeder.js';
import { OpenAIEmbedder } from '../src/services/embeddings.js';
import { HttpImageEmbedder } from '../src/services/image-embeddings.js';
import { InMemoryVectorStore } from '../src/services/vector-store.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const rootDir = path.join(__dirname, '..');

async function main() {
  const logger = createLogger();

  if (!env.OPENAI_API_KEY) {
    throw new Error('OPENAI_API_KEY is required to create text embeddings');
  }

  const productsPath = path.resolve(rootDir, env.PRODUCTS_PATH);
  const snapshotPath = path.resolve(rootDir, env.VECTOR_DB_PATH);

  const products = await loadCatalog(productsPath);
  logger.info(`Loaded ${products.length} products from ${productsPath}`);

  const store = new InMemoryVectorStore();
  const summary = await seedCatalog(products, {
    textEmbedder: new OpenAIEmbedder(
      new OpenAI({ apiKey: env.OPENAI_API_KEY, ...(env.OPENAI_BASE_URL ? { baseURL: env.OPENAI_BASE_URL } : {}) }),
      { model: env.EMBEDDING_MODEL },
    ),
    imageEmbedder: new HttpImageEmbedder(env.IMAGE_EMBEDDING_URL),
    store,
    logger,
    readImage: (imagePath) => fs.readFile(path.resolve(rootDir, imagePath)),
  });

  await store.save(snapshotPath);

  logger.info(
    { text: summary.textCount, images: summary.imageCount, skipped: summary.skippedImages.length },
    `Catalog snapshot written to ${snapshotPath}`,
  );
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
