import { describe, it, expect, vi } from 'vitest';
import { createCatalogToolRegistry, createImageSearchTool, createTextSearchTool } from '../index.js';
import { IMAGE_SEARCH, TEXT_SEARCH } from '../types.js';
import { RetrievalRouter } from '../../retrieval.js';
import { InMemoryVectorStore } from '../../vector-store.js';
import type { CatalogItem } from '../../catalog.js';

const mug: CatalogItem = {
  id: 'mug-1',
  name: 'Ceramic Mug',
  category: 'Kitchen',
  description: 'Glazed stoneware mug',
  price: 12,
  image_path: 'images/mug.jpg',
  tags: ['coffee'],
};

function createRouter() {
  const router = new RetrievalRouter({
    textEmbedder: { embedText: vi.fn(async () => [1]), embedTexts: vi.fn(async () => []) },
    imageEmbedder: { embedImage: vi.fn(async () => [1]) },
    store: new InMemoryVectorStore(),
  });
  const search = vi.spyOn(router, 'search').mockResolvedValue([mug]);
  return { router, search };
}

describe('Product search tools', () => {
  it('text search routes the query to the text modality', async () => {
    const { router, search } = createRouter();
    const tool = createTextSearchTool(router);

    await expect(tool.execute({ query: 'coffee mug', n_results: 4 })).resolves.toEqual([mug]);
    expect(search).toHaveBeenCalledWith('text', 'coffee mug', 4);
  });

  it('image search routes the payload to the image modality', async () => {
    const { router, search } = createRouter();
    const tool = createImageSearchTool(router);

    await tool.execute({ image_base64: 'aW1hZ2U=', n_results: 2 });
    expect(search).toHaveBeenCalledWith('image', 'aW1hZ2U=', 2);
  });

  it('applies the configured default result count', () => {
    const { router } = createRouter();
    const tool = createTextSearchTool(router, 7);

    expect(tool.schema.parse({ query: 'mug' })).toEqual({ query: 'mug', n_results: 7 });
    expect(tool.parameters.find(p => p.name === 'n_results')?.default).toBe(7);
  });

  it('rejects blank queries and non-positive counts', () => {
    const { router } = createRouter();
    const tool = createTextSearchTool(router);

    expect(tool.schema.safeParse({ query: '   ' }).success).toBe(false);
    expect(tool.schema.safeParse({ query: 'mug', n_results: 0 }).success).toBe(false);
    expect(tool.schema.safeParse({ query: 'mug', n_results: 1.5 }).success).toBe(false);
  });

  it('requires an image payload', () => {
    const { router } = createRouter();
    const tool = createImageSearchTool(router);

    expect(tool.schema.safeParse({}).success).toBe(false);
    expect(tool.schema.safeParse({ image_base64: '' }).success).toBe(false);
  });

  it('builds a registry with exactly the two catalog operations', () => {
    const { router } = createRouter();
    const registry = createCatalogToolRegistry(router, { defaultResultCount: 3 });

    expect(registry.getAll().map(t => t.name)).toEqual([TEXT_SEARCH, IMAGE_SEARCH]);
    expect(registry.toProviderTools().map(t => t.function.parameters.required)).toEqual([
      ['query'],
      ['image_base64'],
    ]);
  });
});
