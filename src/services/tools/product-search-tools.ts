// Product search tools
// Text and image similarity search over the catalog, backed by the retrieval router

import { z } from 'zod';
import type { RetrievalRouter } from '../retrieval.js';
import { IMAGE_SEARCH, TEXT_SEARCH, type ToolDefinition } from './types.js';

export const DEFAULT_RESULT_COUNT = 5;

const resultCount = (defaultCount: number) =>
  z.number().int().positive().default(defaultCount);

export function createTextSearchTool(
  router: RetrievalRouter,
  defaultCount: number = DEFAULT_RESULT_COUNT,
): ToolDefinition<typeof TEXT_SEARCH> {
  return {
    name: TEXT_SEARCH,
    description: 'Search for products in the catalog based on a text description. Use this when the user asks for product recommendations or wants to find specific items.',
    parameters: [
      {
        name: 'query',
        type: 'string',
        description: "The product search query based on user's description",
        required: true,
      },
      {
        name: 'n_results',
        type: 'integer',
        description: `Number of products to return (default ${defaultCount})`,
        required: false,
        default: defaultCount,
      },
    ],
    schema: z.object({
      query: z.string().trim().min(1),
      n_results: resultCount(defaultCount),
    }),
    execute: async (args) => router.search('text', args.query, args.n_results),
  };
}

export function createImageSearchTool(
  router: RetrievalRouter,
  defaultCount: number = DEFAULT_RESULT_COUNT,
): ToolDefinition<typeof IMAGE_SEARCH> {
  return {
    name: IMAGE_SEARCH,
    description: 'Search for products similar to an uploaded image. Use this when the user uploads an image and wants to find similar products.',
    parameters: [
      {
        name: 'image_base64',
        type: 'string',
        description: 'Base64 encoded image data of the image the user uploaded',
        required: true,
      },
      {
        name: 'n_results',
        type: 'integer',
        description: `Number of products to return (default ${defaultCount})`,
        required: false,
        default: defaultCount,
      },
    ],
    schema: z.object({
      image_base64: z.string().min(1),
      n_results: resultCount(defaultCount),
    }),
    execute: async (args) => router.search('image', args.image_base64, args.n_results),
  };
}
