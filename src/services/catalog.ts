/**
 * Product Catalog
 * Catalog item shape shared by the store, the retrieval router and the agent
 */

import * as fs from 'fs/promises';
import { z } from 'zod';

export const CatalogItemSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  category: z.string(),
  description: z.string(),
  price: z.number(),
  image_path: z.string(),
  tags: z.array(z.string()).default([]),
});

export type CatalogItem = z.infer<typeof CatalogItemSchema>;

const CatalogFileSchema = z.array(CatalogItemSchema);

/**
 * Text indexed for semantic search: name, description and tags
 */
export function catalogSearchText(item: CatalogItem): string {
  return `${item.name} ${item.description} ${item.tags.join(' ')}`;
}

/**
 * Load the product catalog JSON file used for seeding
 */
export async function loadCatalog(filePath: string): Promise<CatalogItem[]> {
  const raw = await fs.readFile(filePath, 'utf-8');
  const parsed = CatalogFileSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Invalid catalog file ${filePath}: ${parsed.error.message}`);
  }
  return parsed.data;
}
