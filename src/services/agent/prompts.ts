// System prompt and product rendering for the shopping assistant

import type { CatalogItem } from '../catalog.js';
import { IMAGE_SEARCH, TEXT_SEARCH } from '../tools/types.js';

export const SYSTEM_PROMPT = `You are a helpful AI shopping assistant for an e-commerce store.

Your capabilities:
1. Have general conversations with users
2. Help users find products based on text descriptions
3. Help users find products similar to images they upload

IMPORTANT GUIDELINES:
- When users ask for product recommendations, focus ONLY on their current request
- Do NOT reference or mention products from previous searches unless specifically asked
- Each product search should be treated as a fresh request
- Use the ${TEXT_SEARCH} function to find relevant items for the current query
- Use the ${IMAGE_SEARCH} function when users upload images

For product searches:
- Be specific about what you're searching for based on the current request
- Present products clearly with their key features
- Explain why the products match the user's current needs

For general questions about yourself or casual conversation:
- Respond naturally without using any tools

Always be friendly, helpful, and concise. Keep responses focused on the user's immediate request.`;

export const NO_PRODUCTS_FOUND = 'No matching products found.';

/**
 * Render search results as the tool message the model reads in its second round.
 */
export function formatProductsForDisplay(products: CatalogItem[]): string {
  if (products.length === 0) {
    return NO_PRODUCTS_FOUND;
  }

  let formatted = 'Here are the products I found:\n\n';
  products.forEach((product, index) => {
    formatted += `${index + 1}. **${product.name}** - $${product.price}\n`;
    formatted += `   ${product.description.slice(0, 100)}...\n`;
    formatted += `   Category: ${product.category}\n\n`;
  });
  return formatted;
}

export function formatUnknownOperation(name: string): string {
  return `Unknown operation "${name}". No search was performed.`;
}
