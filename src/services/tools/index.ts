// Tool System Initialization
// Builds the registry of catalog operations offered to the model

import type { Logger } from 'pino';
import type { RetrievalRouter } from '../retrieval.js';
import { ToolRegistry } from './registry.js';
import { createImageSearchTool, createTextSearchTool, DEFAULT_RESULT_COUNT } from './product-search-tools.js';

export { ToolRegistry, parseToolArguments } from './registry.js';
export { createImageSearchTool, createTextSearchTool, DEFAULT_RESULT_COUNT } from './product-search-tools.js';
export { IMAGE_SEARCH, TEXT_SEARCH, OPERATION_NAMES, isOperationName } from './types.js';
export type {
  AnyToolDefinition,
  DispatchResult,
  ImageSearchArgs,
  OperationName,
  TextSearchArgs,
  ToolDefinition,
  ToolParameter,
} from './types.js';

export interface CatalogToolOptions {
  defaultResultCount?: number;
  logger?: Logger;
}

export function createCatalogToolRegistry(
  router: RetrievalRouter,
  options: CatalogToolOptions = {},
): ToolRegistry {
  const defaultCount = options.defaultResultCount ?? DEFAULT_RESULT_COUNT;
  const registry = new ToolRegistry();

  registry.register(createTextSearchTool(router, defaultCount));
  registry.register(createImageSearchTool(router, defaultCount));

  const registeredTools = registry.getAll();
  options.logger?.info(
    { tools: registeredTools.map(t => t.name) },
    `Tool system initialized with ${registeredTools.length} tool(s)`,
  );

  return registry;
}
