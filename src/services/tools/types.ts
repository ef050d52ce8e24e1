// Tool system types
// The catalog exposes a closed set of operations, each with typed arguments

import type { z } from 'zod';
import type { CatalogItem } from '../catalog.js';
import type { ToolDispatchFailure } from '../../utils/errors.js';

export const TEXT_SEARCH = 'search_products_by_text';
export const IMAGE_SEARCH = 'search_products_by_image';

export const OPERATION_NAMES = [TEXT_SEARCH, IMAGE_SEARCH] as const;

export type OperationName = (typeof OPERATION_NAMES)[number];

export interface TextSearchArgs {
  query: string;
  n_results: number;
}

export interface ImageSearchArgs {
  image_base64: string;
  n_results: number;
}

export interface OperationArgs {
  [TEXT_SEARCH]: TextSearchArgs;
  [IMAGE_SEARCH]: ImageSearchArgs;
}

export interface ToolParameter {
  name: string;
  type: 'string' | 'integer' | 'number' | 'boolean';
  description: string;
  required: boolean;
  enum?: string[];
  default?: string | number | boolean;
}

export interface ToolDefinition<K extends OperationName = OperationName> {
  name: K;
  description: string;
  /** Advertised to the provider */
  parameters: ToolParameter[];
  /** Validates what the provider actually sent */
  schema: z.ZodType<OperationArgs[K], z.ZodTypeDef, unknown>;
  execute(args: OperationArgs[K]): Promise<CatalogItem[]>;
}

export type AnyToolDefinition = { [K in OperationName]: ToolDefinition<K> }[OperationName];

export type DispatchResult =
  | { status: 'ok'; operation: OperationName; items: CatalogItem[]; durationMs: number }
  | { status: 'unknown'; name: string }
  | { status: 'failed'; operation: OperationName; error: ToolDispatchFailure; durationMs: number };

export function isOperationName(name: string): name is OperationName {
  return OPERATION_NAMES.some(op => op === name);
}
