// Agent Types

import type { CatalogItem } from '../catalog.js';
import type { OperationName } from '../tools/types.js';

export type ChatMessage =
  | { role: 'user' | 'assistant' | 'system'; content: string }
  | { role: 'tool'; content: string; toolCallId: string };

export interface TurnRequest {
  message: string;
  /** Prior turns, oldest first. Never modified. */
  history: readonly ChatMessage[];
  /** Base64 image, bare or as a data URL */
  image?: string;
}

export interface TurnOutcome {
  message: string;
  products: CatalogItem[] | null;
  toolUsed: OperationName | null;
}

export type StreamEvent =
  | { type: 'content'; text: string }
  | { type: 'complete'; products: CatalogItem[] | null; toolUsed: OperationName | null }
  | { type: 'error'; message: string };

export type DeliveryMode = 'complete' | 'stream';

export interface AgentOptions {
  model: string;
  maxTokens?: number;
  temperature?: number;
  systemPrompt?: string;
}
