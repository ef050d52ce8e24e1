// Agent Module - Main exports

export { ShoppingAgent } from './agent.js';
export type { ShoppingAgentDeps } from './agent.js';
export { SYSTEM_PROMPT, NO_PRODUCTS_FOUND, formatProductsForDisplay } from './prompts.js';
export type {
  AgentOptions,
  ChatMessage,
  DeliveryMode,
  StreamEvent,
  TurnOutcome,
  TurnRequest,
} from './types.js';
