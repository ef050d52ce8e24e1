// Provider Registry
// Central registry for the completion backends the agent can use

import OpenAI, { AzureOpenAI } from 'openai';
import type { Provider } from './types.js';
import { OpenAIProvider } from './openai.js';
import { env, isProviderConfigured, type CompletionProviderName } from '../env.js';

// Provider instances (lazy initialization)
const providers: Map<CompletionProviderName, Provider> = new Map();

function createProvider(name: CompletionProviderName): Provider {
  switch (name) {
    case 'openai':
      return new OpenAIProvider(
        'openai',
        new OpenAI({
          apiKey: env.OPENAI_API_KEY,
          ...(env.OPENAI_BASE_URL ? { baseURL: env.OPENAI_BASE_URL } : {}),
          maxRetries: 0, // failures surface to the caller, retry policy lives outside the agent
        }),
      );
    case 'azure':
      return new OpenAIProvider(
        'azure',
        new AzureOpenAI({
          endpoint: env.AZURE_OPENAI_ENDPOINT,
          apiKey: env.AZURE_OPENAI_API_KEY,
          apiVersion: env.AZURE_OPENAI_API_VERSION,
          maxRetries: 0,
        }),
      );
  }
}

export function getProvider(name: CompletionProviderName): Provider {
  const cached = providers.get(name);
  if (cached) {
    return cached;
  }

  if (!isProviderConfigured(name)) {
    throw new Error(`Provider "${name}" is not available or not configured`);
  }

  const provider = createProvider(name);
  providers.set(name, provider);
  return provider;
}

// Re-export types
export type {
  Provider,
  ProviderMessage,
  ProviderOptions,
  ProviderResponse,
  ProviderTool,
  StreamChunk,
  ToolCall,
} from './types.js';
