// Environment configuration for the shopping assistant API
// Load provider credentials, catalog paths and server settings from environment variables

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseUnitFloat(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  if (isNaN(parsed) || parsed < 0 || parsed > 2) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

export type CompletionProviderName = 'openai' | 'azure';

function parseProviderName(value: string | undefined): CompletionProviderName {
  const name = strEnv(value, 'openai').toLowerCase();
  if (name === 'openai' || name === 'azure') return name;
  console.error(`Invalid LLM_PROVIDER "${value}", using default openai`);
  return 'openai';
}

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 8000),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',
  CORS_ORIGINS: (process.env.CORS_ORIGINS || '*')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean),

  // Completion provider
  LLM_PROVIDER: parseProviderName(process.env.LLM_PROVIDER),
  LLM_MODEL: strEnv(process.env.LLM_MODEL, 'gpt-4o-mini'),
  LLM_MAX_TOKENS: parsePositiveInt(process.env.LLM_MAX_TOKENS, 1024, 'LLM_MAX_TOKENS'),
  LLM_TEMPERATURE: parseUnitFloat(process.env.LLM_TEMPERATURE, 0.7, 'LLM_TEMPERATURE'),

  // OpenAI
  OPENAI_API_KEY: strEnv(process.env.OPENAI_API_KEY),
  OPENAI_BASE_URL: strEnv(process.env.OPENAI_BASE_URL),

  // Azure OpenAI (deployment name = LLM_MODEL)
  AZURE_OPENAI_ENDPOINT: strEnv(process.env.AZURE_OPENAI_ENDPOINT),
  AZURE_OPENAI_API_KEY: strEnv(process.env.AZURE_OPENAI_API_KEY),
  AZURE_OPENAI_API_VERSION: strEnv(process.env.AZURE_OPENAI_API_VERSION, '2024-10-21'),

  // Embeddings
  EMBEDDING_MODEL: strEnv(process.env.EMBEDDING_MODEL, 'text-embedding-3-small'),
  IMAGE_EMBEDDING_URL: strEnv(process.env.IMAGE_EMBEDDING_URL, 'http://127.0.0.1:8001/embed/image'),

  // Catalog
  PRODUCTS_PATH: strEnv(process.env.PRODUCTS_PATH, 'data/products.json'),
  VECTOR_DB_PATH: strEnv(process.env.VECTOR_DB_PATH, 'data/vector_db/catalog.json'),
  DEFAULT_RESULT_COUNT: parsePositiveInt(process.env.DEFAULT_RESULT_COUNT, 5, 'DEFAULT_RESULT_COUNT') || 5,

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

export function isProviderConfigured(provider: CompletionProviderName): boolean {
  switch (provider) {
    case 'openai':
      return !!env.OPENAI_API_KEY;
    case 'azure':
      return !!env.AZURE_OPENAI_ENDPOINT && !!env.AZURE_OPENAI_API_KEY;
    default:
      return false;
  }
}

export function areEmbeddingsConfigured(): boolean {
  return !!env.OPENAI_API_KEY;
}

// Log configuration on startup (redact secrets)
export function logConfiguration() {
  console.log('Shopping assistant configuration:');
  console.log(`  Environment: ${env.NODE_ENV}`);
  console.log(`  Server: ${env.HOST}:${env.PORT}`);
  console.log(`  Completion provider: ${env.LLM_PROVIDER} (${isProviderConfigured(env.LLM_PROVIDER) ? 'configured' : 'NOT configured'})`);
  console.log(`  Model: ${env.LLM_MODEL}`);
  console.log(`  Embedding model: ${env.EMBEDDING_MODEL}${areEmbeddingsConfigured() ? '' : ' (OPENAI_API_KEY missing)'}`);
  console.log(`  Image embedding service: ${env.IMAGE_EMBEDDING_URL}`);
  console.log(`  Catalog snapshot: ${env.VECTOR_DB_PATH}`);
}
