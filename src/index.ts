// Shopping Assistant API
// Port: 8000 by default

// Load environment variables from .env file
import 'dotenv/config';

import Fastify from 'fastify';
import cors from '@fastify/cors';
import OpenAI from 'openai';
import { env, isProviderConfigured, logConfiguration } from './env.js';
import { createLogger } from './logger.js';
import { getProvider } from './providers/index.js';
import { chatRoutes } from './routes/chat.js';
import { healthRoutes } from './routes/health.js';
import { ShoppingAgent } from './services/agent/index.js';
import { OpenAIEmbedder } from './services/embeddings.js';
import { HttpImageEmbedder } from './services/image-embeddings.js';
import { RetrievalRouter } from './services/retrieval.js';
import { createCatalogToolRegistry } from './services/tools/index.js';
import { InMemoryVectorStore } from './services/vector-store.js';

const PORT = env.PORT;
const HOST = env.HOST;

const logger = createLogger();

if (!isProviderConfigured(env.LLM_PROVIDER) || !env.OPENAI_API_KEY) {
  console.error(`Provider "${env.LLM_PROVIDER}" is not configured (OPENAI_API_KEY is also required for embeddings)`);
  process.exit(1);
}

const server = Fastify({ loggerInstance: logger });

await server.register(cors, {
  origin: env.CORS_ORIGINS.includes('*') ? true : env.CORS_ORIGINS,
  credentials: true,
});

// Catalog index
const store = new InMemoryVectorStore();
const loaded = await store.load(env.VECTOR_DB_PATH);
if (!loaded) {
  logger.warn(`No catalog snapshot at ${env.VECTOR_DB_PATH}, run "npm run seed" first`);
}

const router = new RetrievalRouter({
  textEmbedder: new OpenAIEmbedder(
    new OpenAI({ apiKey: env.OPENAI_API_KEY, ...(env.OPENAI_BASE_URL ? { baseURL: env.OPENAI_BASE_URL } : {}) }),
    { model: env.EMBEDDING_MODEL },
  ),
  imageEmbedder: new HttpImageEmbedder(env.IMAGE_EMBEDDING_URL),
  store,
});

const tools = createCatalogToolRegistry(router, {
  defaultResultCount: env.DEFAULT_RESULT_COUNT,
  logger: logger.child({ module: 'tools' }),
});

const agent = new ShoppingAgent({
  provider: getProvider(env.LLM_PROVIDER),
  tools,
  logger: logger.child({ module: 'agent' }),
  options: {
    model: env.LLM_MODEL,
    maxTokens: env.LLM_MAX_TOKENS,
    temperature: env.LLM_TEMPERATURE,
  },
});

server.get('/', async () => {
  return {
    message: 'Shopping Assistant API',
    status: 'running',
    endpoints: {
      chat: '/api/chat',
      stream: '/api/chat/stream',
      health: '/api/health',
    },
  };
});

// API routes
await server.register(chatRoutes, { prefix: '/api', agent });
await server.register(healthRoutes, {
  prefix: '/api',
  store,
  isConfigured: () => isProviderConfigured(env.LLM_PROVIDER),
});

// Start server
try {
  await server.listen({ port: PORT, host: HOST });
  console.log(`Shopping assistant API listening on http://${HOST}:${PORT}`);
  console.log(`Health: http://${HOST}:${PORT}/api/health`);
  console.log('');
  logConfiguration();
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
