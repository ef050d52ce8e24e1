// Chat routes: one-shot and server-sent-event delivery of a conversation turn
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { ChatMessage, ShoppingAgent, StreamEvent, TurnRequest } from '../services/agent/index.js';
import type { CatalogItem } from '../services/catalog.js';
import { AppError, GENERIC_ERROR_MESSAGE, formatErrorResponse } from '../utils/errors.js';

// A tool message is only valid as the answer to a named tool call
const ChatMessageSchema = z.union([
  z.object({
    role: z.enum(['user', 'assistant', 'system']),
    content: z.string(),
  }),
  z.object({
    role: z.literal('tool'),
    content: z.string(),
    tool_call_id: z.string().min(1),
  }),
]);

const ChatRequestSchema = z.object({
  message: z.string(),
  history: z.array(ChatMessageSchema).default([]),
  image: z.string().min(1).nullish(),
});

type ChatRequestBody = z.infer<typeof ChatRequestSchema>;

export interface ChatResponseBody {
  message: string;
  products: CatalogItem[] | null;
  tool_used: string | null;
}

export interface StreamPayload {
  type: StreamEvent['type'];
  content: string;
  products: CatalogItem[] | null;
  tool_used: string | null;
}

export type ChatRouteOptions = {
  agent: ShoppingAgent;
};

function toTurnRequest(body: ChatRequestBody): TurnRequest {
  return {
    message: body.message,
    history: body.history.map((m): ChatMessage => m.role === 'tool'
      ? { role: 'tool', content: m.content, toolCallId: m.tool_call_id }
      : { role: m.role, content: m.content }),
    ...(body.image ? { image: body.image } : {}),
  };
}

export function toStreamPayload(event: StreamEvent): StreamPayload {
  switch (event.type) {
    case 'content':
      return { type: 'content', content: event.text, products: null, tool_used: null };
    case 'complete':
      return { type: 'complete', content: '', products: event.products, tool_used: event.toolUsed };
    case 'error':
      return { type: 'error', content: event.message, products: null, tool_used: null };
  }
}

export async function chatRoutes(server: FastifyInstance, opts: ChatRouteOptions) {
  const { agent } = opts;

  // POST /api/chat - Complete reply in one response
  server.post('/chat', async (request, reply) => {
    const parsed = ChatRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send(formatErrorResponse(
        AppError.validationError('Invalid chat request', parsed.error.flatten()),
        true,
      ));
    }

    try {
      const outcome = await agent.chat(toTurnRequest(parsed.data));
      const body: ChatResponseBody = {
        message: outcome.message,
        products: outcome.products,
        tool_used: outcome.toolUsed,
      };
      return body;
    } catch (err) {
      request.log.error({ err }, 'Error in chat endpoint');
      return reply.code(500).send(formatErrorResponse(AppError.internal(GENERIC_ERROR_MESSAGE)));
    }
  });

  // POST /api/chat/stream - Same turn as server-sent events, terminated by [DONE]
  server.post('/chat/stream', async (request, reply) => {
    const parsed = ChatRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send(formatErrorResponse(
        AppError.validationError('Invalid chat request', parsed.error.flatten()),
        true,
      ));
    }

    // Headers added by hooks (CORS) live on the reply, not on the raw response
    reply.hijack();
    for (const [name, value] of Object.entries(reply.getHeaders())) {
      if (value !== undefined) {
        reply.raw.setHeader(name, value);
      }
    }

    // Set up SSE streaming
    reply.raw.setHeader('Content-Type', 'text/event-stream');
    reply.raw.setHeader('Cache-Control', 'no-cache');
    reply.raw.setHeader('Connection', 'keep-alive');
    reply.raw.writeHead(200);

    const sendData = (data: string) => {
      try {
        reply.raw.write(`data: ${data}\n\n`);
      } catch (err) {
        request.log.error({ err }, 'Failed to send SSE event');
      }
    };

    const iterator = agent.streamTurn(toTurnRequest(parsed.data))[Symbol.asyncIterator]();
    let finished = false;

    // Client went away: stop pulling so the agent aborts its provider call
    reply.raw.on('close', () => {
      if (finished) return;
      finished = true;
      iterator.return?.().catch((err: unknown) => {
        request.log.debug({ err }, 'Failed to abandon stream');
      });
    });

    try {
      while (!finished) {
        const next = await iterator.next();
        if (next.done) break;
        sendData(JSON.stringify(toStreamPayload(next.value)));
      }
    } catch (err) {
      request.log.error({ err }, 'Error in streaming');
      sendData(JSON.stringify(toStreamPayload({ type: 'error', message: GENERIC_ERROR_MESSAGE })));
    }

    if (!reply.raw.destroyed) {
      finished = true;
      sendData('[DONE]');
      reply.raw.end();
    }
  });
}
