// Shopping Agent
// Runs one conversation turn: a tool-deciding completion, optional catalog
// searches, then an answer-synthesis completion. Delivered whole or as a stream.

import type { Logger } from 'pino';
import type {
  ContentPart,
  Provider,
  ProviderMessage,
  ProviderOptions,
  ProviderResponse,
  ToolCall,
} from '../../providers/types.js';
import type { CatalogItem } from '../catalog.js';
import { parseToolArguments, type ToolRegistry } from '../tools/registry.js';
import { IMAGE_SEARCH, type DispatchResult, type OperationName } from '../tools/types.js';
import { EventChannel, ChannelClosedError } from '../../utils/event-channel.js';
import {
  GENERIC_ERROR_MESSAGE,
  MalformedToolArguments,
  ProviderFailure,
} from '../../utils/errors.js';
import { SYSTEM_PROMPT, formatProductsForDisplay, formatUnknownOperation } from './prompts.js';
import type {
  AgentOptions,
  ChatMessage,
  DeliveryMode,
  StreamEvent,
  TurnOutcome,
  TurnRequest,
} from './types.js';

export interface ShoppingAgentDeps {
  provider: Provider;
  tools: ToolRegistry;
  logger: Logger;
  options: AgentOptions;
}

interface ToolRoundResult {
  products: CatalogItem[] | null;
  toolUsed: OperationName | null;
}

function toImageUrl(image: string): string {
  return image.startsWith('data:') ? image : `data:image/png;base64,${image}`;
}

function toProviderMessage(message: ChatMessage): ProviderMessage {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'tool':
      return { role: 'tool', content: message.content, tool_call_id: message.toolCallId };
  }
}

export class ShoppingAgent {
  private provider: Provider;
  private tools: ToolRegistry;
  private logger: Logger;
  private options: AgentOptions;

  constructor(deps: ShoppingAgentDeps) {
    this.provider = deps.provider;
    this.tools = deps.tools;
    this.logger = deps.logger;
    this.options = deps.options;
  }

  runTurn(request: TurnRequest, mode: 'complete', signal?: AbortSignal): Promise<TurnOutcome>;
  runTurn(request: TurnRequest, mode: 'stream'): AsyncIterable<StreamEvent>;
  runTurn(
    request: TurnRequest,
    mode: DeliveryMode,
    signal?: AbortSignal,
  ): Promise<TurnOutcome> | AsyncIterable<StreamEvent> {
    return mode === 'stream' ? this.streamTurn(request) : this.chat(request, signal);
  }

  /**
   * Run a turn and return the finished reply.
   * Provider failures propagate as ProviderFailure.
   */
  async chat(request: TurnRequest, signal?: AbortSignal): Promise<TurnOutcome> {
    const context = this.buildContext(request);

    const first = await this.complete(context, { withTools: true, signal });
    if (first.toolCalls.length === 0) {
      return { message: first.content, products: null, toolUsed: null };
    }

    const round = await this.runToolRound(context, first, request.image);
    const final = await this.complete(context, { withTools: false, signal });

    return { message: final.content, products: round.products, toolUsed: round.toolUsed };
  }

  /**
   * Run a turn as a stream of events: any number of `content` events, then
   * exactly one `complete` or `error`.
   *
   * The tool-deciding completion is never streamed. Breaking out of the
   * iteration aborts the in-flight provider request.
   */
  streamTurn(request: TurnRequest): AsyncIterable<StreamEvent> {
    const channel = new EventChannel<StreamEvent>(1);
    this.produceStream(request, channel).catch((err: unknown) => {
      this.logger.error({ err }, 'Stream producer failed after close');
    });
    return channel;
  }

  private async produceStream(request: TurnRequest, channel: EventChannel<StreamEvent>): Promise<void> {
    const signal = channel.signal;

    try {
      const context = this.buildContext(request);
      const first = await this.complete(context, { withTools: true, signal });

      let round: ToolRoundResult = { products: null, toolUsed: null };

      if (first.toolCalls.length === 0) {
        // Direct conversation: the first reply is the whole answer
        if (first.content) {
          await channel.push({ type: 'content', text: first.content });
        }
      } else {
        round = await this.runToolRound(context, first, request.image);

        try {
          for await (const chunk of this.provider.sendChatStream(context, this.completionOptions(false, signal))) {
            if (chunk.text) {
              await channel.push({ type: 'content', text: chunk.text });
            }
          }
        } catch (error) {
          if (error instanceof ChannelClosedError) throw error;
          throw ProviderFailure.wrap(this.provider.name, error);
        }
      }

      channel.close({ type: 'complete', products: round.products, toolUsed: round.toolUsed });
    } catch (error) {
      if (error instanceof ChannelClosedError || channel.wasAbandoned) {
        this.logger.debug('Stream consumer went away, turn abandoned');
        return;
      }

      this.logger.error({ err: error }, 'Streaming turn failed');
      channel.close({ type: 'error', message: GENERIC_ERROR_MESSAGE });
    }
  }

  private buildContext(request: TurnRequest): ProviderMessage[] {
    const messages: ProviderMessage[] = [
      { role: 'system', content: this.options.systemPrompt ?? SYSTEM_PROMPT },
    ];

    for (const message of request.history) {
      messages.push(toProviderMessage(message));
    }

    if (request.image) {
      const content: ContentPart[] = [
        { type: 'text', text: request.message },
        { type: 'image_url', image_url: { url: toImageUrl(request.image) } },
      ];
      messages.push({ role: 'user', content });
    } else {
      messages.push({ role: 'user', content: request.message });
    }

    return messages;
  }

  private completionOptions(withTools: boolean, signal?: AbortSignal): ProviderOptions {
    return {
      model: this.options.model,
      maxTokens: this.options.maxTokens,
      temperature: this.options.temperature,
      signal,
      // The synthesis round gets no tools: one round of tool calls per turn
      ...(withTools ? { tools: this.tools.toProviderTools(), tool_choice: 'auto' as const } : {}),
    };
  }

  private async complete(
    context: ProviderMessage[],
    opts: { withTools: boolean; signal?: AbortSignal },
  ): Promise<ProviderResponse> {
    try {
      const response = await this.provider.sendChat(context, this.completionOptions(opts.withTools, opts.signal));
      this.logger.debug(
        { provider: this.provider.name, usage: response.usage, toolCalls: response.toolCalls.length },
        'Completion received',
      );
      return response;
    } catch (error) {
      throw ProviderFailure.wrap(this.provider.name, error);
    }
  }

  /**
   * Dispatch every requested tool call in order and fold the results into the
   * context. When several calls succeed, the last one's products are reported.
   */
  private async runToolRound(
    context: ProviderMessage[],
    response: ProviderResponse,
    image: string | undefined,
  ): Promise<ToolRoundResult> {
    context.push({ role: 'assistant', content: response.content, tool_calls: response.toolCalls });

    let round: ToolRoundResult = { products: null, toolUsed: null };

    for (const call of response.toolCalls) {
      const result = await this.dispatch(call, image);

      context.push({
        role: 'tool',
        tool_call_id: call.id,
        name: call.name,
        content: this.renderResult(result),
      });

      switch (result.status) {
        case 'ok':
          this.logger.info(
            { tool: result.operation, items: result.items.length, durationMs: result.durationMs },
            'Tool dispatched',
          );
          // Last successful invocation wins
          round = { products: result.items, toolUsed: result.operation };
          break;
        case 'failed':
          this.logger.warn(
            { tool: result.operation, err: result.error, durationMs: result.durationMs },
            'Tool dispatch failed, treating as empty result',
          );
          break;
        case 'unknown':
          this.logger.warn({ tool: result.name }, 'Model requested an unknown tool, ignoring');
          break;
      }
    }

    return round;
  }

  private async dispatch(call: ToolCall, image: string | undefined): Promise<DispatchResult> {
    const tool = this.tools.get(call.name);
    if (!tool) {
      return { status: 'unknown', name: call.name };
    }

    let args: Record<string, unknown>;
    try {
      args = parseToolArguments(call);
    } catch (error) {
      if (!(error instanceof MalformedToolArguments)) throw error;
      return { status: 'failed', operation: tool.name, error, durationMs: 0 };
    }

    if (tool.name === IMAGE_SEARCH) {
      // The image attached to the turn always wins over whatever the model wrote
      if (image) {
        args.image_base64 = image;
      } else {
        return {
          status: 'failed',
          operation: tool.name,
          error: new MalformedToolArguments(tool.name, 'Image search requested but no image was attached to the turn'),
          durationMs: 0,
        };
      }
    }

    return this.tools.dispatch(tool.name, args);
  }

  private renderResult(result: DispatchResult): string {
    switch (result.status) {
      case 'ok':
        return formatProductsForDisplay(result.items);
      case 'failed':
        return formatProductsForDisplay([]);
      case 'unknown':
        return formatUnknownOperation(result.name);
    }
  }
}
