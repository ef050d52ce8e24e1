// OpenAI Chat Completions provider
// Also serves Azure OpenAI: AzureOpenAI is the same client with deployment-based URLs

import OpenAI from 'openai';
import type {
  Provider,
  ProviderMessage,
  ProviderOptions,
  ProviderResponse,
  StreamChunk,
  ToolCall,
} from './types.js';
import { ProviderFailure } from '../utils/errors.js';

type WireMessage = OpenAI.Chat.ChatCompletionMessageParam;

export class OpenAIProvider implements Provider {
  constructor(
    public name: string,
    private client: OpenAI,
  ) {}

  private formatMessages(messages: ProviderMessage[]): WireMessage[] {
    return messages.map((m): WireMessage => {
      switch (m.role) {
        case 'system':
          return { role: 'system', content: m.content };
        case 'user':
          return { role: 'user', content: m.content };
        case 'assistant':
          // Assistant messages with tool calls must echo them back verbatim
          if (m.tool_calls && m.tool_calls.length > 0) {
            return {
              role: 'assistant',
              content: m.content || null,
              tool_calls: m.tool_calls.map(tc => ({
                id: tc.id,
                type: 'function' as const,
                function: { name: tc.name, arguments: tc.arguments },
              })),
            };
          }
          return { role: 'assistant', content: m.content };
        case 'tool':
          return { role: 'tool', tool_call_id: m.tool_call_id, content: m.content };
      }
    });
  }

  private toolParams(options: ProviderOptions): Pick<OpenAI.Chat.ChatCompletionCreateParams, 'tools' | 'tool_choice'> {
    if (!options.tools || options.tools.length === 0) {
      return {};
    }
    return {
      tools: options.tools,
      tool_choice: options.tool_choice ?? 'auto',
    };
  }

  async sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> {
    const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model: options.model,
      messages: this.formatMessages(messages),
      max_tokens: options.maxTokens,
      temperature: options.temperature,
      ...this.toolParams(options),
    };

    let completion: OpenAI.Chat.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(params, { signal: options.signal });
    } catch (error) {
      throw ProviderFailure.wrap(this.name, error);
    }

    const choice = completion.choices[0];
    if (!choice) {
      throw new ProviderFailure(this.name, `${this.name} returned a completion without choices`);
    }

    const toolCalls: ToolCall[] = (choice.message.tool_calls ?? []).map(tc => ({
      id: tc.id,
      name: tc.function.name,
      arguments: tc.function.arguments,
    }));

    return {
      content: choice.message.content ?? '',
      toolCalls,
      usage: {
        promptTokens: completion.usage?.prompt_tokens ?? 0,
        completionTokens: completion.usage?.completion_tokens ?? 0,
        totalTokens: completion.usage?.total_tokens ?? 0,
      },
    };
  }

  async *sendChatStream(messages: ProviderMessage[], options: ProviderOptions): AsyncIterable<StreamChunk> {
    const params: OpenAI.Chat.ChatCompletionCreateParamsStreaming = {
      model: options.model,
      messages: this.formatMessages(messages),
      max_tokens: options.maxTokens,
      temperature: options.temperature,
      stream: true,
      stream_options: { include_usage: true },
      ...this.toolParams(options),
    };

    try {
      const stream = await this.client.chat.completions.create(params, { signal: options.signal });

      for await (const chunk of stream) {
        const choice = chunk.choices[0];
        const text = choice?.delta?.content;
        if (text) {
          yield { text };
        }

        const finishReason = choice?.finish_reason;
        if (finishReason && finishReason !== 'function_call') {
          yield { text: '', finish_reason: finishReason };
        }

        // With include_usage the last chunk has no choices, only usage
        if (chunk.usage) {
          yield {
            text: '',
            usage: {
              promptTokens: chunk.usage.prompt_tokens,
              completionTokens: chunk.usage.completion_tokens,
              totalTokens: chunk.usage.total_tokens,
            },
          };
        }
      }
    } catch (error) {
      throw ProviderFailure.wrap(this.name, error);
    }
  }
}
