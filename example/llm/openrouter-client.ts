/**
 * OpenRouter LLM Client
 *
 * Uses the OpenAI SDK with OpenRouter's API endpoint.
 * OpenRouter provides access to multiple models through a single API.
 */

import OpenAI from 'openai';
import type { Message, Tool, LLMClient, LLMResponse, ToolCall } from '../../patterns/types.js';

export interface OpenRouterConfig {
  apiKey: string;
  model?: string;
  siteUrl?: string;
  siteName?: string;
}

export const DEFAULT_OPENROUTER_MODEL = 'anthropic/claude-sonnet-4';

/**
 * Parse a tool call's argument string. Models occasionally emit something
 * that is not a JSON object; that becomes an empty argument set and the
 * dispatcher reports what is missing.
 */
export function parseToolArguments(raw: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return {};
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return {};
  }
  return Object.fromEntries(Object.entries(parsed));
}

export class OpenRouterClient implements LLMClient {
  private client: OpenAI;
  private model: string;

  constructor(config: OpenRouterConfig) {
    this.client = new OpenAI({
      baseURL: 'https://openrouter.ai/api/v1',
      apiKey: config.apiKey,
      defaultHeaders: {
        ...(config.siteUrl ? { 'HTTP-Referer': config.siteUrl } : {}),
        'X-Title': config.siteName ?? 'GPU Race Agent',
      },
    });
    this.model = config.model ?? DEFAULT_OPENROUTER_MODEL;
  }

  async invoke(messages: Message[], tools: Tool[]): Promise<LLMResponse> {
    const openaiMessages = messages.map((msg) => this.convertMessage(msg));
    const openaiTools = tools.map((tool) => this.convertTool(tool));

    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: openaiMessages,
      tools: openaiTools.length > 0 ? openaiTools : undefined,
    });

    return this.convertResponse(response);
  }

  private convertMessage(msg: Message): OpenAI.ChatCompletionMessageParam {
    switch (msg.role) {
      case 'tool':
        return {
          role: 'tool',
          content: msg.content,
          tool_call_id: msg.tool_call_id ?? '',
        };

      case 'assistant':
        if (msg.tool_calls && msg.tool_calls.length > 0) {
          return {
            role: 'assistant',
            content: msg.content || null,
            tool_calls: msg.tool_calls.map((tc) => ({
              id: tc.id,
              type: 'function' as const,
              function: {
                name: tc.name,
                arguments: JSON.stringify(tc.arguments),
              },
            })),
          };
        }
        return { role: 'assistant', content: msg.content };

      case 'system':
        return { role: 'system', content: msg.content };

      case 'user':
        return { role: 'user', content: msg.content };
    }
  }

  private convertTool(tool: Tool): OpenAI.ChatCompletionTool {
    return {
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description,
        parameters: { ...tool.parameters },
      },
    };
  }

  private convertResponse(response: OpenAI.ChatCompletion): LLMResponse {
    const message = response.choices[0]?.message;
    if (!message) {
      return { content: '', toolCalls: [], done: false };
    }

    const toolCalls: ToolCall[] = (message.tool_calls ?? []).map((tc) => ({
      id: tc.id,
      name: tc.function.name,
      arguments: parseToolArguments(tc.function.arguments),
    }));

    return {
      content: message.content ?? '',
      toolCalls,
      done: false, // Termination is the proposer's call, via the done tool
      usage: response.usage
        ? {
            prompt_tokens: response.usage.prompt_tokens,
            completion_tokens: response.usage.completion_tokens,
            total_tokens: response.usage.total_tokens,
          }
        : undefined,
    };
  }
}

/**
 * Create an OpenRouter client from config values.
 */
export function createOpenRouterClient(apiKey: string, model?: string): OpenRouterClient {
  return new OpenRouterClient({ apiKey, model });
}
