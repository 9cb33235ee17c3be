/**
 * Ollama Model Provider
 *
 * Talks to a local Ollama server. Extraction requests put the findings
 * schema in `format`, which makes Ollama constrain decoding to that schema.
 */

import { z } from 'zod';
import type {
  ModelProvider,
  ChatCompletionParams,
  ChatCompletionResult,
} from '../model-provider.js';

export interface OllamaConfig {
  baseUrl: string;
  model: string;
}

type OllamaRole = 'system' | 'user' | 'assistant';

interface OllamaChatBody {
  model: string;
  messages: { role: OllamaRole; content: string }[];
  stream: false;
  options: { temperature: number; num_predict?: number };
  format?: Record<string, unknown>;
}

const chatReplySchema = z.object({
  message: z.object({ content: z.string() }).optional(),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

/**
 * `http://host:11434/v1/` and `http://host:11434` both address the same server.
 */
function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '').replace(/\/v1$/, '');
}

export class OllamaProvider implements ModelProvider {
  readonly name = 'ollama';
  readonly defaultModel: string;
  private readonly baseUrl: string;

  constructor(config: OllamaConfig) {
    this.baseUrl = normalizeBaseUrl(config.baseUrl);
    this.defaultModel = config.model;
  }

  async chat(params: ChatCompletionParams): Promise<ChatCompletionResult> {
    const body: OllamaChatBody = {
      model: this.defaultModel,
      messages: [
        ...(params.system ? [{ role: 'system' as const, content: params.system }] : []),
        ...params.messages,
      ],
      stream: false,
      options: {
        temperature: params.temperature ?? 0,
        num_predict: params.maxTokens,
      },
      format: params.jsonSchema,
    };

    const response = await fetch(`${this.baseUrl}/api/chat`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      throw new Error(`ollama /api/chat returned ${response.status}: ${await response.text()}`);
    }

    const reply = chatReplySchema.parse(await response.json());
    const content = reply.message?.content;
    if (!content) {
      throw new Error(`ollama returned an empty message for ${this.defaultModel}`);
    }

    return {
      content,
      finishReason: reply.done_reason === 'length' ? 'length' : 'stop',
      usage: {
        inputTokens: reply.prompt_eval_count ?? 0,
        outputTokens: reply.eval_count ?? 0,
      },
    };
  }

  /**
   * True when the server lists its models within five seconds.
   */
  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, {
        signal: AbortSignal.timeout(5000),
      });
      return response.ok;
    } catch {
      return false;
    }
  }

  getModelName(): string {
    return this.defaultModel;
  }
}
