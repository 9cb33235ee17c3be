/**
 * Anthropic Model Provider
 *
 * Implements the ModelProvider interface for Anthropic's Claude models.
 * Structured output is requested through a single forced tool call whose
 * input schema is the caller's JSON schema; the tool input is returned as
 * the JSON content.
 */

import Anthropic from '@anthropic-ai/sdk';
import type {
  ModelProvider,
  ChatCompletionParams,
  ChatCompletionResult,
} from '../model-provider.js';
import { ConfigurationError } from '../errors.js';

export interface AnthropicConfig {
  apiKey?: string;
  model: string;
}

const STRUCTURED_OUTPUT_TOOL = 'record_output';

export class AnthropicProvider implements ModelProvider {
  readonly name = 'anthropic';
  readonly defaultModel: string;
  private readonly client: Anthropic;

  constructor(config: AnthropicConfig) {
    if (!config.apiKey) {
      throw new ConfigurationError('ANTHROPIC_API_KEY is required for Anthropic provider');
    }

    this.client = new Anthropic({ apiKey: config.apiKey });
    this.defaultModel = config.model;
  }

  async chat(params: ChatCompletionParams): Promise<ChatCompletionResult> {
    const messages: Anthropic.MessageParam[] = params.messages.map((msg) => ({
      role: msg.role,
      content: msg.content,
    }));

    const response = await this.client.messages.create({
      model: this.defaultModel,
      max_tokens: params.maxTokens || 4096,
      system: params.system,
      temperature: params.temperature,
      messages,
      tools: params.jsonSchema
        ? [
            {
              name: STRUCTURED_OUTPUT_TOOL,
              description: 'Record the response in the required structure.',
              input_schema: { ...params.jsonSchema, type: 'object' },
            },
          ]
        : undefined,
      tool_choice: params.jsonSchema
        ? { type: 'tool', name: STRUCTURED_OUTPUT_TOOL }
        : undefined,
    });

    const usage = {
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    };
    const finishReason = response.stop_reason === 'max_tokens' ? 'length' : 'stop';

    if (params.jsonSchema) {
      const toolUse = response.content.find((c) => c.type === 'tool_use');
      if (!toolUse || toolUse.type !== 'tool_use') {
        throw new Error('No structured response from Anthropic');
      }
      return { content: JSON.stringify(toolUse.input), finishReason, usage };
    }

    const textContent = response.content.find((c) => c.type === 'text');
    if (!textContent || textContent.type !== 'text') {
      throw new Error('No text response from Anthropic');
    }

    return { content: textContent.text, finishReason, usage };
  }

  async healthCheck(): Promise<boolean> {
    try {
      // Send a minimal request to verify API key works
      await this.client.messages.create({
        model: this.defaultModel,
        max_tokens: 1,
        messages: [{ role: 'user', content: 'hi' }],
      });
      return true;
    } catch {
      return false;
    }
  }

  getModelName(): string {
    return this.defaultModel;
  }
}
