/**
 * Model Provider Interface
 *
 * Common interface for the LLM backends (Anthropic, Ollama) used for
 * structured extraction. The concrete provider is chosen by configuration
 * and handed to the summarizer; nothing resolves a client from globals.
 */

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChatCompletionParams {
  messages: ChatMessage[];
  system?: string;
  maxTokens?: number;
  /** JSON schema the response must follow */
  jsonSchema?: Record<string, unknown>;
  /** Temperature for generation (0 = deterministic) */
  temperature?: number;
}

export interface ChatCompletionResult {
  content: string;
  finishReason: 'stop' | 'length' | 'error';
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

export interface ModelProvider {
  /** Provider name for logging */
  name: string;

  /** Model used for every request */
  defaultModel: string;

  chat(params: ChatCompletionParams): Promise<ChatCompletionResult>;

  /**
   * Check if the provider is available and configured correctly.
   * @returns true if the provider is ready to accept requests
   */
  healthCheck(): Promise<boolean>;

  getModelName(): string;
}
