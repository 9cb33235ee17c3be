/**
 * Model Provider Factory
 *
 * Creates the ModelProvider selected by MODEL_PROVIDER.
 */

import type { ModelSettings } from '../config.js';
import type { ModelProvider } from '../model-provider.js';
import { ConfigurationError } from '../errors.js';
import { AnthropicProvider } from './anthropic-provider.js';
import { OllamaProvider } from './ollama-provider.js';

export function createProvider(settings: ModelSettings): ModelProvider {
  switch (settings.provider) {
    case 'ollama':
      return new OllamaProvider(settings.ollama);

    case 'anthropic':
    default:
      return new AnthropicProvider(settings.anthropic);
  }
}

/**
 * Fail fast when the selected model backend cannot be reached.
 *
 * @throws ConfigurationError naming the provider and model
 */
export async function ensureProviderAvailable(provider: ModelProvider): Promise<void> {
  if (!(await provider.healthCheck())) {
    throw new ConfigurationError(
      `Model provider ${provider.name} (${provider.getModelName()}) is not reachable`
    );
  }
}

export { AnthropicProvider } from './anthropic-provider.js';
export { OllamaProvider } from './ollama-provider.js';
export type { ModelProvider } from '../model-provider.js';
