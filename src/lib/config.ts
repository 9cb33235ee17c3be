/**
 * Analyzer Configuration
 *
 * Reads and validates environment settings once at start-up. Everything
 * downstream receives the parsed object instead of reading process.env.
 *
 * Environment Variables:
 * - TMP_DIR: root for extracted archive copies (default: OS temp dir)
 * - DESTINATION_FOLDER: where downloaded repository archives are stored
 * - VALIDATOR_BIN: validator/initializer binary (default: terraform)
 * - LINTER_BIN: linter binary (default: tflint)
 * - MODEL_PROVIDER: 'anthropic' (default) or 'ollama'
 * - ANTHROPIC_API_KEY / ANTHROPIC_MODEL
 * - OLLAMA_BASE_URL / OLLAMA_MODEL
 * - MODEL_TEMPERATURE: extraction temperature (default: 0)
 * - ANALYZER_HOST / ANALYZER_PORT: HTTP bind address (default: 127.0.0.1:8123)
 * - DEBUG_IAC_ANALYZER: 'true' enables verbose logging
 */

import { tmpdir } from 'os';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  TMP_DIR: z.string().min(1).optional(),
  DESTINATION_FOLDER: z.string().min(1).optional(),
  VALIDATOR_BIN: z.string().min(1).default('terraform'),
  LINTER_BIN: z.string().min(1).default('tflint'),
  MODEL_PROVIDER: z.enum(['anthropic', 'ollama']).default('anthropic'),
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  ANTHROPIC_MODEL: z.string().min(1).default('claude-sonnet-4-20250514'),
  OLLAMA_BASE_URL: z.string().url().default('http://localhost:11434'),
  OLLAMA_MODEL: z.string().min(1).default('qwen2.5-coder:32b'),
  MODEL_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
  ANALYZER_HOST: z.string().min(1).default('127.0.0.1'),
  ANALYZER_PORT: z.coerce.number().int().min(0).max(65535).default(8123),
  DEBUG_IAC_ANALYZER: booleanFlag,
});

export type ProviderType = 'anthropic' | 'ollama';

export interface ModelSettings {
  provider: ProviderType;
  temperature: number;
  anthropic: { apiKey?: string; model: string };
  ollama: { baseUrl: string; model: string };
}

export interface ToolBinaries {
  /** Runs both `validate` and `init` */
  validator: string;
  linter: string;
}

export interface AnalyzerConfig {
  tmpRoot: string;
  destinationFolder: string;
  binaries: ToolBinaries;
  model: ModelSettings;
  server: { host: string; port: number };
  verbose: boolean;
}

/**
 * Parse analyzer settings from an environment map.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AnalyzerConfig {
  // Empty strings behave like unset variables
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid analyzer configuration: ${problems}`);
  }

  const values = parsed.data;
  return {
    tmpRoot: values.TMP_DIR ?? tmpdir(),
    destinationFolder: values.DESTINATION_FOLDER ?? tmpdir(),
    binaries: {
      validator: values.VALIDATOR_BIN,
      linter: values.LINTER_BIN,
    },
    model: {
      provider: values.MODEL_PROVIDER,
      temperature: values.MODEL_TEMPERATURE,
      anthropic: {
        apiKey: values.ANTHROPIC_API_KEY,
        model: values.ANTHROPIC_MODEL,
      },
      ollama: {
        baseUrl: values.OLLAMA_BASE_URL,
        model: values.OLLAMA_MODEL,
      },
    },
    server: {
      host: values.ANALYZER_HOST,
      port: values.ANALYZER_PORT,
    },
    verbose: values.DEBUG_IAC_ANALYZER,
  };
}
