/**
 * Findings Summarizer
 *
 * Hands the rectified validator and linter output to a model configured for
 * structured extraction and returns the error findings it lists. The rules
 * (errors only, line numbers removed, nothing else altered) live in the
 * prompt and the response schema; the parsed list is returned as given.
 */

import { z } from 'zod';
import type { ChatCompletionResult, ModelProvider } from '../lib/model-provider.js';
import { SummarizationError, errorMessage } from '../lib/errors.js';
import type { ToolStreams } from './output-rectifier.js';

/**
 * One error-severity diagnostic attributed to a file.
 */
export interface Finding {
  fileName: string;
  description: string;
}

export interface ToolLabels {
  validator: string;
  linter: string;
}

export interface SummarizerConfig {
  /** Section titles naming the tools in the prompt */
  labels?: ToolLabels;
  maxTokens?: number;
  temperature?: number;
  verbose?: boolean;
}

const DEFAULT_LABELS: ToolLabels = {
  validator: 'terraform validate',
  linter: 'tflint',
};

const EMPTY_STREAM = '(no output)';

export const SUMMARIZER_SYSTEM_PROMPT = [
  'You are an experienced infrastructure engineer organizing the output of Terraform static-analysis tools',
  '(terraform validate, tflint) into a list of issues.',
  '',
  'Rules:',
  '- Produce one entry per error diagnostic, with the file name it refers to and the full issue description.',
  '- Keep every detail of the issue message exactly as written. The ONLY thing you may remove is line numbers',
  '  (for example ":12", "line 12", "on main.tf line 12", or "12:5" position tokens). Do not remove, shorten,',
  '  paraphrase or reword anything else.',
  '- Drop warnings entirely. Keep only diagnostics of error severity.',
  '- Keep the diagnostics in the order they appear in the input. Do not merge diagnostics and do not add any',
  '  issue that is not literally present in the input.',
  '- If there are no errors, return an empty findings array. Never return placeholder text such as',
  '  "no issues" in place of an empty array.',
  '- Use the file name exactly as it appears in the tool output.',
].join('\n');

/**
 * JSON schema for structured output.
 */
export const FINDINGS_RESPONSE_SCHEMA = {
  type: 'object',
  properties: {
    findings: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          file_name: { type: 'string' },
          description: { type: 'string' },
        },
        required: ['file_name', 'description'],
      },
    },
  },
  required: ['findings'],
};

const findingsResponseSchema = z.object({
  findings: z.array(
    z.object({
      file_name: z.string(),
      description: z.string(),
    })
  ),
});

function section(title: string, text: string): string {
  return `### ${title}\n${text.trim() === '' ? EMPTY_STREAM : text.trimEnd()}`;
}

/**
 * Build the labeled document sent to the model: validator before linter,
 * each tool's stdout before its stderr.
 */
export function buildDiagnosticsDocument(
  streams: ToolStreams,
  labels: ToolLabels = DEFAULT_LABELS
): string {
  return [
    `## ${labels.validator} output`,
    section('stdout', streams.validateStdout),
    section('stderr', streams.validateStderr),
    '',
    `## ${labels.linter} output`,
    section('stdout', streams.lintStdout),
    section('stderr', streams.lintStderr),
  ].join('\n');
}

/**
 * Parse the model response into findings.
 *
 * @throws SummarizationError when the content is not a findings object
 */
export function parseFindingsResponse(content: string): Finding[] {
  let raw: unknown;

  try {
    raw = JSON.parse(content);
  } catch {
    // Models sometimes wrap the JSON in prose or a code fence
    const jsonMatch = content.match(/\{[\s\S]*\}/);
    if (!jsonMatch) {
      throw new SummarizationError(
        `Model response is not JSON: ${content.slice(0, 200)}`
      );
    }
    try {
      raw = JSON.parse(jsonMatch[0]);
    } catch (error) {
      throw new SummarizationError(
        `Model response is not JSON: ${content.slice(0, 200)}`,
        { cause: error }
      );
    }
  }

  const parsed = findingsResponseSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new SummarizationError(`Model response does not match findings schema: ${problems}`);
  }

  return parsed.data.findings.map((f) => ({
    fileName: f.file_name,
    description: f.description,
  }));
}

export class FindingsSummarizer {
  private readonly provider: ModelProvider;
  private readonly labels: ToolLabels;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly verbose: boolean;

  constructor(provider: ModelProvider, config: SummarizerConfig = {}) {
    this.provider = provider;
    this.labels = config.labels ?? DEFAULT_LABELS;
    this.maxTokens = config.maxTokens ?? 4096;
    this.temperature = config.temperature ?? 0;
    this.verbose = config.verbose ?? false;
  }

  get modelName(): string {
    return this.provider.getModelName();
  }

  /**
   * Extract error findings from the four rectified streams.
   *
   * @throws SummarizationError on provider failure or an unusable response
   */
  async summarize(streams: ToolStreams): Promise<Finding[]> {
    const startTime = performance.now();
    const document = buildDiagnosticsDocument(streams, this.labels);

    let response: ChatCompletionResult;
    try {
      response = await this.provider.chat({
        system: SUMMARIZER_SYSTEM_PROMPT,
        messages: [{ role: 'user', content: document }],
        maxTokens: this.maxTokens,
        jsonSchema: FINDINGS_RESPONSE_SCHEMA,
        temperature: this.temperature,
      });
    } catch (error) {
      throw new SummarizationError(
        `${this.provider.name} request failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    // A list cut off at the token limit may have lost diagnostics
    if (response.finishReason === 'length') {
      throw new SummarizationError(
        `${this.provider.name} response truncated at maxTokens (${this.maxTokens})`
      );
    }

    const findings = parseFindingsResponse(response.content);

    if (this.verbose) {
      const latencyMs = Math.round(performance.now() - startTime);
      console.log(`   Summarized ${findings.length} findings in ${(latencyMs / 1000).toFixed(1)}s`);
    }

    return findings;
  }
}
