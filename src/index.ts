/**
 * IaC Findings Analyzer
 *
 * Library entry point. `runAnalysis` wires configuration, the model provider
 * and the orchestrator for one source path:
 * 1. Rename OpenTofu files so terraform and tflint can read them
 * 2. Run terraform validate, then terraform init and tflint if it passed
 * 3. Map renamed file names in the output back to the originals
 * 4. Extract error findings with the configured model
 */

import { loadConfig, type AnalyzerConfig } from './lib/config.js';
import { createProvider, type ModelProvider } from './lib/providers/index.js';
import { createAnalysisOrchestrator, type AnalysisRun } from './pipeline/index.js';

export interface RunAnalysisOptions {
  config?: AnalyzerConfig;
  /** Overrides the provider built from config */
  provider?: ModelProvider;
  /** Overrides config.tmpRoot for this run */
  tmpRoot?: string;
}

export async function runAnalysis(
  source: string,
  options: RunAnalysisOptions = {}
): Promise<AnalysisRun> {
  const config = options.config ?? loadConfig();
  const provider = options.provider ?? createProvider(config.model);

  const orchestrator = createAnalysisOrchestrator(provider, {
    tmpRoot: options.tmpRoot ?? config.tmpRoot,
    binaries: config.binaries,
    temperature: config.model.temperature,
    verbose: config.verbose,
  });

  return orchestrator.run(source);
}

export * from './analysis/index.js';
export * from './pipeline/index.js';
export { loadConfig, type AnalyzerConfig, type ModelSettings, type ToolBinaries } from './lib/config.js';
export {
  AnalyzerError,
  ConfigurationError,
  ProcessExecutionError,
  CleanupError,
  SummarizationError,
} from './lib/errors.js';
export { createProvider, AnthropicProvider, OllamaProvider } from './lib/providers/index.js';
export type { ModelProvider, ChatCompletionParams, ChatCompletionResult } from './lib/model-provider.js';
export {
  runProcess,
  commandExists,
  checkRequiredBinaries,
  type ProcessRunner,
  type ToolInvocationResult,
} from './lib/process-runner.js';
