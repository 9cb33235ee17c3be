/**
 * Analyzer Errors
 *
 * Error taxonomy for the analysis pipeline. The orchestrator decides per
 * class whether a failure degrades to an empty result or reaches the caller.
 */

export type AnalyzerErrorCode =
  | 'CONFIGURATION'
  | 'PROCESS_EXECUTION'
  | 'CLEANUP'
  | 'SUMMARIZATION';

export abstract class AnalyzerError extends Error {
  abstract readonly code: AnalyzerErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Missing or invalid setup (no summarizer, no source, bad env values).
 * Raised before any filesystem or process work.
 */
export class ConfigurationError extends AnalyzerError {
  readonly code = 'CONFIGURATION';
}

/**
 * An external tool could not be started or ended abnormally.
 */
export class ProcessExecutionError extends AnalyzerError {
  readonly code = 'PROCESS_EXECUTION';
  readonly command: string;
  readonly stderr: string;

  constructor(
    command: string,
    message: string,
    options?: { cause?: unknown; stderr?: string }
  ) {
    super(`${command}: ${message}`, options);
    this.command = command;
    this.stderr = options?.stderr ?? '';
  }
}

export class CleanupError extends AnalyzerError {
  readonly code = 'CLEANUP';
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super(`Failed to remove temporary workspace ${path}`, options);
    this.path = path;
  }
}

/**
 * The model call failed or returned something that is not a findings list.
 */
export class SummarizationError extends AnalyzerError {
  readonly code = 'SUMMARIZATION';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
