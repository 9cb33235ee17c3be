/**
 * Analysis Orchestrator
 *
 * Drives one analysis run through its stages:
 *
 *   start → normalized → validated → linted | lint_skipped
 *         → cleaned → rectified → summarized → done
 *
 * Failure policy:
 * - ConfigurationError: thrown from `start`, before any filesystem work
 * - ProcessExecutionError during the tool stage: run aborts with an empty
 *   result (workspace still cleaned up)
 * - CleanupError on an extracted copy: run aborts with an empty result
 * - SummarizationError: logged and re-thrown
 *
 * The orchestrator owns the working directory for the run. A directory given
 * by the caller is never deleted; an archive is extracted to
 * `<tmpRoot>/repo_copy` and that copy is always deleted before summarizing.
 */

import { rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { ModelProvider } from '../lib/model-provider.js';
import type { ToolBinaries } from '../lib/config.js';
import type { ProcessRunner } from '../lib/process-runner.js';
import { checkPathType, extractArchive, resolveArchiveRoot } from '../lib/archive.js';
import {
  CleanupError,
  ConfigurationError,
  ProcessExecutionError,
  errorMessage,
} from '../lib/errors.js';
import {
  normalizeSyntaxVariants,
  type FileRenameMapping,
} from '../analysis/syntax-normalizer.js';
import {
  runStaticChecks,
  collectStreams,
  DEFAULT_BINARIES,
  type ToolRunOutcome,
} from '../analysis/tool-runner.js';
import { rectifyOutputs, type ToolStreams } from '../analysis/output-rectifier.js';
import { FindingsSummarizer, type Finding } from '../analysis/findings-summarizer.js';

export const EXTRACT_DIR_NAME = 'repo_copy';

export type PipelineState =
  | 'start'
  | 'normalized'
  | 'validated'
  | 'linted'
  | 'lint_skipped'
  | 'cleaned'
  | 'rectified'
  | 'summarized'
  | 'done'
  | 'failed';

/**
 * 'aborted' marks a soft failure; its findings are always empty.
 */
export type RunStatus = 'completed' | 'aborted';

/**
 * Anything that turns the four streams into findings.
 */
export interface FindingsExtractor {
  summarize(streams: ToolStreams): Promise<Finding[]>;
}

export interface OrchestratorConfig {
  /** Root for archive extraction (default: OS temp dir) */
  tmpRoot?: string;
  binaries?: ToolBinaries;
  runner?: ProcessRunner;
  /** Deletes the extracted workspace at the end of a run */
  removeDirectory?: (path: string) => Promise<void>;
  verbose?: boolean;
}

export interface AnalysisRun {
  status: RunStatus;
  /** Empty when aborted or when the tools reported no errors */
  findings: Finding[];
  /** States visited, in order */
  states: PipelineState[];
  abortReason?: string;
  /** Rectified tool output, present once the tool stage completed */
  streams?: ToolStreams;
  renamedFiles: number;
  totalLatencyMs: number;
}

type Workspace =
  | { provenance: 'caller'; dir: string }
  | { provenance: 'extracted'; dir: string; extractDir: string };

const removeRecursive = (path: string): Promise<void> =>
  rm(path, { recursive: true, force: true });

export class AnalysisOrchestrator {
  private readonly summarizer: FindingsExtractor | undefined;
  private readonly tmpRoot: string;
  private readonly binaries: ToolBinaries;
  private readonly runner: ProcessRunner | undefined;
  private readonly removeDirectory: (path: string) => Promise<void>;
  private readonly verbose: boolean;

  constructor(summarizer: FindingsExtractor | undefined, config: OrchestratorConfig = {}) {
    this.summarizer = summarizer;
    this.tmpRoot = config.tmpRoot ?? tmpdir();
    this.binaries = config.binaries ?? DEFAULT_BINARIES;
    this.runner = config.runner;
    this.removeDirectory = config.removeDirectory ?? removeRecursive;
    this.verbose = config.verbose ?? (process.env.DEBUG_IAC_ANALYZER === 'true');
  }

  /**
   * Analyze a directory or .zip archive and return findings only.
   * An aborted run and a clean run both yield `[]`; use `run()` to tell them apart.
   */
  async analyze(source: string): Promise<Finding[]> {
    const result = await this.run(source);
    return result.findings;
  }

  /**
   * Analyze a directory or .zip archive.
   *
   * @throws ConfigurationError when no summarizer or no usable source is given
   * @throws SummarizationError when findings cannot be extracted
   */
  async run(source: string): Promise<AnalysisRun> {
    const startTime = performance.now();
    const states: PipelineState[] = ['start'];

    if (!this.summarizer) {
      throw new ConfigurationError('Findings summarizer is not configured');
    }
    if (!source || source.trim() === '') {
      throw new ConfigurationError('No source directory or archive given');
    }
    const summarizer = this.summarizer;

    const workspace = await this.prepareWorkspace(source);

    if (this.verbose) {
      console.log(`\n🔄 Analyzing ${workspace.dir} (${workspace.provenance})`);
    }

    let mapping: FileRenameMapping;
    let outcome: ToolRunOutcome;
    let renamedFiles = 0;

    try {
      mapping = await normalizeSyntaxVariants(workspace.dir);
      renamedFiles = mapping.size;
      states.push('normalized');

      if (this.verbose && mapping.size > 0) {
        console.log(`   Renamed ${mapping.size} OpenTofu file(s) for the tools`);
      }

      outcome = await runStaticChecks(workspace.dir, {
        binaries: this.binaries,
        runner: this.runner,
        onStage: (stage) => states.push(stage),
      });
    } catch (error) {
      await this.releaseWorkspace(workspace);

      if (error instanceof ProcessExecutionError) {
        console.error(`❌ Error while running static checks: ${error.message}`);
        if (error.stderr) {
          console.error(error.stderr.trimEnd());
        }
        return this.abort(states, error.message, renamedFiles, startTime);
      }
      throw error;
    }

    if (this.verbose) {
      console.log(`   Validate exit code: ${outcome.validate.exitCode}`);
      console.log(
        outcome.lintSkipped
          ? '   Lint skipped (validation failed)'
          : `   Lint exit code: ${outcome.lint?.exitCode ?? 'n/a'}`
      );
    }

    const cleanupError = await this.releaseWorkspace(workspace);
    if (cleanupError) {
      return this.abort(states, cleanupError.message, renamedFiles, startTime);
    }
    states.push('cleaned');

    const streams = rectifyOutputs(collectStreams(outcome), mapping);
    states.push('rectified');

    let findings: Finding[];
    try {
      findings = await summarizer.summarize(streams);
    } catch (error) {
      console.error(`❌ Error while summarizing static analysis output: ${errorMessage(error)}`);
      throw error;
    }
    states.push('summarized', 'done');

    const totalLatencyMs = Math.round(performance.now() - startTime);
    if (this.verbose) {
      console.log(`\n✅ Analysis complete: ${findings.length} finding(s) in ${(totalLatencyMs / 1000).toFixed(1)}s`);
    }

    return {
      status: 'completed',
      findings,
      states,
      streams,
      renamedFiles,
      totalLatencyMs,
    };
  }

  private async prepareWorkspace(source: string): Promise<Workspace> {
    const pathType = await checkPathType(source);

    if (pathType === 'directory') {
      return { provenance: 'caller', dir: source };
    }

    if (pathType === 'zip') {
      const extractDir = join(this.tmpRoot, EXTRACT_DIR_NAME);
      // A copy left by an interrupted run would mix into this one
      await removeRecursive(extractDir);
      try {
        await extractArchive(source, extractDir);
        const dir = await resolveArchiveRoot(extractDir);
        if (this.verbose) {
          console.log(`📦 Extracted ${source} to ${extractDir}`);
        }
        return { provenance: 'extracted', dir, extractDir };
      } catch (error) {
        await removeRecursive(extractDir);
        throw error;
      }
    }

    throw new ConfigurationError(`'${source}' is neither a zip file nor a directory`);
  }

  /**
   * Delete an extracted copy. Caller-owned directories are left alone.
   */
  private async releaseWorkspace(workspace: Workspace): Promise<CleanupError | undefined> {
    if (workspace.provenance !== 'extracted') {
      return undefined;
    }

    try {
      await this.removeDirectory(workspace.extractDir);
      if (this.verbose) {
        console.log(`🧹 Removed ${workspace.extractDir}`);
      }
      return undefined;
    } catch (error) {
      const failure = new CleanupError(workspace.extractDir, { cause: error });
      console.error(`❌ ${failure.message}: ${errorMessage(error)}`);
      return failure;
    }
  }

  private abort(
    states: PipelineState[],
    reason: string,
    renamedFiles: number,
    startTime: number
  ): AnalysisRun {
    states.push('failed');
    return {
      status: 'aborted',
      findings: [],
      states,
      abortReason: reason,
      renamedFiles,
      totalLatencyMs: Math.round(performance.now() - startTime),
    };
  }
}

/**
 * Create an orchestrator whose summarizer labels prompt sections after the
 * configured binaries.
 */
export function createAnalysisOrchestrator(
  provider: ModelProvider,
  config: OrchestratorConfig & { temperature?: number } = {}
): AnalysisOrchestrator {
  const binaries = config.binaries ?? DEFAULT_BINARIES;
  const summarizer = new FindingsSummarizer(provider, {
    labels: { validator: `${binaries.validator} validate`, linter: binaries.linter },
    temperature: config.temperature,
    verbose: config.verbose,
  });
  return new AnalysisOrchestrator(summarizer, { ...config, binaries });
}
