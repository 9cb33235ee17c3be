/**
 * External Tool Runner
 *
 * Runs the static checks against a working directory, in a fixed order:
 *
 *   1. validator (`terraform validate -no-color`), always
 *   2. initializer (`terraform init -backend=false`), only if validate passed
 *   3. linter (`tflint --format=compact --recursive`), only if validate passed
 *
 * The initializer downloads providers and modules the linter needs on disk,
 * so it must complete successfully before the linter starts. A linter exit
 * code reporting issues is a result, not a failure.
 */

import type { ToolBinaries } from '../lib/config.js';
import { ProcessExecutionError } from '../lib/errors.js';
import {
  runProcess,
  type ProcessRunner,
  type ToolInvocationResult,
} from '../lib/process-runner.js';
import type { ToolStreams } from './output-rectifier.js';

export const VALIDATE_ARGS = ['validate', '-no-color'] as const;
export const INIT_ARGS = ['init', '-backend=false', '-input=false', '-no-color'] as const;
export const LINT_ARGS = ['--format=compact', '--recursive'] as const;

export const DEFAULT_BINARIES: ToolBinaries = {
  validator: 'terraform',
  linter: 'tflint',
};

export type ToolStage = 'validated' | 'linted' | 'lint_skipped';

export interface ToolRunOptions {
  binaries?: ToolBinaries;
  runner?: ProcessRunner;
  /** Called as each stage completes */
  onStage?: (stage: ToolStage) => void;
}

export interface ToolRunOutcome {
  validate: ToolInvocationResult;
  init?: ToolInvocationResult;
  lint?: ToolInvocationResult;
  lintSkipped: boolean;
}

/**
 * Run validator, then (conditionally) initializer and linter.
 *
 * @throws ProcessExecutionError when a tool cannot run, or init exits non-zero
 */
export async function runStaticChecks(
  dir: string,
  options: ToolRunOptions = {}
): Promise<ToolRunOutcome> {
  const binaries = options.binaries ?? DEFAULT_BINARIES;
  const run = options.runner ?? runProcess;

  const validate = await run(binaries.validator, VALIDATE_ARGS, { cwd: dir });
  options.onStage?.('validated');

  if (validate.exitCode !== 0) {
    options.onStage?.('lint_skipped');
    return { validate, lintSkipped: true };
  }

  const init = await run(binaries.validator, INIT_ARGS, { cwd: dir });
  if (init.exitCode !== 0) {
    throw new ProcessExecutionError(
      [binaries.validator, ...INIT_ARGS].join(' '),
      `exited with code ${init.exitCode}`,
      { stderr: init.stderr }
    );
  }

  const lint = await run(binaries.linter, LINT_ARGS, { cwd: dir });
  options.onStage?.('linted');

  return { validate, init, lint, lintSkipped: false };
}

/**
 * The four diagnostic streams; linter streams are empty when linting was skipped.
 */
export function collectStreams(outcome: ToolRunOutcome): ToolStreams {
  return {
    validateStdout: outcome.validate.stdout,
    validateStderr: outcome.validate.stderr,
    lintStdout: outcome.lint?.stdout ?? '',
    lintStderr: outcome.lint?.stderr ?? '',
  };
}
