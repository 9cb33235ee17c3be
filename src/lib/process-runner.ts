/**
 * Process Runner
 *
 * Thin wrapper over child_process.spawn that captures both output streams
 * and the exit code. Launch failures (ENOENT, EACCES) and signal kills are
 * reported as ProcessExecutionError; a non-zero exit is a normal result.
 */

import { spawn } from 'child_process';
import { access, constants } from 'fs/promises';
import { delimiter, join } from 'path';
import { ConfigurationError, ProcessExecutionError } from './errors.js';

/**
 * Captured outcome of one external tool call.
 */
export interface ToolInvocationResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
}

export interface ProcessRunOptions {
  cwd: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Anything that can run a command to completion. Tests substitute a fake.
 */
export type ProcessRunner = (
  command: string,
  args: readonly string[],
  options: ProcessRunOptions
) => Promise<ToolInvocationResult>;

export const runProcess: ProcessRunner = (command, args, options) => {
  const display = [command, ...args].join(' ');

  return new Promise<ToolInvocationResult>((resolve, reject) => {
    const child = spawn(command, [...args], {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.once('error', (error) => {
      reject(
        new ProcessExecutionError(display, `failed to start (${error.message})`, {
          cause: error,
        })
      );
    });

    child.once('close', (code, signal) => {
      const captured = {
        stdout: Buffer.concat(stdout).toString('utf-8'),
        stderr: Buffer.concat(stderr).toString('utf-8'),
      };

      if (code === null) {
        reject(
          new ProcessExecutionError(display, `terminated by signal ${signal ?? 'unknown'}`, {
            stderr: captured.stderr,
          })
        );
        return;
      }

      resolve({ ...captured, exitCode: code });
    });
  });
};

/**
 * Check whether a command resolves to an executable on PATH.
 */
export async function commandExists(
  command: string,
  pathEnv: string = process.env.PATH ?? ''
): Promise<boolean> {
  const candidates = command.includes('/')
    ? [command]
    : pathEnv
        .split(delimiter)
        .filter((dir) => dir.length > 0)
        .map((dir) => join(dir, command));

  for (const candidate of candidates) {
    try {
      await access(candidate, constants.X_OK);
      return true;
    } catch {
      // not in this directory
    }
  }

  return false;
}

/**
 * Fail fast when any of the external tools is missing.
 *
 * @throws ConfigurationError naming every missing binary
 */
export async function checkRequiredBinaries(
  binaries: readonly string[],
  pathEnv?: string
): Promise<void> {
  const missing: string[] = [];
  for (const binary of binaries) {
    if (!(await commandExists(binary, pathEnv))) {
      missing.push(binary);
    }
  }

  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required binaries: ${missing.join(', ')}`);
  }
}
