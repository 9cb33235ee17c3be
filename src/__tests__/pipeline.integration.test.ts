import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import AdmZip from 'adm-zip';
import { mkdtemp, readdir, rm, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  AnalysisOrchestrator,
  createAnalysisOrchestrator,
  EXTRACT_DIR_NAME,
  type FindingsExtractor,
} from '../pipeline/analysis-orchestrator.js';
import type { ModelProvider } from '../lib/model-provider.js';
import type { ProcessRunner, ToolInvocationResult } from '../lib/process-runner.js';
import {
  ConfigurationError,
  ProcessExecutionError,
  SummarizationError,
} from '../lib/errors.js';

function createMockProvider(response: string): ModelProvider {
  return {
    name: 'mock',
    defaultModel: 'mock-model',
    chat: vi.fn().mockResolvedValue({
      content: response,
      usage: { inputTokens: 100, outputTokens: 50 },
    }),
    healthCheck: vi.fn().mockResolvedValue(true),
    getModelName: vi.fn().mockReturnValue('mock-model'),
  };
}

function result(exitCode: number, stdout = '', stderr = ''): ToolInvocationResult {
  return { stdout, stderr, exitCode };
}

function createFakeRunner(responses: Record<string, ToolInvocationResult | Error>) {
  return vi.fn<ProcessRunner>(async (command, args) => {
    const key = `${command} ${args[0]}`;
    const response = responses[key];
    if (response === undefined) {
      throw new Error(`unexpected call: ${key}`);
    }
    if (response instanceof Error) {
      throw response;
    }
    return response;
  });
}

const cleanToolRun = {
  'terraform validate': result(0, 'Success! The configuration is valid.\n'),
  'terraform init': result(0, 'Terraform has been successfully initialized!\n'),
  'tflint --format=compact': result(0),
};

describe('Pipeline Integration Tests', () => {
  let workDir: string;
  let tmpRoot: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'iac-src-'));
    tmpRoot = await mkdtemp(join(tmpdir(), 'iac-tmp-'));
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(workDir, { recursive: true, force: true });
    await rm(tmpRoot, { recursive: true, force: true });
  });

  async function writeZip(entries: Record<string, string>): Promise<string> {
    const zip = new AdmZip();
    for (const [name, content] of Object.entries(entries)) {
      zip.addFile(name, Buffer.from(content));
    }
    const zipPath = join(workDir, 'repo.zip');
    zip.writeZip(zipPath);
    return zipPath;
  }

  describe('AnalysisOrchestrator', () => {
    it('reports validator errors under the original OpenTofu file name and skips lint', async () => {
      await writeFile(join(workDir, 'main.tofu'), 'resource "null_resource" "a" {}\n');
      const runner = createFakeRunner({
        'terraform validate': result(
          1,
          '',
          'Error: Duplicate resource "null_resource" configuration\n\n  on modified_main.tf line 5:\n'
        ),
      });
      const provider = createMockProvider(
        JSON.stringify({
          findings: [
            {
              file_name: 'main.tofu',
              description:
                'Error: Duplicate resource "null_resource" configuration\n\n  on main.tofu:',
            },
          ],
        })
      );
      const orchestrator = createAnalysisOrchestrator(provider, { runner, tmpRoot, verbose: false });

      const run = await orchestrator.run(workDir);

      expect(run.status).toBe('completed');
      expect(run.findings).toEqual([
        {
          fileName: 'main.tofu',
          description: 'Error: Duplicate resource "null_resource" configuration\n\n  on main.tofu:',
        },
      ]);
      expect(run.states).toEqual([
        'start',
        'normalized',
        'validated',
        'lint_skipped',
        'cleaned',
        'rectified',
        'summarized',
        'done',
      ]);
      expect(run.renamedFiles).toBe(1);
      expect(runner).toHaveBeenCalledTimes(1);
      expect(run.streams?.validateStderr).toBe(
        'Error: Duplicate resource "null_resource" configuration\n\n  on main.tofu line 5:\n'
      );

      const [params] = vi.mocked(provider.chat).mock.calls[0];
      expect(params.messages[0].content).toContain('on main.tofu line 5:');
      expect(params.messages[0].content).not.toContain('modified_main.tf');
    });

    it('returns no findings for a clean directory and leaves it in place', async () => {
      const runner = createFakeRunner(cleanToolRun);
      const summarizer: FindingsExtractor = { summarize: vi.fn(async () => []) };
      const orchestrator = new AnalysisOrchestrator(summarizer, { runner, tmpRoot, verbose: false });

      const run = await orchestrator.run(workDir);

      expect(run.status).toBe('completed');
      expect(run.findings).toEqual([]);
      expect(run.states).toEqual([
        'start',
        'normalized',
        'validated',
        'linted',
        'cleaned',
        'rectified',
        'summarized',
        'done',
      ]);
      expect(existsSync(workDir)).toBe(true);
      expect(summarizer.summarize).toHaveBeenCalledWith({
        validateStdout: 'Success! The configuration is valid.\n',
        validateStderr: '',
        lintStdout: '',
        lintStderr: '',
      });
    });

    it('aborts with an empty result and removes the extracted copy when init fails', async () => {
      const zipPath = await writeZip({ 'infra-main/main.tf': 'terraform {}\n' });
      const runner = createFakeRunner({
        'terraform validate': result(0),
        'terraform init': new ProcessExecutionError('terraform init', 'failed to start (spawn EACCES)'),
      });
      const summarizer: FindingsExtractor = { summarize: vi.fn(async () => []) };
      const orchestrator = new AnalysisOrchestrator(summarizer, { runner, tmpRoot, verbose: false });

      const run = await orchestrator.run(zipPath);

      expect(run.status).toBe('aborted');
      expect(run.findings).toEqual([]);
      expect(run.abortReason).toBe('terraform init: failed to start (spawn EACCES)');
      expect(run.states).toEqual(['start', 'normalized', 'validated', 'failed']);
      expect(summarizer.summarize).not.toHaveBeenCalled();
      expect(existsSync(join(tmpRoot, EXTRACT_DIR_NAME))).toBe(false);
    });

    it('analyze() hides the abort behind an empty list', async () => {
      const zipPath = await writeZip({ 'main.tf': '' });
      const runner = createFakeRunner({
        'terraform validate': result(0),
        'terraform init': result(1, '', 'Error: Failed to query available provider packages'),
      });
      const orchestrator = new AnalysisOrchestrator(
        { summarize: vi.fn(async () => []) },
        { runner, tmpRoot, verbose: false }
      );

      await expect(orchestrator.analyze(zipPath)).resolves.toEqual([]);
    });

    it('runs the tools inside the wrapping directory of an archive and cleans up', async () => {
      const zipPath = await writeZip({
        'acme-infra-abc123/main.tf': 'terraform {}\n',
        'acme-infra-abc123/vars.tofuvars': 'region = "x"\n',
      });
      const runner = createFakeRunner(cleanToolRun);
      const summarizer: FindingsExtractor = { summarize: vi.fn(async () => []) };
      const orchestrator = new AnalysisOrchestrator(summarizer, { runner, tmpRoot, verbose: false });

      const run = await orchestrator.run(zipPath);

      expect(run.status).toBe('completed');
      expect(run.renamedFiles).toBe(1);
      expect(runner.mock.calls[0][2]).toEqual({
        cwd: join(tmpRoot, EXTRACT_DIR_NAME, 'acme-infra-abc123'),
      });
      expect(existsSync(join(tmpRoot, EXTRACT_DIR_NAME))).toBe(false);
    });

    it('aborts when the extracted copy cannot be removed', async () => {
      const zipPath = await writeZip({ 'main.tf': '' });
      const runner = createFakeRunner(cleanToolRun);
      const summarizer: FindingsExtractor = { summarize: vi.fn(async () => []) };
      const removeDirectory = vi.fn(async () => {
        throw new Error('EBUSY: resource busy or locked');
      });
      const orchestrator = new AnalysisOrchestrator(summarizer, {
        runner,
        tmpRoot,
        removeDirectory,
        verbose: false,
      });

      const run = await orchestrator.run(zipPath);

      expect(run.status).toBe('aborted');
      expect(run.findings).toEqual([]);
      expect(run.abortReason).toBe(
        `Failed to remove temporary workspace ${join(tmpRoot, EXTRACT_DIR_NAME)}`
      );
      expect(run.states).toEqual(['start', 'normalized', 'validated', 'linted', 'failed']);
      expect(removeDirectory).toHaveBeenCalledWith(join(tmpRoot, EXTRACT_DIR_NAME));
      expect(summarizer.summarize).not.toHaveBeenCalled();
    });

    it('never deletes a caller-owned directory', async () => {
      await writeFile(join(workDir, 'main.tf'), '');
      const removeDirectory = vi.fn(async () => {});
      const orchestrator = new AnalysisOrchestrator(
        { summarize: vi.fn(async () => []) },
        { runner: createFakeRunner(cleanToolRun), tmpRoot, removeDirectory, verbose: false }
      );

      await orchestrator.run(workDir);

      expect(removeDirectory).not.toHaveBeenCalled();
      expect(await readdir(workDir)).toEqual(['main.tf']);
    });

    it('re-raises summarization failures', async () => {
      const failure = new SummarizationError('Model response is not JSON: nope');
      const summarizer: FindingsExtractor = {
        summarize: vi.fn(async () => {
          throw failure;
        }),
      };
      const orchestrator = new AnalysisOrchestrator(summarizer, {
        runner: createFakeRunner(cleanToolRun),
        tmpRoot,
        verbose: false,
      });

      await expect(orchestrator.run(workDir)).rejects.toBe(failure);
    });

    it('rejects a missing summarizer before touching the source', async () => {
      const runner = createFakeRunner(cleanToolRun);
      const orchestrator = new AnalysisOrchestrator(undefined, { runner, tmpRoot, verbose: false });

      await expect(orchestrator.run(workDir)).rejects.toThrow('Findings summarizer is not configured');
      expect(runner).not.toHaveBeenCalled();
    });

    it('rejects an empty source', async () => {
      const orchestrator = new AnalysisOrchestrator(
        { summarize: vi.fn(async () => []) },
        { runner: createFakeRunner(cleanToolRun), tmpRoot, verbose: false }
      );

      await expect(orchestrator.run('')).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('rejects a source that is neither a directory nor a zip file', async () => {
      const notes = join(workDir, 'notes.txt');
      await writeFile(notes, 'hello');
      const orchestrator = new AnalysisOrchestrator(
        { summarize: vi.fn(async () => []) },
        { runner: createFakeRunner(cleanToolRun), tmpRoot, verbose: false }
      );

      await expect(orchestrator.run(notes)).rejects.toThrow(
        `'${notes}' is neither a zip file nor a directory`
      );
    });
  });
});
