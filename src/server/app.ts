/**
 * HTTP API
 *
 * Routes:
 * - GET  /                  welcome message
 * - GET  /health            liveness probe
 * - POST /api/v1/runs       download a GitHub repository and analyze it
 *
 * Each run gets its own temporary download and extraction directories, so
 * concurrent requests never share a `repo_copy`.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import { mkdir, mkdtemp, rm } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import type { AnalyzerConfig } from '../lib/config.js';
import type { ModelProvider } from '../lib/model-provider.js';
import type { ProcessRunner } from '../lib/process-runner.js';
import { errorMessage } from '../lib/errors.js';
import {
  createGitHubClient,
  downloadRepoArchive,
  parseRepoUrl,
} from '../lib/github.js';
import { createAnalysisOrchestrator } from '../pipeline/analysis-orchestrator.js';
import { formatAsLegacyString, toFindingRecords } from '../pipeline/result-formatter.js';

export const API_PREFIX = '/api/v1';
export const INTERNAL_ERROR_MESSAGE = 'An unexpected error occurred. Please try again later.';

const githubDetailsSchema = z.object({
  repo_url: z.string().min(1).describe('Repository URL (https://github.com/owner/repo)'),
  branch: z.string().min(1).optional().describe('Branch to analyze (default branch if omitted)'),
  github_token: z.string().min(1).optional().describe('Token for private repositories'),
});

export const runRequestSchema = z.object({
  agent_id: z.string().optional(),
  input: z.object({
    github_details: githubDetailsSchema,
  }),
  metadata: z.record(z.unknown()).optional(),
});

export type GithubDetails = z.infer<typeof githubDetailsSchema>;
export type RunRequest = z.infer<typeof runRequestSchema>;

/**
 * Fetches a repository archive and returns the path of the .zip file.
 */
export type RepositoryDownloader = (
  details: GithubDetails,
  destinationFolder: string
) => Promise<string>;

export const downloadFromGitHub: RepositoryDownloader = async (details, destinationFolder) => {
  const { owner, repo } = parseRepoUrl(details.repo_url);
  const octokit = createGitHubClient(details.github_token);
  return downloadRepoArchive(octokit, { owner, repo, ref: details.branch }, destinationFolder);
};

export interface ServerDependencies {
  config: AnalyzerConfig;
  provider: ModelProvider;
  downloader?: RepositoryDownloader;
  runner?: ProcessRunner;
}

async function removeQuietly(path: string): Promise<void> {
  try {
    await rm(path, { recursive: true, force: true });
  } catch (error) {
    console.error(`Failed to remove ${path}: ${errorMessage(error)}`);
  }
}

export function createApp(deps: ServerDependencies): express.Express {
  const { config, provider } = deps;
  const downloader = deps.downloader ?? downloadFromGitHub;
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.get('/', (_req, res) => {
    res.json({ message: 'IaC Findings Analyzer API' });
  });

  app.get('/health', async (_req, res) => {
    const available = await provider.healthCheck();
    res.status(available ? 200 : 503).json({
      status: available ? 'ok' : 'unavailable',
      provider: provider.name,
      model: provider.getModelName(),
    });
  });

  app.post(`${API_PREFIX}/runs`, async (req: Request, res: Response) => {
    const parsed = runRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      console.error(`422 Validation Error: ${detail}`);
      res.status(422).json({ detail });
      return;
    }

    const body = parsed.data;
    const details = body.input.github_details;
    console.error(`Received analysis request for ${details.repo_url}${details.branch ? ` (${details.branch})` : ''}`);

    let downloadDir: string | undefined;
    let workDir: string | undefined;

    try {
      await mkdir(config.destinationFolder, { recursive: true });
      await mkdir(config.tmpRoot, { recursive: true });
      downloadDir = await mkdtemp(join(config.destinationFolder, 'iac-download-'));
      workDir = await mkdtemp(join(config.tmpRoot, 'iac-run-'));

      const archivePath = await downloader(details, downloadDir);

      const orchestrator = createAnalysisOrchestrator(provider, {
        tmpRoot: workDir,
        binaries: config.binaries,
        runner: deps.runner,
        temperature: config.model.temperature,
        verbose: config.verbose,
      });
      const run = await orchestrator.run(archivePath);

      console.error(`Analysis ${run.status} with ${run.findings.length} finding(s)`);

      res.status(200).json({
        agent_id: body.agent_id ?? null,
        output: {
          static_analyzer_output: formatAsLegacyString(run.findings),
          findings: toFindingRecords(run.findings),
          status: run.status,
        },
        model: provider.getModelName(),
        metadata: body.metadata ?? {},
      });
    } catch (error) {
      console.error('Internal error during run processing:', error);
      res.status(500).json({ detail: INTERNAL_ERROR_MESSAGE });
    } finally {
      if (downloadDir) await removeQuietly(downloadDir);
      if (workDir) await removeQuietly(workDir);
    }
  });

  // Malformed JSON bodies land here
  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (error instanceof SyntaxError) {
      res.status(422).json({ detail: 'Request body is not valid JSON' });
      return;
    }
    console.error('Unhandled request error:', error);
    res.status(500).json({ detail: INTERNAL_ERROR_MESSAGE });
  });

  return app;
}
