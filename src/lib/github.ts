/**
 * GitHub helpers for fetching repository sources to analyze
 */

import { Octokit } from '@octokit/rest';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';

export interface RepoRef {
  owner: string;
  repo: string;
  /** Branch, tag or commit; the default branch when omitted */
  ref?: string;
}

export function createGitHubClient(token?: string): Octokit {
  return token ? new Octokit({ auth: token }) : new Octokit();
}

/**
 * Parse `https://github.com/owner/repo(.git)` or `owner/repo`.
 *
 * @throws Error for a host other than github.com, or a URL without owner and repository
 */
export function parseRepoUrl(repoUrl: string): { owner: string; repo: string } {
  const trimmed = repoUrl.trim();
  let path = trimmed;

  if (/^[a-z]+:\/\//i.test(trimmed)) {
    const url = new URL(trimmed);
    if (url.hostname.toLowerCase() !== 'github.com') {
      throw new Error(`The provided URL is not a GitHub URL: ${repoUrl}`);
    }
    path = url.pathname;
  }

  const [owner, repo] = path
    .replace(/^\/+/, '')
    .replace(/\/+$/, '')
    .replace(/\.git$/, '')
    .split('/');

  if (!owner || !repo) {
    throw new Error(`Invalid GitHub repository URL: ${repoUrl}`);
  }

  return { owner, repo };
}

/**
 * Download a zipball of a repository ref into a folder.
 *
 * @returns Path of the written .zip file
 */
export async function downloadRepoArchive(
  octokit: Octokit,
  target: RepoRef,
  destinationFolder: string
): Promise<string> {
  const response = await octokit.rest.repos.downloadZipballArchive({
    owner: target.owner,
    repo: target.repo,
    ref: target.ref ?? '',
  });

  const data = response.data;
  if (!(data instanceof ArrayBuffer)) {
    throw new Error(`Unexpected archive payload for ${target.owner}/${target.repo}`);
  }

  await mkdir(destinationFolder, { recursive: true });
  const refLabel = (target.ref ?? 'default').replace(/[^\w.-]+/g, '_');
  const archivePath = join(destinationFolder, `${target.owner}-${target.repo}-${refLabel}.zip`);
  await writeFile(archivePath, Buffer.from(data));

  return archivePath;
}
