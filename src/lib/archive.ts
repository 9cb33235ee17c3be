/**
 * Archive helpers for repository sources.
 */

import AdmZip from 'adm-zip';
import { mkdir, readdir, stat } from 'fs/promises';
import { extname, join } from 'path';

export type SourcePathType = 'zip' | 'directory' | 'other';

/**
 * Classify a source path. Missing paths are 'other'.
 */
export async function checkPathType(path: string): Promise<SourcePathType> {
  try {
    const info = await stat(path);
    if (info.isFile() && extname(path).toLowerCase() === '.zip') {
      return 'zip';
    }
    if (info.isDirectory()) {
      return 'directory';
    }
    return 'other';
  } catch (error) {
    if (isMissingPath(error)) {
      return 'other';
    }
    throw error;
  }
}

/**
 * Extract a zip archive into a directory, creating it if needed.
 */
export async function extractArchive(zipPath: string, destination: string): Promise<void> {
  await mkdir(destination, { recursive: true });
  const zip = new AdmZip(zipPath);
  zip.extractAllTo(destination, true);
}

/**
 * Locate the tree root inside an extracted archive.
 *
 * Repository zipballs wrap everything in one top-level directory
 * (`owner-repo-sha/`); when that is the only entry, its path is returned.
 */
export async function resolveArchiveRoot(extractedDir: string): Promise<string> {
  const entries = await readdir(extractedDir, { withFileTypes: true });
  if (entries.length === 1 && entries[0].isDirectory()) {
    return join(extractedDir, entries[0].name);
  }
  return extractedDir;
}

function isMissingPath(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}
