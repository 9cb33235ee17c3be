/**
 * Syntax Variant Normalizer
 *
 * terraform and tflint only read `.tf` / `.tfvars`. OpenTofu sources written
 * as `.tofu` / `.tofuvars` are renamed in place to a canonical name so the
 * tools pick them up, and the reverse mapping is kept so tool output can be
 * rewritten back to the names the user knows.
 */

import { readdir, rename } from 'fs/promises';
import { join, parse } from 'path';
import { minimatch } from 'minimatch';

/**
 * Renamed file name → original file name. Lives for one analysis run.
 */
export type FileRenameMapping = ReadonlyMap<string, string>;

interface VariantRule {
  pattern: string;
  canonicalExtension: string;
}

export const RENAMED_FILE_PREFIX = 'modified_';

const VARIANT_RULES: readonly VariantRule[] = [
  { pattern: '*.tofu', canonicalExtension: '.tf' },
  { pattern: '*.tofuvars', canonicalExtension: '.tfvars' },
];

function matchRule(fileName: string): VariantRule | undefined {
  return VARIANT_RULES.find((rule) => minimatch(fileName, rule.pattern, { dot: true }));
}

/**
 * Canonical name for an alternate-syntax file, or undefined for any other file.
 */
export function canonicalName(fileName: string): string | undefined {
  const rule = matchRule(fileName);
  if (!rule) return undefined;
  return `${RENAMED_FILE_PREFIX}${parse(fileName).name}${rule.canonicalExtension}`;
}

/**
 * List alternate-syntax files directly inside a directory (non-recursive).
 */
export async function findSyntaxVariants(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && matchRule(entry.name) !== undefined)
    .map((entry) => entry.name)
    .sort();
}

/**
 * Rename every alternate-syntax file in `dir` to its canonical name.
 *
 * A directory without such files is left untouched and yields an empty
 * mapping, so a second pass over a normalized directory is a no-op.
 */
export async function normalizeSyntaxVariants(dir: string): Promise<FileRenameMapping> {
  const variants = await findSyntaxVariants(dir);
  const mapping = new Map<string, string>();

  for (const original of variants) {
    const renamed = canonicalName(original);
    if (!renamed) continue;

    await rename(join(dir, original), join(dir, renamed));
    mapping.set(renamed, original);
  }

  return mapping;
}
