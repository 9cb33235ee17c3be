/**
 * Output Rectifier
 *
 * Rewrites renamed file names in captured tool output back to the original
 * names, so the internal `.tofu` → `.tf` rename never shows in findings.
 */

import type { FileRenameMapping } from './syntax-normalizer.js';

/**
 * The four captured diagnostic streams.
 */
export interface ToolStreams {
  validateStdout: string;
  validateStderr: string;
  lintStdout: string;
  lintStderr: string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Replace every renamed name in `text` with its original name.
 *
 * All names are matched in one pass, longest first, so `modified_a.tf`
 * never eats the front of `modified_a.tfvars`.
 */
export function rectifyText(text: string, mapping: FileRenameMapping): string {
  if (mapping.size === 0 || text === '') {
    return text;
  }

  const names = [...mapping.keys()].sort((a, b) => b.length - a.length);
  const pattern = new RegExp(names.map(escapeRegExp).join('|'), 'g');

  return text.replace(pattern, (renamed) => mapping.get(renamed) ?? renamed);
}

export function rectifyOutputs(
  streams: ToolStreams,
  mapping: FileRenameMapping
): ToolStreams {
  return {
    validateStdout: rectifyText(streams.validateStdout, mapping),
    validateStderr: rectifyText(streams.validateStderr, mapping),
    lintStdout: rectifyText(streams.lintStdout, mapping),
    lintStderr: rectifyText(streams.lintStderr, mapping),
  };
}
