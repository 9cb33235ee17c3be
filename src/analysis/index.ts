/**
 * Analysis Module
 *
 * The stages of one analysis run: rename alternate-syntax files, run the
 * external tools, rewrite their output, and extract findings.
 */

export {
  normalizeSyntaxVariants,
  findSyntaxVariants,
  canonicalName,
  RENAMED_FILE_PREFIX,
  type FileRenameMapping,
} from './syntax-normalizer.js';

export {
  runStaticChecks,
  collectStreams,
  DEFAULT_BINARIES,
  type ToolStage,
  type ToolRunOptions,
  type ToolRunOutcome,
} from './tool-runner.js';

export {
  rectifyOutputs,
  rectifyText,
  type ToolStreams,
} from './output-rectifier.js';

export {
  FindingsSummarizer,
  buildDiagnosticsDocument,
  parseFindingsResponse,
  FINDINGS_RESPONSE_SCHEMA,
  SUMMARIZER_SYSTEM_PROMPT,
  type Finding,
  type SummarizerConfig,
  type ToolLabels,
} from './findings-summarizer.js';
