#!/usr/bin/env node
/**
 * IaC Findings Analyzer - CLI Entry Point
 *
 * Analyzes a local Terraform/OpenTofu directory or .zip archive.
 *
 * Usage:
 *   node dist/cli.js ./infra
 *   node dist/cli.js repo.zip --output markdown
 *   node dist/cli.js --help
 */

import { loadConfig } from './lib/config.js';
import { createProvider, ensureProviderAvailable } from './lib/providers/index.js';
import { checkRequiredBinaries } from './lib/process-runner.js';
import { AnalyzerError, errorMessage } from './lib/errors.js';
import { createAnalysisOrchestrator } from './pipeline/analysis-orchestrator.js';
import {
  formatAsLegacyString,
  formatAsMarkdown,
  toFindingRecords,
  type FindingRecord,
} from './pipeline/result-formatter.js';

export type OutputFormat = 'json' | 'markdown' | 'legacy';

export interface CLIArgs {
  source?: string;
  output?: OutputFormat;
  help?: boolean;
  verbose?: boolean;
  skipBinaryCheck?: boolean;
}

export interface CLIOutput {
  success: boolean;
  source?: string;
  status?: 'completed' | 'aborted';
  findings?: FindingRecord[];
  abort_reason?: string;
  model?: string;
  error?: string;
  hint?: string;
}

export function parseArgs(argv: string[]): CLIArgs {
  const args: CLIArgs = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg === '--output' || arg === '-o') {
      const value = argv[++i];
      if (value === 'json' || value === 'markdown' || value === 'legacy') {
        args.output = value;
      }
    } else if (arg === '--verbose' || arg === '-v') {
      args.verbose = true;
    } else if (arg === '--skip-binary-check') {
      args.skipBinaryCheck = true;
    } else if (!arg.startsWith('-') && args.source === undefined) {
      args.source = arg;
    }
  }

  return args;
}

function printHelp(): void {
  console.log(`
IaC Findings Analyzer CLI

Usage:
  iac-analyze <directory | archive.zip> [options]

Options:
  -o, --output <format>    Output format: json (default), markdown or legacy
  -v, --verbose            Log pipeline progress to stdout
  --skip-binary-check      Do not check for terraform/tflint on PATH first
  -h, --help               Show this help message

Environment:
  MODEL_PROVIDER        anthropic (default) or ollama
  ANTHROPIC_API_KEY     Required for the anthropic provider
  OLLAMA_BASE_URL       Ollama server URL (default: http://localhost:11434)
  VALIDATOR_BIN         Validator binary (default: terraform)
  LINTER_BIN            Linter binary (default: tflint)
  TMP_DIR               Where archives are extracted (default: OS temp dir)

Examples:
  iac-analyze ./infra
  iac-analyze ./infra --output markdown
  VALIDATOR_BIN=tofu iac-analyze repo.zip
`);
}

function outputJSON(result: CLIOutput): void {
  console.log(JSON.stringify(result, null, 2));
}

function outputError(error: string, hint?: string): void {
  outputJSON({
    success: false,
    error,
    hint,
  });
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv);

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  if (!args.source) {
    outputError('Source path is required', 'Use iac-analyze <directory | archive.zip>');
    process.exit(1);
  }

  try {
    const config = loadConfig();
    const verbose = args.verbose ?? config.verbose;

    if (!args.skipBinaryCheck) {
      await checkRequiredBinaries([config.binaries.validator, config.binaries.linter]);
    }

    const provider = createProvider(config.model);
    await ensureProviderAvailable(provider);

    const orchestrator = createAnalysisOrchestrator(provider, {
      tmpRoot: config.tmpRoot,
      binaries: config.binaries,
      temperature: config.model.temperature,
      // Progress lines would corrupt JSON on stdout
      verbose: verbose && args.output !== undefined && args.output !== 'json',
    });

    const run = await orchestrator.run(args.source);

    if (args.output === 'markdown') {
      console.log(formatAsMarkdown(run));
    } else if (args.output === 'legacy') {
      console.log(formatAsLegacyString(run.findings));
    } else {
      outputJSON({
        success: true,
        source: args.source,
        status: run.status,
        findings: toFindingRecords(run.findings),
        abort_reason: run.abortReason,
        model: provider.getModelName(),
      });
    }

    if (run.status === 'aborted') {
      process.exit(2);
    }
  } catch (error) {
    if (error instanceof AnalyzerError && error.code === 'CONFIGURATION') {
      outputError(error.message, 'Check the source path, PATH and model provider settings');
    } else {
      outputError(errorMessage(error));
    }

    process.exit(1);
  }
}

// Only run main() when executed directly, not when imported
const isDirectExecution = process.argv[1]?.endsWith('/cli.js') || process.argv[1]?.endsWith('/cli.ts');
if (isDirectExecution) {
  main().catch((error) => {
    console.error('❌ Analysis failed:', error);
    process.exit(1);
  });
}
