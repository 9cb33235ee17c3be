#!/usr/bin/env node
/**
 * IaC Findings Analyzer HTTP Server
 *
 * Usage:
 *   node dist/server/index.js     # binds ANALYZER_HOST:ANALYZER_PORT (127.0.0.1:8123)
 */

import { loadConfig } from '../lib/config.js';
import { createProvider, ensureProviderAvailable } from '../lib/providers/index.js';
import { checkRequiredBinaries } from '../lib/process-runner.js';
import { createApp } from './app.js';

async function main() {
  const config = loadConfig();

  await checkRequiredBinaries([config.binaries.validator, config.binaries.linter]);

  const provider = createProvider(config.model);
  await ensureProviderAvailable(provider);
  console.error(`Model provider: ${provider.name} (${provider.getModelName()})`);

  const app = createApp({ config, provider });

  const server = app.listen(config.server.port, config.server.host, () => {
    console.error(`IaC analyzer listening on http://${config.server.host}:${config.server.port}`);
    console.error(`Health check: http://${config.server.host}:${config.server.port}/health`);
  });

  const shutdown = () => {
    console.error('Shutting down...');
    server.close(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
