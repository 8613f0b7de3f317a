#!/usr/bin/env node
import { runCli } from './cli.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

// Run if this is the main module
if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error({ err: error }, 'Unhandled error');
    process.exitCode = 1;
  });
}

export { runCli, createProgram } from './cli.js';
export { checkHealth, type ProbeHooks } from './health/probe.js';
export { loadHealthService } from './health/protocol.js';
export { HealthService } from './server/health-service.js';
export { startHealthServer, type HealthServerOptions, type RunningHealthServer } from './server/server.js';
export * from './types/index.js';
export * from './utils/errors.js';
