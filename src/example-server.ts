#!/usr/bin/env node
import { PROGRAM_NAME } from './cli.js';
import { startHealthServer, type RunningHealthServer } from './server/server.js';
import { logger } from './utils/logger.js';

export const EXAMPLE_PORT = 50051;

export const EXAMPLE_STATUSES = {
  '': 'SERVING',
  'example.Service': 'SERVING',
  'example.AnotherService': 'NOT_SERVING',
} as const;

export function startExampleServer(port: number = EXAMPLE_PORT): Promise<RunningHealthServer> {
  return startHealthServer({ host: '::', port, statuses: { ...EXAMPLE_STATUSES } });
}

export function usage(port: number): string[] {
  return [
    `🚀 Example gRPC server started on port ${port}`,
    '   Overall health: SERVING',
    '   example.Service: SERVING',
    '   example.AnotherService: NOT_SERVING',
    '',
    'Test with:',
    `   ${PROGRAM_NAME} --target localhost:${port}`,
    `   ${PROGRAM_NAME} --target localhost:${port} --service example.Service`,
    `   ${PROGRAM_NAME} --target localhost:${port} --service example.AnotherService`,
    '',
    'Press Ctrl+C to stop',
  ];
}

async function main(): Promise<void> {
  const running = await startExampleServer();
  for (const line of usage(running.port)) {
    console.log(line);
  }

  const stop = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}, shutting down...`);
    console.log('\n🛑 Shutting down...');
    void (async () => {
      try {
        await running.stop();
        process.exit(0);
      } catch (error) {
        logger.error({ err: error }, 'Error during shutdown');
        process.exit(1);
      }
    })();
  };

  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error({ err: error }, 'Failed to start example server');
    process.exit(1);
  });
}
