import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { z } from 'zod';
import {
  DEFAULT_TIMEOUT_SECONDS,
  MAX_TIMEOUT_SECONDS,
  resolveOptions,
  type CliOptions,
  type ResolvedOptions,
} from './config.js';
import { checkHealth, type ProbeHooks } from './health/probe.js';
import { consoleSink, Reporter, type OutputSink } from './reporter.js';
import type { HealthCheckResult, ProbeOptions } from './types/health.js';
import { ArgumentError, HealthCheckError } from './utils/errors.js';
import { enableVerboseLogging, logger } from './utils/logger.js';

export const PROGRAM_NAME = 'grpc-healthcheck';

export type ProbeFn = (options: ProbeOptions, hooks?: ProbeHooks) => Promise<HealthCheckResult>;

export interface CliDependencies {
  sink?: OutputSink;
  probe?: ProbeFn;
}

const EXAMPLES = `
Examples:
  # Check overall server health
  $ ${PROGRAM_NAME} --target localhost:50051

  # Check specific service
  $ ${PROGRAM_NAME} --target localhost:50051 --service myapp.UserService

  # Using separate host and port
  $ ${PROGRAM_NAME} --host localhost --port 50051

  # With TLS and custom timeout
  $ ${PROGRAM_NAME} --target example.com:443 --tls --timeout 10

  # Verbose output
  $ ${PROGRAM_NAME} --target localhost:50051 -v`;

const packageJsonSchema = z.object({ version: z.string() });

function packageVersion(): string {
  // src/cli.ts and dist/src/cli.js sit at different depths below the root.
  const candidates = [join(__dirname, '..', 'package.json'), join(__dirname, '..', '..', 'package.json')];
  const path = candidates.find((candidate) => existsSync(candidate));
  if (!path) {
    return '0.0.0';
  }
  const parsed = packageJsonSchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')));
  return parsed.success ? parsed.data.version : '0.0.0';
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

export function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (value.trim() === '' || !Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError('Timeout must be a positive number of seconds.');
  }
  if (seconds > MAX_TIMEOUT_SECONDS) {
    throw new InvalidArgumentError(`Timeout must not exceed ${MAX_TIMEOUT_SECONDS} seconds.`);
  }
  return seconds;
}

export function createProgram(sink: OutputSink = consoleSink): Command {
  return new Command(PROGRAM_NAME)
    .description('gRPC Health Check Tool - Check the health of gRPC services')
    .version(packageVersion())
    .option('--target <address>', "gRPC server target address (e.g., 'localhost:50051')")
    .option('--host <host>', 'gRPC server host (use with --port)')
    .option('--port <port>', 'gRPC server port (use with --host)', parsePort)
    .option('--service <name>', 'Service name to check (empty for overall server health)', '')
    .option(
      '--timeout <seconds>',
      'Timeout in seconds',
      parseSeconds,
      DEFAULT_TIMEOUT_SECONDS
    )
    .option('--tls', 'Use TLS/SSL for the connection', false)
    .option('-v, --verbose', 'Enable verbose output', false)
    .addHelpText('after', EXAMPLES)
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => sink.stdout(str.trimEnd()),
      writeErr: (str) => sink.stderr(str.trimEnd()),
    });
}

/**
 * Parse `argv` (user arguments only), run the probe once and return the
 * process exit code: 0 when the target reports SERVING, 1 otherwise.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const sink = deps.sink ?? consoleSink;
  const probe = deps.probe ?? checkHealth;
  const program = createProgram(sink);

  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version land here with exit code 0
      return error.exitCode === 0 ? 0 : 1;
    }
    throw error;
  }

  const raw = program.opts<CliOptions>();
  let resolved: ResolvedOptions;
  try {
    resolved = resolveOptions(raw);
  } catch (error) {
    if (error instanceof ArgumentError) {
      new Reporter(sink, raw.verbose === true).invalidArguments(error.message);
      return 1;
    }
    throw error;
  }

  const { verbose } = resolved;
  if (verbose) {
    enableVerboseLogging();
  }
  const reporter = new Reporter(sink, verbose);

  try {
    const result = await probe(resolved.probe, {
      onDispatch: () => reporter.checking(resolved.probe),
    });
    reporter.result(result);
    return result.healthy ? 0 : 1;
  } catch (error) {
    if (error instanceof HealthCheckError) {
      reporter.failure(error);
      return 1;
    }
    if (error instanceof ArgumentError) {
      reporter.invalidArguments(error.message);
      return 1;
    }
    reporter.unexpected(error);
    if (verbose) {
      logger.error({ err: error }, 'Unexpected error during health check');
    }
    return 1;
  }
}
