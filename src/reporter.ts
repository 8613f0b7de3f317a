import type { HealthCheckResult, ProbeOptions, ServingStatus } from './types/health.js';
import type { HealthCheckError } from './utils/errors.js';

export interface OutputSink {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

export const consoleSink: OutputSink = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

export function describeStatus(status: ServingStatus): string {
  switch (status) {
    case 'SERVING':
      return `✅ Service is ${status}`;
    case 'NOT_SERVING':
      return `❌ Service is ${status}`;
    case 'UNKNOWN':
      return `⚠️  Service status is ${status}`;
    default:
      return `❓ Service status: ${status}`;
  }
}

/**
 * Turns probe progress into the lines the CLI prints. Verbose mode adds
 * the request summary and the raw gRPC outcome and drops the one-line
 * verdict.
 */
export class Reporter {
  constructor(
    private readonly sink: OutputSink,
    private readonly verbose: boolean
  ) {}

  checking(options: ProbeOptions): void {
    if (!this.verbose) {
      return;
    }
    this.sink.stdout(`🔍 Checking health of gRPC server at ${options.target}`);
    this.sink.stdout(`   Service: ${options.service || '<overall server health>'}`);
    this.sink.stdout(`   Timeout: ${options.timeoutSeconds}s`);
    this.sink.stdout(`   TLS: ${options.tls ? 'enabled' : 'disabled'}`);
    this.sink.stdout('');
  }

  result(result: HealthCheckResult): void {
    if (this.verbose) {
      this.sink.stdout(describeStatus(result.status));
      return;
    }
    this.sink.stdout(result.healthy ? '✅ Service is healthy' : '❌ Service is not healthy');
  }

  failure(error: HealthCheckError): void {
    if (this.verbose && error.rpcStatus !== undefined) {
      this.sink.stdout(`❌ gRPC Error: ${error.rpcStatus}`);
      this.sink.stdout(`   Details: ${error.details ?? ''}`);
    }
    this.sink.stderr(`❌ Health check failed: ${error.message}`);
  }

  invalidArguments(message: string): void {
    this.sink.stderr(`❌ Invalid arguments: ${message}`);
  }

  unexpected(error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    this.sink.stderr(`❌ Unexpected error: ${message}`);
  }
}
