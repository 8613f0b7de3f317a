import { describe, it, expect, beforeEach } from '@jest/globals';
import { describeStatus, Reporter, type OutputSink } from '../../src/reporter.js';
import type { HealthCheckResult, ProbeOptions } from '../../src/types/health.js';
import { TimeoutError, UnimplementedError } from '../../src/utils/errors.js';

interface CapturedSink extends OutputSink {
  out: string[];
  err: string[];
}

function captureSink(): CapturedSink {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (line) => out.push(line),
    stderr: (line) => err.push(line),
  };
}

const options: ProbeOptions = {
  target: 'localhost:50051',
  service: '',
  timeoutSeconds: 5,
  tls: false,
};

function result(overrides: Partial<HealthCheckResult>): HealthCheckResult {
  return {
    target: 'localhost:50051',
    service: '',
    status: 'SERVING',
    healthy: true,
    elapsedMs: 3,
    ...overrides,
  };
}

describe('describeStatus', () => {
  it('should describe every serving status', () => {
    expect(describeStatus('SERVING')).toBe('✅ Service is SERVING');
    expect(describeStatus('NOT_SERVING')).toBe('❌ Service is NOT_SERVING');
    expect(describeStatus('UNKNOWN')).toBe('⚠️  Service status is UNKNOWN');
    expect(describeStatus('SERVICE_UNKNOWN')).toBe('❓ Service status: SERVICE_UNKNOWN');
  });
});

describe('Reporter', () => {
  let sink: CapturedSink;

  beforeEach(() => {
    sink = captureSink();
  });

  describe('quiet mode', () => {
    it('should print nothing before the call', () => {
      new Reporter(sink, false).checking(options);
      expect(sink.out).toEqual([]);
    });

    it('should print the healthy verdict', () => {
      new Reporter(sink, false).result(result({}));
      expect(sink.out).toEqual(['✅ Service is healthy']);
    });

    it('should print the unhealthy verdict', () => {
      new Reporter(sink, false).result(result({ status: 'NOT_SERVING', healthy: false }));
      expect(sink.out).toEqual(['❌ Service is not healthy']);
    });

    it('should print failures on stderr only', () => {
      new Reporter(sink, false).failure(new TimeoutError(5, { rpcStatus: 'DEADLINE_EXCEEDED', details: 'late' }));
      expect(sink.out).toEqual([]);
      expect(sink.err).toEqual(['❌ Health check failed: Health check timed out after 5s']);
    });
  });

  describe('verbose mode', () => {
    it('should summarise the request', () => {
      new Reporter(sink, true).checking({ ...options, service: 'example.Service', tls: true, timeoutSeconds: 2.5 });
      expect(sink.out).toEqual([
        '🔍 Checking health of gRPC server at localhost:50051',
        '   Service: example.Service',
        '   Timeout: 2.5s',
        '   TLS: enabled',
        '',
      ]);
    });

    it('should name the whole server when no service is given', () => {
      new Reporter(sink, true).checking(options);
      expect(sink.out[1]).toBe('   Service: <overall server health>');
      expect(sink.out[3]).toBe('   TLS: disabled');
    });

    it('should print the raw status instead of the verdict', () => {
      new Reporter(sink, true).result(result({ status: 'UNKNOWN', healthy: false }));
      expect(sink.out).toEqual(['⚠️  Service status is UNKNOWN']);
    });

    it('should print the gRPC status and details of a failure', () => {
      new Reporter(sink, true).failure(
        new UnimplementedError({ rpcStatus: 'UNIMPLEMENTED', details: 'Method not found' })
      );
      expect(sink.out).toEqual(['❌ gRPC Error: UNIMPLEMENTED', '   Details: Method not found']);
      expect(sink.err).toHaveLength(1);
      expect(sink.err[0]).toMatch(/^❌ Health check failed: Health check not implemented/);
    });
  });

  it('should report invalid arguments and unexpected errors on stderr', () => {
    const reporter = new Reporter(sink, false);
    reporter.invalidArguments('--port is required when using --host');
    reporter.unexpected(new Error('socket hang up'));
    reporter.unexpected('plain string');

    expect(sink.err).toEqual([
      '❌ Invalid arguments: --port is required when using --host',
      '❌ Unexpected error: socket hang up',
      '❌ Unexpected error: plain string',
    ]);
  });
});
