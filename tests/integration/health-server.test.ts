import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { Client, credentials, Metadata, status, type ClientReadableStream } from '@grpc/grpc-js';
import { EXAMPLE_STATUSES, usage } from '../../src/example-server.js';
import { loadHealthService, parseHealthCheckResponse } from '../../src/health/protocol.js';
import { checkHealth } from '../../src/health/probe.js';
import { startHealthServer, type RunningHealthServer } from '../../src/server/server.js';
import type { ServingStatus } from '../../src/types/health.js';

function nextStatuses(stream: ClientReadableStream<object>, count: number): Promise<ServingStatus[]> {
  return new Promise((resolve, reject) => {
    const seen: ServingStatus[] = [];
    const onData = (message: object): void => {
      seen.push(parseHealthCheckResponse(message).status);
      if (seen.length === count) {
        stream.off('data', onData);
        resolve(seen);
      }
    };
    stream.on('data', onData);
    stream.once('error', reject);
  });
}

describe('health server', () => {
  let running: RunningHealthServer;
  let client: Client;

  beforeAll(async () => {
    running = await startHealthServer({ statuses: { ...EXAMPLE_STATUSES } });
    client = new Client(running.address, credentials.createInsecure());
  });

  afterAll(async () => {
    client.close();
    await running.stop();
  });

  function watch(service: string): ClientReadableStream<object> {
    const { watch: method } = loadHealthService();
    return client.makeServerStreamRequest(
      method.path,
      method.requestSerialize,
      method.responseDeserialize,
      { service },
      new Metadata()
    );
  }

  it('should serve the example statuses through Check', async () => {
    const probe = (service: string) =>
      checkHealth({ target: running.address, service, timeoutSeconds: 2, tls: false });

    await expect(probe('')).resolves.toMatchObject({ status: 'SERVING', healthy: true });
    await expect(probe('example.Service')).resolves.toMatchObject({ status: 'SERVING' });
    await expect(probe('example.AnotherService')).resolves.toMatchObject({
      status: 'NOT_SERVING',
      healthy: false,
    });
  });

  it('should stream the current status and later changes through Watch', async () => {
    const stream = watch('example.Service');
    const first = await nextStatuses(stream, 1);
    expect(first).toEqual(['SERVING']);

    const following = nextStatuses(stream, 2);
    running.health.set('example.Service', 'NOT_SERVING');
    running.health.set('example.Service', 'SERVING');
    await expect(following).resolves.toEqual(['NOT_SERVING', 'SERVING']);

    const cancelled = new Promise<number>((resolve) => {
      stream.once('error', (error: { code: number }) => resolve(error.code));
    });
    stream.cancel();
    await expect(cancelled).resolves.toBe(status.CANCELLED);
  });

  it('should report SERVICE_UNKNOWN to watchers of an unknown service', async () => {
    const stream = watch('example.Missing');

    await expect(nextStatuses(stream, 1)).resolves.toEqual(['SERVICE_UNKNOWN']);

    const cancelled = new Promise<void>((resolve) => stream.once('error', () => resolve()));
    stream.cancel();
    await cancelled;
  });
});

describe('example server usage', () => {
  it('should show how to probe each example service', () => {
    const lines = usage(50051);

    expect(lines[0]).toBe('🚀 Example gRPC server started on port 50051');
    expect(lines).toContain('   grpc-healthcheck --target localhost:50051 --service example.AnotherService');
    expect(lines[lines.length - 1]).toBe('Press Ctrl+C to stop');
  });
});
