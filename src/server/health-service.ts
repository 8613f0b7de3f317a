import { EventEmitter } from 'events';
import {
  status as GrpcStatus,
  type sendUnaryData,
  type ServerUnaryCall,
  type ServerWritableStream,
  type UntypedServiceImplementation,
} from '@grpc/grpc-js';
import { parseHealthCheckRequest } from '../health/protocol.js';
import type { HealthCheckResponse, ServingStatus } from '../types/health.js';
import { logger as baseLogger } from '../utils/logger.js';

const logger = baseLogger.child({ component: 'health-service' });

/**
 * Serving status registry behind grpc.health.v1.Health.
 *
 * The empty service name stands for the server as a whole. Watchers are
 * notified on every `set`, including ones that leave the status unchanged.
 */
export class HealthService extends EventEmitter {
  private statuses = new Map<string, ServingStatus>();
  private shuttingDown = false;

  constructor(initial: Record<string, ServingStatus> = {}) {
    super();
    for (const [service, status] of Object.entries(initial)) {
      this.statuses.set(service, status);
    }
  }

  set(service: string, status: ServingStatus): void {
    if (this.shuttingDown) {
      logger.debug({ service, status }, 'Ignoring status update during shutdown');
      return;
    }
    this.statuses.set(service, status);
    this.emit('change', service, status);
  }

  clear(service: string): void {
    if (this.shuttingDown) {
      logger.debug({ service }, 'Ignoring clear during shutdown');
      return;
    }
    this.statuses.delete(service);
    this.emit('change', service, 'SERVICE_UNKNOWN');
  }

  get(service: string): ServingStatus | undefined {
    return this.statuses.get(service);
  }

  services(): string[] {
    return [...this.statuses.keys()];
  }

  /** Mark every service NOT_SERVING and freeze the registry. */
  enterGracefulShutdown(): void {
    if (this.shuttingDown) {
      return;
    }
    for (const service of this.statuses.keys()) {
      this.set(service, 'NOT_SERVING');
    }
    this.shuttingDown = true;
  }

  implementation(): UntypedServiceImplementation {
    return {
      Check: (
        call: ServerUnaryCall<unknown, HealthCheckResponse>,
        callback: sendUnaryData<HealthCheckResponse>
      ) => this.check(call, callback),
      Watch: (call: ServerWritableStream<unknown, HealthCheckResponse>) => this.watch(call),
    };
  }

  private check(
    call: ServerUnaryCall<unknown, HealthCheckResponse>,
    callback: sendUnaryData<HealthCheckResponse>
  ): void {
    const { service } = parseHealthCheckRequest(call.request);
    const status = this.statuses.get(service);

    if (status === undefined) {
      callback({ code: GrpcStatus.NOT_FOUND, details: `unknown service ${service}` });
      return;
    }
    callback(null, { status });
  }

  private watch(call: ServerWritableStream<unknown, HealthCheckResponse>): void {
    const { service } = parseHealthCheckRequest(call.request);

    const onChange = (changed: string, status: ServingStatus): void => {
      if (changed === service) {
        call.write({ status });
      }
    };

    call.write({ status: this.statuses.get(service) ?? 'SERVICE_UNKNOWN' });
    this.on('change', onChange);
    call.on('cancelled', () => {
      this.off('change', onChange);
      call.end();
    });
  }
}
