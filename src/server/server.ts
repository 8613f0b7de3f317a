import { Server, ServerCredentials } from '@grpc/grpc-js';
import { formatHost } from '../config.js';
import { loadHealthService } from '../health/protocol.js';
import type { ServingStatus } from '../types/health.js';
import { logger as baseLogger } from '../utils/logger.js';
import { HealthService } from './health-service.js';

const logger = baseLogger.child({ component: 'server' });

export interface HealthServerOptions {
  host?: string;
  /** 0 binds a free port. */
  port?: number;
  statuses?: Record<string, ServingStatus>;
  /** Registry to serve; one is built from `statuses` when omitted. */
  health?: HealthService;
  /** Register no health service at all, so every call is UNIMPLEMENTED. */
  withoutHealthService?: boolean;
}

export interface RunningHealthServer {
  port: number;
  address: string;
  health: HealthService;
  server: Server;
  stop(): Promise<void>;
}

function bind(server: Server, address: string): Promise<number> {
  return new Promise((resolve, reject) => {
    server.bindAsync(address, ServerCredentials.createInsecure(), (error, port) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(port);
    });
  });
}

function shutdown(server: Server): Promise<void> {
  return new Promise((resolve) => {
    const timeout = setTimeout(() => {
      server.forceShutdown();
      resolve();
    }, 5000);
    timeout.unref();

    server.tryShutdown((error) => {
      clearTimeout(timeout);
      if (error) {
        logger.warn({ err: error }, 'Graceful shutdown failed, forcing');
        server.forceShutdown();
      }
      resolve();
    });
  });
}

export async function startHealthServer(options: HealthServerOptions = {}): Promise<RunningHealthServer> {
  const host = options.host ?? '127.0.0.1';
  const health = options.health ?? new HealthService(options.statuses ?? { '': 'SERVING' });
  const server = new Server();

  if (!options.withoutHealthService) {
    server.addService(loadHealthService().service, health.implementation());
  }

  const hostPart = formatHost(host);
  const port = await bind(server, `${hostPart}:${options.port ?? 0}`);
  const address = `${hostPart}:${port}`;
  logger.info({ address, services: health.services() }, 'Health server listening');

  return {
    port,
    address,
    health,
    server,
    async stop(): Promise<void> {
      health.enterGracefulShutdown();
      await shutdown(server);
      logger.info({ address }, 'Health server stopped');
    },
  };
}
