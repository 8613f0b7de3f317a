import { Client, credentials, Metadata, type ChannelCredentials, type ServiceError } from '@grpc/grpc-js';
import { ZodError } from 'zod';
import type { HealthCheckRequest, HealthCheckResult, ProbeOptions } from '../types/health.js';
import { ArgumentError, classifyRpcError, RpcFailureError } from '../utils/errors.js';
import { logger as baseLogger } from '../utils/logger.js';
import { loadHealthService, parseHealthCheckResponse } from './protocol.js';

const logger = baseLogger.child({ component: 'probe' });

export interface ProbeHooks {
  /** Called just before the request is sent. */
  onDispatch?: (request: HealthCheckRequest, deadline: Date) => void;
}

function channelCredentials(tls: boolean): ChannelCredentials {
  return tls ? credentials.createSsl() : credentials.createInsecure();
}

function callCheck(
  client: Client,
  request: HealthCheckRequest,
  deadline: Date
): Promise<object> {
  const { check } = loadHealthService();

  return new Promise((resolve, reject) => {
    client.makeUnaryRequest(
      check.path,
      check.requestSerialize,
      check.responseDeserialize,
      request,
      new Metadata(),
      { deadline },
      (error: ServiceError | null, response?: object) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(response ?? {});
      }
    );
  });
}

function isServiceError(error: unknown): error is ServiceError {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'number' &&
    'details' in error &&
    typeof error.details === 'string'
  );
}

/**
 * Run one grpc.health.v1.Health/Check against `options.target`.
 *
 * Resolves with the reported status whatever it is; rejects with a
 * HealthCheckError subclass when the call itself fails. The channel is
 * closed before the promise settles.
 */
export async function checkHealth(
  options: ProbeOptions,
  hooks: ProbeHooks = {}
): Promise<HealthCheckResult> {
  const { target, service, timeoutSeconds, tls } = options;
  const startedAt = Date.now();
  const deadline = new Date(startedAt + timeoutSeconds * 1000);
  if (!(timeoutSeconds > 0) || !Number.isFinite(deadline.getTime())) {
    throw new ArgumentError(`timeout of ${timeoutSeconds}s does not give a usable deadline`);
  }

  const client = new Client(target, channelCredentials(tls));
  const request: HealthCheckRequest = { service };

  logger.debug({ target, service, timeoutSeconds, tls }, 'Sending health check');

  try {
    hooks.onDispatch?.(request, deadline);
    const raw = await callCheck(client, request, deadline);
    const { status } = parseHealthCheckResponse(raw);
    const elapsedMs = Date.now() - startedAt;

    logger.debug({ target, service, status, elapsedMs }, 'Health check answered');

    return {
      target,
      service,
      status,
      healthy: status === 'SERVING',
      elapsedMs,
    };
  } catch (error) {
    if (isServiceError(error)) {
      logger.debug({ target, code: error.code, details: error.details }, 'Health check failed');
      throw classifyRpcError(error, { target, service, timeoutSeconds });
    }
    if (error instanceof ZodError) {
      throw new RpcFailureError('INVALID_RESPONSE', error.issues.map((i) => i.message).join('; '), {
        target,
      });
    }
    throw error;
  } finally {
    client.close();
  }
}
