import { existsSync } from 'fs';
import { join } from 'path';
import { loadSync, type MethodDefinition, type ServiceDefinition } from '@grpc/proto-loader';
import { z } from 'zod';
import { SERVING_STATUSES, type HealthCheckRequest, type HealthCheckResponse } from '../types/health.js';

export const HEALTH_SERVICE_NAME = 'grpc.health.v1.Health';

const PROTO_FILE = 'health.proto';

// Sources sit in src/health, compiled output in dist/src/health.
const PROTO_DIRS = [join(__dirname, '..', '..', 'proto'), join(__dirname, '..', '..', '..', 'proto')];

export const healthCheckRequestSchema = z.object({
  service: z.string().default(''),
});

export const healthCheckResponseSchema = z.object({
  status: z.enum(SERVING_STATUSES).default('UNKNOWN'),
});

export interface HealthServiceDefinition {
  service: ServiceDefinition;
  check: MethodDefinition<object, object>;
  watch: MethodDefinition<object, object>;
}

let cached: HealthServiceDefinition | null = null;

export function resolveProtoDirectory(): string {
  const dir = PROTO_DIRS.find((candidate) => existsSync(join(candidate, PROTO_FILE)));
  if (!dir) {
    throw new Error(`Cannot locate ${PROTO_FILE} in ${PROTO_DIRS.join(', ')}`);
  }
  return dir;
}

/**
 * Load grpc.health.v1.Health from its .proto file.
 *
 * Enums decode as their names and unset fields take their proto3 defaults,
 * so a response without a status reads as UNKNOWN.
 */
export function loadHealthService(): HealthServiceDefinition {
  if (cached) {
    return cached;
  }

  const packageDefinition = loadSync(PROTO_FILE, {
    includeDirs: [resolveProtoDirectory()],
    keepCase: true,
    longs: String,
    enums: String,
    defaults: true,
    oneofs: true,
  });

  const definition = packageDefinition[HEALTH_SERVICE_NAME];
  if (!definition || 'format' in definition) {
    throw new Error(`${HEALTH_SERVICE_NAME} is not a service in ${PROTO_FILE}`);
  }

  const check = definition['Check'];
  const watch = definition['Watch'];
  if (!check || !watch) {
    throw new Error(`${HEALTH_SERVICE_NAME} is missing Check or Watch`);
  }

  cached = { service: definition, check, watch };
  return cached;
}

export function parseHealthCheckResponse(message: unknown): HealthCheckResponse {
  return healthCheckResponseSchema.parse(message);
}

export function parseHealthCheckRequest(message: unknown): HealthCheckRequest {
  return healthCheckRequestSchema.parse(message);
}
