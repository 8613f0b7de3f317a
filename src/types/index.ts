export type {
  HealthCheckRequest,
  HealthCheckResponse,
  HealthCheckResult,
  ProbeOptions,
  ServingStatus,
} from './health.js';
export { SERVING_STATUSES } from './health.js';
