export const SERVING_STATUSES = ['UNKNOWN', 'SERVING', 'NOT_SERVING', 'SERVICE_UNKNOWN'] as const;

export type ServingStatus = (typeof SERVING_STATUSES)[number];

export interface HealthCheckRequest {
  /** Empty string asks for the health of the whole server. */
  service: string;
}

export interface HealthCheckResponse {
  status: ServingStatus;
}

export interface ProbeOptions {
  target: string;
  service: string;
  timeoutSeconds: number;
  tls: boolean;
}

export interface HealthCheckResult {
  target: string;
  service: string;
  status: ServingStatus;
  healthy: boolean;
  elapsedMs: number;
}
