import { status as GrpcStatus, type ServiceError } from '@grpc/grpc-js';

export type HealthCheckErrorCode =
  | 'UNREACHABLE'
  | 'TIMED_OUT'
  | 'UNIMPLEMENTED'
  | 'NOT_FOUND'
  | 'RPC_FAILURE';

export type CauseCategory = 'unreachable' | 'timed out' | 'unimplemented' | 'not found' | 'other';

const CATEGORIES: Record<HealthCheckErrorCode, CauseCategory> = {
  UNREACHABLE: 'unreachable',
  TIMED_OUT: 'timed out',
  UNIMPLEMENTED: 'unimplemented',
  NOT_FOUND: 'not found',
  RPC_FAILURE: 'other',
};

export interface RpcErrorDetails {
  target?: string;
  rpcStatus?: string;
  details?: string;
}

export class HealthCheckError extends Error {
  public readonly category: CauseCategory;
  public readonly target?: string;
  public readonly rpcStatus?: string;
  public readonly details?: string;

  constructor(
    message: string,
    public readonly code: HealthCheckErrorCode,
    info: RpcErrorDetails = {}
  ) {
    super(message);
    this.name = 'HealthCheckError';
    this.category = CATEGORIES[code];
    this.target = info.target;
    this.rpcStatus = info.rpcStatus;
    this.details = info.details;
  }
}

export class UnreachableError extends HealthCheckError {
  constructor(target: string, info: RpcErrorDetails = {}) {
    super(`Cannot connect to ${target}`, 'UNREACHABLE', { ...info, target });
    this.name = 'UnreachableError';
  }
}

export class TimeoutError extends HealthCheckError {
  constructor(
    public readonly timeoutSeconds: number,
    info: RpcErrorDetails = {}
  ) {
    super(`Health check timed out after ${timeoutSeconds}s`, 'TIMED_OUT', info);
    this.name = 'TimeoutError';
  }
}

export class UnimplementedError extends HealthCheckError {
  constructor(info: RpcErrorDetails = {}) {
    super(
      'Health check not implemented on the server. ' +
        'Make sure the server implements grpc.health.v1.Health service.',
      'UNIMPLEMENTED',
      info
    );
    this.name = 'UnimplementedError';
  }
}

export class ServiceNotFoundError extends HealthCheckError {
  constructor(
    public readonly service: string,
    info: RpcErrorDetails = {}
  ) {
    super(`Service '${service}' not found`, 'NOT_FOUND', info);
    this.name = 'ServiceNotFoundError';
  }
}

export class RpcFailureError extends HealthCheckError {
  constructor(rpcStatus: string, details: string, info: RpcErrorDetails = {}) {
    super(`Health check failed: ${rpcStatus} - ${details}`, 'RPC_FAILURE', {
      ...info,
      rpcStatus,
      details,
    });
    this.name = 'RpcFailureError';
  }
}

/**
 * Raised for flag combinations that cannot name a single target.
 * Never reaches the network.
 */
export class ArgumentError extends Error {
  public readonly code = 'INVALID_ARGUMENT';

  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

export interface RpcCallContext {
  target: string;
  service: string;
  timeoutSeconds: number;
}

export function statusName(code: number): string {
  return GrpcStatus[code] ?? `CODE_${code}`;
}

/**
 * Map a failed gRPC call onto the error kind the CLI reports.
 */
export function classifyRpcError(error: ServiceError, context: RpcCallContext): HealthCheckError {
  const info: RpcErrorDetails = {
    target: context.target,
    rpcStatus: statusName(error.code),
    details: error.details,
  };

  switch (error.code) {
    case GrpcStatus.UNIMPLEMENTED:
      return new UnimplementedError(info);
    case GrpcStatus.DEADLINE_EXCEEDED:
      return new TimeoutError(context.timeoutSeconds, info);
    case GrpcStatus.UNAVAILABLE:
      return new UnreachableError(context.target, info);
    case GrpcStatus.NOT_FOUND:
      return new ServiceNotFoundError(context.service, info);
    default:
      return new RpcFailureError(statusName(error.code), error.details, info);
  }
}
