import { z } from 'zod';
import type { ProbeOptions } from './types/health.js';
import { ArgumentError } from './utils/errors.js';

export const DEFAULT_TIMEOUT_SECONDS = 5;

/** Longest delay a Node timer can hold, in whole seconds. */
export const MAX_TIMEOUT_SECONDS = 2147483;

/**
 * Flag set as it comes out of the argument parser, before the
 * target/host/port combination has been checked.
 */
export const cliOptionsSchema = z.object({
  target: z.string().min(1, 'target address must not be empty').optional(),
  host: z.string().min(1, 'host must not be empty').optional(),
  port: z.number().int().min(1).max(65535).optional(),
  service: z.string().default(''),
  timeout: z.number().positive().max(MAX_TIMEOUT_SECONDS).default(DEFAULT_TIMEOUT_SECONDS),
  tls: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

export type CliOptions = z.input<typeof cliOptionsSchema>;

export interface ResolvedOptions {
  probe: ProbeOptions;
  verbose: boolean;
}

export function buildTarget(options: { target?: string; host?: string; port?: number }): string {
  const { target, host, port } = options;

  if (target !== undefined) {
    if (host !== undefined || port !== undefined) {
      throw new ArgumentError('--target cannot be combined with --host or --port');
    }
    return target;
  }

  if (host === undefined) {
    if (port !== undefined) {
      throw new ArgumentError('--host is required when using --port');
    }
    throw new ArgumentError('one of --target or --host is required');
  }

  if (port === undefined) {
    throw new ArgumentError('--port is required when using --host');
  }

  return `${formatHost(host)}:${port}`;
}

/** Bracket IPv6 literals so the port separator stays unambiguous. */
export function formatHost(host: string): string {
  return host.includes(':') && !host.startsWith('[') ? `[${host}]` : host;
}

export function resolveOptions(raw: CliOptions): ResolvedOptions {
  const parsed = cliOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') ?? 'options';
    throw new ArgumentError(`--${field}: ${issue?.message ?? 'invalid value'}`);
  }

  const options = parsed.data;
  return {
    probe: {
      target: buildTarget(options),
      service: options.service,
      timeoutSeconds: options.timeout,
      tls: options.tls,
    },
    verbose: options.verbose,
  };
}
