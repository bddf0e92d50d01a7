import type { ZodError } from 'zod';
import type { JsonValue, RpcErrorObject } from './types';

/** Malformed suite, endpoint or proxy configuration. Fatal before any case runs. */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}:\n\t- ${issues.join('\n\t- ')}` : message);
    this.name = 'ConfigError';
  }
}

export type TransportReason = 'network' | 'timeout' | 'http' | 'cancelled' | 'malformed' | 'upstream';

/** No usable response was received. */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly reason: TransportReason,
    public readonly retryable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/** A response arrived but is not a JSON-RPC 2.0 envelope for our request. */
export class MalformedResponseError extends TransportError {
  constructor(
    message: string,
    public readonly body: string
  ) {
    super(message, 'malformed', false);
    this.name = 'MalformedResponseError';
  }
}

/** Every fan-out upstream failed. */
export class ProxyUpstreamError extends TransportError {
  constructor(public readonly failures: Record<string, string>) {
    super(
      `all upstreams failed: ${Object.entries(failures)
        .map(([target, reason]) => `${target} (${reason})`)
        .join(', ')}`,
      'upstream',
      true
    );
    this.name = 'ProxyUpstreamError';
  }
}

/** JSON-RPC error object returned to a suite hook. */
export class RpcCallError extends Error {
  public readonly code: number;
  public readonly data?: JsonValue;

  constructor(method: string, error: RpcErrorObject) {
    super(`${method} failed with ${error.code}: ${error.message}`);
    this.name = 'RpcCallError';
    this.code = error.code;
    this.data = error.data;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Flattens zod issues into `path: message` lines for a `ConfigError`. */
export function zodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}
