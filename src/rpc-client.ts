import type { ConnectionOptions } from 'tls';
import { Agent, fetch, type Dispatcher } from 'undici';
import debugFactory from 'debug';
import { MalformedResponseError, TransportError, errorMessage } from './errors';
import type { HostResolver } from './resolver';
import type { Endpoint, RetryPolicy, RpcParams, RpcRequest, RpcResponse } from './types';

const debug = debugFactory('rpc-conform:rpc-client');

export const DEFAULT_RETRY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 200,
  maxDelayMs: 5000,
  jitter: 0.2,
};

export interface SendOptions {
  timeout?: number;
  signal?: AbortSignal;
}

export interface CallOptions extends SendOptions {
  retry?: Partial<RetryPolicy>;
}

export interface RpcReply {
  response: RpcResponse;
  /** Lower-cased response headers */
  headers: Record<string, string>;
  status: number;
}

export interface RpcExchange extends RpcReply {
  request: RpcRequest;
  attempts: number;
  elapsedMs: number;
}

export interface RpcClientOptions {
  timeout: number;
  retry?: Partial<RetryPolicy>;
  resolver?: HostResolver;
  userAgent?: string;
  /** Source of randomness for jitter */
  random?: () => number;
}

export function isRpcResponse(value: unknown): value is RpcResponse {
  if (!value || typeof value !== 'object' || Array.isArray(value)) return false;
  if (!('jsonrpc' in value) || value.jsonrpc !== '2.0' || !('id' in value)) return false;
  const hasResult = 'result' in value;
  if ('error' in value) {
    const err = value.error;
    return !hasResult && !!err && typeof err === 'object' && 'code' in err && typeof err.code === 'number';
  }
  return hasResult;
}

export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  const spread = exponential * policy.jitter;
  return Math.max(0, Math.round(exponential - spread + random() * spread * 2));
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new TransportError('cancelled', 'cancelled', false));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new TransportError('cancelled', 'cancelled', false));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function networkCode(error: unknown): string | undefined {
  const cause = error instanceof Error ? error.cause : undefined;
  if (cause && typeof cause === 'object' && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}

/**
 * JSON-RPC 2.0 transport over HTTP(S). Stateless between calls apart from the
 * request id counter and one connection pool per endpoint.
 */
export class RpcClient {
  private nextId = 1;
  private readonly timeout: number;
  private readonly retry: RetryPolicy;
  private readonly resolver?: HostResolver;
  private readonly userAgent: string;
  private readonly random: () => number;
  private readonly dispatchers = new Map<string, Dispatcher>();

  constructor(options: RpcClientOptions) {
    this.timeout = options.timeout;
    this.retry = { ...DEFAULT_RETRY, ...options.retry };
    this.resolver = options.resolver;
    this.userAgent = options.userAgent ?? 'rpc-conform';
    this.random = options.random ?? Math.random;
  }

  public getTimeout(): number {
    return this.timeout;
  }

  public allocateId(): number {
    const id = this.nextId;
    this.nextId += 1;
    return id;
  }

  public buildRequest(method: string, params?: RpcParams): RpcRequest {
    const request: RpcRequest = { jsonrpc: '2.0', id: this.allocateId(), method };
    if (params !== undefined) request.params = params;
    return request;
  }

  /**
   * Calls `method` and returns the exchange whether the node answered with a
   * result or a JSON-RPC error. Only transport failures are retried.
   */
  public async call(
    endpoint: Endpoint,
    method: string,
    params?: RpcParams,
    options: CallOptions = {}
  ): Promise<RpcExchange> {
    const policy: RetryPolicy = { ...this.retry, ...options.retry };
    const attempts = Math.max(1, policy.attempts);
    const request = this.buildRequest(method, params);
    const startTime = Date.now();

    for (let attempt = 1; ; attempt += 1) {
      try {
        const reply = await this.send(endpoint, request, options);
        return { ...reply, request, attempts: attempt, elapsedMs: Date.now() - startTime };
      } catch (error) {
        if (!(error instanceof TransportError) || !error.retryable || attempt >= attempts) {
          throw error;
        }
        const wait = backoffDelay(policy, attempt, this.random);
        debug('%s %s attempt %d failed (%s), retrying in %dms', endpoint.name, method, attempt, error.message, wait);
        await sleep(wait, options.signal);
      }
    }
  }

  /** Forwards a notification; there is no response to read. */
  public async notify(endpoint: Endpoint, request: RpcRequest, options: SendOptions = {}): Promise<void> {
    const timeoutMs = options.timeout ?? this.timeout;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    const onAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });
    try {
      const response = await fetch(endpoint.url, {
        method: 'POST',
        headers: { 'content-type': 'application/json', 'user-agent': this.userAgent, ...endpoint.headers },
        body: JSON.stringify(request),
        signal: controller.signal,
        dispatcher: this.dispatcherFor(endpoint),
      });
      await response.arrayBuffer();
      if (response.status >= 500) {
        throw new TransportError(`HTTP ${response.status} from ${endpoint.name}`, 'http', true);
      }
    } catch (error) {
      if (error instanceof TransportError) throw error;
      if (options.signal?.aborted) throw new TransportError('cancelled', 'cancelled', false, { cause: error });
      throw new TransportError(`${endpoint.name} unreachable: ${errorMessage(error)}`, 'network', true, { cause: error });
    } finally {
      clearTimeout(timeout);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }

  /** One attempt, no retry. */
  public async send(endpoint: Endpoint, request: RpcRequest, options: SendOptions = {}): Promise<RpcReply> {
    const { signal } = options;
    if (signal?.aborted) {
      throw new TransportError('cancelled', 'cancelled', false);
    }

    const controller = new AbortController();
    const timeoutMs = options.timeout ?? this.timeout;
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(endpoint.url, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          accept: 'application/json',
          'user-agent': this.userAgent,
          ...endpoint.headers,
        },
        body: JSON.stringify(request),
        signal: controller.signal,
        dispatcher: this.dispatcherFor(endpoint),
      });

      const text = await response.text();
      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      let data: unknown;
      try {
        data = text ? JSON.parse(text) : null;
      } catch {
        data = undefined;
      }

      if (!isRpcResponse(data)) {
        if (response.status >= 500) {
          throw new TransportError(`HTTP ${response.status} from ${endpoint.name}`, 'http', true);
        }
        if (!response.ok) {
          throw new TransportError(`HTTP ${response.status} from ${endpoint.name}`, 'http', false);
        }
        throw new MalformedResponseError(`${endpoint.name} did not answer with a JSON-RPC 2.0 envelope`, text);
      }
      if (request.id !== undefined && data.id !== request.id) {
        throw new MalformedResponseError(
          `${endpoint.name} answered id ${JSON.stringify(data.id)} to request id ${JSON.stringify(request.id)}`,
          text
        );
      }

      return { response: data, headers, status: response.status };
    } catch (error) {
      if (error instanceof TransportError) throw error;
      if (signal?.aborted) {
        throw new TransportError('cancelled', 'cancelled', false, { cause: error });
      }
      if (timedOut) {
        throw new TransportError(`timeout after ${timeoutMs}ms`, 'timeout', true, { cause: error });
      }
      const code = networkCode(error);
      throw new TransportError(
        `${endpoint.name} unreachable: ${code ?? errorMessage(error)}`,
        'network',
        true,
        { cause: error }
      );
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private dispatcherFor(endpoint: Endpoint): Dispatcher {
    let dispatcher = this.dispatchers.get(endpoint.name);
    if (!dispatcher) {
      // undefined must not reach tls.connect: it would override its defaults
      const connect: ConnectionOptions = {};
      if (endpoint.ca) connect.ca = endpoint.ca;
      if (endpoint.cert) connect.cert = endpoint.cert;
      if (endpoint.key) connect.key = endpoint.key;
      if (endpoint.rejectUnauthorized !== undefined) connect.rejectUnauthorized = endpoint.rejectUnauthorized;
      if (this.resolver) connect.lookup = this.resolver.lookup;
      dispatcher = new Agent({ connect });
      this.dispatchers.set(endpoint.name, dispatcher);
    }
    return dispatcher;
  }

  public async close(): Promise<void> {
    const dispatchers = [...this.dispatchers.values()];
    this.dispatchers.clear();
    await Promise.all(dispatchers.map((d) => d.close()));
  }
}
