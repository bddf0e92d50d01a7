import http, { type IncomingMessage, type ServerResponse } from 'http';
import https from 'https';
import type { Socket } from 'net';
import debugFactory from 'debug';
import { ConfigError, ProxyUpstreamError, errorMessage } from '../errors';
import type { HostResolver } from '../resolver';
import { RpcClient } from '../rpc-client';
import type { Endpoint, RpcId, RpcParams, RpcRequest, RpcResponse } from '../types';
import { compareResponses } from './compare';
import { DEFAULT_MAX_BODY_BYTES, type ProxyMode } from './config';
import type { TrafficRecorder, UpstreamRecord } from './recorder';
import { ProxySession } from './session';

const debug = debugFactory('rpc-conform:proxy');

export const PARSE_ERROR = -32700;
export const INVALID_REQUEST = -32600;
export const INTERNAL_ERROR = -32603;

export interface ProxyOptions {
  mode: ProxyMode;
  targets: Endpoint[];
  port?: number;
  host?: string;
  tls?: { cert: string; key: string };
  /** Upper bound on the wait for upstream answers */
  deadlineMs?: number;
  /** Fields left out when comparing fan-out answers */
  ignoreFields?: string[];
  /** Inbound bodies above this size get 413 */
  maxBodyBytes?: number;
  recorder?: TrafficRecorder;
  resolver?: HostResolver;
  client?: RpcClient;
}

type Outcome =
  | { kind: 'none'; failed: string[] }
  | { kind: 'response'; response: RpcResponse; divergent: string[]; failed: string[] }
  | { kind: 'failed'; error: ProxyUpstreamError };

interface UpstreamOutcome extends UpstreamRecord {
  response?: RpcResponse;
}

function envelopeError(id: RpcId, code: number, message: string): RpcResponse {
  return { jsonrpc: '2.0', id, error: { code, message } };
}

/** Resolves `undefined` once the body passes `limit` bytes; the rest is drained. */
function readBody(req: IncomingMessage, limit: number): Promise<string | undefined> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    const onData = (chunk: Buffer) => {
      size += chunk.length;
      if (size > limit) {
        req.off('data', onData);
        req.resume();
        resolve(undefined);
        return;
      }
      chunks.push(chunk);
    };
    req.on('data', onData);
    req.on('end', () => resolve(size > limit ? undefined : Buffer.concat(chunks).toString('utf8')));
    req.on('error', reject);
  });
}

/** Shape check only; nested values come straight from `JSON.parse`. */
function isParams(value: unknown): value is RpcParams {
  return !!value && typeof value === 'object';
}

/** Validates one inbound JSON-RPC message; `undefined` means it is not a request. */
function toRequest(message: unknown): RpcRequest | undefined {
  if (!message || typeof message !== 'object' || Array.isArray(message)) return undefined;
  if (!('jsonrpc' in message) || message.jsonrpc !== '2.0') return undefined;
  if (!('method' in message) || typeof message.method !== 'string') return undefined;
  const request: RpcRequest = { jsonrpc: '2.0', method: message.method };
  if ('params' in message && message.params !== undefined) {
    if (!isParams(message.params)) return undefined;
    request.params = message.params;
  }
  if ('id' in message) {
    const id = message.id;
    if (id !== null && typeof id !== 'string' && typeof id !== 'number') return undefined;
    request.id = id;
  }
  return request;
}

function inboundId(message: unknown): RpcId {
  if (message && typeof message === 'object' && 'id' in message) {
    const id = message.id;
    if (id === null || typeof id === 'string' || typeof id === 'number') return id;
  }
  return null;
}

/**
 * JSON-RPC relay in front of one (pass-through) or several (fan-out) node
 * backends. Never retries; the caller's client owns retry policy.
 */
export class RpcProxy {
  private readonly mode: ProxyMode;
  private readonly targets: Endpoint[];
  private readonly host: string;
  private readonly requestedPort: number;
  private readonly tls?: { cert: string; key: string };
  private readonly deadlineMs: number;
  private readonly ignoreFields: string[];
  private readonly maxBodyBytes: number;
  private readonly recorder?: TrafficRecorder;
  private readonly client: RpcClient;
  private readonly sessions = new WeakMap<Socket, ProxySession>();
  private readonly open = new Set<ProxySession>();
  private server?: http.Server;
  private nextUpstreamId = 1;
  private nextSessionId = 1;

  constructor(options: ProxyOptions) {
    if (options.targets.length === 0) {
      throw new ConfigError('the proxy needs at least one target');
    }
    if (options.mode === 'pass-through' && options.targets.length !== 1) {
      throw new ConfigError(`pass-through takes exactly one target, got ${options.targets.length}`);
    }
    this.mode = options.mode;
    this.targets = options.targets;
    this.host = options.host ?? '127.0.0.1';
    this.requestedPort = options.port ?? 0;
    this.tls = options.tls;
    this.deadlineMs = options.deadlineMs ?? 10000;
    this.ignoreFields = options.ignoreFields ?? ['timestamp'];
    this.maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
    this.recorder = options.recorder;
    this.client =
      options.client ??
      new RpcClient({ timeout: this.deadlineMs, retry: { attempts: 1 }, resolver: options.resolver, userAgent: 'rpc-conform-proxy' });
  }

  get port(): number {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : this.requestedPort;
  }

  get url(): string {
    return `${this.tls ? 'https' : 'http'}://${this.host}:${this.port}`;
  }

  get activeSessions(): number {
    return this.open.size;
  }

  public listen(): Promise<void> {
    const handler = (req: IncomingMessage, res: ServerResponse) => {
      this.handle(req, res).catch((error) => {
        debug('request failed: %s', errorMessage(error));
        if (!res.headersSent) {
          res.writeHead(500, { 'content-type': 'text/plain' });
        }
        res.end(`proxy error: ${errorMessage(error)}`);
      });
    };

    let server: http.Server;
    if (this.tls) {
      const secure = https.createServer({ cert: this.tls.cert, key: this.tls.key }, handler);
      secure.on('secureConnection', (socket) => {
        this.openSession(socket);
      });
      server = secure;
    } else {
      server = http.createServer(handler);
      server.on('connection', (socket: Socket) => {
        this.openSession(socket);
      });
    }
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.requestedPort, this.host, () => {
        server.off('error', reject);
        debug('%s proxy listening on %s for %s', this.mode, this.url, this.targets.map((t) => t.name).join(', '));
        resolve();
      });
    });
  }

  public async close(): Promise<void> {
    const server = this.server;
    this.server = undefined;
    this.open.forEach((session) => session.dispose());
    this.open.clear();
    if (server) {
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
    }
    await this.client.close();
    await this.recorder?.close();
  }

  private openSession(socket: Socket): ProxySession {
    const session = new ProxySession(`s${this.nextSessionId}`, socket);
    this.nextSessionId += 1;
    this.sessions.set(socket, session);
    this.open.add(session);
    debug('session %s opened from %s', session.id, session.remote);
    socket.once('close', () => {
      session.dispose();
      this.open.delete(session);
      debug('session %s closed', session.id);
    });
    return session;
  }

  private allocateUpstreamId(): number {
    const id = this.nextUpstreamId;
    this.nextUpstreamId += 1;
    return id;
  }

  private async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (req.method !== 'POST') {
      res.writeHead(405, { allow: 'POST', 'content-type': 'text/plain' });
      res.end('JSON-RPC over POST only');
      return;
    }
    const session = this.sessions.get(req.socket) ?? this.openSession(req.socket);
    const body = await readBody(req, this.maxBodyBytes);
    if (body === undefined) {
      res.writeHead(413, { 'content-type': 'text/plain', connection: 'close' });
      res.end(`request body exceeds ${this.maxBodyBytes} bytes`);
      return;
    }

    let message: unknown;
    try {
      message = JSON.parse(body);
    } catch {
      this.reply(res, 200, envelopeError(null, PARSE_ERROR, 'Parse error'));
      return;
    }

    if (Array.isArray(message)) {
      if (message.length === 0) {
        this.reply(res, 200, envelopeError(null, INVALID_REQUEST, 'Invalid Request'));
        return;
      }
      const outcomes = await Promise.all(message.map((m) => this.handleMessage(session, m)));
      const failures = outcomes.flatMap((o) => (o.kind === 'failed' ? [o.error] : []));
      if (failures.length === outcomes.length) {
        this.fail(res, failures[0]);
        return;
      }
      const responses = outcomes.flatMap((o, i): RpcResponse[] => {
        if (o.kind === 'response') return [o.response];
        if (o.kind === 'failed') return [envelopeError(inboundId(message[i]), INTERNAL_ERROR, o.error.message)];
        return [];
      });
      const divergent = new Set(outcomes.flatMap((o) => (o.kind === 'response' ? o.divergent : [])));
      const failed = new Set(outcomes.flatMap((o) => (o.kind === 'failed' ? Object.keys(o.error.failures) : o.failed)));
      if (responses.length === 0) {
        res.writeHead(204, this.headers([...divergent], [...failed]));
        res.end();
        return;
      }
      this.reply(res, 200, responses, this.headers([...divergent], [...failed]));
      return;
    }

    const outcome = await this.handleMessage(session, message);
    if (outcome.kind === 'failed') {
      this.fail(res, outcome.error);
    } else if (outcome.kind === 'none') {
      res.writeHead(204, this.headers([], outcome.failed));
      res.end();
    } else {
      this.reply(res, 200, outcome.response, this.headers(outcome.divergent, outcome.failed));
    }
  }

  private headers(divergent: string[], failed: string[]): Record<string, string> {
    const headers: Record<string, string> = { 'x-rpc-upstreams': this.targets.map((t) => t.name).join(',') };
    if (divergent.length > 0) headers['x-rpc-divergence'] = divergent.join(',');
    if (failed.length > 0) headers['x-rpc-failed'] = failed.join(',');
    return headers;
  }

  private reply(res: ServerResponse, status: number, payload: RpcResponse | RpcResponse[], headers: Record<string, string> = {}): void {
    res.writeHead(status, { ...headers, 'content-type': 'application/json' });
    res.end(JSON.stringify(payload));
  }

  /** Not a JSON-RPC envelope: clients treat this as a retryable transport failure. */
  private fail(res: ServerResponse, error: ProxyUpstreamError): void {
    res.writeHead(502, { ...this.headers([], Object.keys(error.failures)), 'content-type': 'text/plain' });
    res.end(error.message);
  }

  private upstreamsFor(): Endpoint[] {
    return this.mode === 'pass-through' ? this.targets.slice(0, 1) : this.targets;
  }

  private async handleMessage(session: ProxySession, message: unknown): Promise<Outcome> {
    const request = toRequest(message);
    if (!request) {
      return {
        kind: 'response',
        response: envelopeError(inboundId(message), INVALID_REQUEST, 'Invalid Request'),
        divergent: [],
        failed: [],
      };
    }
    const seq = session.nextSeq();
    const upstreams = this.upstreamsFor();

    if (request.id === undefined) {
      const outcomes = await Promise.all(upstreams.map((target) => this.notifyOne(session, target, request)));
      const failed = outcomes.filter((o) => o.error !== undefined).map((o) => o.target);
      this.record(session, seq, message, outcomes, [], failed);
      return { kind: 'none', failed };
    }

    const outcomes = await Promise.all(upstreams.map((target) => this.forwardOne(session, target, request)));
    const answered = outcomes.flatMap((o) => (o.response ? [{ target: o.target, response: o.response }] : []));
    const failures = Object.fromEntries(outcomes.flatMap((o) => (o.error !== undefined ? [[o.target, o.error]] : [])));
    const failed = Object.keys(failures);

    if (answered.length === 0) {
      this.record(session, seq, message, outcomes, [], failed);
      return { kind: 'failed', error: new ProxyUpstreamError(failures) };
    }

    const { divergent } = this.mode === 'fanout' ? compareResponses(answered, this.ignoreFields) : { divergent: [] };
    if (divergent.length > 0) {
      debug('session %s #%d %s: divergent %s', session.id, seq, request.method, divergent.join(','));
    }
    this.record(session, seq, message, outcomes, divergent, failed);
    // an error envelope is still an answer, but a result from a later target wins over it
    const chosen = answered.find((a) => a.response.error === undefined) ?? answered[0];
    return { kind: 'response', response: chosen.response, divergent, failed };
  }

  private async forwardOne(session: ProxySession, target: Endpoint, request: RpcRequest): Promise<UpstreamOutcome> {
    const upstreamId = this.allocateUpstreamId();
    session.track(upstreamId, request.id ?? null);
    const startTime = Date.now();
    try {
      const reply = await this.client.send(target, { ...request, id: upstreamId }, { timeout: this.deadlineMs, signal: session.signal });
      const id = session.release(upstreamId);
      return {
        target: target.name,
        upstreamId,
        response: { ...reply.response, id: id ?? null },
        elapsedMs: Date.now() - startTime,
      };
    } catch (error) {
      session.release(upstreamId);
      debug('%s failed for upstream id %d: %s', target.name, upstreamId, errorMessage(error));
      return { target: target.name, upstreamId, error: errorMessage(error), elapsedMs: Date.now() - startTime };
    }
  }

  private async notifyOne(session: ProxySession, target: Endpoint, request: RpcRequest): Promise<UpstreamOutcome> {
    const startTime = Date.now();
    try {
      await this.client.notify(target, request, { timeout: this.deadlineMs, signal: session.signal });
      return { target: target.name, upstreamId: null, elapsedMs: Date.now() - startTime };
    } catch (error) {
      return { target: target.name, upstreamId: null, error: errorMessage(error), elapsedMs: Date.now() - startTime };
    }
  }

  private record(
    session: ProxySession,
    seq: number,
    request: unknown,
    upstreams: UpstreamOutcome[],
    divergent: string[],
    failed: string[]
  ): void {
    try {
      this.recorder?.write({
        session: session.id,
        seq,
        at: new Date().toISOString(),
        mode: this.mode,
        request,
        upstreams,
        divergent,
        failed,
      });
    } catch (error) {
      // the client still gets its answer; close() reports the recorder failure
      debug('session %s #%d not recorded: %s', session.id, seq, errorMessage(error));
    }
  }
}
