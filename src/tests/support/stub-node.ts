import http, { type IncomingMessage } from 'node:http';

import type { JsonValue, RpcId } from '../../types';

export interface StubRequest {
  id: RpcId | undefined;
  method: string;
  params: unknown;
  /** Raw decoded body, useful for batches */
  body: unknown;
  headers: IncomingMessage['headers'];
}

export interface StubReply {
  status?: number;
  /** JSON body; ignored when `raw` is given */
  body?: unknown;
  raw?: string;
  headers?: Record<string, string>;
  delayMs?: number;
}

export type StubHandler = (request: StubRequest, index: number) => StubReply | Promise<StubReply>;

const field = (body: unknown, key: string): unknown =>
  body && typeof body === 'object' && !Array.isArray(body) && key in body
    ? Object.entries(body).find(([k]) => k === key)?.[1]
    : undefined;

const toId = (value: unknown): RpcId | undefined =>
  value === null || typeof value === 'string' || typeof value === 'number' ? value : undefined;

export const result = (value: JsonValue) => (request: StubRequest): StubReply => ({
  body: { jsonrpc: '2.0', id: request.id ?? null, result: value },
});

export const rpcError = (code: number, message: string) => (request: StubRequest): StubReply => ({
  body: { jsonrpc: '2.0', id: request.id ?? null, error: { code, message } },
});

/** Loopback JSON-RPC node answering through `handler`; records every request it receives. */
export class StubNode {
  public readonly requests: StubRequest[] = [];
  private readonly server: http.Server;

  private constructor(handler: StubHandler) {
    this.server = http.createServer((req, res) => {
      const chunks: Buffer[] = [];
      req.on('data', (chunk: Buffer) => chunks.push(chunk));
      req.on('end', () => {
        const text = Buffer.concat(chunks).toString('utf8');
        let body: unknown = null;
        try {
          body = JSON.parse(text);
        } catch {
          body = text;
        }
        const request: StubRequest = {
          id: toId(field(body, 'id')),
          method: String(field(body, 'method') ?? ''),
          params: field(body, 'params'),
          body,
          headers: req.headers,
        };
        const index = this.requests.length;
        this.requests.push(request);
        Promise.resolve(handler(request, index))
          .then(async (reply) => {
            if (reply.delayMs) {
              await new Promise((resolve) => setTimeout(resolve, reply.delayMs));
            }
            if (res.destroyed) return;
            res.writeHead(reply.status ?? 200, { 'content-type': 'application/json', ...reply.headers });
            res.end(reply.raw ?? JSON.stringify(reply.body ?? null));
          })
          .catch((error: unknown) => {
            res.writeHead(500);
            res.end(String(error));
          });
      });
    });
  }

  static async start(handler: StubHandler): Promise<StubNode> {
    const node = new StubNode(handler);
    await new Promise<void>((resolve) => node.server.listen(0, '127.0.0.1', resolve));
    return node;
  }

  get url(): string {
    const address = this.server.address();
    const port = address && typeof address === 'object' ? address.port : 0;
    return `http://127.0.0.1:${port}`;
  }

  get methods(): string[] {
    return this.requests.map((r) => r.method);
  }

  async close(): Promise<void> {
    this.server.closeAllConnections();
    await new Promise<void>((resolve) => this.server.close(() => resolve()));
  }
}
