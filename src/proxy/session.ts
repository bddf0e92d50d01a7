import type { Socket } from 'net';
import { TLSSocket } from 'tls';
import type { RpcId } from '../types';

export interface SessionTls {
  protocol: string | null;
  cipher?: string;
  servername?: string;
}

/**
 * One inbound connection. Owns the map from upstream ids back to the ids the
 * client used, and an abort signal that fires when the connection closes.
 */
export class ProxySession {
  public readonly remote: string;
  public readonly tls?: SessionTls;
  public readonly openedAt = Date.now();
  private readonly inflight = new Map<number, RpcId>();
  private readonly controller = new AbortController();
  private seq = 0;

  constructor(
    public readonly id: string,
    socket: Socket
  ) {
    this.remote = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
    if (socket instanceof TLSSocket) {
      const servername = socket.servername;
      this.tls = {
        protocol: socket.getProtocol(),
        cipher: socket.getCipher()?.name,
        servername: typeof servername === 'string' ? servername : undefined,
      };
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get disposed(): boolean {
    return this.controller.signal.aborted;
  }

  /** Requests awaiting an upstream answer */
  get pending(): number {
    return this.inflight.size;
  }

  nextSeq(): number {
    this.seq += 1;
    return this.seq;
  }

  track(upstreamId: number, inboundId: RpcId): void {
    this.inflight.set(upstreamId, inboundId);
  }

  /** Returns the client's id for an upstream id and forgets the mapping. */
  release(upstreamId: number): RpcId | undefined {
    const inbound = this.inflight.get(upstreamId);
    this.inflight.delete(upstreamId);
    return inbound;
  }

  dispose(): void {
    this.inflight.clear();
    this.controller.abort();
  }
}
