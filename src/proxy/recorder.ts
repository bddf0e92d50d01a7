import { createWriteStream, mkdirSync, type WriteStream } from 'fs';
import path from 'path';
import type { RpcResponse } from '../types';
import type { ProxyMode } from './config';

export interface UpstreamRecord {
  target: string;
  upstreamId: number | null;
  response?: RpcResponse;
  error?: string;
  elapsedMs: number;
}

export interface TrafficRecord {
  session: string;
  seq: number;
  at: string;
  mode: ProxyMode;
  /** The inbound request as received, before id remapping */
  request: unknown;
  upstreams: UpstreamRecord[];
  divergent: string[];
  failed: string[];
}

export interface TrafficRecorder {
  write(record: TrafficRecord): void;
  close(): Promise<void>;
}

export class MemoryRecorder implements TrafficRecorder {
  public readonly records: TrafficRecord[] = [];

  write(record: TrafficRecord): void {
    this.records.push(record);
  }

  close(): Promise<void> {
    return Promise.resolve();
  }
}

/**
 * Appends one JSON document per line. A stream failure is kept and raised by
 * the next `write` or `close`.
 */
export class FileRecorder implements TrafficRecorder {
  private readonly stream: WriteStream;
  private failure?: Error;

  constructor(public readonly file: string) {
    mkdirSync(path.dirname(file), { recursive: true });
    this.stream = createWriteStream(file, { flags: 'a' });
    this.stream.on('error', (error) => {
      this.failure ??= error;
    });
  }

  write(record: TrafficRecord): void {
    if (this.failure) throw this.failure;
    this.stream.write(`${JSON.stringify(record)}\n`);
  }

  close(): Promise<void> {
    const failure = this.failure;
    if (failure) return Promise.reject(failure);
    return new Promise((resolve, reject) => {
      this.stream.once('error', reject);
      this.stream.end((error?: Error | null) => {
        const failure = error ?? this.failure;
        if (failure) reject(failure);
        else resolve();
      });
    });
  }
}
