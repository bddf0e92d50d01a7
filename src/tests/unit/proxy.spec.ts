import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { fetch } from 'undici';
import { afterAll, afterEach, describe, expect, it } from 'vitest';

import { createEndpoint } from '../../endpoint';
import { parseProxyConfig } from '../../proxy/config';
import { FileRecorder, MemoryRecorder, type TrafficRecord } from '../../proxy/recorder';
import { RpcProxy, type ProxyOptions } from '../../proxy/server';
import { RpcClient } from '../../rpc-client';
import type { Endpoint } from '../../types';
import { StubNode, result, rpcError, type StubHandler } from '../support/stub-node';

const CHAIN_ID = '0x534e5f5345504f4c4941';

describe('RpcProxy', () => {
  const nodes: StubNode[] = [];
  const proxies: RpcProxy[] = [];
  const clients: RpcClient[] = [];

  afterEach(async () => {
    await Promise.all(clients.splice(0).map((c) => c.close()));
    await Promise.all(proxies.splice(0).map((p) => p.close()));
    await Promise.all(nodes.splice(0).map((n) => n.close()));
  });

  const upstream = async (name: string, handler: StubHandler): Promise<{ node: StubNode; endpoint: Endpoint }> => {
    const node = await StubNode.start(handler);
    nodes.push(node);
    return { node, endpoint: createEndpoint({ name, url: node.url }) };
  };

  const deadUpstream = async (name: string): Promise<Endpoint> => {
    const node = await StubNode.start(result(1));
    const endpoint = createEndpoint({ name, url: node.url });
    await node.close();
    return endpoint;
  };

  const proxy = async (options: ProxyOptions): Promise<{ proxy: RpcProxy; endpoint: Endpoint }> => {
    const p = new RpcProxy({ port: 0, deadlineMs: 1000, ...options });
    proxies.push(p);
    await p.listen();
    return { proxy: p, endpoint: createEndpoint({ name: 'proxy', url: p.url }) };
  };

  const client = () => {
    const c = new RpcClient({ timeout: 2000, retry: { attempts: 1 } });
    clients.push(c);
    return c;
  };

  const post = (endpoint: Endpoint, body: string) =>
    fetch(endpoint.url, { method: 'POST', headers: { 'content-type': 'application/json' }, body });

  it('answers from the majority and names the divergent upstream', async () => {
    const a = await upstream('a', result(CHAIN_ID));
    const b = await upstream('b', result(CHAIN_ID));
    const c = await upstream('c', result('0x1'));
    const recorder = new MemoryRecorder();
    const { endpoint } = await proxy({ mode: 'fanout', targets: [a.endpoint, b.endpoint, c.endpoint], recorder });

    const exchange = await client().call(endpoint, 'starknet_chainId');

    expect(exchange.response).toEqual({ jsonrpc: '2.0', id: 1, result: CHAIN_ID });
    expect(exchange.headers['x-rpc-divergence']).toBe('c');
    expect(exchange.headers['x-rpc-upstreams']).toBe('a,b,c');
    expect(recorder.records).toHaveLength(1);
    expect(recorder.records[0]).toMatchObject({ session: 's1', seq: 1, mode: 'fanout', divergent: ['c'], failed: [] });
    expect(recorder.records[0].upstreams.map((u) => [u.target, u.upstreamId])).toEqual([
      ['a', 1],
      ['b', 2],
      ['c', 3],
    ]);
  });

  it('leaves out ignored fields when comparing answers', async () => {
    const a = await upstream('a', result({ block_number: 4, timestamp: 100 }));
    const b = await upstream('b', result({ block_number: 4, timestamp: 101 }));
    const { endpoint } = await proxy({ mode: 'fanout', targets: [a.endpoint, b.endpoint] });

    const exchange = await client().call(endpoint, 'starknet_getBlockWithTxHashes', { block_id: 'latest' });

    expect(exchange.headers['x-rpc-divergence']).toBeUndefined();
    expect(exchange.response.result).toEqual({ block_number: 4, timestamp: 100 });
  });

  it('prefers a later result over an earlier error envelope', async () => {
    const a = await upstream('a', rpcError(-32603, 'Internal error'));
    const b = await upstream('b', result(CHAIN_ID));
    const { endpoint } = await proxy({ mode: 'fanout', targets: [a.endpoint, b.endpoint] });

    const response = await post(endpoint, JSON.stringify({ jsonrpc: '2.0', id: 1, method: 'starknet_chainId' }));

    expect(await response.json()).toEqual({ jsonrpc: '2.0', id: 1, result: CHAIN_ID });
    expect(response.headers.get('x-rpc-divergence')).toBe('b');
  });

  it('reaches upstreams named through the dns table', async () => {
    const a = await upstream('a', result(CHAIN_ID));
    const port = new URL(a.node.url).port;
    const settings = parseProxyConfig({
      mode: 'pass-through',
      port: 0,
      targets: [{ name: 'a', url: `http://node-a.local:${port}` }],
      dns: { 'node-a.local': '127.0.0.1' },
      strictDns: true,
    });
    const { endpoint } = await proxy({ ...settings });

    const exchange = await client().call(endpoint, 'starknet_chainId');

    expect(exchange.response.result).toBe(CHAIN_ID);
    expect(a.node.requests[0].headers.host).toBe(`node-a.local:${port}`);
  });

  it('answers 413 to an oversized body without contacting upstreams', async () => {
    const a = await upstream('a', result(1));
    const { endpoint } = await proxy({ mode: 'pass-through', targets: [a.endpoint], maxBodyBytes: 64 });

    const body = JSON.stringify({ jsonrpc: '2.0', id: 1, method: 'starknet_chainId', params: ['x'.repeat(80)] });
    const response = await post(endpoint, body);

    expect(response.status).toBe(413);
    expect(await response.text()).toBe('request body exceeds 64 bytes');
    expect(a.node.requests).toHaveLength(0);
  });

  it('gives every client its own id back while upstream ids never collide', async () => {
    const a = await upstream('a', (req) => ({ ...result(7)(req), delayMs: 20 }));
    const { endpoint } = await proxy({ mode: 'pass-through', targets: [a.endpoint] });

    const [first, second] = await Promise.all([
      client().call(endpoint, 'starknet_blockNumber'),
      client().call(endpoint, 'starknet_blockNumber'),
    ]);

    expect(first.response.id).toBe(1);
    expect(second.response.id).toBe(1);
    expect(a.node.requests.map((r) => r.id).sort()).toEqual([1, 2]);
  });

  it('restores string ids', async () => {
    const a = await upstream('a', result(CHAIN_ID));
    const { endpoint } = await proxy({ mode: 'pass-through', targets: [a.endpoint] });

    const response = await post(endpoint, JSON.stringify({ jsonrpc: '2.0', id: 'abc', method: 'starknet_chainId' }));

    expect(await response.json()).toEqual({ jsonrpc: '2.0', id: 'abc', result: CHAIN_ID });
    expect(a.node.requests[0].id).toBe(1);
  });

  it('answers 502 when every upstream failed, which clients retry', async () => {
    const gone = await deadUpstream('a');
    const { endpoint } = await proxy({ mode: 'fanout', targets: [gone] });

    await expect(client().call(endpoint, 'starknet_chainId')).rejects.toMatchObject({
      name: 'TransportError',
      reason: 'http',
      retryable: true,
      message: 'HTTP 502 from proxy',
    });

    const response = await post(endpoint, JSON.stringify({ jsonrpc: '2.0', id: 1, method: 'starknet_chainId' }));
    expect(response.status).toBe(502);
    expect(response.headers.get('x-rpc-failed')).toBe('a');
    expect(await response.text()).toMatch(/^all upstreams failed: a \(/);
  });

  it('answers from the live upstreams and names the failed ones', async () => {
    const a = await upstream('a', result(CHAIN_ID));
    const gone = await deadUpstream('b');
    const { endpoint } = await proxy({ mode: 'fanout', targets: [a.endpoint, gone] });

    const exchange = await client().call(endpoint, 'starknet_chainId');

    expect(exchange.response.result).toBe(CHAIN_ID);
    expect(exchange.headers['x-rpc-failed']).toBe('b');
  });

  it('forwards notifications and answers 204', async () => {
    const a = await upstream('a', () => ({ status: 204, raw: '' }));
    const { endpoint } = await proxy({ mode: 'pass-through', targets: [a.endpoint] });

    const response = await post(endpoint, JSON.stringify({ jsonrpc: '2.0', method: 'node_ping' }));

    expect(response.status).toBe(204);
    expect(a.node.requests).toHaveLength(1);
    expect(a.node.requests[0].id).toBeUndefined();
  });

  it('answers a parse error without contacting upstreams', async () => {
    const a = await upstream('a', result(1));
    const { endpoint } = await proxy({ mode: 'pass-through', targets: [a.endpoint] });

    const response = await post(endpoint, '{ nope');

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ jsonrpc: '2.0', id: null, error: { code: -32700, message: 'Parse error' } });
    expect(a.node.requests).toHaveLength(0);
  });

  it('answers a batch element by element', async () => {
    const a = await upstream('a', (req) => result(req.method === 'starknet_chainId' ? CHAIN_ID : 12)(req));
    const { endpoint } = await proxy({ mode: 'pass-through', targets: [a.endpoint] });

    const response = await post(
      endpoint,
      JSON.stringify([
        { jsonrpc: '2.0', id: 'x', method: 'starknet_chainId' },
        { jsonrpc: '2.0', id: 7, method: 'starknet_blockNumber' },
        { jsonrpc: '1.0', id: 9, method: 'starknet_blockNumber' },
        { jsonrpc: '2.0', method: 'node_ping' },
      ])
    );

    expect(await response.json()).toEqual([
      { jsonrpc: '2.0', id: 'x', result: CHAIN_ID },
      { jsonrpc: '2.0', id: 7, result: 12 },
      { jsonrpc: '2.0', id: 9, error: { code: -32600, message: 'Invalid Request' } },
    ]);
    expect(a.node.requests).toHaveLength(3);
  });

  it('rejects an empty batch', async () => {
    const a = await upstream('a', result(1));
    const { endpoint } = await proxy({ mode: 'pass-through', targets: [a.endpoint] });

    const response = await post(endpoint, '[]');

    expect(await response.json()).toEqual({ jsonrpc: '2.0', id: null, error: { code: -32600, message: 'Invalid Request' } });
  });

  it('only takes POST', async () => {
    const a = await upstream('a', result(1));
    const { endpoint } = await proxy({ mode: 'pass-through', targets: [a.endpoint] });

    const response = await fetch(endpoint.url);

    expect(response.status).toBe(405);
    expect(response.headers.get('allow')).toBe('POST');
    await response.text();
  });

  it('refuses pass-through with several targets', () => {
    const targets = [
      createEndpoint({ name: 'a', url: 'http://127.0.0.1:1' }),
      createEndpoint({ name: 'b', url: 'http://127.0.0.1:2' }),
    ];
    expect(() => new RpcProxy({ mode: 'pass-through', targets })).toThrow('pass-through takes exactly one target, got 2');
  });
});

describe('parseProxyConfig', () => {
  const target = { name: 'a', url: 'http://127.0.0.1:9545' };

  it('fills defaults', () => {
    const settings = parseProxyConfig({ targets: [target] });
    expect(settings).toMatchObject({
      mode: 'fanout',
      record: false,
      port: 8545,
      host: '127.0.0.1',
      deadlineMs: 10000,
      ignoreFields: ['timestamp'],
    });
    expect(settings.targets.map((t) => t.name)).toEqual(['a']);
    expect(settings.tls).toBeUndefined();
  });

  it('rejects pass-through with two targets', () => {
    expect(() =>
      parseProxyConfig({ mode: 'pass-through', targets: [target, { ...target, name: 'b' }] })
    ).toThrow('invalid proxy configuration:\n\t- targets: pass-through takes exactly one target, got 2');
  });

  it('wants the certificate and key together', () => {
    expect(() => parseProxyConfig({ targets: [target], tls_cert: 'cert.pem' })).toThrow(
      'invalid proxy configuration:\n\t- tls_key: tls_cert and tls_key must be given together'
    );
  });

  it('wants a file when recording', () => {
    expect(() => parseProxyConfig({ targets: [target], record: true })).toThrow(
      'invalid proxy configuration:\n\t- recordFile: record needs a recordFile to append traffic to'
    );
  });

  it('names the certificate it cannot read', () => {
    expect(() =>
      parseProxyConfig({ targets: [target], tls_cert: 'missing-cert.pem', tls_key: 'missing-key.pem' }, tmpdir())
    ).toThrow(/^cannot read tls certificate missing-cert\.pem/);
  });

  it('routes logical hostnames through the dns table', () => {
    const settings = parseProxyConfig({ targets: [target], dns: { 'node-a.local': '10.0.0.7' } });
    expect(settings.resolver.resolve('node-a.local')).toEqual(['10.0.0.7']);
  });
});

describe('FileRecorder', () => {
  const dir = mkdtempSync(path.join(tmpdir(), 'rpc-conform-recorder-'));

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const record = (seq: number): TrafficRecord => ({
    session: 's1',
    seq,
    at: '2026-01-01T00:00:00.000Z',
    mode: 'fanout',
    request: { jsonrpc: '2.0', id: seq, method: 'starknet_blockNumber' },
    upstreams: [],
    divergent: [],
    failed: [],
  });

  it('creates the directory and appends one line per record', async () => {
    const file = path.join(dir, 'reports', 'traffic.jsonl');
    const recorder = new FileRecorder(file);

    recorder.write(record(1));
    recorder.write(record(2));
    await recorder.close();

    const lines = readFileSync(file, 'utf8').split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe('');
    expect(JSON.parse(lines[0])).toEqual(record(1));
    expect(JSON.parse(lines[1])).toEqual(record(2));
  });

  it('keeps a stream failure and raises it on close and on later writes', async () => {
    const recorder = new FileRecorder(dir);

    await expect(recorder.close()).rejects.toThrow(/^EISDIR/);
    expect(() => recorder.write(record(1))).toThrow(/^EISDIR/);
  });
});
