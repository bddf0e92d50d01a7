import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterAll, afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { envConfig, loadConfig, parseArgs } from '../../config';

const argv = (...args: string[]) => ['node', 'rpc-conform', ...args];

describe('parseArgs', () => {
  it('reads flags, repeated targets and one positional suite file', () => {
    expect(
      parseArgs(
        argv(
          '--spec',
          'doc.json',
          '--target',
          'a=http://127.0.0.1:9545,b=http://127.0.0.1:9546',
          '--target=c=http://127.0.0.1:9547',
          '--tags',
          'smoke, slow',
          '--concurrency=4',
          '--exhaustive',
          'false',
          '--verbose',
          'suites/chain.suite.yaml'
        )
      )
    ).toEqual({
      spec: 'doc.json',
      targets: [
        { name: 'a', url: 'http://127.0.0.1:9545' },
        { name: 'b', url: 'http://127.0.0.1:9546' },
        { name: 'c', url: 'http://127.0.0.1:9547' },
      ],
      tags: ['smoke', 'slow'],
      concurrency: 4,
      exhaustive: false,
      verbose: true,
      suiteFile: 'suites/chain.suite.yaml',
    });
  });

  it('keeps everything after the first = in a value', () => {
    expect(parseArgs(argv('--filter=id=head'))).toEqual({ filter: 'id=head' });
  });

  it('rejects unknown options, bad numbers and extra arguments', () => {
    expect(() => parseArgs(argv('--nope'))).toThrow('unknown option --nope');
    expect(() => parseArgs(argv('--concurrency', 'many'))).toThrow('--concurrency expects a number, got many');
    expect(() => parseArgs(argv('a.suite.yaml', 'b.suite.yaml'))).toThrow('unexpected argument b.suite.yaml');
    expect(() => parseArgs(argv('--target', 'just-a-url'))).toThrow('target "just-a-url" must look like name=url');
  });
});

describe('envConfig', () => {
  it('reads the document and targets from the environment', () => {
    expect(envConfig({ OPENRPC_SPEC: 'doc.yaml', RPC_TARGETS: 'a=http://127.0.0.1:9545' })).toEqual({
      spec: 'doc.yaml',
      targets: [{ name: 'a', url: 'http://127.0.0.1:9545' }],
    });
    expect(envConfig({})).toEqual({});
  });
});

describe('loadConfig', () => {
  const dir = mkdtempSync(path.join(tmpdir(), 'rpc-conform-config-'));

  beforeEach(() => {
    vi.stubEnv('RPC_TARGETS', '');
    vi.stubEnv('OPENRPC_SPEC', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  writeFileSync(
    path.join(dir, 'rpc-conform.config.yaml'),
    ['concurrency: 2', 'targets:', '  - name: a', '    url: http://127.0.0.1:9545', ''].join('\n')
  );
  writeFileSync(path.join(dir, 'ci.json'), JSON.stringify({ concurrency: 3, timeout: 1000 }));

  it('layers defaults, the project file, --config and the command line', async () => {
    const cfg = await loadConfig(argv('--config', 'ci.json', '--rps', '5'), dir);

    expect(cfg).toMatchObject({
      spec: './specs/starknet-subset.json',
      concurrency: 3,
      timeout: 1000,
      rps: 5,
      retries: 3,
      divergence: 'record',
      targets: [{ name: 'a', url: 'http://127.0.0.1:9545' }],
      projectRoot: dir,
    });
  });

  it('lets the environment replace file targets and the command line replace both', async () => {
    vi.stubEnv('RPC_TARGETS', 'b=http://127.0.0.1:9546');
    expect((await loadConfig(argv(), dir)).targets).toEqual([{ name: 'b', url: 'http://127.0.0.1:9546' }]);
    expect((await loadConfig(argv('--target', 'c=http://127.0.0.1:9547'), dir)).targets).toEqual([
      { name: 'c', url: 'http://127.0.0.1:9547' },
    ]);
  });

  it('rejects invalid values with the offending key', async () => {
    await expect(loadConfig(argv('--divergence', 'maybe'), dir)).rejects.toThrow(/^invalid configuration:\n\t- divergence: /);
  });

  it('rejects a missing --config file', async () => {
    await expect(loadConfig(argv('--config', 'missing.yaml'), dir)).rejects.toThrow(
      `cannot read ${path.join(dir, 'missing.yaml')}`
    );
  });
});
