import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterAll, describe, expect, it } from 'vitest';

import { runFixtureTool } from '../../fixtures';

const node = process.execPath;

describe('runFixtureTool', () => {
  const dir = mkdtempSync(path.join(tmpdir(), 'rpc-conform-fixture-'));

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('sends the input on stdin and parses stdout', async () => {
    const output = await runFixtureTool({
      name: 'echo',
      command: node,
      args: ['-e', 'process.stdin.pipe(process.stdout)'],
      input: { block_number: 3, transactions: ['0x1'] },
    });
    expect(output).toEqual({ block_number: 3, transactions: ['0x1'] });
  });

  it('accepts a tool that exits without reading its input', async () => {
    const output = await runFixtureTool({
      name: 'ignore-input',
      command: node,
      args: ['-e', "process.stdout.write('{}')"],
      input: { blob: 'x'.repeat(4000000) },
    });
    expect(output).toEqual({});
  });

  it('reads the output file relative to the working directory', async () => {
    const output = await runFixtureTool(
      {
        name: 'state',
        command: node,
        args: ['-e', "require('fs').writeFileSync('state.json', JSON.stringify({ root: '0xabc' }))"],
        outputFile: 'state.json',
      },
      { cwd: dir }
    );
    expect(output).toEqual({ root: '0xabc' });
  });

  it('fails with the exit code and stderr of the tool', async () => {
    await expect(
      runFixtureTool({ name: 'bad', command: node, args: ['-e', "process.stderr.write('boom'); process.exit(3)"] })
    ).rejects.toThrow(/exited with code 3: boom$/);
  });

  it('fails when stdout is not JSON', async () => {
    await expect(
      runFixtureTool({ name: 'text', command: node, args: ['-e', "console.log('hello')"] })
    ).rejects.toThrow(/is not JSON$/);
  });

  it('fails when the command cannot start', async () => {
    await expect(runFixtureTool({ name: 'missing', command: path.join(dir, 'no-such-tool') })).rejects.toThrow(
      /failed to start/
    );
  });
});
