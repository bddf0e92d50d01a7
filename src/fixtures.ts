import { spawn } from 'child_process';
import { readFile } from 'fs/promises';
import path from 'path';
import debugFactory from 'debug';
import type { FixtureSpec, JsonValue } from './types';

const debug = debugFactory('rpc-conform:fixtures');

export interface FixtureRunOptions {
  cwd?: string;
  signal?: AbortSignal;
}

function parseJson(text: string, source: string): JsonValue {
  try {
    return JSON.parse(text);
  } catch {
    throw new Error(`fixture output from ${source} is not JSON`);
  }
}

/**
 * Runs an external fixture tool (state transition, transaction validation,
 * block building) and returns the JSON it produced on stdout or in its output
 * file.
 */
export async function runFixtureTool(spec: FixtureSpec, options: FixtureRunOptions = {}): Promise<JsonValue> {
  const cwd = options.cwd ?? process.cwd();
  const label = [spec.command, ...(spec.args ?? [])].join(' ');
  debug('running %s', label);

  const { code, stdout, stderr } = await new Promise<{ code: number | null; stdout: string; stderr: string }>(
    (resolve, reject) => {
      const child = spawn(spec.command, spec.args ?? [], { cwd, stdio: 'pipe', signal: options.signal });
      let out = '';
      let err = '';
      let timer: NodeJS.Timeout | undefined;

      child.stdout.on('data', (data: Buffer) => {
        out += data.toString();
      });
      child.stderr.on('data', (data: Buffer) => {
        err += data.toString();
      });
      child.on('error', (error) => {
        clearTimeout(timer);
        reject(new Error(`fixture ${label} failed to start: ${error.message}`));
      });
      child.on('close', (exitCode) => {
        clearTimeout(timer);
        resolve({ code: exitCode, stdout: out, stderr: err });
      });

      if (spec.timeout) {
        timer = setTimeout(() => {
          child.kill('SIGKILL');
        }, spec.timeout);
      }

      // a tool may exit without reading its input; its exit code decides the outcome
      child.stdin.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'EPIPE') {
          debug('%s closed stdin before reading its input', label);
          return;
        }
        clearTimeout(timer);
        reject(new Error(`fixture ${label}: cannot write input: ${error.message}`));
      });
      if (spec.input !== undefined) {
        child.stdin.write(JSON.stringify(spec.input));
      }
      child.stdin.end();
    }
  );

  if (code !== 0) {
    throw new Error(`fixture ${label} exited with code ${code}: ${stderr.trim()}`);
  }

  if (spec.outputFile) {
    const file = path.resolve(cwd, spec.outputFile);
    return parseJson(await readFile(file, 'utf8'), file);
  }
  return parseJson(stdout, label);
}
