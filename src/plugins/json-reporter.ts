import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import debugFactory from 'debug';
import type { Plugin } from '../plugin-api';
import { summarize } from '../report';

const debug = debugFactory('rpc-conform:json-reporter');

/** Writes the full result tree, with raw request/response pairs, to `file`. */
export const jsonReporterPlugin = (file: string): Plugin => ({
  name: 'json-reporter',
  setup(ctx) {
    ctx.onRunEnd(async (report) => {
      const target = path.resolve(file);
      const { counts, total, latency } = summarize(report.tree);
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, `${JSON.stringify({ ...report, summary: { total, counts, latency } }, null, 2)}\n`, 'utf8');
      debug('report written to %s', target);
    });
  },
});
