import { realpathSync } from 'fs';
import { readdir } from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import debugFactory from 'debug';

import { loadConfig, type RunConfig } from './config';
import { createEndpoints } from './endpoint';
import { ConfigError, errorMessage } from './errors';
import { loadOpenRpc } from './openrpc';
import type { Plugin } from './plugin-api';
import { PluginHost } from './plugin-host';
import { consoleReporterPlugin } from './plugins/console-reporter';
import { coreFilterPlugin } from './plugins/core-filter';
import { coreLoaderPlugin } from './plugins/core-loader';
import { jsonReporterPlugin } from './plugins/json-reporter';
import { HostResolver } from './resolver';
import { RpcClient } from './rpc-client';
import { Scheduler } from './scheduler';
import { DEFAULT_MONOTONIC_RULES } from './semantic';
import { SchemaValidator } from './validator';
import type { Endpoint, RunReport, Suite } from './types';

const debug = debugFactory('rpc-conform:cli');

export const EXIT_PASS = 0;
export const EXIT_FAIL = 1;
export const EXIT_CONFIG = 2;

export function countCases(suite: Suite, target: Endpoint): number {
  if (suite.targets && !suite.targets.includes(target.name)) return 0;
  const own = suite.tests.length + (suite.setup ?? []).length + (suite.teardown ?? []).length;
  return own + (suite.suites ?? []).reduce((sum, child) => sum + countCases(child, target), 0);
}

async function discoverSuites(cfg: RunConfig): Promise<string[]> {
  if (cfg.suiteFile) return [path.resolve(cfg.projectRoot, cfg.suiteFile)];
  const suiteDir = path.resolve(cfg.projectRoot, cfg.suiteDir);
  let files: string[];
  try {
    files = await readdir(suiteDir);
  } catch (error) {
    throw new ConfigError(`cannot read suite directory ${suiteDir}: ${errorMessage(error)}`);
  }
  const pattern = new RegExp(cfg.filePattern);
  return files
    .filter((f) => pattern.test(f))
    .sort()
    .map((f) => path.join(suiteDir, f));
}

export interface RunOptions {
  /** Replaces the reporters */
  reporters?: Plugin[];
}

/** Loads everything the configuration names, runs it and returns the report. */
export async function runConformance(cfg: RunConfig, options: RunOptions = {}): Promise<RunReport> {
  const startedAt = new Date();
  const registry = await loadOpenRpc(/^https?:\/\//.test(cfg.spec) ? cfg.spec : path.resolve(cfg.projectRoot, cfg.spec));
  const validator = new SchemaValidator(registry, { feltSchemas: cfg.feltSchemas });
  const targets = createEndpoints(cfg.targets, cfg.projectRoot);
  if (targets.length === 0) {
    throw new ConfigError('no targets: pass --target name=url or set RPC_TARGETS');
  }

  const reporters = options.reporters ?? [
    consoleReporterPlugin({ verbose: cfg.verbose }),
    ...(cfg.report ? [jsonReporterPlugin(path.resolve(cfg.projectRoot, cfg.report))] : []),
  ];
  const host = new PluginHost([coreLoaderPlugin, coreFilterPlugin({ tags: cfg.tags, filter: cfg.filter }), ...reporters]);
  await host.setup();

  const loaded: Suite[] = [];
  for (const file of await discoverSuites(cfg)) {
    loaded.push(...(await host.loadSuites(file)));
  }
  const suites = await host.prepareSuites(loaded);
  debug('%d suite(s) after filtering', suites.length);
  const root: Suite = { name: 'rpc-conform', tests: [], suites };

  const client = new RpcClient({
    timeout: cfg.timeout,
    retry: { attempts: cfg.retries },
    resolver: new HostResolver(cfg.dns, { strict: cfg.strictDns }),
  });
  const scheduler = new Scheduler({
    registry,
    validator,
    client,
    host,
    concurrency: cfg.concurrency,
    rps: cfg.rps > 0 ? cfg.rps : undefined,
    caseRetries: cfg.caseRetries,
    timeout: cfg.timeout,
    exhaustive: cfg.exhaustive,
    divergence: cfg.divergence,
    monotonic: [...DEFAULT_MONOTONIC_RULES, ...cfg.monotonic],
    fixtureCwd: cfg.projectRoot,
  });
  scheduler.check(root, targets);

  await host.dispatchRunStart({
    suites,
    targets,
    caseCount: targets.reduce((sum, target) => sum + countCases(root, target), 0),
  });
  try {
    const tree = await scheduler.run(root, targets);
    const report: RunReport = {
      status: tree.status === 'pass' ? 'pass' : 'fail',
      startedAt: startedAt.toISOString(),
      elapsedMs: Date.now() - startedAt.getTime(),
      tree,
    };
    await host.dispatchRunEnd(report);
    return report;
  } finally {
    await client.close();
  }
}

export async function main(argv = process.argv): Promise<number> {
  try {
    const cfg = await loadConfig(argv);
    const report = await runConformance(cfg);
    return report.status === 'pass' ? EXIT_PASS : EXIT_FAIL;
  } catch (error) {
    console.error(`❌ ${error instanceof ConfigError ? 'Configuration error' : 'Setup failed'}: ${errorMessage(error)}`);
    return EXIT_CONFIG;
  }
}

if (process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1])) {
  main(process.argv).then((code) => process.exit(code), (error) => {
    console.error(error);
    process.exit(EXIT_CONFIG);
  });
}
