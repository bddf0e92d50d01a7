import type { ConformContext, Plugin, RunStartInfo } from './plugin-api';
import type { CaseResult, Endpoint, RunReport, Suite, TestCase } from './types';

type LoadCallback = (args: { path: string }) => Promise<{ suites: Suite[] } | null>;

export class PluginHost {
  private plugins: Plugin[] = [];

  // Callbacks
  private onLoadCbs: { filter: RegExp; callback: LoadCallback }[] = [];
  private onPrepareCbs: ((suites: Suite[]) => Promise<Suite[]> | Suite[])[] = [];
  private onRunStartCbs: ((info: RunStartInfo) => Promise<void> | void)[] = [];
  private onRunEndCbs: ((report: RunReport) => Promise<void> | void)[] = [];
  private onCaseStartCbs: ((test: TestCase, target: Endpoint) => void)[] = [];
  private onCaseEndCbs: ((test: TestCase, result: CaseResult) => void)[] = [];

  public context: ConformContext = {
    onLoad: (options, callback) => {
      this.onLoadCbs.push({ filter: options.filter, callback });
    },
    onPrepare: (callback) => {
      this.onPrepareCbs.push(callback);
    },
    onRunStart: (callback) => {
      this.onRunStartCbs.push(callback);
    },
    onRunEnd: (callback) => {
      this.onRunEndCbs.push(callback);
    },
    onCaseStart: (callback) => {
      this.onCaseStartCbs.push(callback);
    },
    onCaseEnd: (callback) => {
      this.onCaseEndCbs.push(callback);
    },
  };

  constructor(plugins: Plugin[]) {
    this.plugins = plugins;
  }

  public async setup(): Promise<void> {
    for (const plugin of this.plugins) {
      await plugin.setup(this.context);
    }
  }

  public async loadSuites(path: string): Promise<Suite[]> {
    const match = this.onLoadCbs.find(({ filter }) => filter.test(path));
    if (!match) return [];
    const result = await match.callback({ path });
    return result?.suites || [];
  }

  public async prepareSuites(suites: Suite[]): Promise<Suite[]> {
    let result = suites;
    for (const cb of this.onPrepareCbs) {
      result = await cb(result);
    }
    return result;
  }

  public async dispatchRunStart(info: RunStartInfo): Promise<void> {
    for (const cb of this.onRunStartCbs) await cb(info);
  }

  public async dispatchRunEnd(report: RunReport): Promise<void> {
    for (const cb of this.onRunEndCbs) await cb(report);
  }

  public dispatchCaseStart(test: TestCase, target: Endpoint): void {
    this.onCaseStartCbs.forEach((cb) => cb(test, target));
  }

  public dispatchCaseEnd(test: TestCase, result: CaseResult): void {
    this.onCaseEndCbs.forEach((cb) => cb(test, result));
  }
}
