import type { CaseResult, Endpoint, RunReport, Suite, TestCase } from './types';

export interface RunStartInfo {
  suites: Suite[];
  targets: Endpoint[];
  caseCount: number;
}

export interface ConformContext {
  // Discovery Phase
  onLoad(options: { filter: RegExp }, callback: (args: { path: string }) => Promise<{ suites: Suite[] } | null>): void;

  // Preparation Phase: Modify/Filter suites before running
  onPrepare(callback: (suites: Suite[]) => Promise<Suite[]> | Suite[]): void;

  // Execution Lifecycle
  onRunStart(callback: (info: RunStartInfo) => Promise<void> | void): void;
  onRunEnd(callback: (report: RunReport) => Promise<void> | void): void;

  // Case Granularity
  onCaseStart(callback: (test: TestCase, target: Endpoint) => void): void;
  onCaseEnd(callback: (test: TestCase, result: CaseResult) => void): void;
}

export interface Plugin {
  name: string;
  setup: (ctx: ConformContext) => void | Promise<void>;
}
