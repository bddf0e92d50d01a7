import Bottleneck from 'bottleneck';
import debugFactory from 'debug';
import { CaseRun, aggregateStatus, nodePassed } from './case-run';
import { ConfigError, MalformedResponseError, RpcCallError, TransportError, errorMessage } from './errors';
import { runFixtureTool } from './fixtures';
import { resolveParams } from './params';
import { caseId, orderCases } from './suite-graph';
import { MonotonicTracker, readPath, type MonotonicRule } from './semantic';
import { describeViolation, normalizeExpectation, type SchemaValidator } from './validator';
import type { MethodRegistry } from './openrpc';
import type { PluginHost } from './plugin-host';
import type { RpcClient, RpcExchange } from './rpc-client';
import type {
  CaseResult,
  Endpoint,
  ResultNode,
  RetryPolicy,
  RpcParams,
  RpcRequest,
  Suite,
  SuiteContext,
  SuiteResult,
  SuiteState,
  TestCase,
  Verdict,
  Violation,
} from './types';

const debug = debugFactory('rpc-conform:scheduler');

export const DIVERGENCE_HEADER = 'x-rpc-divergence';
export const FAILED_UPSTREAMS_HEADER = 'x-rpc-failed';

export type DivergencePolicy = 'fail' | 'record';

export interface SchedulerOptions {
  registry: MethodRegistry;
  validator: SchemaValidator;
  client: RpcClient;
  /** Concurrent calls per target */
  concurrency?: number;
  /** Requests per second per target */
  rps?: number;
  /** Extra whole-case attempts on transport errors */
  caseRetries?: number;
  /** Transport retry inside the client */
  retry?: Partial<RetryPolicy>;
  /** Per-call timeout; defaults to the client's */
  timeout?: number;
  exhaustive?: boolean;
  divergence?: DivergencePolicy;
  monotonic?: MonotonicRule[];
  host?: PluginHost;
  fixtureCwd?: string;
}

interface TargetRun {
  target: Endpoint;
  limiter: Bottleneck;
  tracker: MonotonicTracker;
}

interface SuiteRun extends TargetRun {
  suite: Suite;
  state: SuiteState;
  signal: AbortSignal;
}

const CANCELLED: Verdict = { status: 'transport-error', detail: 'cancelled' };

function appliesTo(suite: Suite, target: Endpoint): boolean {
  return !suite.targets || suite.targets.includes(target.name);
}

function wait(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new TransportError('cancelled', 'cancelled', false));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Expands a suite over the target set and runs it: one subtree per target,
 * cases concurrent up to the per-target bound, dependent cases in order.
 */
export class Scheduler {
  private readonly registry: MethodRegistry;
  private readonly validator: SchemaValidator;
  private readonly client: RpcClient;
  private readonly concurrency: number;
  private readonly rps: number;
  private readonly caseRetries: number;
  private readonly retry?: Partial<RetryPolicy>;
  private readonly timeout?: number;
  private readonly exhaustive: boolean;
  private readonly divergence: DivergencePolicy;
  private readonly monotonic?: MonotonicRule[];
  private readonly host?: PluginHost;
  private readonly fixtureCwd?: string;

  constructor(options: SchedulerOptions) {
    this.registry = options.registry;
    this.validator = options.validator;
    this.client = options.client;
    this.concurrency = options.concurrency ?? 8;
    this.rps = options.rps ?? Infinity;
    this.caseRetries = options.caseRetries ?? 1;
    this.retry = options.retry;
    this.timeout = options.timeout;
    this.exhaustive = options.exhaustive ?? true;
    this.divergence = options.divergence ?? 'record';
    this.monotonic = options.monotonic;
    this.host = options.host;
    this.fixtureCwd = options.fixtureCwd;
  }

  /** Rejects with `ConfigError` before anything runs when the tree is inconsistent. */
  public check(suite: Suite, targets: readonly Endpoint[]): void {
    const issues: string[] = [];
    const names = new Set(targets.map((t) => t.name));
    const visit = (s: Suite, trail: string) => {
      const where = trail ? `${trail} > ${s.name}` : s.name;
      (s.targets ?? []).forEach((name) => {
        if (!names.has(name)) issues.push(`${where}: unknown target ${name}`);
      });
      const setup = s.setup ?? [];
      const all = [...setup, ...s.tests, ...(s.teardown ?? [])];
      all.forEach((t) => {
        const expect = normalizeExpectation(t.expect);
        if (expect.type !== 'error' && !this.registry.has(t.method)) {
          issues.push(`${where} / ${t.name}: ${t.method} is not in the OpenRPC document`);
        }
      });
      try {
        const setupIds = new Set(orderCases(setup).map(caseId));
        const mainIds = orderCases(s.tests, setupIds).map(caseId);
        orderCases(s.teardown ?? [], new Set([...setupIds, ...mainIds]));
      } catch (error) {
        if (error instanceof ConfigError) {
          issues.push(...error.issues.map((i) => `${where}: ${i}`));
        } else {
          throw error;
        }
      }
      (s.suites ?? []).forEach((child) => visit(child, where));
    };
    visit(suite, '');
    if (issues.length > 0) {
      throw new ConfigError('invalid suite configuration', issues);
    }
  }

  public async run(suite: Suite, targets: readonly Endpoint[]): Promise<SuiteResult> {
    this.check(suite, targets);
    const startTime = Date.now();
    const children = await Promise.all(
      targets.filter((target) => appliesTo(suite, target)).map(async (target) => {
        const targetRun: TargetRun = {
          target,
          limiter: new Bottleneck({
            maxConcurrent: this.concurrency > 0 ? this.concurrency : null,
            minTime: Number.isFinite(this.rps) && this.rps > 0 ? Math.ceil(1000 / this.rps) : 0,
          }),
          tracker: new MonotonicTracker(this.monotonic),
        };
        const result = await this.runSuite(suite, targetRun, {});
        return { ...result, name: `${suite.name} [${target.name}]` };
      })
    );
    return {
      kind: 'suite',
      name: suite.name,
      optional: !!suite.optional,
      status: aggregateStatus(children),
      elapsedMs: Date.now() - startTime,
      children,
    };
  }

  private async runSuite(
    suite: Suite,
    targetRun: TargetRun,
    inherited: Readonly<SuiteState>,
    parentSignal?: AbortSignal
  ): Promise<SuiteResult> {
    const startTime = Date.now();
    const controller = new AbortController();
    const abort = () => controller.abort();
    if (parentSignal?.aborted) abort();
    parentSignal?.addEventListener('abort', abort, { once: true });
    const deadline = suite.timeout
      ? setTimeout(() => {
          debug('%s [%s] deadline of %dms reached', suite.name, targetRun.target.name, suite.timeout);
          abort();
        }, suite.timeout)
      : undefined;

    const run: SuiteRun = { ...targetRun, suite, state: { ...inherited }, signal: controller.signal };
    const ctx = this.suiteContext(run);
    const children: ResultNode[] = [];
    const problems: string[] = [];
    let setupError: string | undefined;

    try {
      for (const fixture of suite.fixtures ?? []) {
        try {
          run.state[fixture.name] = await runFixtureTool(fixture, { cwd: this.fixtureCwd, signal: run.signal });
        } catch (error) {
          setupError = `fixture ${fixture.name}: ${errorMessage(error)}`;
          break;
        }
      }

      if (!setupError && suite.before) {
        try {
          await suite.before(ctx);
        } catch (error) {
          setupError = `before hook: ${errorMessage(error)}`;
        }
      }

      for (const test of orderCases(suite.setup ?? [])) {
        if (setupError) {
          children.push(this.skipCase(test, run, `setup failed: ${setupError}`));
          continue;
        }
        const result = await this.runCase(test, run);
        children.push(result);
        if (!nodePassed(result)) setupError = `setup case ${result.name} did not pass`;
      }

      if (setupError) {
        children.push(...this.skipMain(suite, run, `setup failed: ${setupError}`));
      } else {
        children.push(...(await this.runMain(run)));
      }

      const outcomes = new Map<string, CaseResult>();
      children.forEach((node) => {
        if (node.kind === 'case') outcomes.set(node.id, node);
      });
      for (const test of orderCases(suite.teardown ?? [], new Set(outcomes.keys()))) {
        const failed = (test.dependsOn ?? [])
          .map((id) => outcomes.get(id))
          .find((r) => r !== undefined && r.verdict.status !== 'pass');
        const result = failed
          ? this.skipCase(test, run, `dependency ${failed.id} did not pass`)
          : await this.runCase(test, run);
        outcomes.set(result.id, result);
        children.push(result);
      }

      if (suite.after) {
        try {
          await suite.after(ctx);
        } catch (error) {
          problems.push(`after hook: ${errorMessage(error)}`);
        }
      }
    } finally {
      clearTimeout(deadline);
      parentSignal?.removeEventListener('abort', abort);
    }

    if (setupError) problems.unshift(setupError);
    return {
      kind: 'suite',
      name: suite.name,
      target: targetRun.target.name,
      optional: !!suite.optional,
      status: problems.length > 0 ? 'fail' : aggregateStatus(children),
      detail: problems.length > 0 ? problems.join('; ') : undefined,
      elapsedMs: Date.now() - startTime,
      children,
    };
  }

  private async runMain(run: SuiteRun): Promise<ResultNode[]> {
    const { suite } = run;
    const setupIds = new Set((suite.setup ?? []).map(caseId));
    const pending = new Map<string, Promise<CaseResult>>();

    orderCases(suite.tests, setupIds).forEach((test) => {
      const deps = (test.dependsOn ?? []).flatMap((id) => {
        const dep = pending.get(id);
        return dep ? [dep] : [];
      });
      pending.set(
        caseId(test),
        Promise.all(deps).then((results) => {
          if (run.signal.aborted) return this.cancelCase(test, run);
          const failed = results.find((r) => r.verdict.status !== 'pass');
          if (failed) return this.skipCase(test, run, `dependency ${failed.id} did not pass`);
          return this.runCase(test, run);
        })
      );
    });

    const nested = (suite.suites ?? [])
      .filter((child) => appliesTo(child, run.target))
      .map((child) => this.runSuite(child, run, run.state, run.signal));

    const cases = await Promise.all(
      suite.tests.map((test) => pending.get(caseId(test)) ?? Promise.resolve(this.skipCase(test, run, 'not scheduled')))
    );
    return [...cases, ...(await Promise.all(nested))];
  }

  private skipMain(suite: Suite, run: SuiteRun, reason: string): ResultNode[] {
    const cases = suite.tests.map((test) => this.skipCase(test, run, reason));
    const nested = (suite.suites ?? [])
      .filter((child) => appliesTo(child, run.target))
      .map((child): SuiteResult => ({
        kind: 'suite',
        name: child.name,
        target: run.target.name,
        optional: !!child.optional,
        status: 'skipped',
        detail: reason,
        elapsedMs: 0,
        children: this.skipMain(child, { ...run, suite: child }, reason),
      }));
    return [...cases, ...nested];
  }

  private baseResult(test: TestCase, run: SuiteRun): Omit<CaseResult, 'verdict' | 'elapsedMs'> {
    return {
      kind: 'case',
      name: test.name,
      id: caseId(test),
      method: test.method,
      target: run.target.name,
      optional: !!test.optional,
      violations: [],
      annotations: [],
      attempts: 0,
      request: null,
      response: null,
    };
  }

  private settle(
    test: TestCase,
    run: SuiteRun,
    caseRun: CaseRun,
    verdict: Verdict,
    extra: Partial<CaseResult> = {}
  ): CaseResult {
    caseRun.finish(verdict);
    const result: CaseResult = { ...this.baseResult(test, run), ...extra, verdict, elapsedMs: caseRun.elapsedMs };
    this.host?.dispatchCaseEnd(test, result);
    return result;
  }

  private skipCase(test: TestCase, run: SuiteRun, reason: string): CaseResult {
    return this.settle(test, run, new CaseRun(test.name), { status: 'skipped', detail: reason });
  }

  private cancelCase(test: TestCase, run: SuiteRun): CaseResult {
    return this.settle(test, run, new CaseRun(test.name), CANCELLED);
  }

  private async runCase(test: TestCase, run: SuiteRun): Promise<CaseResult> {
    const caseRun = new CaseRun(`${run.suite.name} / ${test.name} [${run.target.name}]`);
    // authored skips are reported but never count against the suite
    if (test.skip) return this.settle(test, run, caseRun, { status: 'skipped', detail: 'marked skip' }, { optional: true });
    if (run.signal.aborted) return this.settle(test, run, caseRun, CANCELLED);

    this.host?.dispatchCaseStart(test, run.target);
    caseRun.start();

    const spec = this.registry.get(test.method);
    const expect = normalizeExpectation(test.expect);
    let request: RpcRequest = { jsonrpc: '2.0', method: test.method };

    try {
      if (typeof test.delay === 'number' && test.delay > 0) {
        await wait(test.delay, run.signal);
      }

      let params: RpcParams | undefined;
      try {
        params = await resolveParams(test, run.state, spec);
      } catch (error) {
        return this.settle(test, run, caseRun, { status: 'skipped', detail: `cannot bind params: ${errorMessage(error)}` });
      }
      if (params !== undefined) request = { ...request, params };

      const maxAttempts = 1 + Math.max(0, test.retries ?? this.caseRetries);
      let attempts = 0;
      let exchange: RpcExchange | undefined;
      while (!exchange) {
        attempts += 1;
        try {
          exchange = await run.limiter.schedule(() =>
            this.client.call(run.target, test.method, params, {
              timeout: test.timeout ?? this.timeout,
              retry: this.retry,
              signal: run.signal,
            })
          );
        } catch (error) {
          if (error instanceof MalformedResponseError) {
            const violation: Violation = {
              kind: 'schema',
              path: 'response',
              message: error.message,
              expected: 'a JSON-RPC 2.0 response',
              actual: error.body.slice(0, 200),
            };
            return this.settle(test, run, caseRun, { status: 'schema-violation', detail: describeViolation(violation) }, {
              attempts,
              request,
              violations: [violation],
            });
          }
          if (error instanceof TransportError && error.retryable && attempts < maxAttempts && !run.signal.aborted) {
            debug('%s: %s, retrying case (%d/%d)', caseRun.label, error.message, attempts, maxAttempts);
            continue;
          }
          throw error;
        }
      }

      return await this.judge(test, run, caseRun, exchange, attempts, expect.type);
    } catch (error) {
      const detail = run.signal.aborted ? 'cancelled' : errorMessage(error);
      return this.settle(test, run, caseRun, { status: 'transport-error', detail }, { request });
    }
  }

  private async judge(
    test: TestCase,
    run: SuiteRun,
    caseRun: CaseRun,
    exchange: RpcExchange,
    attempts: number,
    expectType: string
  ): Promise<CaseResult> {
    const spec = this.registry.get(test.method);
    const { response, headers } = exchange;
    const outcome = this.validator.validate(spec, response, {
      exhaustive: true,
      expect: normalizeExpectation(test.expect),
    });
    const violations = [...outcome.violations];
    const annotations: string[] = [];

    const schemaFailed = violations.some((v) => v.kind === 'schema');
    if (response.result !== undefined && !schemaFailed && expectType !== 'error') {
      violations.push(...run.tracker.observe(run.target.name, spec, test.method, response.result));
    }

    const divergent = headers[DIVERGENCE_HEADER];
    if (divergent) {
      if (this.divergence === 'fail') {
        violations.push({
          kind: 'semantic',
          path: 'response',
          message: `upstreams disagree: ${divergent}`,
          expected: 'identical responses',
          actual: `divergent ${divergent}`,
        });
      } else {
        annotations.push(`divergent upstreams: ${divergent}`);
      }
    }
    const failedUpstreams = headers[FAILED_UPSTREAMS_HEADER];
    if (failedUpstreams) annotations.push(`failed upstreams: ${failedUpstreams}`);

    if (violations.length === 0) {
      Object.entries(test.capture ?? {}).forEach(([key, path]) => {
        const value = readPath(response.result, path);
        if (value === undefined) {
          violations.push({ kind: 'semantic', path: `result.${path}`, message: `nothing to capture into ${key}` });
        } else {
          run.state[key] = value;
        }
      });
    }
    if (violations.length === 0 && test.postTest) {
      try {
        await test.postTest(response.result, run.state);
      } catch (error) {
        violations.push({ kind: 'semantic', path: 'result', message: errorMessage(error) });
      }
    }

    const schema = violations.filter((v) => v.kind === 'schema');
    const semantic = violations.filter((v) => v.kind === 'semantic');
    let verdict: Verdict = { status: 'pass' };
    if (schema.length > 0) {
      verdict = { status: 'schema-violation', detail: schema.map(describeViolation).join('; ') };
    } else if (semantic.length > 0) {
      verdict = { status: 'semantic-violation', detail: semantic.map(describeViolation).join('; ') };
    }

    const ordered = [...schema, ...semantic];
    return this.settle(test, run, caseRun, verdict, {
      attempts,
      request: exchange.request,
      response,
      annotations,
      violations: this.exhaustive ? ordered : ordered.slice(0, 1),
    });
  }

  private suiteContext(run: SuiteRun): SuiteContext {
    return {
      target: run.target,
      state: run.state,
      signal: run.signal,
      call: async (method, params) => {
        const exchange = await run.limiter.schedule(() =>
          this.client.call(run.target, method, params, { timeout: this.timeout, retry: this.retry, signal: run.signal })
        );
        if (exchange.response.error) {
          throw new RpcCallError(method, exchange.response.error);
        }
        return exchange.response.result ?? null;
      },
    };
  }
}
