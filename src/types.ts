export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type RpcId = string | number | null;

export type RpcParams = JsonValue[] | JsonObject;

export interface RpcErrorObject {
  code: number;
  message: string;
  data?: JsonValue;
}

export interface RpcRequest {
  jsonrpc: '2.0';
  /** Absent for notifications */
  id?: RpcId;
  method: string;
  params?: RpcParams;
}

export interface RpcResponse {
  jsonrpc: '2.0';
  id: RpcId;
  result?: JsonValue;
  error?: RpcErrorObject;
}

/** An addressable RPC backend. Frozen by `createEndpoint`. */
export interface Endpoint {
  readonly name: string;
  readonly url: string;
  readonly scheme: 'http' | 'https';
  /** PEM trust material for https upstreams */
  readonly ca?: string;
  readonly cert?: string;
  readonly key?: string;
  readonly rejectUnauthorized?: boolean;
  readonly headers?: Readonly<Record<string, string>>;
}

export interface RetryPolicy {
  /** Total attempts, including the first one */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the delay randomized in both directions, 0..1 */
  jitter: number;
}

export type Expectation =
  | { type: 'result' }
  | { type: 'error'; code?: number }
  | { type: 'any' };

export type SuiteState = Record<string, JsonValue>;

export interface TestCase {
  /** Unique name for the test */
  name: string;
  /** Identifier other cases reference in `dependsOn` */
  id?: string;
  /** JSON-RPC method to call */
  method: string;
  /** Positional or named params, or a function of the suite state */
  params?: RpcParams | ((state: Readonly<SuiteState>) => RpcParams | Promise<RpcParams>);
  /** Expected outcome class. Defaults to `result` */
  expect?: Expectation | Expectation['type'];
  /** Optional cases are reported but never fail their suite */
  optional?: boolean;
  /** Ids of cases whose output this case reads */
  dependsOn?: string[];
  /** Suite state key -> dotted path into the result */
  capture?: Record<string, string>;
  /** Tags used for filtering */
  tags?: string | string[];
  /** Skip this test completely */
  skip?: boolean;
  /** Mark as focused */
  focus?: boolean;
  /** Per-call timeout in milliseconds */
  timeout?: number;
  /** Extra whole-case attempts on transport errors */
  retries?: number;
  /** Delay in milliseconds before execution */
  delay?: number;
  /** Called with the result after validation passes; a throw is a semantic violation */
  postTest?: (result: JsonValue | undefined, state: SuiteState) => void | Promise<void>;
}

export interface FixtureSpec {
  /** State key receiving the tool's JSON output */
  name: string;
  command: string;
  args?: string[];
  input?: JsonValue;
  /** Read the output from this file instead of stdout */
  outputFile?: string;
  timeout?: number;
}

export interface SuiteContext {
  readonly target: Endpoint;
  readonly state: SuiteState;
  readonly signal: AbortSignal;
  /** Calls the suite's target; a JSON-RPC error rejects with `RpcCallError` */
  call(method: string, params?: RpcParams): Promise<JsonValue>;
}

export interface Suite {
  name: string;
  tests: TestCase[];
  /** Nested suites, run beside the tests */
  suites?: Suite[];
  /** Setup cases, run in order before anything else */
  setup?: TestCase[];
  /** Teardown cases, run in order after everything else */
  teardown?: TestCase[];
  /** External fixture tools run before setup */
  fixtures?: FixtureSpec[];
  before?: (ctx: SuiteContext) => void | Promise<void>;
  after?: (ctx: SuiteContext) => void | Promise<void>;
  optional?: boolean;
  /** Restrict the suite to these target names */
  targets?: string[];
  /** Suite deadline in milliseconds */
  timeout?: number;
  tags?: string | string[];
  focus?: boolean;
  /** Path the suite was loaded from */
  loadPath?: string;
}

export type Verdict =
  | { status: 'pass' }
  | { status: 'schema-violation'; detail: string }
  | { status: 'semantic-violation'; detail: string }
  | { status: 'transport-error'; detail: string }
  | { status: 'skipped'; detail: string };

export type VerdictStatus = Verdict['status'];

export type CaseStatus = 'pending' | 'running' | VerdictStatus;

export interface Violation {
  kind: 'schema' | 'semantic';
  /** Dotted location, e.g. `result.block_hash` */
  path: string;
  message: string;
  expected?: string;
  actual?: string;
}

export interface CaseResult {
  kind: 'case';
  name: string;
  id: string;
  method: string;
  target: string;
  optional: boolean;
  verdict: Verdict;
  violations: Violation[];
  /** Non-failing observations, such as recorded divergence */
  annotations: string[];
  attempts: number;
  elapsedMs: number;
  request: RpcRequest | null;
  response: RpcResponse | null;
}

export type SuiteStatus = 'pass' | 'fail' | 'skipped';

export interface SuiteResult {
  kind: 'suite';
  name: string;
  target?: string;
  optional: boolean;
  status: SuiteStatus;
  detail?: string;
  elapsedMs: number;
  children: ResultNode[];
}

export type ResultNode = CaseResult | SuiteResult;

export interface RunReport {
  status: 'pass' | 'fail';
  startedAt: string;
  elapsedMs: number;
  tree: SuiteResult;
}
