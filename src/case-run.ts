import type { CaseStatus, ResultNode, SuiteStatus, Verdict } from './types';

const TRANSITIONS: Record<CaseStatus, readonly CaseStatus[]> = {
  pending: ['running', 'skipped', 'transport-error'],
  running: ['pass', 'schema-violation', 'semantic-violation', 'transport-error', 'skipped'],
  pass: [],
  'schema-violation': [],
  'semantic-violation': [],
  'transport-error': [],
  skipped: [],
};

/** Lifecycle of one case: pending -> running -> exactly one terminal verdict. */
export class CaseRun {
  private current: CaseStatus = 'pending';
  private final?: Verdict;
  private readonly startedAt = Date.now();

  constructor(public readonly label: string) {}

  get status(): CaseStatus {
    return this.current;
  }

  get verdict(): Verdict | undefined {
    return this.final;
  }

  get elapsedMs(): number {
    return Date.now() - this.startedAt;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  start(): void {
    this.move('running');
  }

  finish(verdict: Verdict): Verdict {
    this.move(verdict.status);
    this.final = verdict;
    return verdict;
  }

  private move(next: CaseStatus): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`${this.label}: illegal transition ${this.current} -> ${next}`);
    }
    this.current = next;
  }
}

export function nodePassed(node: ResultNode): boolean {
  return node.kind === 'case' ? node.verdict.status === 'pass' : node.status === 'pass';
}

/** Fails when any required child did not pass; optional children never count. */
export function aggregateStatus(children: readonly ResultNode[]): Exclude<SuiteStatus, 'skipped'> {
  return children.every((child) => child.optional || nodePassed(child)) ? 'pass' : 'fail';
}
