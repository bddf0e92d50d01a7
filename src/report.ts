import type { CaseResult, ResultNode, SuiteResult, VerdictStatus } from './types';

export interface CaseEntry {
  /** Suite names from the root down to the case's suite */
  path: string[];
  result: CaseResult;
}

export interface Summary {
  total: number;
  counts: Record<VerdictStatus, number>;
  /** Required cases that did not pass */
  failures: CaseEntry[];
  skipped: CaseEntry[];
  latency?: { min: number; avg: number; max: number };
}

export function walkCases(node: ResultNode, path: string[] = []): CaseEntry[] {
  if (node.kind === 'case') return [{ path, result: node }];
  const here = [...path, node.name];
  return node.children.flatMap((child) => walkCases(child, here));
}

export function summarize(tree: SuiteResult): Summary {
  const cases = walkCases(tree);
  const counts: Record<VerdictStatus, number> = {
    pass: 0,
    'schema-violation': 0,
    'semantic-violation': 0,
    'transport-error': 0,
    skipped: 0,
  };
  cases.forEach(({ result }) => {
    counts[result.verdict.status] += 1;
  });

  const latencies = cases
    .filter(({ result }) => result.attempts > 0)
    .map(({ result }) => result.elapsedMs)
    .sort((a, b) => a - b);

  return {
    total: cases.length,
    counts,
    failures: cases.filter(
      ({ result }) => !result.optional && result.verdict.status !== 'pass' && result.verdict.status !== 'skipped'
    ),
    skipped: cases.filter(({ result }) => result.verdict.status === 'skipped'),
    latency:
      latencies.length > 0
        ? {
            min: latencies[0],
            avg: Number((latencies.reduce((a, b) => a + b, 0) / latencies.length).toFixed(2)),
            max: latencies[latencies.length - 1],
          }
        : undefined,
  };
}
