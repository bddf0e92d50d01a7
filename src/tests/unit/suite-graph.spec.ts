import { describe, expect, it } from 'vitest';

import { aggregateStatus, CaseRun } from '../../case-run';
import { caseId, orderCases, toSnakeCase } from '../../suite-graph';
import type { CaseResult, ResultNode, SuiteResult, TestCase, Verdict } from '../../types';

const test = (name: string, dependsOn?: string[]): TestCase => ({ name, method: 'starknet_chainId', dependsOn });

const caseResult = (verdict: Verdict, optional = false): CaseResult => ({
  kind: 'case',
  name: 'c',
  id: 'c',
  method: 'starknet_chainId',
  target: 'a',
  optional,
  verdict,
  violations: [],
  annotations: [],
  attempts: 1,
  elapsedMs: 1,
  request: null,
  response: null,
});

describe('toSnakeCase / caseId', () => {
  it('derives ids from names', () => {
    expect(toSnakeCase('Get Block By Number')).toBe('get_block_by_number');
    expect(toSnakeCase('getHTTPStatus')).toBe('get_http_status');
    expect(caseId({ name: 'Latest block', method: 'x' })).toBe('latest_block');
    expect(caseId({ name: 'Latest block', id: 'head', method: 'x' })).toBe('head');
  });
});

describe('orderCases', () => {
  it('places every case after the cases it depends on', () => {
    const ordered = orderCases([test('c', ['b']), test('b', ['a']), test('a')]);
    expect(ordered.map((t) => t.name)).toEqual(['a', 'b', 'c']);
  });

  it('keeps independent cases in declaration order', () => {
    expect(orderCases([test('x'), test('y'), test('z')]).map((t) => t.name)).toEqual(['x', 'y', 'z']);
  });

  it('accepts dependencies satisfied elsewhere', () => {
    expect(orderCases([test('main', ['setup'])], new Set(['setup']))).toHaveLength(1);
  });

  it('rejects unknown and duplicate ids together', () => {
    expect(() => orderCases([test('a', ['ghost']), test('a')])).toThrow(
      'invalid case dependencies:\n\t- duplicate case id a\n\t- a depends on unknown case ghost'
    );
  });

  it('rejects cycles with the path that closes them', () => {
    expect(() => orderCases([test('a', ['b']), test('b', ['a'])])).toThrow('dependency cycle:\n\t- a -> b -> a');
  });
});

describe('CaseRun', () => {
  it('moves from pending through running to one terminal verdict', () => {
    const run = new CaseRun('case');
    expect(run.status).toBe('pending');
    run.start();
    run.finish({ status: 'pass' });
    expect(run.status).toBe('pass');
    expect(run.isTerminal).toBe(true);
    expect(() => run.finish({ status: 'skipped', detail: 'late' })).toThrow('case: illegal transition pass -> skipped');
  });

  it('lets a pending case be skipped or cancelled but not passed', () => {
    expect(() => new CaseRun('p').finish({ status: 'pass' })).toThrow('p: illegal transition pending -> pass');
    expect(new CaseRun('s').finish({ status: 'skipped', detail: 'setup failed' }).status).toBe('skipped');
    expect(new CaseRun('t').finish({ status: 'transport-error', detail: 'cancelled' }).status).toBe('transport-error');
  });
});

describe('aggregateStatus', () => {
  const violation: Verdict = { status: 'schema-violation', detail: 'result: must be string' };

  it('fails when a required child did not pass', () => {
    expect(aggregateStatus([caseResult({ status: 'pass' }), caseResult({ status: 'pass' }), caseResult(violation)])).toBe('fail');
  });

  it('ignores optional children', () => {
    expect(aggregateStatus([caseResult({ status: 'pass' }), caseResult({ status: 'pass' }), caseResult(violation, true)])).toBe('pass');
  });

  it('looks at nested suite status', () => {
    const nested: SuiteResult = { kind: 'suite', name: 's', optional: false, status: 'fail', elapsedMs: 0, children: [] };
    const children: ResultNode[] = [caseResult({ status: 'pass' }), nested];
    expect(aggregateStatus(children)).toBe('fail');
    expect(aggregateStatus([caseResult({ status: 'pass' }), { ...nested, optional: true }])).toBe('pass');
  });
});
