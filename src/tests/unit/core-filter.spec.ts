import { describe, expect, it } from 'vitest';

import { composePostTest, delay, focus, optional, retries, seq, setup, skip, tag, teardown } from '../../helpers';
import { filterSuites } from '../../plugins/core-filter';
import type { Suite } from '../../types';

const blocks = (): Suite => ({
  name: 'blocks',
  tags: 'smoke',
  tests: [
    { name: 'head', id: 'head', method: 'starknet_blockNumber' },
    { name: 'block by number', method: 'starknet_getBlockWithTxHashes', dependsOn: ['head'], tags: ['slow'] },
  ],
  suites: [{ name: 'inner', tests: [{ name: 'sync', method: 'starknet_syncing' }] }],
});

const chain = (): Suite => ({ name: 'chain', tests: [{ name: 'chain id', method: 'starknet_chainId' }] });

const names = (suites: Suite[]): string[] =>
  suites.flatMap((s) => [...s.tests.map((t) => `${s.name} / ${t.name}`), ...names(s.suites ?? [])]);

describe('filterSuites', () => {
  it('keeps everything without options', () => {
    expect(names(filterSuites([blocks(), chain()], {}))).toEqual([
      'blocks / head',
      'blocks / block by number',
      'inner / sync',
      'chain / chain id',
    ]);
  });

  it('selects by tag and brings back the cases a selected case depends on', () => {
    const kept = filterSuites([blocks(), chain()], { tags: ['slow'] });
    expect(names(kept)).toEqual(['blocks / head', 'blocks / block by number']);
    expect(kept[0].suites).toEqual([]);
  });

  it('lets nested suites inherit tags, case-insensitively', () => {
    expect(names(filterSuites([blocks(), chain()], { tags: ['SMOKE'] }))).toEqual([
      'blocks / head',
      'blocks / block by number',
      'inner / sync',
    ]);
  });

  it('matches the name pattern against the suite trail', () => {
    const kept = filterSuites([blocks(), chain()], { filter: 'inner / sync' });
    expect(names(kept)).toEqual(['inner / sync']);
    expect(kept.map((s) => s.name)).toEqual(['blocks']);
  });

  it('runs only focused cases once anything is focused', () => {
    const focusedChain: Suite = { ...chain(), tests: focus(chain().tests) };
    expect(names(filterSuites([blocks(), focusedChain], {}))).toEqual(['chain / chain id']);
  });

  it('runs every case of a focused suite', () => {
    const suite = blocks();
    const focusedInner: Suite = { ...suite, suites: [{ name: 'inner', focus: true, tests: [{ name: 'sync', method: 'starknet_syncing' }] }] };
    expect(names(filterSuites([focusedInner, chain()], {}))).toEqual(['inner / sync']);
  });
});

describe('helpers', () => {
  const cases = [
    { name: 'First', method: 'starknet_chainId' },
    { name: 'Second', method: 'starknet_blockNumber', dependsOn: ['x'] },
    { name: 'Third', method: 'starknet_syncing' },
  ];

  it('chains cases in order', () => {
    expect(seq(cases).map((t) => t.dependsOn)).toEqual([undefined, ['x', 'first'], ['second']]);
  });

  it('sets flags without touching the input', () => {
    expect(skip(cases).every((t) => t.skip)).toBe(true);
    expect(optional(cases).every((t) => t.optional)).toBe(true);
    expect(retries(cases, 2).map((t) => t.retries)).toEqual([2, 2, 2]);
    expect(delay(cases, 50).map((t) => t.delay)).toEqual([50, 50, 50]);
    expect(cases.some((t) => 'skip' in t)).toBe(false);
  });

  it('merges tags without duplicates', () => {
    const tagged = tag([{ name: 'a', method: 'm', tags: 'smoke' }], 'smoke', 'slow');
    expect(tagged[0].tags).toEqual(['smoke', 'slow']);
  });

  it('appends setup and teardown cases', () => {
    const suite = teardown(setup(chain(), [cases[0]]), [cases[2]]);
    expect(suite.setup?.map((t) => t.name)).toEqual(['First']);
    expect(suite.teardown?.map((t) => t.name)).toEqual(['Third']);
  });

  it('runs composed postTest hooks in order', async () => {
    const calls: string[] = [];
    const hook = composePostTest(
      (result) => {
        calls.push(`a:${String(result)}`);
      },
      async (_result, state) => {
        calls.push(`b:${String(state.head)}`);
      }
    );
    await hook('0x1', { head: 5 });
    expect(calls).toEqual(['a:0x1', 'b:5']);
  });
});
