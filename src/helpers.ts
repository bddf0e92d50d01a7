import { caseId } from './suite-graph';
import type { JsonValue, Suite, SuiteState, TestCase } from './types';

type PostTest = NonNullable<TestCase['postTest']>;

export function composePostTest(...fns: PostTest[]): PostTest {
  return async (result: JsonValue | undefined, state: SuiteState) => {
    for (const fn of fns) {
      await fn(result, state);
    }
  };
}

export function delay(tests: TestCase[], delayMs: number): TestCase[] {
  return tests.map((test) => ({ ...test, delay: delayMs }));
}

export function focus(tests: TestCase[]): TestCase[] {
  return tests.map((test) => ({ ...test, focus: true }));
}

export function skip(tests: TestCase[]): TestCase[] {
  return tests.map((test) => ({ ...test, skip: true }));
}

export function optional(tests: TestCase[]): TestCase[] {
  return tests.map((test) => ({ ...test, optional: true }));
}

export function retries(tests: TestCase[], count: number): TestCase[] {
  return tests.map((test) => ({ ...test, retries: count }));
}

export function tag(tests: TestCase[], ...tags: string[]): TestCase[] {
  return tests.map((test) => {
    const existing = Array.isArray(test.tags) ? test.tags : test.tags ? [test.tags] : [];
    return { ...test, tags: [...new Set([...existing, ...tags])] };
  });
}

/** Chains cases so each one depends on the case before it. */
export function seq(tests: TestCase[]): TestCase[] {
  return tests.map((test, i) => {
    if (i === 0) return test;
    const previous = caseId(tests[i - 1]);
    const dependsOn = test.dependsOn ?? [];
    return dependsOn.includes(previous) ? test : { ...test, dependsOn: [...dependsOn, previous] };
  });
}

export function setup(suite: Suite, tests: TestCase[]): Suite {
  return { ...suite, setup: [...(suite.setup ?? []), ...tests] };
}

export function teardown(suite: Suite, tests: TestCase[]): Suite {
  return { ...suite, teardown: [...(suite.teardown ?? []), ...tests] };
}
