import { ConfigError } from './errors';
import type { TestCase } from './types';

export function toSnakeCase(text: string): string {
  if (!text) return '';
  let result = text.replace(/[^a-zA-Z0-9]+/g, '_');
  result = result.replace(/([a-z0-9])([A-Z])/g, '$1_$2');
  result = result.replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2');
  return result.toLowerCase().replace(/_+/g, '_').replace(/^_+|_+$/g, '');
}

export function caseId(test: TestCase): string {
  return test.id ?? toSnakeCase(test.name);
}

/**
 * Resolves `dependsOn` into an execution order where every case comes after
 * the cases it reads from. `known` holds ids satisfied elsewhere (setup cases).
 */
export function orderCases(tests: readonly TestCase[], known: ReadonlySet<string> = new Set()): TestCase[] {
  const byId = new Map<string, TestCase>();
  const issues: string[] = [];
  tests.forEach((t) => {
    const id = caseId(t);
    if (byId.has(id) || known.has(id)) issues.push(`duplicate case id ${id}`);
    byId.set(id, t);
  });
  tests.forEach((t) => {
    (t.dependsOn ?? []).forEach((dep) => {
      if (!byId.has(dep) && !known.has(dep)) issues.push(`${caseId(t)} depends on unknown case ${dep}`);
    });
  });
  if (issues.length > 0) throw new ConfigError('invalid case dependencies', issues);

  const ordered: TestCase[] = [];
  const state = new Map<string, 'visiting' | 'done'>();
  const visit = (test: TestCase, trail: string[]) => {
    const id = caseId(test);
    const mark = state.get(id);
    if (mark === 'done') return;
    if (mark === 'visiting') {
      throw new ConfigError('dependency cycle', [[...trail, id].join(' -> ')]);
    }
    state.set(id, 'visiting');
    (test.dependsOn ?? []).forEach((dep) => {
      const next = byId.get(dep);
      if (next) visit(next, [...trail, id]);
    });
    state.set(id, 'done');
    ordered.push(test);
  };
  tests.forEach((t) => visit(t, []));
  return ordered;
}
