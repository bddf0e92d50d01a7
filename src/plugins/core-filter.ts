import type { Plugin } from '../plugin-api';
import { caseId } from '../suite-graph';
import type { Suite, TestCase } from '../types';

export interface FilterOptions {
  tags?: string[];
  /** Case-insensitive pattern matched against `suite / case` */
  filter?: string;
}

function tagList(tags: string | string[] | undefined): string[] {
  if (!tags) return [];
  return (Array.isArray(tags) ? tags : [tags]).map((t) => t.toLowerCase());
}

function hasFocus(suite: Suite): boolean {
  return !!suite.focus || suite.tests.some((t) => t.focus) || (suite.suites ?? []).some(hasFocus);
}

/** Adds back the cases kept cases depend on, so the dependency graph stays closed. */
function withDependencies(kept: TestCase[], all: TestCase[]): TestCase[] {
  const byId = new Map(all.map((t) => [caseId(t), t]));
  const keep = new Set(kept.map(caseId));
  const queue = [...kept];
  while (queue.length > 0) {
    const test = queue.shift();
    (test?.dependsOn ?? []).forEach((dep) => {
      const found = byId.get(dep);
      if (found && !keep.has(dep)) {
        keep.add(dep);
        queue.push(found);
      }
    });
  }
  return all.filter((t) => keep.has(caseId(t)));
}

interface Scope {
  focused: boolean;
  inFocus: boolean;
  tags: string[];
  trail: string;
}

function filterSuite(suite: Suite, options: FilterOptions, scope: Scope): Suite | undefined {
  const inFocus = scope.inFocus || !!suite.focus;
  const tags = [...scope.tags, ...tagList(suite.tags)];
  const trail = scope.trail ? `${scope.trail} / ${suite.name}` : suite.name;
  const wanted = options.tags?.map((t) => t.toLowerCase()) ?? [];
  const pattern = options.filter ? new RegExp(options.filter, 'i') : undefined;

  const selected = suite.tests.filter((test) => {
    if (scope.focused && !inFocus && !test.focus) return false;
    if (wanted.length > 0 && ![...tags, ...tagList(test.tags)].some((t) => wanted.includes(t))) return false;
    if (pattern && !pattern.test(`${trail} / ${test.name}`)) return false;
    return true;
  });
  const tests = withDependencies(selected, suite.tests);
  const suites = (suite.suites ?? []).flatMap((child) => {
    const kept = filterSuite(child, options, { ...scope, inFocus, tags, trail });
    return kept ? [kept] : [];
  });

  if (selected.length === 0 && suites.length === 0) return undefined;
  return { ...suite, tests, suites };
}

/** Applies focus, tags and the name filter, then drops suites left empty. */
export function filterSuites(suites: Suite[], options: FilterOptions): Suite[] {
  const focused = suites.some(hasFocus);
  return suites.flatMap((suite) => {
    const kept = filterSuite(suite, options, { focused, inFocus: false, tags: [], trail: '' });
    return kept ? [kept] : [];
  });
}

export const coreFilterPlugin = (cfg: FilterOptions): Plugin => ({
  name: 'core-filter',
  setup(ctx) {
    ctx.onPrepare((suites) => filterSuites(suites, cfg));
  },
});
