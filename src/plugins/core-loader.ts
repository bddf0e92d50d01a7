import path from 'path';
import { pathToFileURL } from 'url';
import { z } from 'zod';
import { jsonValueSchema, readDataFile } from '../data-file';
import { ConfigError, zodIssues } from '../errors';
import type { Plugin } from '../plugin-api';
import type { Expectation, FixtureSpec, RpcParams, Suite, TestCase } from '../types';

export const SUITE_FILE = /\.suite\.(js|ts|mjs|cjs|json|yaml|yml)$/;

interface CaseData {
  name: string;
  id?: string;
  method: string;
  params?: RpcParams;
  expect?: Expectation | Expectation['type'];
  optional?: boolean;
  dependsOn?: string[];
  capture?: Record<string, string>;
  tags?: string | string[];
  skip?: boolean;
  focus?: boolean;
  timeout?: number;
  retries?: number;
  delay?: number;
}

interface SuiteData {
  name?: string;
  tests?: CaseData[];
  suites?: SuiteData[];
  setup?: CaseData[];
  teardown?: CaseData[];
  fixtures?: FixtureSpec[];
  optional?: boolean;
  targets?: string[];
  timeout?: number;
  tags?: string | string[];
  focus?: boolean;
}

const tagsSchema = z.union([z.string(), z.array(z.string())]);

const expectSchema = z.union([
  z.enum(['result', 'error', 'any']),
  z.object({ type: z.literal('result') }),
  z.object({ type: z.literal('error'), code: z.number().int().optional() }),
  z.object({ type: z.literal('any') }),
]);

const caseSchema: z.ZodType<CaseData> = z
  .object({
    name: z.string().min(1),
    id: z.string().min(1).optional(),
    method: z.string().min(1),
    params: z.union([z.array(jsonValueSchema), z.record(jsonValueSchema)]).optional(),
    expect: expectSchema.optional(),
    optional: z.boolean().optional(),
    dependsOn: z.array(z.string()).optional(),
    capture: z.record(z.string()).optional(),
    tags: tagsSchema.optional(),
    skip: z.boolean().optional(),
    focus: z.boolean().optional(),
    timeout: z.number().int().positive().optional(),
    retries: z.number().int().min(0).optional(),
    delay: z.number().int().min(0).optional(),
  })
  .strict();

const fixtureSchema: z.ZodType<FixtureSpec> = z
  .object({
    name: z.string().min(1),
    command: z.string().min(1),
    args: z.array(z.string()).optional(),
    input: jsonValueSchema.optional(),
    outputFile: z.string().optional(),
    timeout: z.number().int().positive().optional(),
  })
  .strict();

const suiteSchema: z.ZodType<SuiteData> = z.lazy(() =>
  z
    .object({
      name: z.string().min(1).optional(),
      tests: z.array(caseSchema).optional(),
      suites: z.array(suiteSchema).optional(),
      setup: z.array(caseSchema).optional(),
      teardown: z.array(caseSchema).optional(),
      fixtures: z.array(fixtureSchema).optional(),
      optional: z.boolean().optional(),
      targets: z.array(z.string()).optional(),
      timeout: z.number().int().positive().optional(),
      tags: tagsSchema.optional(),
      focus: z.boolean().optional(),
    })
    .strict()
);

const suiteFileSchema = z.union([z.array(caseSchema), suiteSchema]);

function toSuite(data: SuiteData, fallbackName: string, loadPath: string): Suite {
  const name = data.name ?? fallbackName;
  return {
    ...data,
    name,
    tests: data.tests ?? [],
    suites: data.suites?.map((child, i) => toSuite(child, `${name} #${i + 1}`, loadPath)),
    loadPath,
  };
}

function isTestCase(value: unknown): value is TestCase {
  return (
    !!value &&
    typeof value === 'object' &&
    'name' in value &&
    typeof value.name === 'string' &&
    'method' in value &&
    typeof value.method === 'string'
  );
}

function isSuite(value: unknown): value is Suite {
  return (
    !!value &&
    typeof value === 'object' &&
    'tests' in value &&
    Array.isArray(value.tests) &&
    value.tests.every(isTestCase)
  );
}

function suiteName(filePath: string): string {
  return path.basename(filePath).replace(SUITE_FILE, '');
}

/** Loads one suite file: data files are validated, modules export a suite or a case list. */
export async function loadSuiteFile(filePath: string): Promise<Suite> {
  const fallback = suiteName(filePath);
  if (/\.(json|ya?ml)$/.test(filePath)) {
    const parsed = suiteFileSchema.safeParse(await readDataFile(filePath));
    if (!parsed.success) {
      throw new ConfigError(`invalid suite file ${filePath}`, zodIssues(parsed.error));
    }
    const data = parsed.data;
    return Array.isArray(data) ? { name: fallback, tests: data, loadPath: filePath } : toSuite(data, fallback, filePath);
  }

  const mod: unknown = await import(pathToFileURL(path.resolve(filePath)).href);
  const exported = mod && typeof mod === 'object' && 'default' in mod ? mod.default : mod;
  if (Array.isArray(exported) && exported.every(isTestCase)) {
    return { name: fallback, tests: exported, loadPath: filePath };
  }
  if (isSuite(exported)) {
    return { ...exported, name: exported.name || fallback, loadPath: filePath };
  }
  throw new ConfigError(`${filePath} must export a suite or a list of cases`);
}

export const coreLoaderPlugin: Plugin = {
  name: 'core-loader',
  setup(ctx) {
    ctx.onLoad({ filter: SUITE_FILE }, async ({ path: filePath }) => {
      const suite = await loadSuiteFile(filePath);
      return { suites: [suite] };
    });
  },
};
