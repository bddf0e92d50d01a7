import { existsSync } from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import defaultConfig from './default.config';
import { readDataFile } from './data-file';
import { endpointSchema, parseTargetList, type EndpointInput } from './endpoint';
import { ConfigError, zodIssues } from './errors';

const PROJECT_CONFIG_FILES = ['rpc-conform.config.json', 'rpc-conform.config.yaml', 'rpc-conform.config.yml'];

const BOOLEAN_FLAGS = new Set(['exhaustive', 'verbose']);

const monotonicRuleSchema = z.object({
  method: z.string().min(1),
  path: z.string(),
  key: z.string().optional(),
});

export const runConfigSchema = z.object({
  configFile: z.string().optional(),
  /** OpenRPC document: file path or http(s) URL */
  spec: z.string().min(1),
  targets: z.array(endpointSchema),
  dns: z.record(z.union([z.string(), z.array(z.string())])),
  strictDns: z.boolean(),
  suiteDir: z.string(),
  filePattern: z.string(),
  suiteFile: z.string().optional(),
  tags: z.array(z.string()),
  filter: z.string().optional(),
  concurrency: z.number().int().positive(),
  /** Requests per second per target; 0 means unlimited */
  rps: z.number().min(0),
  timeout: z.number().int().positive(),
  /** Transport attempts per call, including the first */
  retries: z.number().int().min(1),
  caseRetries: z.number().int().min(0),
  report: z.string().optional(),
  exhaustive: z.boolean(),
  divergence: z.enum(['fail', 'record']),
  verbose: z.boolean(),
  feltSchemas: z.array(z.string()),
  monotonic: z.array(monotonicRuleSchema),
  projectRoot: z.string(),
});

export type RunConfig = z.infer<typeof runConfigSchema>;

export interface CliConfig {
  configFile?: string;
  spec?: string;
  targets?: EndpointInput[];
  suiteDir?: string;
  filePattern?: string;
  suiteFile?: string;
  tags?: string[];
  filter?: string;
  concurrency?: number;
  rps?: number;
  timeout?: number;
  retries?: number;
  caseRetries?: number;
  report?: string;
  exhaustive?: boolean;
  divergence?: string;
  verbose?: boolean;
}

function toNumber(key: string, value: string | undefined): number {
  const n = Number(value);
  if (value === undefined || value === '' || Number.isNaN(n)) {
    throw new ConfigError(`--${key} expects a number, got ${value ?? 'nothing'}`);
  }
  return n;
}

export function parseArgs(argv: string[]): CliConfig {
  const args = argv.slice(2);
  const raw: CliConfig = {};
  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      const key = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
      let value = eq === -1 ? undefined : arg.slice(eq + 1);
      if (value === undefined) {
        const next = args[i + 1];
        const takesValue = !BOOLEAN_FLAGS.has(key) || next === 'true' || next === 'false';
        if (next && takesValue && !next.startsWith('--')) {
          value = next;
          i += 1;
        }
      }
      switch (key) {
        case 'config':
          raw.configFile = value;
          break;
        case 'spec':
          raw.spec = value;
          break;
        case 'target':
          raw.targets = [...(raw.targets ?? []), ...parseTargetList(value ?? '')];
          break;
        case 'suite-dir':
          raw.suiteDir = value;
          break;
        case 'file-pattern':
          raw.filePattern = value;
          break;
        case 'tags':
          raw.tags = value ? value.split(',').map((t) => t.trim()).filter(Boolean) : [];
          break;
        case 'filter':
          raw.filter = value;
          break;
        case 'concurrency':
          raw.concurrency = toNumber(key, value);
          break;
        case 'rps':
          raw.rps = toNumber(key, value);
          break;
        case 'timeout':
          raw.timeout = toNumber(key, value);
          break;
        case 'retries':
          raw.retries = toNumber(key, value);
          break;
        case 'case-retries':
          raw.caseRetries = toNumber(key, value);
          break;
        case 'report':
          raw.report = value;
          break;
        case 'exhaustive':
          raw.exhaustive = value !== 'false';
          break;
        case 'divergence':
          raw.divergence = value;
          break;
        case 'verbose':
          raw.verbose = value !== 'false';
          break;
        default:
          throw new ConfigError(`unknown option --${key}`);
      }
    } else if (!raw.suiteFile) {
      raw.suiteFile = arg;
    } else {
      throw new ConfigError(`unexpected argument ${arg}`);
    }
    i += 1;
  }

  return raw;
}

async function readConfigFile(file: string): Promise<Record<string, unknown>> {
  const data = await readDataFile(file);
  if (!data || typeof data !== 'object' || Array.isArray(data)) {
    throw new ConfigError(`${file}: expected a mapping at the top level`);
  }
  return Object.fromEntries(Object.entries(data));
}

/** Settings taken from the environment (and `.env`). */
export function envConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const cfg: Record<string, unknown> = {};
  if (env.OPENRPC_SPEC) cfg.spec = env.OPENRPC_SPEC;
  if (env.RPC_TARGETS) cfg.targets = parseTargetList(env.RPC_TARGETS);
  return cfg;
}

/**
 * Merges defaults < project config file < `--config` file < environment <
 * command line, and validates the result.
 */
export async function loadConfig(argv = process.argv, projectRoot = process.cwd()): Promise<RunConfig> {
  dotenv.config({ path: path.join(projectRoot, '.env') });
  const cliOpts = parseArgs(argv);
  // first load default config.
  let cfg: Record<string, unknown> = { ...defaultConfig };

  // then load project config.
  const projectFile = PROJECT_CONFIG_FILES.map((f) => path.join(projectRoot, f)).find((f) => existsSync(f));
  if (projectFile) {
    cfg = { ...cfg, ...(await readConfigFile(projectFile)) };
  }

  // then load invocation-time config.
  if (cliOpts.configFile) {
    cfg = { ...cfg, ...(await readConfigFile(path.resolve(projectRoot, cliOpts.configFile))) };
  }

  // then the environment, then cli options over everything.
  const given = Object.fromEntries(Object.entries(cliOpts).filter(([, value]) => value !== undefined));
  cfg = { ...cfg, ...envConfig(), ...given, projectRoot };

  const parsed = runConfigSchema.safeParse(cfg);
  if (!parsed.success) {
    throw new ConfigError('invalid configuration', zodIssues(parsed.error));
  }
  return parsed.data;
}
