import path from 'path';
import { z } from 'zod';
import { readDataFile } from '../data-file';
import { createEndpoints, endpointSchema, readPem } from '../endpoint';
import { ConfigError, zodIssues } from '../errors';
import { HostResolver } from '../resolver';
import type { Endpoint } from '../types';

export type ProxyMode = 'pass-through' | 'fanout';

export const DEFAULT_MAX_BODY_BYTES = 10 * 1024 * 1024;

export const proxyConfigSchema = z
  .object({
    mode: z.enum(['pass-through', 'fanout']).default('fanout'),
    targets: z.array(endpointSchema).min(1),
    record: z.boolean().default(false),
    recordFile: z.string().optional(),
    tls_cert: z.string().optional(),
    tls_key: z.string().optional(),
    port: z.number().int().min(0).max(65535).default(8545),
    host: z.string().default('127.0.0.1'),
    deadlineMs: z.number().int().positive().default(10000),
    /** Largest inbound body accepted, in bytes */
    maxBodyBytes: z.number().int().positive().default(DEFAULT_MAX_BODY_BYTES),
    ignoreFields: z.array(z.string()).default(['timestamp']),
    dns: z.record(z.union([z.string(), z.array(z.string())])).default({}),
    strictDns: z.boolean().default(false),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.mode === 'pass-through' && cfg.targets.length !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['targets'],
        message: `pass-through takes exactly one target, got ${cfg.targets.length}`,
      });
    }
    if (cfg.record && !cfg.recordFile) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['recordFile'],
        message: 'record needs a recordFile to append traffic to',
      });
    }
    if (!!cfg.tls_cert !== !!cfg.tls_key) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [cfg.tls_cert ? 'tls_key' : 'tls_cert'],
        message: 'tls_cert and tls_key must be given together',
      });
    }
  });

export type ProxyConfigInput = z.input<typeof proxyConfigSchema>;

export interface ProxySettings {
  mode: ProxyMode;
  targets: Endpoint[];
  record: boolean;
  recordFile?: string;
  tls?: { cert: string; key: string };
  port: number;
  host: string;
  deadlineMs: number;
  maxBodyBytes: number;
  ignoreFields: string[];
  resolver: HostResolver;
}

export function parseProxyConfig(input: unknown, baseDir = process.cwd()): ProxySettings {
  const parsed = proxyConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError('invalid proxy configuration', zodIssues(parsed.error));
  }
  const cfg = parsed.data;
  return {
    mode: cfg.mode,
    targets: createEndpoints(cfg.targets, baseDir),
    record: cfg.record,
    recordFile: cfg.recordFile ? path.resolve(baseDir, cfg.recordFile) : undefined,
    tls:
      cfg.tls_cert && cfg.tls_key
        ? { cert: readPem(cfg.tls_cert, baseDir, 'tls certificate'), key: readPem(cfg.tls_key, baseDir, 'tls key') }
        : undefined,
    port: cfg.port,
    host: cfg.host,
    deadlineMs: cfg.deadlineMs,
    maxBodyBytes: cfg.maxBodyBytes,
    ignoreFields: cfg.ignoreFields,
    resolver: new HostResolver(cfg.dns, { strict: cfg.strictDns }),
  };
}

/** Loads a JSON or YAML proxy config; file paths inside resolve against its directory. */
export async function loadProxyConfig(file: string, overrides: Record<string, unknown> = {}): Promise<ProxySettings> {
  const data = await readDataFile(file);
  if (!data || typeof data !== 'object' || Array.isArray(data)) {
    throw new ConfigError(`${file}: expected a mapping at the top level`);
  }
  return parseProxyConfig({ ...data, ...overrides }, path.dirname(path.resolve(file)));
}
