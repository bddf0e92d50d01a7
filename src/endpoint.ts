import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors';
import type { Endpoint } from './types';

export const endpointSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  /** Paths to PEM files, resolved against the config file directory */
  ca: z.string().optional(),
  cert: z.string().optional(),
  key: z.string().optional(),
  rejectUnauthorized: z.boolean().optional(),
  headers: z.record(z.string()).optional(),
});

export type EndpointInput = z.infer<typeof endpointSchema>;

export function readPem(file: string, baseDir: string, label: string): string {
  try {
    return readFileSync(path.resolve(baseDir, file), 'utf8');
  } catch (error) {
    throw new ConfigError(`cannot read ${label} ${file}: ${errorMessage(error)}`);
  }
}

const readOptionalPem = (file: string | undefined, baseDir: string, label: string): string | undefined =>
  file ? readPem(file, baseDir, label) : undefined;

export function createEndpoint(input: EndpointInput, baseDir = process.cwd()): Endpoint {
  const url = new URL(input.url);
  const scheme = url.protocol.replace(/:$/, '');
  if (scheme !== 'http' && scheme !== 'https') {
    throw new ConfigError(`endpoint ${input.name} must use http or https, got ${url.protocol}`);
  }
  const endpoint: Endpoint = {
    name: input.name,
    url: url.toString(),
    scheme,
    ca: readOptionalPem(input.ca, baseDir, 'ca bundle'),
    cert: readOptionalPem(input.cert, baseDir, 'client certificate'),
    key: readOptionalPem(input.key, baseDir, 'client key'),
    rejectUnauthorized: input.rejectUnauthorized,
    headers: input.headers ? Object.freeze({ ...input.headers }) : undefined,
  };
  return Object.freeze(endpoint);
}

/** Parses `name=url` pairs as given on the command line or in `RPC_TARGETS`. */
export function parseTargetList(value: string): EndpointInput[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean)
    .map((entry) => {
      const eq = entry.indexOf('=');
      if (eq <= 0) {
        throw new ConfigError(`target "${entry}" must look like name=url`);
      }
      return { name: entry.slice(0, eq), url: entry.slice(eq + 1) };
    });
}

export function createEndpoints(inputs: EndpointInput[], baseDir?: string): Endpoint[] {
  const seen = new Set<string>();
  return inputs.map((input) => {
    if (seen.has(input.name)) {
      throw new ConfigError(`duplicate target name ${input.name}`);
    }
    seen.add(input.name);
    return createEndpoint(input, baseDir);
  });
}
