import { readFile } from 'fs/promises';
import { load as parseYaml } from 'js-yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors';
import type { JsonValue } from './types';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.null(), z.boolean(), z.number(), z.string(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

/** Reads a JSON or YAML file; YAML is chosen by extension. */
export async function readDataFile(file: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(file, 'utf8');
  } catch (error) {
    throw new ConfigError(`cannot read ${file}: ${errorMessage(error)}`);
  }
  try {
    return file.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
  } catch (error) {
    throw new ConfigError(`cannot parse ${file}: ${errorMessage(error)}`);
  }
}
