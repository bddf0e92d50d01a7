import { readFile } from 'fs/promises';
import { load as parseYaml } from 'js-yaml';
import { fetch } from 'undici';
import { z } from 'zod';
import debugFactory from 'debug';
import { jsonValueSchema } from './data-file';
import { ConfigError, errorMessage, zodIssues } from './errors';
import type { JsonObject, JsonValue } from './types';

const debug = debugFactory('rpc-conform:openrpc');

export type SchemaObject = JsonObject;

export interface ParamSpec {
  readonly name: string;
  readonly required: boolean;
  readonly schema: SchemaObject;
  readonly default?: JsonValue;
}

export interface MethodSpec {
  readonly name: string;
  readonly params: readonly ParamSpec[];
  readonly paramStructure: 'by-name' | 'by-position' | 'either';
  readonly result?: SchemaObject;
  /** Declared error codes -> error name */
  readonly errors: ReadonlyMap<number, string>;
  /** Result paths that must never regress, from `x-monotonic` */
  readonly monotonic: readonly string[];
}

const jsonObject = z.record(jsonValueSchema);

const refSchema = z.object({ $ref: z.string() });

const contentDescriptorSchema = z
  .object({
    name: z.string(),
    required: z.boolean().optional(),
    schema: jsonObject,
  })
  .passthrough();

const errorSchema = z.object({ code: z.number().int(), message: z.string() }).passthrough();

const methodSchema = z
  .object({
    name: z.string().min(1),
    params: z.array(z.union([refSchema, contentDescriptorSchema])).default([]),
    result: z.union([refSchema, contentDescriptorSchema]).optional(),
    errors: z.array(z.union([refSchema, errorSchema])).default([]),
    paramStructure: z.enum(['by-name', 'by-position', 'either']).default('either'),
    'x-monotonic': z.array(z.string()).optional(),
  })
  .passthrough();

const documentSchema = z
  .object({
    openrpc: z.string(),
    methods: z.array(z.union([refSchema, methodSchema])),
    components: z
      .object({
        schemas: z.record(jsonObject).optional(),
        contentDescriptors: z.record(jsonObject).optional(),
        errors: z.record(jsonObject).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type OpenRpcDocument = z.infer<typeof documentSchema>;

function resolvePointer(doc: JsonValue, ref: string): JsonValue | undefined {
  if (!ref.startsWith('#/')) return undefined;
  let node: JsonValue | undefined = doc;
  for (const raw of ref.slice(2).split('/')) {
    const key = raw.replace(/~1/g, '/').replace(/~0/g, '~');
    if (!node || typeof node !== 'object') return undefined;
    node = Array.isArray(node) ? node[Number(key)] : node[key];
  }
  return node;
}

function refOf(value: unknown): string | undefined {
  if (!value || typeof value !== 'object' || !('$ref' in value)) return undefined;
  return typeof value.$ref === 'string' ? value.$ref : undefined;
}

function deref<T>(doc: JsonValue, value: unknown, parser: z.ZodType<T, z.ZodTypeDef, unknown>, where: string): T {
  const ref = refOf(value);
  const parsed = parser.safeParse(ref ? resolvePointer(doc, ref) : value);
  if (!parsed.success) {
    throw new ConfigError(`${where}: cannot resolve ${ref ?? 'inline definition'}`);
  }
  return parsed.data;
}

/** Read-only set of method specs loaded from one OpenRPC document. */
export class MethodRegistry {
  private readonly methods = new Map<string, MethodSpec>();

  constructor(
    public readonly document: OpenRpcDocument,
    specs: MethodSpec[]
  ) {
    specs.forEach((spec) => this.methods.set(spec.name, spec));
  }

  get(name: string): MethodSpec | undefined {
    return this.methods.get(name);
  }

  has(name: string): boolean {
    return this.methods.has(name);
  }

  names(): string[] {
    return [...this.methods.keys()];
  }

  all(): MethodSpec[] {
    return [...this.methods.values()];
  }
}

export function buildMethodRegistry(input: unknown): MethodRegistry {
  const parsed = documentSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError('invalid OpenRPC document', zodIssues(parsed.error));
  }
  const doc = parsed.data;
  const root = jsonValueSchema.parse(input);

  const specs = doc.methods.map((entry, index) => {
    const method = deref(root, entry, methodSchema, `methods[${index}]`);
    const params = method.params.map((p, i) => {
      const cd = deref(root, p, contentDescriptorSchema, `${method.name}.params[${i}]`);
      const spec: ParamSpec = {
        name: cd.name,
        required: cd.required === true,
        schema: cd.schema,
        default: cd.schema.default,
      };
      return Object.freeze(spec);
    });
    const result = method.result
      ? deref(root, method.result, contentDescriptorSchema, `${method.name}.result`).schema
      : undefined;
    const errors = new Map<number, string>();
    method.errors.forEach((e, i) => {
      const err = deref(root, e, errorSchema, `${method.name}.errors[${i}]`);
      const ref = refOf(e);
      errors.set(err.code, ref ? ref.slice(ref.lastIndexOf('/') + 1) : err.message);
    });
    const spec: MethodSpec = {
      name: method.name,
      params: Object.freeze(params),
      paramStructure: method.paramStructure,
      result,
      errors,
      monotonic: Object.freeze([...(method['x-monotonic'] ?? [])]),
    };
    return Object.freeze(spec);
  });

  const duplicates = specs.map((s) => s.name).filter((name, i, all) => all.indexOf(name) !== i);
  if (duplicates.length > 0) {
    throw new ConfigError('duplicate methods in OpenRPC document', duplicates);
  }

  debug('loaded %d methods (openrpc %s)', specs.length, doc.openrpc);
  return new MethodRegistry(doc, specs);
}

async function readSource(source: string): Promise<string> {
  if (/^https?:\/\//.test(source)) {
    const response = await fetch(source);
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }
    return response.text();
  }
  return readFile(source, 'utf8');
}

/** Loads an OpenRPC document from a file path (JSON or YAML) or an http(s) URL. */
export async function loadOpenRpc(source: string): Promise<MethodRegistry> {
  let raw: string;
  try {
    raw = await readSource(source);
  } catch (error) {
    throw new ConfigError(`cannot read OpenRPC document ${source}: ${errorMessage(error)}`);
  }
  let data: unknown;
  try {
    data = source.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
  } catch (error) {
    throw new ConfigError(`cannot parse OpenRPC document ${source}: ${errorMessage(error)}`);
  }
  return buildMethodRegistry(data);
}

/**
 * Orders named params by the method's declared sequence when the method takes
 * them by position, and fills declared defaults for missing trailing params.
 */
export function bindParams(
  spec: MethodSpec | undefined,
  params: JsonValue[] | JsonObject | undefined
): JsonValue[] | JsonObject | undefined {
  if (!spec || params === undefined) return params;
  if (Array.isArray(params)) {
    const bound = [...params];
    for (let i = bound.length; i < spec.params.length; i += 1) {
      const def = spec.params[i].default;
      if (def === undefined) break;
      bound.push(def);
    }
    return bound;
  }
  const named: JsonObject = { ...params };
  spec.params.forEach((p) => {
    if (named[p.name] === undefined && p.default !== undefined) named[p.name] = p.default;
  });
  if (spec.paramStructure !== 'by-position') return named;
  const positional: JsonValue[] = [];
  for (const p of spec.params) {
    if (named[p.name] === undefined) break;
    positional.push(named[p.name]);
  }
  return positional;
}
