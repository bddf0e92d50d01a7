import Ajv, { type ErrorObject, type SchemaObject as AjvSchema, type ValidateFunction } from 'ajv';
import debugFactory from 'debug';
import { ConfigError, errorMessage } from './errors';
import type { MethodRegistry, MethodSpec, SchemaObject } from './openrpc';
import type { Expectation, JsonValue, RpcResponse, Violation } from './types';

const debug = debugFactory('rpc-conform:validator');

/** Stark field prime, 2^251 + 17 * 2^192 + 1 */
export const FELT_PRIME = 2n ** 251n + 17n * 2n ** 192n + 1n;

const FELT_HEX = /^0x[0-9a-fA-F]{1,64}$/;

/** JSON-RPC reserved codes every method may answer with. */
export const RESERVED_ERROR_CODES: ReadonlySet<number> = new Set([-32700, -32600, -32601, -32602, -32603]);

const DOCUMENT_KEY = 'openrpc.json';

export function isFelt(value: string): boolean {
  return FELT_HEX.test(value) && BigInt(value) < FELT_PRIME;
}

export interface ValidationOutcome {
  valid: boolean;
  /** First violation found, if any */
  first?: Violation;
  /** Every violation in exhaustive mode, otherwise at most the first */
  violations: Violation[];
}

export interface ValidateOptions {
  exhaustive?: boolean;
  expect?: Expectation;
}

export interface ValidatorOptions {
  /** Component schemas that carry field elements and get the `felt` format */
  feltSchemas?: string[];
}

export function normalizeExpectation(expect: Expectation | Expectation['type'] | undefined): Expectation {
  if (!expect) return { type: 'result' };
  if (typeof expect === 'string') return { type: expect };
  return expect;
}

export function jsonType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number' && Number.isInteger(value)) return 'integer';
  return typeof value;
}

function preview(value: unknown): string {
  const text = JSON.stringify(value) ?? String(value);
  return text.length > 80 ? `${text.slice(0, 77)}...` : text;
}

/** `/transactions/0/hash` -> `result.transactions[0].hash` */
export function toDottedPath(root: string, pointer: string): string {
  if (!pointer) return root;
  return pointer
    .split('/')
    .slice(1)
    .map((raw) => raw.replace(/~1/g, '/').replace(/~0/g, '~'))
    .reduce((acc, key) => (/^\d+$/.test(key) ? `${acc}[${key}]` : `${acc}.${key}`), root);
}

function rewriteRefs(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return value.map(rewriteRefs);
  if (!value || typeof value !== 'object') return value;
  return rewriteSchema(value);
}

/** Points document-local `$ref`s at the registered components. */
function rewriteSchema(schema: SchemaObject): AjvSchema {
  const out: AjvSchema = {};
  Object.entries(schema).forEach(([key, value]) => {
    out[key] = key === '$ref' && typeof value === 'string' && value.startsWith('#/')
      ? `${DOCUMENT_KEY}${value}`
      : rewriteRefs(value);
  });
  return out;
}

function toViolation(error: ErrorObject): Violation {
  const path = toDottedPath('result', error.instancePath);
  switch (error.keyword) {
    case 'required': {
      const missing = String(error.params.missingProperty);
      return {
        kind: 'schema',
        path: `${path}.${missing}`,
        message: 'missing required field',
        expected: 'present',
        actual: 'absent',
      };
    }
    case 'type':
      return {
        kind: 'schema',
        path,
        message: `must be ${String(error.params.type)}`,
        expected: String(error.params.type),
        actual: jsonType(error.data),
      };
    case 'pattern':
      return {
        kind: 'schema',
        path,
        message: 'does not match the declared pattern',
        expected: String(error.params.pattern),
        actual: preview(error.data),
      };
    case 'format':
      return {
        kind: 'schema',
        path,
        message: `is not a valid ${String(error.params.format)}`,
        expected: String(error.params.format),
        actual: preview(error.data),
      };
    default:
      return {
        kind: 'schema',
        path,
        message: error.message ?? `fails ${error.keyword}`,
        actual: preview(error.data),
      };
  }
}

/**
 * Checks JSON-RPC responses against the result schemas and declared error
 * codes of an OpenRPC document. Stateless: the same response always yields the
 * same outcome.
 */
export class SchemaValidator {
  private readonly ajv: Ajv;
  private readonly compiled = new Map<string, ValidateFunction>();

  constructor(
    registry: MethodRegistry,
    options: ValidatorOptions = {}
  ) {
    this.ajv = new Ajv({ allErrors: true, strict: false, verbose: true });
    this.ajv.addFormat('felt', { type: 'string', validate: isFelt });

    const feltSchemas = options.feltSchemas ?? ['FELT'];
    const schemas: Record<string, JsonValue> = { ...(registry.document.components?.schemas ?? {}) };
    feltSchemas.forEach((name) => {
      const schema = schemas[name];
      if (schema && typeof schema === 'object' && !Array.isArray(schema)) {
        schemas[name] = { ...schema, format: 'felt' };
      }
    });
    this.ajv.addSchema({ components: { schemas } }, DOCUMENT_KEY);

    const issues: string[] = [];
    registry.all().forEach((spec) => {
      if (!spec.result) return;
      try {
        this.compiled.set(spec.name, this.ajv.compile(rewriteSchema(spec.result)));
      } catch (error) {
        issues.push(`${spec.name}: ${errorMessage(error)}`);
      }
    });
    if (issues.length > 0) {
      throw new ConfigError('cannot compile result schemas', issues);
    }
    debug('compiled %d result schemas', this.compiled.size);
  }

  /** Validates a bare value against an ad-hoc schema that may reference document components. */
  public check(schema: SchemaObject, value: JsonValue, root = 'value'): Violation[] {
    const validate = this.ajv.compile(rewriteSchema(schema));
    if (validate(value)) return [];
    return (validate.errors ?? []).map((e) => ({ ...toViolation(e), path: toDottedPath(root, e.instancePath) }));
  }

  public validate(spec: MethodSpec | undefined, response: RpcResponse, options: ValidateOptions = {}): ValidationOutcome {
    const expect = options.expect ?? { type: 'result' };
    const violations = this.collect(spec, response, expect);
    const kept = options.exhaustive ? violations : violations.slice(0, 1);
    return { valid: violations.length === 0, first: violations[0], violations: kept };
  }

  private collect(spec: MethodSpec | undefined, response: RpcResponse, expect: Expectation): Violation[] {
    const method = spec?.name ?? 'unknown method';
    if (response.jsonrpc !== '2.0') {
      return [{ kind: 'schema', path: 'jsonrpc', message: 'must be "2.0"', expected: '"2.0"', actual: preview(response.jsonrpc) }];
    }

    if (response.error !== undefined) {
      const { error } = response;
      const violations: Violation[] = [];
      if (!Number.isInteger(error.code)) {
        violations.push({ kind: 'schema', path: 'error.code', message: 'must be integer', expected: 'integer', actual: jsonType(error.code) });
      }
      if (typeof error.message !== 'string') {
        violations.push({ kind: 'schema', path: 'error.message', message: 'must be string', expected: 'string', actual: jsonType(error.message) });
      }
      if (expect.type === 'result') {
        violations.push({
          kind: 'semantic',
          path: 'error',
          message: `expected a result, got error ${error.code}: ${error.message}`,
          expected: 'result',
          actual: `error ${error.code}`,
        });
        return violations;
      }
      const declared = spec?.errors ?? new Map<number, string>();
      if (expect.type === 'error' && expect.code !== undefined && expect.code !== error.code) {
        violations.push({
          kind: 'semantic',
          path: 'error.code',
          message: `expected error code ${expect.code}`,
          expected: String(expect.code),
          actual: String(error.code),
        });
      }
      if (!declared.has(error.code) && !RESERVED_ERROR_CODES.has(error.code)) {
        violations.push({
          kind: 'semantic',
          path: 'error.code',
          message: `${error.code} is not a declared error of ${method}`,
          expected: [...declared.keys()].join('|') || 'reserved JSON-RPC codes',
          actual: String(error.code),
        });
      }
      return violations;
    }

    if (response.result === undefined) {
      return [{ kind: 'schema', path: 'result', message: 'response has neither result nor error', expected: 'result', actual: 'absent' }];
    }

    if (expect.type === 'error') {
      const code = expect.code !== undefined ? ` ${expect.code}` : '';
      return [{
        kind: 'semantic',
        path: 'result',
        message: `expected error${code}, got a result`,
        expected: `error${code}`,
        actual: 'result',
      }];
    }

    const validate = spec ? this.compiled.get(spec.name) : undefined;
    if (!validate || validate(response.result)) return [];
    return (validate.errors ?? []).map(toViolation);
  }
}

export function describeViolation(v: Violation): string {
  const detail = v.expected !== undefined || v.actual !== undefined
    ? ` (expected ${v.expected ?? '?'}, got ${v.actual ?? '?'})`
    : '';
  return `${v.path}: ${v.message}${detail}`;
}
