import type { MethodSpec } from './openrpc';
import type { JsonValue, Violation } from './types';

export interface MonotonicRule {
  method: string;
  /** Dotted path into the result; empty for the result itself */
  path: string;
  /** Rules sharing a key are compared with each other */
  key?: string;
}

export const DEFAULT_MONOTONIC_RULES: MonotonicRule[] = [
  { method: 'starknet_blockNumber', path: '', key: 'block_number' },
  { method: 'starknet_blockHashAndNumber', path: 'block_number', key: 'block_number' },
];

export function readPath(value: JsonValue | undefined, path: string): JsonValue | undefined {
  if (!path) return value;
  let node = value;
  for (const key of path.split('.')) {
    if (node === null || node === undefined || typeof node !== 'object') return undefined;
    node = Array.isArray(node) ? node[Number(key)] : node[key];
  }
  return node;
}

function toBigInt(value: JsonValue | undefined): bigint | undefined {
  if (typeof value === 'number' && Number.isInteger(value)) return BigInt(value);
  if (typeof value === 'string' && /^(0x[0-9a-fA-F]+|\d+)$/.test(value)) return BigInt(value);
  return undefined;
}

/**
 * Remembers the last value of every monotonic field per target and flags a
 * value lower than one seen before. One tracker lives for one suite run.
 */
export class MonotonicTracker {
  private readonly seen = new Map<string, { value: bigint; method: string }>();
  private readonly rules: MonotonicRule[];

  constructor(rules: MonotonicRule[] = DEFAULT_MONOTONIC_RULES) {
    this.rules = rules;
  }

  rulesFor(spec: MethodSpec | undefined, method: string): MonotonicRule[] {
    const declared = (spec?.monotonic ?? []).map((path) => ({ method, path }));
    return [...this.rules.filter((r) => r.method === method), ...declared];
  }

  observe(target: string, spec: MethodSpec | undefined, method: string, result: JsonValue | undefined): Violation[] {
    const violations: Violation[] = [];
    this.rulesFor(spec, method).forEach((rule) => {
      const value = toBigInt(readPath(result, rule.path));
      if (value === undefined) return;
      const key = `${target}::${rule.key ?? `${rule.method}.${rule.path}`}`;
      const previous = this.seen.get(key);
      if (previous && value < previous.value) {
        violations.push({
          kind: 'semantic',
          path: rule.path ? `result.${rule.path}` : 'result',
          message: `regressed below the value ${previous.method} returned earlier`,
          expected: `>= ${previous.value}`,
          actual: String(value),
        });
        return;
      }
      this.seen.set(key, { value, method });
    });
    return violations;
  }
}
