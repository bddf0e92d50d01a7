import { bindParams, type MethodSpec } from './openrpc';
import type { JsonValue, RpcParams, SuiteState, TestCase } from './types';

const WHOLE = /^\{\{\s*([\w.-]+)\s*\}\}$/;
const INLINE = /\{\{\s*([\w.-]+)\s*\}\}/g;

function lookup(state: Readonly<SuiteState>, key: string): JsonValue {
  const value = state[key];
  if (value === undefined) {
    throw new Error(`suite state has no value for {{${key}}}`);
  }
  return value;
}

/** Replaces `{{key}}` placeholders with values captured earlier in the suite run. */
export function interpolate(value: JsonValue, state: Readonly<SuiteState>): JsonValue {
  if (typeof value === 'string') {
    const whole = WHOLE.exec(value);
    if (whole) return lookup(state, whole[1]);
    return value.replace(INLINE, (_, key: string) => {
      const found = lookup(state, key);
      return typeof found === 'string' ? found : JSON.stringify(found);
    });
  }
  if (Array.isArray(value)) return value.map((v) => interpolate(v, state));
  if (value && typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, interpolate(v, state)]));
  }
  return value;
}

export function interpolateParams(params: RpcParams, state: Readonly<SuiteState>): RpcParams {
  if (Array.isArray(params)) return params.map((v) => interpolate(v, state));
  return Object.fromEntries(Object.entries(params).map(([k, v]) => [k, interpolate(v, state)]));
}

export async function resolveParams(
  test: TestCase,
  state: Readonly<SuiteState>,
  spec: MethodSpec | undefined
): Promise<RpcParams | undefined> {
  const raw = typeof test.params === 'function' ? await test.params(Object.freeze({ ...state })) : test.params;
  if (raw === undefined) return undefined;
  return bindParams(spec, interpolateParams(raw, state));
}
