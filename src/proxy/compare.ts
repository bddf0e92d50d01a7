import type { JsonValue, RpcResponse } from '../types';

function isObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

/** JSON with object keys sorted, so equal values stringify equally. */
export const stableStringify = (value: JsonValue): string => {
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(',')}]`;
  if (isObject(value)) {
    const body = Object.keys(value)
      .sort((a, b) => a.localeCompare(b))
      .map((key) => `${JSON.stringify(key)}:${stableStringify(value[key])}`);
    return `{${body.join(',')}}`;
  }
  return JSON.stringify(value);
};

/** Drops every key named in `fields`, at any depth. */
export function stripFields(value: JsonValue, fields: ReadonlySet<string>): JsonValue {
  if (Array.isArray(value)) return value.map((v) => stripFields(v, fields));
  if (isObject(value)) {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([key]) => !fields.has(key))
        .map(([key, v]) => [key, stripFields(v, fields)])
    );
  }
  return value;
}

/** Comparison key of a response: its result or error, never its id. */
export function responseKey(response: RpcResponse, ignoreFields: ReadonlySet<string>): string {
  const payload: JsonValue = response.error
    ? { error: { code: response.error.code, message: response.error.message, data: response.error.data ?? null } }
    : { result: response.result ?? null };
  return stableStringify(stripFields(payload, ignoreFields));
}

export interface Agreement {
  /** Targets in the majority group */
  agreeing: string[];
  /** Targets whose answer differs from the majority */
  divergent: string[];
}

/**
 * Groups answers by comparison key. The largest group is the reference; on a
 * tie the group holding the earliest target (in configured order) wins.
 */
export function compareResponses(
  answers: readonly { target: string; response: RpcResponse }[],
  ignoreFields: readonly string[] = []
): Agreement {
  const ignored = new Set(ignoreFields);
  const groups = new Map<string, string[]>();
  answers.forEach(({ target, response }) => {
    const key = responseKey(response, ignored);
    const group = groups.get(key);
    if (group) {
      group.push(target);
    } else {
      groups.set(key, [target]);
    }
  });

  let reference: string[] = [];
  groups.forEach((group) => {
    if (group.length > reference.length) reference = group;
  });
  const agreeing = new Set(reference);
  return {
    agreeing: reference,
    divergent: answers.map((a) => a.target).filter((target) => !agreeing.has(target)),
  };
}
