/**
 * Canonical cache keys: `<operation>|<stable JSON of params>`.
 *
 * Object keys are sorted at every depth and `undefined` members are dropped, so
 * logically identical parameter sets map to the same key regardless of order.
 */

export type CacheParams = Record<string, unknown>;

const SEPARATOR = '|';

export function cacheKey(operation: string, params: CacheParams = {}): string {
  return `${operation}${SEPARATOR}${stableStringify(params)}`;
}

/** Prefix matching every key of one operation family. */
export function operationPrefix(operation: string): string {
  return `${operation}${SEPARATOR}`;
}

export function stableStringify(value: unknown): string {
  return JSON.stringify(normalize(value)) ?? 'null';
}

function normalize(value: unknown): unknown {
  if (value === null || value === undefined) {
    return null;
  }
  if (Array.isArray(value)) {
    return value.map((item) => normalize(item));
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  switch (typeof value) {
    case 'bigint':
      return value.toString();
    case 'number':
      return Number.isFinite(value) ? value : String(value);
    case 'object': {
      const out: Record<string, unknown> = {};
      for (const key of Object.keys(value).sort()) {
        const member: unknown = Reflect.get(value, key);
        if (member !== undefined) {
          out[key] = normalize(member);
        }
      }
      return out;
    }
    case 'function':
    case 'symbol':
      return null;
    default:
      return value;
  }
}
