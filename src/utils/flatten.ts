/**
 * Flat key/value serialization for records handed to collaborators.
 * Nested keys are dot-joined, array items indexed, dates ISO-8601.
 */

export type FlatValue = string | number | boolean | null;
export type FlatRecord = Record<string, FlatValue>;

export function flattenRecord(value: object): FlatRecord {
  const out: FlatRecord = {};
  flattenInto(out, '', value);
  return out;
}

function flattenInto(out: FlatRecord, prefix: string, value: unknown): void {
  if (value === undefined) return;

  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    out[prefix] = value;
    return;
  }

  if (value instanceof Date) {
    out[prefix] = value.toISOString();
    return;
  }

  if (Array.isArray(value)) {
    if (value.length === 0 && prefix) {
      out[prefix] = null;
      return;
    }
    value.forEach((item, index) => flattenInto(out, join(prefix, String(index)), item));
    return;
  }

  if (typeof value === 'object') {
    const entries = Object.entries(value);
    if (entries.length === 0 && prefix) {
      out[prefix] = null;
      return;
    }
    for (const [key, child] of entries) {
      flattenInto(out, join(prefix, key), child);
    }
  }
}

function join(prefix: string, key: string): string {
  return prefix ? `${prefix}.${key}` : key;
}
