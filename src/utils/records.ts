export type UnknownRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Value of the first key present on `raw`. A present key wins even when its
 * value is null, so a later alias never overrides an explicit null.
 */
export function readField(raw: UnknownRecord, keys: readonly string[]): unknown {
  for (const key of keys) {
    if (key in raw) {
      return raw[key];
    }
  }
  return undefined;
}

export function toText(value: unknown): string | null {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

// Counters arrive as numbers, numeric strings ("1,204") or not at all
export function toCount(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : 0;
  }
  if (typeof value === 'string') {
    const parsed = Number(value.replace(/,/g, '').trim());
    return value.trim() !== '' && Number.isFinite(parsed) ? Math.trunc(parsed) : 0;
  }
  return 0;
}
