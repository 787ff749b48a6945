export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function asNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * String field with a fallback. Numbers are rendered as-is, anything else falls back.
 */
export function readString(record: Record<string, unknown>, key: string, fallback: string): string {
  const value = record[key];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }

  return asString(value) ?? fallback;
}

/**
 * Two-level lookup such as `company.display_name`. Missing parent, non-object parent and
 * missing child all resolve to the fallback.
 */
export function readNested(record: Record<string, unknown>, parent: string, key: string, fallback: string): string {
  const container = record[parent];
  if (!isRecord(container)) {
    return fallback;
  }

  return readString(container, key, fallback);
}

/**
 * Salary-style amount: present only when it is a finite number greater than zero.
 */
export function readAmount(record: Record<string, unknown>, key: string): number | undefined {
  const value = asNumber(record[key]);
  return value !== undefined && value > 0 ? value : undefined;
}
