/**
 * Validation Utilities
 *
 * Type guards and sanitizers for persisted data. Storage contents can be
 * stale, hand-edited or truncated, so every field is checked on load.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Non-negative integer or the fallback.
 */
export function toCount(value: unknown, fallback = 0): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.max(0, Math.floor(value));
}

/**
 * Finite timestamp (ms) or undefined.
 */
export function toTimestamp(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Deduplicated strings from an unknown array (non-strings dropped, order kept).
 */
export function toUniqueStrings(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  const seen = new Set<string>();
  for (const item of value) {
    if (typeof item === 'string') seen.add(item);
  }
  return Array.from(seen);
}
