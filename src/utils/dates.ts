/**
 * Date Utilities
 *
 * Calendar-day keys ("YYYY-MM-DD") and the consecutive-day streak.
 */

const DAY_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86400000;

/**
 * Day key for a moment in the local timezone.
 */
export function toDayKey(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Parse a day key to a day ordinal (days since epoch, UTC based so DST never
 * shifts the difference between two keys). Returns null for invalid keys.
 */
export function parseDayKey(key: string): number | null {
  const match = DAY_KEY_PATTERN.exec(key);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const time = Date.UTC(year, month - 1, day);

  // Reject rollovers like 2024-02-31
  const check = new Date(time);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day
  ) {
    return null;
  }

  return Math.round(time / MS_PER_DAY);
}

/**
 * Length of the run of consecutive calendar days ending at the latest
 * recorded day. The run ends at the latest recorded day, not at today.
 */
export function computeConsecutiveStreak(dayKeys: Iterable<string>): number {
  const ordinals = Array.from(
    new Set(
      Array.from(dayKeys)
        .map(parseDayKey)
        .filter((ordinal): ordinal is number => ordinal !== null)
    )
  ).sort((a, b) => a - b);

  if (ordinals.length === 0) return 0;

  let streak = 1;
  let current = ordinals[ordinals.length - 1];

  for (let i = ordinals.length - 2; i >= 0; i--) {
    const previous = ordinals[i];
    if (current - previous !== 1) break;
    streak++;
    current = previous;
  }

  return streak;
}
