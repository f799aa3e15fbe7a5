/**
 * Formatting Utilities
 */

/**
 * Format seconds as MM:SS (minutes are not wrapped at 60).
 */
export function formatClock(totalSeconds: number): string {
  const safe = Math.max(0, Math.floor(totalSeconds));
  const minutes = Math.floor(safe / 60);
  const seconds = safe % 60;
  return `${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}

const TURKISH_FOLDS: Record<string, string> = {
  ü: 'u',
  ç: 'c',
  ş: 's',
  ğ: 'g',
  ı: 'i',
  ö: 'o',
};

/**
 * Lowercase and fold Turkish letters to their ASCII base (İ/I both become i).
 */
export function foldText(text: string): string {
  return text
    .replace(/İ/g, 'i')
    .toLowerCase()
    .replace(/[üçşğıö]/g, (ch) => TURKISH_FOLDS[ch] ?? ch)
    .trim();
}

/**
 * Percentage (0-100) of current toward target, floored and capped.
 */
export function toPercentage(current: number, target: number): number {
  if (target <= 0) return 100;
  return Math.min(100, Math.max(0, Math.floor((current / target) * 100)));
}
