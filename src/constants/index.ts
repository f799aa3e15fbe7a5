/**
 * Constants - Storage keys, schema versions and tunables
 */

// Persistence keys
export const STORAGE_KEYS = {
  achievements: 'dessertpassport_achievements',
  stats: 'dessertpassport_stats',
  favorites: 'dessertpassport_favorites',
} as const;

export type StorageKeys = { [K in keyof typeof STORAGE_KEYS]: string };

/** Current schema versions for migration safety */
export const ACHIEVEMENTS_SCHEMA_VERSION = 1;
export const STATS_SCHEMA_VERSION = 1;

// Local notification shown on unlock
export const UNLOCK_NOTIFICATION = {
  TITLE: 'Achievement Unlocked!',
  DELAY_MS: 1000,
} as const;

// Cooking timer
export const TIMER = {
  TICK_MS: 1000,
  OPTIONS_MINUTES: [1, 5, 10, 15, 20, 30, 45, 60, 90, 120],
  DEFAULT_MINUTES: 5,
} as const;

// Calorie calculator
export const CALORIES = {
  DEFAULT_PER_SERVING: 300,
  DEFAULT_PORTION_GRAMS: 100,
  PORTION_STEP: 0.5,
  MIN_PORTIONS: 0.5,
  MAX_PORTIONS: 10,
} as const;

// Search filters
export const SEARCH = {
  DEFAULT_MAX_COOKING_TIME: 120,
} as const;
