/**
 * Achievement Storage
 *
 * Persistence of achievement records and user stats through a
 * KeyValueStore. Loads never throw: anything unreadable falls back to
 * defaults.
 */

import { ACHIEVEMENTS_SCHEMA_VERSION, STATS_SCHEMA_VERSION } from '../../constants';
import { readJson, writeJson } from '../storage/keyValueStore';
import type { KeyValueStore } from '../storage/keyValueStore';
import { createDefaultStats } from '../stats/statsStore';
import type { SerializedUserStatistics, UserStatistics } from '../stats/types';
import { isRecord, toCount, toTimestamp, toUniqueStrings } from '../../utils/validation';
import { isAchievementCategory } from './definitions';
import type {
  AchievementDefinition,
  AchievementRecord,
  SerializedAchievementRecord,
  SerializedAchievementsState,
} from './types';

const TAG = 'achievements/storage';

// === Records ===

export function createDefaultRecords(
  definitions: readonly AchievementDefinition[]
): AchievementRecord[] {
  return definitions.map((definition) => ({
    category: definition.category,
    progress: 0,
    unlocked: false,
  }));
}

function parseRecord(raw: unknown): AchievementRecord | null {
  if (!isRecord(raw) || !isAchievementCategory(raw.category)) {
    return null;
  }

  const unlocked = raw.unlocked === true;
  const record: AchievementRecord = {
    category: raw.category,
    progress: toCount(raw.progress),
    unlocked,
  };
  const unlockedAt = unlocked ? toTimestamp(raw.unlockedAt) : undefined;
  if (unlockedAt !== undefined) {
    record.unlockedAt = unlockedAt;
  }
  return record;
}

/**
 * Catalog definitions decide which records exist; persisted entries only
 * contribute progress/unlocked/unlockedAt. Unknown categories are dropped.
 */
export function mergeRecords(
  definitions: readonly AchievementDefinition[],
  persisted: readonly AchievementRecord[]
): AchievementRecord[] {
  return definitions.map((definition) => {
    const saved = persisted.find((r) => r.category === definition.category);
    return saved
      ? { ...saved }
      : { category: definition.category, progress: 0, unlocked: false };
  });
}

export function loadAchievementRecords(
  store: KeyValueStore,
  key: string,
  definitions: readonly AchievementDefinition[]
): AchievementRecord[] {
  const parsed = readJson(store, key, TAG);
  if (parsed === null) {
    return createDefaultRecords(definitions);
  }

  // Older saves wrote the bare record array
  let rawRecords: unknown = parsed;
  if (isRecord(parsed)) {
    const version = typeof parsed.schemaVersion === 'number' ? parsed.schemaVersion : 0;
    if (version > ACHIEVEMENTS_SCHEMA_VERSION) {
      console.warn(`[${TAG}] Achievements schema version is from future, resetting`);
      return createDefaultRecords(definitions);
    }
    rawRecords = parsed.records;
  }

  if (!Array.isArray(rawRecords)) {
    console.warn(`[${TAG}] Achievements data is malformed, resetting`);
    return createDefaultRecords(definitions);
  }

  const persisted = rawRecords
    .map(parseRecord)
    .filter((record): record is AchievementRecord => record !== null);

  return mergeRecords(definitions, persisted);
}

export function serializeRecords(records: readonly AchievementRecord[]): SerializedAchievementsState {
  return {
    schemaVersion: ACHIEVEMENTS_SCHEMA_VERSION,
    records: records.map((record): SerializedAchievementRecord => {
      const serialized: SerializedAchievementRecord = {
        category: record.category,
        progress: record.progress,
        unlocked: record.unlocked,
      };
      if (record.unlockedAt !== undefined) {
        serialized.unlockedAt = record.unlockedAt;
      }
      return serialized;
    }),
  };
}

export function saveAchievementRecords(
  store: KeyValueStore,
  key: string,
  records: readonly AchievementRecord[]
): void {
  writeJson(store, key, serializeRecords(records), TAG);
}

// === Stats ===

/**
 * Field-wise migration: anything missing or malformed takes its default.
 */
export function migrateStats(raw: Record<string, unknown>): UserStatistics {
  const defaults = createDefaultStats();
  return {
    viewedCountries: new Set(toUniqueStrings(raw.viewedCountries)),
    viewedDesserts: new Set(toUniqueStrings(raw.viewedDesserts)),
    timerUsages: toCount(raw.timerUsages, defaults.timerUsages),
    calorieCalculations: toCount(raw.calorieCalculations, defaults.calorieCalculations),
    favoritesCount: toCount(raw.favoritesCount, defaults.favoritesCount),
    activityDays: toUniqueStrings(raw.activityDays),
    totalViews: toCount(raw.totalViews, defaults.totalViews),
  };
}

export function loadStats(store: KeyValueStore, key: string): UserStatistics {
  const parsed = readJson(store, key, TAG);
  if (parsed === null) {
    return createDefaultStats();
  }

  if (!isRecord(parsed)) {
    console.warn(`[${TAG}] Stats data is malformed, resetting`);
    return createDefaultStats();
  }

  const version = typeof parsed.schemaVersion === 'number' ? parsed.schemaVersion : 0;
  if (version > STATS_SCHEMA_VERSION) {
    console.warn(`[${TAG}] Stats schema version is from future, resetting`);
    return createDefaultStats();
  }

  return migrateStats(parsed);
}

export function serializeStats(stats: UserStatistics): SerializedUserStatistics {
  return {
    schemaVersion: STATS_SCHEMA_VERSION,
    viewedCountries: Array.from(stats.viewedCountries),
    viewedDesserts: Array.from(stats.viewedDesserts),
    timerUsages: stats.timerUsages,
    calorieCalculations: stats.calorieCalculations,
    favoritesCount: stats.favoritesCount,
    activityDays: [...stats.activityDays],
    totalViews: stats.totalViews,
  };
}

export function saveStats(store: KeyValueStore, key: string, stats: UserStatistics): void {
  writeJson(store, key, serializeStats(stats), TAG);
}
