/**
 * Achievement Engine
 *
 * Turns tracking calls into events, applies them to the stats, updates
 * achievement progress and unlocks. Every tracking call runs to completion
 * synchronously: stats -> progress -> unlock -> persist -> notify.
 */

import { STORAGE_KEYS, UNLOCK_NOTIFICATION } from '../../constants';
import type { StorageKeys } from '../../constants';
import { noopNotificationScheduler, scheduleSafely } from '../notifications';
import type { NotificationScheduler } from '../notifications';
import { MemoryKeyValueStore } from '../storage/keyValueStore';
import type { KeyValueStore } from '../storage/keyValueStore';
import { StatsStore } from '../stats/statsStore';
import type { UserStatistics } from '../stats/types';
import { toDayKey } from '../../utils/dates';
import { toPercentage } from '../../utils/formatting';
import { ACHIEVEMENTS, ACHIEVEMENTS_BY_CATEGORY } from './definitions';
import {
  loadAchievementRecords,
  loadStats,
  saveAchievementRecords,
  saveStats,
} from './storage';
import type {
  AchievementCategory,
  AchievementDefinition,
  AchievementFilter,
  AchievementRecord,
  AchievementSummary,
  AchievementView,
  EngineEvent,
  EngineListener,
  EvaluationResult,
  ProgressUpdate,
  TrackingEvent,
} from './types';

// === Event Application ===

/**
 * Apply an event to the raw stats.
 */
export function applyEvent(event: TrackingEvent, stats: StatsStore): void {
  switch (event.type) {
    case 'DESSERT_VIEWED': {
      stats.recordDessertView(event.dessertId);
      stats.recordCountryView(event.countryId);
      stats.recordDailyActivity(event.day);
      break;
    }

    case 'TIMER_USED': {
      stats.recordTimerUsage();
      break;
    }

    case 'CALORIES_CALCULATED': {
      stats.recordCalorieCalculation();
      break;
    }

    case 'FAVORITE_ADDED': {
      stats.setFavoritesCount(stats.favoritesCount + 1);
      break;
    }

    case 'FAVORITE_REMOVED': {
      stats.setFavoritesCount(stats.favoritesCount - 1);
      break;
    }

    case 'FAVORITES_SYNCED': {
      stats.setFavoritesCount(event.count);
      break;
    }

    case 'APP_OPENED': {
      stats.recordDailyActivity(event.day);
      break;
    }
  }
}

/**
 * Progress updates an event causes, in evaluation order. Count-like
 * categories are recomputed from the stats rather than incremented, so
 * repeated or reversed actions never double count.
 */
export function getProgressUpdates(event: TrackingEvent, stats: StatsStore): ProgressUpdate[] {
  switch (event.type) {
    case 'DESSERT_VIEWED': {
      const countries = stats.viewedCountryCount;
      return [
        { category: 'first-view', mode: 'increment', amount: 1 },
        { category: 'recipe-collector', mode: 'increment', amount: 1 },
        { category: 'country-explorer', mode: 'set', value: countries },
        { category: 'completionist', mode: 'set', value: countries },
        { category: 'weekly-streak', mode: 'set', value: stats.computeConsecutiveStreak() },
      ];
    }

    case 'TIMER_USED':
      return [{ category: 'time-keeper', mode: 'increment', amount: 1 }];

    case 'CALORIES_CALCULATED':
      return [{ category: 'calorie-tracker', mode: 'increment', amount: 1 }];

    case 'FAVORITE_ADDED':
    case 'FAVORITE_REMOVED':
    case 'FAVORITES_SYNCED':
      return [{ category: 'favorite-collector', mode: 'set', value: stats.favoritesCount }];

    case 'APP_OPENED':
      return [{ category: 'weekly-streak', mode: 'set', value: stats.computeConsecutiveStreak() }];
  }
}

/**
 * Apply one progress update to a record.
 * Unlocked records are frozen: the guard runs before any mutation.
 * @returns true if this update unlocked the record
 */
export function applyProgress(
  record: AchievementRecord,
  definition: AchievementDefinition,
  update: ProgressUpdate,
  now: number
): boolean {
  if (record.unlocked) {
    return false;
  }

  record.progress =
    update.mode === 'increment' ? record.progress + update.amount : update.value;

  if (record.progress >= definition.target) {
    record.unlocked = true;
    record.unlockedAt = now;
    return true;
  }

  return false;
}

export function toAchievementView(
  definition: AchievementDefinition,
  record: AchievementRecord
): AchievementView {
  const view: AchievementView = {
    ...definition,
    progress: record.progress,
    unlocked: record.unlocked,
    percentage: record.unlocked ? 100 : toPercentage(record.progress, definition.target),
  };
  if (record.unlockedAt !== undefined) {
    view.unlockedAt = record.unlockedAt;
  }
  return view;
}

// === Engine ===

export interface AchievementEngineOptions {
  /** Persistence transport (default: in-memory) */
  storage?: KeyValueStore;
  /** Local notification scheduler (default: no-op) */
  notifier?: NotificationScheduler;
  /** Clock, injectable for tests */
  now?: () => Date;
  /** Override persistence keys */
  storageKeys?: Partial<StorageKeys>;
}

export class AchievementEngine {
  private readonly storage: KeyValueStore;
  private readonly notifier: NotificationScheduler;
  private readonly now: () => Date;
  private readonly keys: StorageKeys;

  private readonly stats: StatsStore;
  private readonly records: Map<AchievementCategory, AchievementRecord>;
  private readonly listeners = new Set<EngineListener>();

  constructor(options: AchievementEngineOptions = {}) {
    this.storage = options.storage ?? new MemoryKeyValueStore();
    this.notifier = options.notifier ?? noopNotificationScheduler;
    this.now = options.now ?? (() => new Date());
    this.keys = { ...STORAGE_KEYS, ...options.storageKeys };

    this.stats = StatsStore.from(loadStats(this.storage, this.keys.stats));
    this.records = new Map(
      loadAchievementRecords(this.storage, this.keys.achievements, ACHIEVEMENTS).map(
        (record): [AchievementCategory, AchievementRecord] => [record.category, record]
      )
    );
  }

  // --- Tracking calls ---

  trackDessertView(dessertId: string, countryId: string): EvaluationResult {
    const now = this.now();
    return this.process({
      type: 'DESSERT_VIEWED',
      ts: now.getTime(),
      dessertId,
      countryId,
      day: toDayKey(now),
    });
  }

  trackTimerUsage(): EvaluationResult {
    return this.process({ type: 'TIMER_USED', ts: this.now().getTime() });
  }

  trackCalorieCalculation(): EvaluationResult {
    return this.process({ type: 'CALORIES_CALCULATED', ts: this.now().getTime() });
  }

  trackFavoriteAdded(): EvaluationResult {
    return this.process({ type: 'FAVORITE_ADDED', ts: this.now().getTime() });
  }

  trackFavoriteRemoved(): EvaluationResult {
    return this.process({ type: 'FAVORITE_REMOVED', ts: this.now().getTime() });
  }

  /** Mirror the persisted favorites size into the stats (startup). */
  syncFavoritesCount(count: number): EvaluationResult {
    return this.process({ type: 'FAVORITES_SYNCED', ts: this.now().getTime(), count });
  }

  /** Record today's activity without viewing a dessert. */
  trackAppOpen(): EvaluationResult {
    const now = this.now();
    return this.process({ type: 'APP_OPENED', ts: now.getTime(), day: toDayKey(now) });
  }

  /**
   * Apply an event, evaluate progress, persist and notify.
   */
  process(event: TrackingEvent): EvaluationResult {
    applyEvent(event, this.stats);

    const newUnlocks: AchievementCategory[] = [];
    let progressChanged = false;

    for (const update of getProgressUpdates(event, this.stats)) {
      const record = this.records.get(update.category);
      const definition = ACHIEVEMENTS_BY_CATEGORY.get(update.category);
      if (!record || !definition) continue;

      const before = record.progress;
      if (applyProgress(record, definition, update, event.ts)) {
        newUnlocks.push(update.category);
      }
      if (record.progress !== before) {
        progressChanged = true;
      }
    }

    this.persist();

    for (const category of newUnlocks) {
      this.announceUnlock(category, event.ts);
    }
    this.emit({ type: 'STATE_CHANGED', ts: event.ts });

    return { newUnlocks, progressChanged };
  }

  // --- Queries ---

  /** All achievements in catalog order. */
  getAchievements(): AchievementView[] {
    return ACHIEVEMENTS.map((definition) => this.viewOf(definition));
  }

  getAchievement(category: AchievementCategory): AchievementView | undefined {
    const definition = ACHIEVEMENTS_BY_CATEGORY.get(category);
    return definition ? this.viewOf(definition) : undefined;
  }

  /** Unlocked achievements, oldest unlock first (derived, never stored). */
  getUnlocked(): AchievementView[] {
    return this.getAchievements()
      .filter((a) => a.unlocked)
      .sort((a, b) => (a.unlockedAt ?? 0) - (b.unlockedAt ?? 0));
  }

  filterAchievements(filter: AchievementFilter): AchievementView[] {
    switch (filter) {
      case 'all':
        return this.getAchievements();
      case 'unlocked':
        return this.getAchievements().filter((a) => a.unlocked);
      case 'locked':
        return this.getAchievements().filter((a) => !a.unlocked);
    }
  }

  getSummary(): AchievementSummary {
    const totalCount = ACHIEVEMENTS.length;
    const unlockedCount = this.getAchievements().filter((a) => a.unlocked).length;
    const percentage = totalCount === 0 ? 0 : Math.round((unlockedCount / totalCount) * 100);
    return { unlockedCount, totalCount, percentage };
  }

  getStats(): UserStatistics {
    return this.stats.snapshot();
  }

  computeConsecutiveStreak(): number {
    return this.stats.computeConsecutiveStreak();
  }

  // --- Subscription ---

  subscribe(listener: EngineListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // --- Internals ---

  private viewOf(definition: AchievementDefinition): AchievementView {
    const record = this.records.get(definition.category) ?? {
      category: definition.category,
      progress: 0,
      unlocked: false,
    };
    return toAchievementView(definition, record);
  }

  private persist(): void {
    saveAchievementRecords(this.storage, this.keys.achievements, Array.from(this.records.values()));
    saveStats(this.storage, this.keys.stats, this.stats.snapshot());
  }

  private announceUnlock(category: AchievementCategory, ts: number): void {
    const achievement = this.getAchievement(category);
    if (!achievement) return;

    this.emit({ type: 'ACHIEVEMENT_UNLOCKED', achievement, ts });
    scheduleSafely(
      this.notifier,
      UNLOCK_NOTIFICATION.TITLE,
      `${achievement.title} - ${achievement.description}`,
      UNLOCK_NOTIFICATION.DELAY_MS
    );
  }

  private emit(event: EngineEvent): void {
    for (const listener of Array.from(this.listeners)) {
      try {
        listener(event);
      } catch (error) {
        console.error('[achievements/engine] Listener failed:', error);
      }
    }
  }
}
