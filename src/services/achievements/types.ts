/**
 * Achievement System Types
 *
 * Tracking calls are turned into events; each event mutates the stats and
 * then drives progress updates for the categories it affects.
 */

// === Categories ===

export type AchievementCategory =
  | 'first-view'
  | 'country-explorer'
  | 'time-keeper'
  | 'recipe-collector'
  | 'calorie-tracker'
  | 'favorite-collector'
  | 'weekly-streak'
  | 'completionist';

// === Tracking Events ===

interface BaseEvent {
  ts: number; // Unix timestamp (ms)
}

export interface DessertViewedEvent extends BaseEvent {
  type: 'DESSERT_VIEWED';
  dessertId: string;
  countryId: string;
  day: string; // YYYY-MM-DD, local time
}

export interface TimerUsedEvent extends BaseEvent {
  type: 'TIMER_USED';
}

export interface CaloriesCalculatedEvent extends BaseEvent {
  type: 'CALORIES_CALCULATED';
}

export interface FavoriteAddedEvent extends BaseEvent {
  type: 'FAVORITE_ADDED';
}

export interface FavoriteRemovedEvent extends BaseEvent {
  type: 'FAVORITE_REMOVED';
}

export interface FavoritesSyncedEvent extends BaseEvent {
  type: 'FAVORITES_SYNCED';
  count: number;
}

export interface AppOpenedEvent extends BaseEvent {
  type: 'APP_OPENED';
  day: string;
}

export type TrackingEvent =
  | DessertViewedEvent
  | TimerUsedEvent
  | CaloriesCalculatedEvent
  | FavoriteAddedEvent
  | FavoriteRemovedEvent
  | FavoritesSyncedEvent
  | AppOpenedEvent;

// === Achievement Definition ===

export interface AchievementDefinition {
  readonly category: AchievementCategory;
  readonly title: string;
  readonly description: string;
  readonly icon: string; // Emoji
  readonly target: number;
}

/**
 * Mutable per-category state. `unlockedAt` is stamped once and
 * `progress` stops moving after unlock.
 */
export interface AchievementRecord {
  category: AchievementCategory;
  progress: number;
  unlocked: boolean;
  unlockedAt?: number;
}

/**
 * How an event moves a record: add to it, or replace it with a value
 * recomputed from the stats.
 */
export type ProgressUpdate =
  | { category: AchievementCategory; mode: 'increment'; amount: number }
  | { category: AchievementCategory; mode: 'set'; value: number };

// === Views ===

export interface AchievementView extends AchievementDefinition {
  progress: number;
  unlocked: boolean;
  unlockedAt?: number;
  percentage: number; // 0-100
}

export type AchievementFilter = 'all' | 'unlocked' | 'locked';

export interface AchievementSummary {
  unlockedCount: number;
  totalCount: number;
  percentage: number;
}

// === Engine Output ===

export type EngineEvent =
  | { type: 'ACHIEVEMENT_UNLOCKED'; achievement: AchievementView; ts: number }
  | { type: 'STATE_CHANGED'; ts: number };

export type EngineListener = (event: EngineEvent) => void;

export interface EvaluationResult {
  newUnlocks: AchievementCategory[];
  progressChanged: boolean;
}

// === Serialization (JSON storage) ===

export interface SerializedAchievementRecord {
  category: string;
  progress: number;
  unlocked: boolean;
  unlockedAt?: number;
}

export interface SerializedAchievementsState {
  schemaVersion: number;
  records: SerializedAchievementRecord[];
}
