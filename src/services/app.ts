/**
 * Dessert App
 *
 * Composition root: builds one engine and one favorites set over the same
 * storage and wires them together. Owners of UI event dispatch hold the
 * returned object and pass it down.
 */

import { STORAGE_KEYS } from '../constants';
import type { StorageKeys } from '../constants';
import { AchievementEngine } from './achievements/engine';
import type { EvaluationResult } from './achievements/types';
import { calculateTotalCalories } from './calories';
import { findDessert } from './catalog';
import type { CookingTimer } from './cookingTimer';
import { FavoritesSet } from './favorites';
import { noopNotificationScheduler } from './notifications';
import type { NotificationScheduler } from './notifications';
import { MemoryKeyValueStore } from './storage/keyValueStore';
import type { KeyValueStore } from './storage/keyValueStore';

export interface DessertAppOptions {
  storage?: KeyValueStore;
  notifier?: NotificationScheduler;
  now?: () => Date;
  storageKeys?: Partial<StorageKeys>;
}

export interface DessertApp {
  engine: AchievementEngine;
  favorites: FavoritesSet;
  /** Track a dessert view by id; unknown ids are ignored. */
  viewDessert: (dessertId: string) => EvaluationResult | null;
  /** Start the timer and count it toward the time-keeper achievement. */
  startCookingTimer: (timer: CookingTimer, minutes: number) => EvaluationResult;
  /** Compute calories for a portion count and count the calculation. */
  calculateCalories: (dessertName: string, portions: number) => number;
}

export function createDessertApp(options: DessertAppOptions = {}): DessertApp {
  const storage = options.storage ?? new MemoryKeyValueStore();
  const keys: StorageKeys = { ...STORAGE_KEYS, ...options.storageKeys };

  const engine = new AchievementEngine({
    storage,
    notifier: options.notifier ?? noopNotificationScheduler,
    now: options.now,
    storageKeys: keys,
  });

  const favorites = new FavoritesSet({
    storage,
    tracker: engine,
    storageKey: keys.favorites,
  });

  // Stats and favorites are persisted separately; the favorites set wins
  if (engine.getStats().favoritesCount !== favorites.size) {
    engine.syncFavoritesCount(favorites.size);
  }

  const viewDessert = (dessertId: string): EvaluationResult | null => {
    const entry = findDessert(dessertId);
    if (!entry) {
      console.warn(`[app] Unknown dessert "${dessertId}", view not tracked`);
      return null;
    }
    return engine.trackDessertView(entry.dessert.id, entry.country.id);
  };

  const startCookingTimer = (timer: CookingTimer, minutes: number): EvaluationResult => {
    timer.start(minutes);
    return engine.trackTimerUsage();
  };

  const calculateCalories = (dessertName: string, portions: number): number => {
    const total = calculateTotalCalories(dessertName, portions);
    engine.trackCalorieCalculation();
    return total;
  };

  return { engine, favorites, viewDessert, startCookingTimer, calculateCalories };
}
