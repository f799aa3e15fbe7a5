/**
 * Stats Store
 *
 * Owns the raw usage counters and the activity-day log. Pure accumulation;
 * unlock rules live in the achievement engine.
 */

import { computeConsecutiveStreak } from '../../utils/dates';
import type { UserStatistics } from './types';

export function createDefaultStats(): UserStatistics {
  return {
    viewedCountries: new Set(),
    viewedDesserts: new Set(),
    timerUsages: 0,
    calorieCalculations: 0,
    favoritesCount: 0,
    activityDays: [],
    totalViews: 0,
  };
}

export function cloneStats(stats: UserStatistics): UserStatistics {
  return {
    viewedCountries: new Set(stats.viewedCountries),
    viewedDesserts: new Set(stats.viewedDesserts),
    timerUsages: stats.timerUsages,
    calorieCalculations: stats.calorieCalculations,
    favoritesCount: stats.favoritesCount,
    activityDays: [...stats.activityDays],
    totalViews: stats.totalViews,
  };
}

export class StatsStore {
  private readonly stats: UserStatistics;

  constructor(initial?: UserStatistics) {
    this.stats = initial ? cloneStats(initial) : createDefaultStats();
  }

  static from(stats: UserStatistics): StatsStore {
    return new StatsStore(stats);
  }

  recordCountryView(countryId: string): void {
    this.stats.viewedCountries.add(countryId);
  }

  recordDessertView(dessertId: string): void {
    this.stats.viewedDesserts.add(dessertId);
    this.stats.totalViews++;
  }

  recordTimerUsage(): void {
    this.stats.timerUsages++;
  }

  recordCalorieCalculation(): void {
    this.stats.calorieCalculations++;
  }

  setFavoritesCount(count: number): void {
    this.stats.favoritesCount = Number.isFinite(count) ? Math.max(0, Math.floor(count)) : 0;
  }

  recordDailyActivity(day: string): void {
    if (!this.stats.activityDays.includes(day)) {
      this.stats.activityDays.push(day);
    }
  }

  computeConsecutiveStreak(): number {
    return computeConsecutiveStreak(this.stats.activityDays);
  }

  get viewedCountryCount(): number {
    return this.stats.viewedCountries.size;
  }

  get favoritesCount(): number {
    return this.stats.favoritesCount;
  }

  /** Deep copy, safe to hand to callers. */
  snapshot(): UserStatistics {
    return cloneStats(this.stats);
  }
}
