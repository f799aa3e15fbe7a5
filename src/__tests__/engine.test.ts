/**
 * Achievement Engine Tests
 */

import { STORAGE_KEYS } from '../constants';
import { ACHIEVEMENTS } from '../services/achievements/definitions';
import { AchievementEngine } from '../services/achievements/engine';
import type { AchievementCategory, EngineEvent } from '../services/achievements/types';
import { FavoritesSet } from '../services/favorites';
import type { NotificationScheduler } from '../services/notifications';
import { MemoryKeyValueStore } from '../services/storage/keyValueStore';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createClock(start: Date) {
  let current = new Date(start.getTime());
  return {
    now: () => new Date(current.getTime()),
    advanceDays: (days: number) => {
      current = new Date(current.getFullYear(), current.getMonth(), current.getDate() + days, 12);
    },
    advanceMs: (ms: number) => {
      current = new Date(current.getTime() + ms);
    },
  };
}

function createEngine(storage = new MemoryKeyValueStore(), notifier?: NotificationScheduler) {
  const clock = createClock(new Date(2024, 0, 10, 12, 0, 0));
  const engine = new AchievementEngine({ storage, notifier, now: clock.now });
  return { engine, clock, storage };
}

function progressOf(engine: AchievementEngine, category: AchievementCategory): number {
  return engine.getAchievement(category)?.progress ?? -1;
}

function isUnlocked(engine: AchievementEngine, category: AchievementCategory): boolean {
  return engine.getAchievement(category)?.unlocked ?? false;
}

const FIVE_COUNTRIES: Array<[string, string]> = [
  ['baklava', 'turkey'],
  ['tiramisu', 'italy'],
  ['macaron', 'france'],
  ['mochi', 'japan'],
  ['waffle', 'belgium'],
];

// ---------------------------------------------------------------------------
// Catalog
// ---------------------------------------------------------------------------

describe('achievement catalog', () => {
  it('should define one achievement per category with fixed targets', () => {
    const targets = Object.fromEntries(ACHIEVEMENTS.map((a) => [a.category, a.target]));
    expect(targets).toEqual({
      'first-view': 1,
      'country-explorer': 5,
      'time-keeper': 10,
      'recipe-collector': 20,
      'calorie-tracker': 15,
      'favorite-collector': 10,
      'weekly-streak': 7,
      completionist: 12,
    });
  });

  it('should start every achievement locked at zero', () => {
    const { engine } = createEngine();
    for (const achievement of engine.getAchievements()) {
      expect(achievement.progress).toBe(0);
      expect(achievement.unlocked).toBe(false);
      expect(achievement.unlockedAt).toBeUndefined();
    }
  });
});

// ---------------------------------------------------------------------------
// Dessert views
// ---------------------------------------------------------------------------

describe('trackDessertView', () => {
  it('should count total views separately from distinct desserts', () => {
    const { engine } = createEngine();
    engine.trackDessertView('baklava', 'turkey');
    engine.trackDessertView('baklava', 'turkey');
    engine.trackDessertView('kunefe', 'turkey');

    const stats = engine.getStats();
    expect(stats.totalViews).toBe(3);
    expect(stats.viewedDesserts.size).toBe(2);
  });

  it('should unlock first-view on the first view and freeze it', () => {
    const { engine } = createEngine();
    const result = engine.trackDessertView('baklava', 'turkey');

    expect(result.newUnlocks).toEqual(['first-view']);
    expect(progressOf(engine, 'first-view')).toBe(1);

    engine.trackDessertView('kunefe', 'turkey');
    expect(progressOf(engine, 'first-view')).toBe(1);
    expect(progressOf(engine, 'recipe-collector')).toBe(2);
  });

  it('should recompute country progress instead of incrementing it', () => {
    const { engine } = createEngine();
    engine.trackDessertView('baklava', 'turkey');
    engine.trackDessertView('kunefe', 'turkey');

    expect(progressOf(engine, 'country-explorer')).toBe(1);
    expect(progressOf(engine, 'completionist')).toBe(1);
  });

  it('should unlock country-explorer at five countries while completionist stays locked', () => {
    const { engine } = createEngine();
    for (const [dessertId, countryId] of FIVE_COUNTRIES) {
      engine.trackDessertView(dessertId, countryId);
    }

    expect(progressOf(engine, 'country-explorer')).toBe(5);
    expect(isUnlocked(engine, 'country-explorer')).toBe(true);
    expect(progressOf(engine, 'completionist')).toBe(5);
    expect(isUnlocked(engine, 'completionist')).toBe(false);
  });

  it('should record today as an activity day', () => {
    const { engine } = createEngine();
    engine.trackDessertView('baklava', 'turkey');

    expect(engine.getStats().activityDays).toEqual(['2024-01-10']);
    expect(progressOf(engine, 'weekly-streak')).toBe(1);
  });

  it('should unlock weekly-streak after seven consecutive days', () => {
    const { engine, clock } = createEngine();

    for (let day = 1; day <= 6; day++) {
      engine.trackDessertView('baklava', 'turkey');
      clock.advanceDays(1);
    }
    expect(progressOf(engine, 'weekly-streak')).toBe(6);
    expect(isUnlocked(engine, 'weekly-streak')).toBe(false);

    const result = engine.trackDessertView('baklava', 'turkey');
    expect(result.newUnlocks).toContain('weekly-streak');
    expect(progressOf(engine, 'weekly-streak')).toBe(7);
  });

  it('should restart the streak after a gap while locked', () => {
    const { engine, clock } = createEngine();
    engine.trackDessertView('baklava', 'turkey');
    clock.advanceDays(1);
    engine.trackDessertView('baklava', 'turkey');
    expect(progressOf(engine, 'weekly-streak')).toBe(2);

    clock.advanceDays(2);
    engine.trackDessertView('baklava', 'turkey');
    expect(progressOf(engine, 'weekly-streak')).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Counters
// ---------------------------------------------------------------------------

describe('timer and calorie tracking', () => {
  it('should unlock time-keeper on the tenth timer start', () => {
    const { engine } = createEngine();
    for (let i = 0; i < 9; i++) engine.trackTimerUsage();
    expect(isUnlocked(engine, 'time-keeper')).toBe(false);

    const result = engine.trackTimerUsage();
    expect(result.newUnlocks).toEqual(['time-keeper']);

    engine.trackTimerUsage();
    expect(progressOf(engine, 'time-keeper')).toBe(10);
    expect(engine.getStats().timerUsages).toBe(11);
  });

  it('should track calorie calculations', () => {
    const { engine } = createEngine();
    engine.trackCalorieCalculation();
    engine.trackCalorieCalculation();

    expect(progressOf(engine, 'calorie-tracker')).toBe(2);
    expect(engine.getStats().calorieCalculations).toBe(2);
  });
});

// ---------------------------------------------------------------------------
// Favorites
// ---------------------------------------------------------------------------

describe('favorite tracking', () => {
  it('should set favorite progress from the absolute count', () => {
    const { engine } = createEngine();
    engine.trackFavoriteAdded();
    engine.trackFavoriteAdded();
    engine.trackFavoriteRemoved();

    expect(progressOf(engine, 'favorite-collector')).toBe(1);
    expect(engine.getStats().favoritesCount).toBe(1);
  });

  it('should never take the favorites count below zero', () => {
    const { engine } = createEngine();
    engine.trackFavoriteRemoved();

    expect(engine.getStats().favoritesCount).toBe(0);
    expect(progressOf(engine, 'favorite-collector')).toBe(0);
  });

  it('should not re-lock favorite-collector when favorites drop below target', () => {
    const { engine } = createEngine();
    for (let i = 0; i < 10; i++) engine.trackFavoriteAdded();
    expect(isUnlocked(engine, 'favorite-collector')).toBe(true);

    for (let i = 0; i < 4; i++) engine.trackFavoriteRemoved();

    expect(isUnlocked(engine, 'favorite-collector')).toBe(true);
    expect(progressOf(engine, 'favorite-collector')).toBe(10);
    expect(engine.getStats().favoritesCount).toBe(6);
  });

  it('should return to the original state after toggling a favorite twice', () => {
    const { engine, storage } = createEngine();
    const favorites = new FavoritesSet({ storage, tracker: engine });
    favorites.toggle('mochi');
    const before = { set: favorites.all(), progress: progressOf(engine, 'favorite-collector') };

    favorites.toggle('gelato');
    favorites.toggle('gelato');

    expect(favorites.all()).toEqual(before.set);
    expect(progressOf(engine, 'favorite-collector')).toBe(before.progress);
  });
});

// ---------------------------------------------------------------------------
// App opens
// ---------------------------------------------------------------------------

describe('trackAppOpen', () => {
  it('should record the day once and update the streak', () => {
    const { engine, clock } = createEngine();
    engine.trackAppOpen();
    engine.trackAppOpen();
    clock.advanceDays(1);
    engine.trackAppOpen();

    expect(engine.getStats().activityDays).toEqual(['2024-01-10', '2024-01-11']);
    expect(progressOf(engine, 'weekly-streak')).toBe(2);
    expect(engine.getStats().totalViews).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Unlock side effects
// ---------------------------------------------------------------------------

describe('unlock notifications', () => {
  it('should emit one unlock event before the state change', () => {
    const { engine } = createEngine();
    const events: EngineEvent[] = [];
    engine.subscribe((event) => events.push(event));

    engine.trackDessertView('baklava', 'turkey');

    expect(events.map((e) => e.type)).toEqual(['ACHIEVEMENT_UNLOCKED', 'STATE_CHANGED']);
    const [unlock] = events;
    expect(unlock.type === 'ACHIEVEMENT_UNLOCKED' && unlock.achievement.title).toBe('First Bite');
  });

  it('should stop delivering events after unsubscribe', () => {
    const { engine } = createEngine();
    const listener = jest.fn();
    const unsubscribe = engine.subscribe(listener);
    unsubscribe();

    engine.trackTimerUsage();
    expect(listener).not.toHaveBeenCalled();
  });

  it('should keep notifying other listeners when one throws', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const { engine } = createEngine();
    const listener = jest.fn();
    engine.subscribe(() => {
      throw new Error('boom');
    });
    engine.subscribe(listener);

    engine.trackTimerUsage();

    expect(listener).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalled();
    errorSpy.mockRestore();
  });

  it('should schedule a local notification per unlock', () => {
    const schedule = jest.fn();
    const { engine } = createEngine(new MemoryKeyValueStore(), { schedule });

    engine.trackDessertView('baklava', 'turkey');
    engine.trackDessertView('kunefe', 'turkey');

    expect(schedule).toHaveBeenCalledTimes(1);
    expect(schedule).toHaveBeenCalledWith(
      'Achievement Unlocked!',
      'First Bite - Open your first dessert recipe.',
      1000
    );
  });

  it('should unlock even when the notification scheduler fails', async () => {
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const { engine } = createEngine(new MemoryKeyValueStore(), {
      schedule: () => {
        throw new Error('denied');
      },
    });
    engine.trackDessertView('baklava', 'turkey');
    expect(isUnlocked(engine, 'first-view')).toBe(true);

    const asyncFailing = createEngine(new MemoryKeyValueStore(), {
      schedule: () => Promise.reject(new Error('denied')),
    });
    asyncFailing.engine.trackDessertView('baklava', 'turkey');
    await Promise.resolve();
    await Promise.resolve();

    expect(isUnlocked(asyncFailing.engine, 'first-view')).toBe(true);
    expect(warnSpy).toHaveBeenCalledTimes(2);
    warnSpy.mockRestore();
  });

  it('should stamp the unlock time once', () => {
    const { engine, clock } = createEngine();
    const unlockTime = clock.now().getTime();
    engine.trackDessertView('baklava', 'turkey');

    clock.advanceMs(60000);
    engine.trackDessertView('baklava', 'turkey');

    expect(engine.getAchievement('first-view')?.unlockedAt).toBe(unlockTime);
  });
});

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

describe('queries', () => {
  it('should list unlocked achievements by unlock time', () => {
    const { engine, clock } = createEngine();
    for (let i = 0; i < 10; i++) engine.trackTimerUsage();
    clock.advanceMs(1000);
    engine.trackDessertView('baklava', 'turkey');

    expect(engine.getUnlocked().map((a) => a.category)).toEqual(['time-keeper', 'first-view']);
  });

  it('should filter and summarize', () => {
    const { engine } = createEngine();
    engine.trackDessertView('baklava', 'turkey');

    expect(engine.filterAchievements('unlocked').map((a) => a.category)).toEqual(['first-view']);
    expect(engine.filterAchievements('locked')).toHaveLength(7);
    expect(engine.filterAchievements('all')).toHaveLength(8);
    expect(engine.getSummary()).toEqual({ unlockedCount: 1, totalCount: 8, percentage: 13 });
  });

  it('should report percentages toward the target', () => {
    const { engine } = createEngine();
    for (let i = 0; i < 3; i++) engine.trackCalorieCalculation();

    expect(engine.getAchievement('calorie-tracker')?.percentage).toBe(20);
  });
});

// ---------------------------------------------------------------------------
// Persistence
// ---------------------------------------------------------------------------

describe('persistence', () => {
  it('should restore identical records and stats after reload', () => {
    const { engine, storage, clock } = createEngine();
    for (const [dessertId, countryId] of FIVE_COUNTRIES) {
      engine.trackDessertView(dessertId, countryId);
      clock.advanceDays(1);
    }
    engine.trackTimerUsage();
    engine.trackCalorieCalculation();
    engine.trackFavoriteAdded();

    const reloaded = new AchievementEngine({ storage });

    expect(reloaded.getAchievements()).toEqual(engine.getAchievements());
    expect(reloaded.getStats()).toEqual(engine.getStats());
  });

  it('should write both records and stats on every tracking call', () => {
    const { engine, storage } = createEngine();
    engine.trackTimerUsage();

    const saved = JSON.parse(storage.getItem(STORAGE_KEYS.stats) ?? 'null');
    expect(saved.timerUsages).toBe(1);
    expect(saved.schemaVersion).toBe(1);

    const records = JSON.parse(storage.getItem(STORAGE_KEYS.achievements) ?? 'null');
    expect(records.records).toContainEqual({ category: 'time-keeper', progress: 1, unlocked: false });
  });

  it('should merge persisted records with the catalog and drop unknown ones', () => {
    const storage = new MemoryKeyValueStore({
      [STORAGE_KEYS.achievements]: JSON.stringify({
        schemaVersion: 1,
        records: [
          { category: 'time-keeper', progress: 4, unlocked: false },
          { category: 'first-view', progress: 1, unlocked: true, unlockedAt: 1000 },
          { category: 'retired-badge', progress: 99, unlocked: true },
        ],
      }),
    });
    const engine = new AchievementEngine({ storage });

    expect(engine.getAchievements()).toHaveLength(8);
    expect(engine.getAchievement('time-keeper')?.progress).toBe(4);
    expect(engine.getAchievement('first-view')?.unlockedAt).toBe(1000);
    expect(engine.getAchievement('recipe-collector')?.progress).toBe(0);

    engine.trackDessertView('baklava', 'turkey');
    expect(engine.getAchievement('first-view')?.unlockedAt).toBe(1000);
    expect(engine.getUnlocked().map((a) => a.category)).toEqual(['first-view']);
  });

  it('should accept a bare record array', () => {
    const storage = new MemoryKeyValueStore({
      [STORAGE_KEYS.achievements]: JSON.stringify([
        { category: 'calorie-tracker', progress: 14, unlocked: false },
      ]),
    });
    const engine = new AchievementEngine({ storage });
    const result = engine.trackCalorieCalculation();

    expect(result.newUnlocks).toEqual(['calorie-tracker']);
  });

  it('should fall back to defaults on corrupt data', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const storage = new MemoryKeyValueStore({
      [STORAGE_KEYS.achievements]: '{not json',
      [STORAGE_KEYS.stats]: '[]',
    });
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    const engine = new AchievementEngine({ storage });

    expect(engine.getSummary().unlockedCount).toBe(0);
    expect(engine.getStats().totalViews).toBe(0);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    errorSpy.mockRestore();
    warnSpy.mockRestore();
  });

  it('should reset data written by a newer schema', () => {
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const storage = new MemoryKeyValueStore({
      [STORAGE_KEYS.stats]: JSON.stringify({ schemaVersion: 99, totalViews: 40 }),
    });
    const engine = new AchievementEngine({ storage });

    expect(engine.getStats().totalViews).toBe(0);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    warnSpy.mockRestore();
  });

  it('should default malformed stat fields individually', () => {
    const storage = new MemoryKeyValueStore({
      [STORAGE_KEYS.stats]: JSON.stringify({
        viewedCountries: ['italy', 7, 'italy'],
        timerUsages: 'three',
        totalViews: 12,
        activityDays: ['2024-01-01', '2024-01-02'],
      }),
    });
    const stats = new AchievementEngine({ storage }).getStats();

    expect(stats.viewedCountries).toEqual(new Set(['italy']));
    expect(stats.timerUsages).toBe(0);
    expect(stats.totalViews).toBe(12);
    expect(stats.activityDays).toEqual(['2024-01-01', '2024-01-02']);
  });

  it('should keep in-memory progress when writes fail', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const storage = {
      getItem: () => null,
      setItem: () => {
        throw new Error('quota exceeded');
      },
    };
    const engine = new AchievementEngine({ storage });
    engine.trackTimerUsage();
    engine.trackTimerUsage();

    expect(engine.getAchievement('time-keeper')?.progress).toBe(2);
    // Two keys per call, every call retries the full write
    expect(errorSpy).toHaveBeenCalledTimes(4);
    errorSpy.mockRestore();
  });

  it('should log asynchronous write failures', async () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const storage = {
      getItem: () => null,
      setItem: () => Promise.reject(new Error('offline')),
    };
    const engine = new AchievementEngine({ storage });
    engine.trackCalorieCalculation();
    await Promise.resolve();
    await Promise.resolve();

    expect(engine.getAchievement('calorie-tracker')?.progress).toBe(1);
    expect(errorSpy).toHaveBeenCalledTimes(2);
    errorSpy.mockRestore();
  });
});
