/**
 * Achievement System
 *
 * Event-based achievement tracking over the user's stats.
 */

// Types
export * from './types';

// Definitions
export { ACHIEVEMENTS, ACHIEVEMENTS_BY_CATEGORY, isAchievementCategory } from './definitions';

// Engine
export {
  AchievementEngine,
  applyEvent,
  applyProgress,
  getProgressUpdates,
  toAchievementView,
} from './engine';
export type { AchievementEngineOptions } from './engine';

// Storage
export {
  createDefaultRecords,
  mergeRecords,
  loadAchievementRecords,
  saveAchievementRecords,
  serializeRecords,
  migrateStats,
  loadStats,
  saveStats,
  serializeStats,
} from './storage';
