/**
 * Dessert Passport
 *
 * Catalog, calorie estimator, cooking timer and the achievement engine,
 * with React hooks for the presentation layer.
 */

export * from './types';
export * from './constants';

export * from './services/achievements';
export { StatsStore, createDefaultStats, cloneStats } from './services/stats';
export type { UserStatistics, SerializedUserStatistics } from './services/stats';
export { FavoritesSet, loadFavorites } from './services/favorites';
export type { FavoritesListener, FavoritesSetOptions, FavoritesTracker } from './services/favorites';
export { CookingTimer, getTimerProgress, isTimerFinished } from './services/cookingTimer';
export type { CookingTimerEvent, CookingTimerListener, CookingTimerState } from './services/cookingTimer';
export { noopNotificationScheduler, scheduleSafely } from './services/notifications';
export type { NotificationScheduler } from './services/notifications';
export * from './services/storage';
export {
  COUNTRY_COUNT,
  findDessert,
  getAllDesserts,
  getCountries,
  getCountry,
  parseCatalog,
  searchDesserts,
} from './services/catalog';
export {
  calculateTotalCalories,
  getCaloriesPerServing,
  getPortionWeight,
  normalizeDessertName,
  normalizePortions,
} from './services/calories';
export { createDessertApp } from './services/app';
export type { DessertApp, DessertAppOptions } from './services/app';

export * from './hooks';
export * from './utils';
