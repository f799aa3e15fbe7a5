/**
 * User Statistics Types
 */

/**
 * Raw usage counters for one user (persisted).
 */
export interface UserStatistics {
  viewedCountries: Set<string>;
  viewedDesserts: Set<string>;
  timerUsages: number;
  calorieCalculations: number;
  favoritesCount: number;
  activityDays: string[]; // distinct YYYY-MM-DD, insertion ordered
  totalViews: number; // every view, repeats included
}

/**
 * JSON shape written to storage.
 */
export interface SerializedUserStatistics {
  schemaVersion: number;
  viewedCountries: string[];
  viewedDesserts: string[];
  timerUsages: number;
  calorieCalculations: number;
  favoritesCount: number;
  activityDays: string[];
  totalViews: number;
}
