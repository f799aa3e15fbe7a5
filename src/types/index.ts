/**
 * Dessert Passport - Catalog Type Definitions
 */

// ============================================
// CATALOG TYPES
// ============================================

export type Difficulty = 'easy' | 'medium' | 'hard';

export const DIFFICULTIES: readonly Difficulty[] = ['easy', 'medium', 'hard'];

export interface Dessert {
  id: string;
  name: string;
  description: string;
  cookingTime: number; // minutes
  servings: number;
  difficulty: Difficulty;
  ingredients: string[];
  instructions: string[];
}

export interface Country {
  id: string;
  name: string;
  flag: string;
  desserts: Dessert[];
}

export interface DessertEntry {
  country: Country;
  dessert: Dessert;
}

// ============================================
// SEARCH TYPES
// ============================================

export type DifficultyFilter = Difficulty | 'all';

export interface DessertSearchOptions {
  query?: string;
  difficulty?: DifficultyFilter;
  maxCookingTime?: number;
}
