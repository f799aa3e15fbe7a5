/**
 * Achievement Definitions
 *
 * The fixed catalog: one definition per category.
 */

import { COUNTRY_COUNT } from '../catalog';
import type { AchievementCategory, AchievementDefinition } from './types';

export const ACHIEVEMENTS: readonly AchievementDefinition[] = [
  {
    category: 'first-view',
    title: 'First Bite',
    description: 'Open your first dessert recipe.',
    icon: '⭐',
    target: 1,
  },
  {
    category: 'country-explorer',
    title: 'World Traveler',
    description: 'Discover desserts from 5 different countries.',
    icon: '🌍',
    target: 5,
  },
  {
    category: 'time-keeper',
    title: 'Timer Master',
    description: 'Start the cooking timer 10 times.',
    icon: '⏱️',
    target: 10,
  },
  {
    category: 'recipe-collector',
    title: 'Recipe Collector',
    description: 'View 20 recipes.',
    icon: '📖',
    target: 20,
  },
  {
    category: 'calorie-tracker',
    title: 'Calorie Counter',
    description: 'Use the calorie calculator 15 times.',
    icon: '🔥',
    target: 15,
  },
  {
    category: 'favorite-collector',
    title: 'Favorite Hunter',
    description: 'Add 10 recipes to your favorites.',
    icon: '❤️',
    target: 10,
  },
  {
    category: 'weekly-streak',
    title: 'Weekly Chef',
    description: 'Use the app 7 days in a row.',
    icon: '📅',
    target: 7,
  },
  {
    category: 'completionist',
    title: 'Dessert Master',
    description: 'Explore desserts from every country.',
    icon: '👑',
    target: COUNTRY_COUNT,
  },
];

export const ACHIEVEMENTS_BY_CATEGORY = new Map<AchievementCategory, AchievementDefinition>(
  ACHIEVEMENTS.map((a) => [a.category, a])
);

export function isAchievementCategory(value: unknown): value is AchievementCategory {
  return typeof value === 'string' && ACHIEVEMENTS.some((a) => a.category === value);
}
