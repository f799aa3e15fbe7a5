/**
 * Hooks - Export all custom hooks
 */

export { useAchievements } from './useAchievements';
export type { UseAchievementsReturn } from './useAchievements';

export { useFavorites } from './useFavorites';
export type { UseFavoritesReturn } from './useFavorites';

export { useCookingTimer } from './useCookingTimer';
export type { UseCookingTimerOptions, UseCookingTimerReturn } from './useCookingTimer';
