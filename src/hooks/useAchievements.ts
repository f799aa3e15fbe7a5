/**
 * Achievement Tracking Hook
 *
 * Mirrors engine state into React. The engine stays the source of truth;
 * this hook re-reads it after every engine event.
 */

import { useCallback, useEffect, useState } from 'react';
import type { AchievementEngine } from '../services/achievements/engine';
import type {
  AchievementSummary,
  AchievementView,
} from '../services/achievements/types';
import type { UserStatistics } from '../services/stats/types';

interface AchievementsSnapshot {
  achievements: AchievementView[];
  unlocked: AchievementView[];
  summary: AchievementSummary;
  stats: UserStatistics;
}

export interface UseAchievementsReturn extends AchievementsSnapshot {
  /** Most recent unlock, until dismissed (drives the unlock popup) */
  lastUnlocked: AchievementView | null;
  dismissLastUnlocked: () => void;
}

function readSnapshot(engine: AchievementEngine): AchievementsSnapshot {
  return {
    achievements: engine.getAchievements(),
    unlocked: engine.getUnlocked(),
    summary: engine.getSummary(),
    stats: engine.getStats(),
  };
}

export function useAchievements(engine: AchievementEngine): UseAchievementsReturn {
  const [snapshot, setSnapshot] = useState<AchievementsSnapshot>(() => readSnapshot(engine));
  const [lastUnlocked, setLastUnlocked] = useState<AchievementView | null>(null);

  useEffect(() => {
    // Engine may have changed between render and subscribe
    setSnapshot(readSnapshot(engine));

    return engine.subscribe((event) => {
      if (event.type === 'ACHIEVEMENT_UNLOCKED') {
        setLastUnlocked(event.achievement);
        return;
      }
      setSnapshot(readSnapshot(engine));
    });
  }, [engine]);

  const dismissLastUnlocked = useCallback(() => {
    setLastUnlocked(null);
  }, []);

  return { ...snapshot, lastUnlocked, dismissLastUnlocked };
}

export default useAchievements;
