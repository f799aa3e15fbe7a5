/**
 * useCookingTimer Hook
 *
 * Owns a CookingTimer for the lifetime of the component. Unmounting
 * disposes it, so no tick outlives the screen.
 */

import { useCallback, useEffect, useMemo, useRef, useState } from 'react';
import { TIMER } from '../constants';
import { CookingTimer, getTimerProgress, isTimerFinished } from '../services/cookingTimer';
import type { CookingTimerState } from '../services/cookingTimer';
import { formatClock } from '../utils/formatting';

export interface UseCookingTimerOptions {
  /** Called after every start (e.g. to track timer usage) */
  onStart?: (minutes: number) => void;
  /** Called once when the countdown reaches zero */
  onFinish?: () => void;
  /** Tick length in ms */
  tickMs?: number;
}

export interface UseCookingTimerReturn extends CookingTimerState {
  progress: number;
  formattedTime: string;
  isFinished: boolean;
  start: (minutes: number) => void;
  pause: () => void;
  resume: () => void;
  stop: () => void;
}

export function useCookingTimer(options: UseCookingTimerOptions = {}): UseCookingTimerReturn {
  // Store options in ref to always get latest callbacks
  const optionsRef = useRef(options);
  optionsRef.current = options;

  const tickMs = options.tickMs ?? TIMER.TICK_MS;
  const timer = useMemo(() => new CookingTimer(tickMs), [tickMs]);
  const [state, setState] = useState<CookingTimerState>(() => timer.getState());

  useEffect(() => {
    setState(timer.getState());
    const unsubscribe = timer.subscribe((event) => {
      setState(event.state);
      if (event.type === 'FINISHED') {
        optionsRef.current.onFinish?.();
      }
    });

    return () => {
      unsubscribe();
      timer.dispose();
    };
  }, [timer]);

  const start = useCallback(
    (minutes: number) => {
      timer.start(minutes);
      optionsRef.current.onStart?.(minutes);
    },
    [timer]
  );

  const pause = useCallback(() => timer.pause(), [timer]);
  const resume = useCallback(() => timer.resume(), [timer]);
  const stop = useCallback(() => timer.stop(), [timer]);

  return {
    ...state,
    progress: getTimerProgress(state),
    formattedTime: formatClock(state.timeRemaining),
    isFinished: isTimerFinished(state),
    start,
    pause,
    resume,
    stop,
  };
}

export default useCookingTimer;
