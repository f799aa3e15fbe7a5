/**
 * Cooking Timer
 *
 * One-second countdown. The interval exists only while the timer is
 * running; pause, stop, finish and dispose all clear it.
 */

import { TIMER } from '../constants';
import { formatClock } from '../utils/formatting';

export interface CookingTimerState {
  isActive: boolean;
  timeRemaining: number; // seconds
  totalTime: number; // seconds
}

export type CookingTimerEvent =
  | { type: 'TICK'; state: CookingTimerState }
  | { type: 'STATE_CHANGED'; state: CookingTimerState }
  | { type: 'FINISHED'; state: CookingTimerState };

export type CookingTimerListener = (event: CookingTimerEvent) => void;

/** Elapsed fraction, 0..1 */
export function getTimerProgress(state: CookingTimerState): number {
  if (state.totalTime <= 0) return 0;
  return (state.totalTime - state.timeRemaining) / state.totalTime;
}

/** Ran to zero (as opposed to stopped or never started). */
export function isTimerFinished(state: CookingTimerState): boolean {
  return !state.isActive && state.timeRemaining === 0 && state.totalTime > 0;
}

export class CookingTimer {
  private isActive = false;
  private timeRemaining = 0;
  private totalTime = 0;
  private interval: ReturnType<typeof setInterval> | null = null;
  private readonly listeners = new Set<CookingTimerListener>();

  constructor(private readonly tickMs: number = TIMER.TICK_MS) {}

  /** Start a fresh countdown, replacing any running one. */
  start(minutes: number): void {
    this.clearTick();

    const seconds = Number.isFinite(minutes) ? Math.max(0, Math.floor(minutes * 60)) : 0;
    this.totalTime = seconds;
    this.timeRemaining = seconds;

    if (seconds === 0) {
      this.isActive = false;
      this.emit('STATE_CHANGED');
      return;
    }

    this.isActive = true;
    this.scheduleTick();
    this.emit('STATE_CHANGED');
  }

  pause(): void {
    if (!this.isActive) return;
    this.clearTick();
    this.isActive = false;
    this.emit('STATE_CHANGED');
  }

  resume(): void {
    if (this.isActive || this.timeRemaining <= 0) return;
    this.isActive = true;
    this.scheduleTick();
    this.emit('STATE_CHANGED');
  }

  /** Cancel and clear the countdown. */
  stop(): void {
    this.clearTick();
    this.isActive = false;
    this.timeRemaining = 0;
    this.totalTime = 0;
    this.emit('STATE_CHANGED');
  }

  /** Release the interval and drop listeners (owner is going away). */
  dispose(): void {
    this.clearTick();
    this.isActive = false;
    this.listeners.clear();
  }

  getState(): CookingTimerState {
    return {
      isActive: this.isActive,
      timeRemaining: this.timeRemaining,
      totalTime: this.totalTime,
    };
  }

  get progress(): number {
    return getTimerProgress(this.getState());
  }

  get formattedTime(): string {
    return formatClock(this.timeRemaining);
  }

  get isFinished(): boolean {
    return isTimerFinished(this.getState());
  }

  get isRunning(): boolean {
    return this.interval !== null;
  }

  subscribe(listener: CookingTimerListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private scheduleTick(): void {
    this.interval = setInterval(() => this.tick(), this.tickMs);
  }

  private clearTick(): void {
    if (this.interval !== null) {
      clearInterval(this.interval);
      this.interval = null;
    }
  }

  private tick(): void {
    if (this.timeRemaining > 0) {
      this.timeRemaining--;
    }

    if (this.timeRemaining > 0) {
      this.emit('TICK');
      return;
    }

    // Finished: keep totalTime so isFinished reads true
    this.clearTick();
    this.isActive = false;
    this.emit('FINISHED');
  }

  private emit(type: CookingTimerEvent['type']): void {
    const event: CookingTimerEvent = { type, state: this.getState() };
    for (const listener of Array.from(this.listeners)) {
      try {
        listener(event);
      } catch (error) {
        console.error('[cookingTimer] Listener failed:', error);
      }
    }
  }
}
