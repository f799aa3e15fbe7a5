/**
 * Favorites
 *
 * Persisted set of favorite dessert ids. Holds no unlock logic: every
 * toggle is reported to the achievement engine, which owns the count.
 */

import { STORAGE_KEYS } from '../constants';
import { readJson, writeJson } from './storage/keyValueStore';
import type { KeyValueStore } from './storage/keyValueStore';
import { toUniqueStrings } from '../utils/validation';

const TAG = 'favorites';

/** The part of the engine favorites report to. */
export interface FavoritesTracker {
  trackFavoriteAdded(): void;
  trackFavoriteRemoved(): void;
}

export type FavoritesListener = (favorites: ReadonlySet<string>) => void;

export interface FavoritesSetOptions {
  storage: KeyValueStore;
  tracker: FavoritesTracker;
  storageKey?: string;
}

export function loadFavorites(store: KeyValueStore, key: string): Set<string> {
  const parsed = readJson(store, key, TAG);
  if (parsed !== null && !Array.isArray(parsed)) {
    console.warn(`[${TAG}] Favorites data is malformed, resetting`);
  }
  return new Set(toUniqueStrings(parsed));
}

export class FavoritesSet {
  private readonly storage: KeyValueStore;
  private readonly tracker: FavoritesTracker;
  private readonly key: string;
  private readonly favorites: Set<string>;
  private readonly listeners = new Set<FavoritesListener>();

  constructor(options: FavoritesSetOptions) {
    this.storage = options.storage;
    this.tracker = options.tracker;
    this.key = options.storageKey ?? STORAGE_KEYS.favorites;
    this.favorites = loadFavorites(this.storage, this.key);
  }

  /**
   * Flip membership of `id`, persist, and report to the tracker.
   * @returns true if `id` is now a favorite
   */
  toggle(id: string): boolean {
    const added = !this.favorites.has(id);

    if (added) {
      this.favorites.add(id);
    } else {
      this.favorites.delete(id);
    }
    writeJson(this.storage, this.key, Array.from(this.favorites), TAG);

    if (added) {
      this.tracker.trackFavoriteAdded();
    } else {
      this.tracker.trackFavoriteRemoved();
    }

    const snapshot = this.all();
    for (const listener of Array.from(this.listeners)) {
      try {
        listener(snapshot);
      } catch (error) {
        console.error(`[${TAG}] Listener failed:`, error);
      }
    }

    return added;
  }

  isFavorite(id: string): boolean {
    return this.favorites.has(id);
  }

  all(): Set<string> {
    return new Set(this.favorites);
  }

  get size(): number {
    return this.favorites.size;
  }

  subscribe(listener: FavoritesListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
