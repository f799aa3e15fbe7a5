/**
 * Key-Value Storage
 *
 * Persistence transport for achievements, stats and favorites.
 * Reads are synchronous (state is loaded once at startup); writes may be
 * asynchronous and are never awaited by tracking calls.
 */

export interface KeyValueStore {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void | Promise<void>;
}

/** Anything shaped like `window.localStorage`. */
export interface WebStorageLike {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
}

/**
 * In-process store. Default when no storage is supplied.
 */
export class MemoryKeyValueStore implements KeyValueStore {
  private readonly items = new Map<string, string>();

  constructor(initial?: Record<string, string>) {
    if (initial) {
      for (const [key, value] of Object.entries(initial)) {
        this.items.set(key, value);
      }
    }
  }

  getItem(key: string): string | null {
    return this.items.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.items.set(key, value);
  }

  keys(): string[] {
    return Array.from(this.items.keys());
  }
}

/**
 * Adapter over localStorage / sessionStorage.
 */
export class WebStorageKeyValueStore implements KeyValueStore {
  constructor(private readonly storage: WebStorageLike) {}

  getItem(key: string): string | null {
    return this.storage.getItem(key);
  }

  setItem(key: string, value: string): void {
    this.storage.setItem(key, value);
  }
}

/**
 * Read and JSON-parse a key. Missing key, read failure or bad JSON all
 * yield null (logged under `tag`).
 */
export function readJson(store: KeyValueStore, key: string, tag: string): unknown {
  try {
    const raw = store.getItem(key);
    if (raw === null) return null;
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    console.error(`[${tag}] Failed to read "${key}":`, error);
    return null;
  }
}

/**
 * Serialize and write a key, fire-and-forget. Sync throws and async
 * rejections are logged; callers keep their in-memory state either way.
 */
export function writeJson(store: KeyValueStore, key: string, value: unknown, tag: string): void {
  try {
    const pending = store.setItem(key, JSON.stringify(value));
    if (pending instanceof Promise) {
      pending.catch((error: unknown) => {
        console.error(`[${tag}] Failed to write "${key}":`, error);
      });
    }
  } catch (error) {
    console.error(`[${tag}] Failed to write "${key}":`, error);
  }
}
