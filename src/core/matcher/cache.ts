import { resolve } from 'node:path';

import { fingerprintsEqual, type Fingerprint } from './fingerprint.js';

/**
 * Path -> result memo for one rule set.
 *
 * `get` and `set` are synchronous and never yield, so on the event loop every access runs
 * to completion before the next one starts; concurrent `match()` callers cannot interleave
 * inside a lookup.
 */
export class ResultCache {
  private readonly results = new Map<string, boolean>();
  private hitCount = 0;
  private missCount = 0;

  constructor(readonly fingerprint: Fingerprint) {}

  get(path: string): boolean | undefined {
    const value = this.results.get(path);
    if (value === undefined) this.missCount++;
    else this.hitCount++;
    return value;
  }

  set(path: string, selected: boolean): void {
    this.results.set(path, selected);
  }

  has(path: string): boolean {
    return this.results.has(path);
  }

  get size(): number {
    return this.results.size;
  }

  get hits(): number {
    return this.hitCount;
  }

  get misses(): number {
    return this.missCount;
  }
}

export interface CacheBinding {
  cache: ResultCache;
  /** True when the previous cache for the source was kept because the rules did not change. */
  reused: boolean;
}

/**
 * Caches keyed by rule source, owned by the caller.
 *
 * A reload whose fingerprint equals the registered one keeps the existing cache (warm reload);
 * any change replaces it with an empty one, so memory stays bounded by the paths queried
 * since the last real rule change.
 */
export class CacheRegistry {
  private readonly caches = new Map<string, ResultCache>();

  bind(source: string, fingerprint: Fingerprint): CacheBinding {
    const key = resolve(source);
    const existing = this.caches.get(key);
    if (existing && fingerprintsEqual(existing.fingerprint, fingerprint)) {
      return { cache: existing, reused: true };
    }
    const cache = new ResultCache(fingerprint);
    this.caches.set(key, cache);
    return { cache, reused: false };
  }

  get(source: string): ResultCache | undefined {
    return this.caches.get(resolve(source));
  }

  delete(source: string): boolean {
    return this.caches.delete(resolve(source));
  }

  clear(): void {
    this.caches.clear();
  }

  get size(): number {
    return this.caches.size;
  }
}
