import { sep } from 'node:path';

import type { Predicate, RuleSet } from '../rules/types.js';
import type { ResultCache } from './cache.js';
import { computeFingerprint, fingerprintsEqual, type Fingerprint } from './fingerprint.js';

export const EXCLUDE_MARKER = '(?exclude)';

export interface MatchExplanation {
  path: string;
  selected: boolean;
  /** The deciding predicate; absent when nothing matched and the default applied. */
  predicate?: Predicate;
  index?: number;
}

/** Repo-relative paths use `/`; Windows callers may hand in `\`. */
export function normalizePath(path: string): string {
  return sep === '\\' ? path.replaceAll('\\', '/') : path;
}

/**
 * Ordered, first-match-wins evaluation over an immutable rule set.
 *
 * The earliest declared predicate that matches decides. A later `!pattern` does not
 * override an earlier broader rule; it has to come first to take effect.
 */
export class MatcherEngine {
  readonly fingerprint: Fingerprint;
  private readonly rules: RuleSet;

  constructor(rules: RuleSet, readonly cache?: ResultCache) {
    this.rules = Object.freeze([...rules]);
    this.fingerprint = computeFingerprint(this.rules);
    if (cache && !fingerprintsEqual(cache.fingerprint, this.fingerprint)) {
      throw new Error('Result cache was built for a different rule set');
    }
  }

  get size(): number {
    return this.rules.length;
  }

  get predicates(): RuleSet {
    return this.rules;
  }

  match(path: string): boolean {
    if (this.rules.length === 0) return false;

    const key = normalizePath(path);
    if (this.cache) {
      const cached = this.cache.get(key);
      if (cached !== undefined) return cached;
    }

    const selected = this.evaluate(key)?.polarity === 'select';
    this.cache?.set(key, selected);
    return selected;
  }

  /** Like `match()` but reports the deciding predicate. Never reads or writes the cache. */
  explain(path: string): MatchExplanation {
    const key = normalizePath(path);
    for (let i = 0; i < this.rules.length; i++) {
      const predicate = this.rules[i];
      if (predicate.matches(key)) {
        return { path: key, selected: predicate.polarity === 'select', predicate, index: i };
      }
    }
    return { path: key, selected: false };
  }

  /** Paths not selected by the rules, in input order. */
  filter(paths: Iterable<string>): string[] {
    const kept: string[] = [];
    for (const path of paths) {
      if (!this.match(path)) kept.push(path);
    }
    return kept;
  }

  describe(): string[] {
    return this.rules.map((p) => (p.polarity === 'deselect' ? `${EXCLUDE_MARKER}${p.pattern}` : p.pattern));
  }

  private evaluate(path: string): Predicate | undefined {
    for (const predicate of this.rules) {
      if (predicate.matches(path)) return predicate;
    }
    return undefined;
  }
}
