import { createHash } from 'node:crypto';

import type { Polarity, RuleSet } from '../rules/types.js';

export interface FingerprintEntry {
  readonly pattern: string;
  readonly polarity: Polarity;
}

/**
 * Identity of a rule set for cache reuse: the ordered (pattern, polarity) pairs.
 *
 * Origins are not part of it: moving a rule to another line or file without changing the
 * effective order yields the same fingerprint.
 */
export interface Fingerprint {
  readonly entries: readonly FingerprintEntry[];
  /** sha256 over `entries`; for logs, equality always compares `entries`. */
  readonly digest: string;
}

export function computeFingerprint(rules: RuleSet): Fingerprint {
  const entries = Object.freeze(rules.map((p) => Object.freeze({ pattern: p.pattern, polarity: p.polarity })));
  return Object.freeze({ entries, digest: sha256(JSON.stringify(entries.map((e) => [e.pattern, e.polarity]))) });
}

export function fingerprintsEqual(a: Fingerprint, b: Fingerprint): boolean {
  if (a === b) return true;
  if (a.entries.length !== b.entries.length) return false;
  for (let i = 0; i < a.entries.length; i++) {
    const x = a.entries[i];
    const y = b.entries[i];
    if (x.polarity !== y.polarity || x.pattern !== y.pattern) return false;
  }
  return true;
}

function sha256(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}
