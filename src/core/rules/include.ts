import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

import { IncludeCycleError, SourceUnavailableError } from '../errors.js';
import type { InclusionChain, RuleSet } from './types.js';

export type RuleTextParser = (text: string, file: string) => RuleSet;

/** Canonical identifier of a rule file: its absolute, normalised path. */
export function canonicalRuleFile(file: string): string {
  return resolve(file);
}

export function createInclusionChain(...open: string[]): InclusionChain {
  return { seen: new Set(open), stack: [...open] };
}

/**
 * Resolve an `#include` target against the directory of the including file and load it.
 * Absolute targets are used as-is.
 */
export function resolveInclude(target: string, fromFile: string, chain: InclusionChain, parse: RuleTextParser): RuleSet {
  const file = resolve(dirname(fromFile), target);
  return loadRuleFile(file, chain, parse);
}

/**
 * Read one rule file and parse it with `parse`, rejecting files already visited in this load.
 */
export function loadRuleFile(file: string, chain: InclusionChain, parse: RuleTextParser): RuleSet {
  const canonical = canonicalRuleFile(file);
  if (chain.seen.has(canonical)) {
    const reason = chain.stack.includes(canonical) ? 'cycle' : 'duplicate';
    throw new IncludeCycleError(canonical, reason, [...chain.stack]);
  }
  chain.seen.add(canonical);

  const text = readRuleSource(canonical);
  chain.stack.push(canonical);
  try {
    return parse(text, canonical);
  } finally {
    chain.stack.pop();
  }
}

export function readRuleSource(file: string): string {
  try {
    return readFileSync(file, 'utf8');
  } catch (err) {
    throw new SourceUnavailableError(file, err);
  }
}
