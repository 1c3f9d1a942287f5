export type Polarity = 'select' | 'deselect';

/** Where a predicate was declared. Diagnostics only; never part of the fingerprint. */
export interface RuleOrigin {
  file: string;
  /** 1-based line number within `file`. */
  line: number;
  /** The trimmed source line the predicate was expanded from. */
  text: string;
}

/**
 * One compiled path test plus its polarity.
 *
 * Every compiled form (root-anchored, any-depth, literal, spliced from an include) has this
 * same shape; only `pattern` records how it was produced.
 */
export interface Predicate {
  /** Canonical glob text handed to the glob translator. */
  readonly pattern: string;
  readonly polarity: Polarity;
  readonly origin: RuleOrigin;
  matches(path: string): boolean;
}

export type RuleSet = readonly Predicate[];

/**
 * State shared by every file visited in one load.
 *
 * `seen` is never cleared within a load, so a file reached twice is rejected even when
 * the two includes do not form a cycle.
 */
export interface InclusionChain {
  readonly seen: Set<string>;
  /** Files currently being read, outermost first. */
  readonly stack: string[];
}

export interface CompileContext {
  /** Canonical path (or logical name) of the file being compiled. */
  file: string;
  line: number;
  text: string;
  /** Loads an `#include` target (relative to the directory of `file`) and returns its predicates. */
  include(target: string): RuleSet;
}
