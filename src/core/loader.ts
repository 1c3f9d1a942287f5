import { silentLogger, type Logger } from '../utils/logger.js';
import { CacheRegistry } from './matcher/cache.js';
import { MatcherEngine } from './matcher/engine.js';
import { computeFingerprint } from './matcher/fingerprint.js';
import { canonicalRuleFile, createInclusionChain, loadRuleFile } from './rules/include.js';
import { parseRuleText, type ParseHooks } from './rules/parser.js';
import type { RuleSet } from './rules/types.js';

export interface LoadOptions {
  /** Memoise match results. Without a `registry` the cache lives only as long as the engine. */
  cache?: boolean;
  /** Caches shared across reloads, keyed by rule source. */
  registry?: CacheRegistry;
  logger?: Logger;
}

/**
 * Load a rule file (and everything it includes) into a matcher.
 *
 * Synchronous and all-or-nothing: the first unreadable file, bad pattern or repeated
 * include throws and no engine is produced.
 */
export function loadRules(file: string, opts: LoadOptions = {}): MatcherEngine {
  const log = (opts.logger ?? silentLogger).child('loader');
  const source = canonicalRuleFile(file);
  const hooks = includeHooks(log);

  const chain = createInclusionChain();
  const rules = loadRuleFile(source, chain, (text, name) => parseRuleText(text, name, chain, hooks));
  log.debug('rule file loaded', { file: source, predicates: rules.length });

  return bindEngine(rules, source, opts, log);
}

/**
 * Build a matcher from rule text that is already in memory.
 *
 * `name` is the logical file name: `#include` targets resolve against its directory, and it
 * counts as already loaded, so the text cannot include its own file.
 */
export function parseRules(text: string, name: string, opts: LoadOptions = {}): MatcherEngine {
  const log = (opts.logger ?? silentLogger).child('loader');
  const source = canonicalRuleFile(name);

  const chain = createInclusionChain(source);
  const rules = parseRuleText(text, source, chain, includeHooks(log));
  log.debug('rule text parsed', { name: source, predicates: rules.length });

  return bindEngine(rules, source, opts, log);
}

function bindEngine(rules: RuleSet, source: string, opts: LoadOptions, log: Logger): MatcherEngine {
  if (!opts.cache) return new MatcherEngine(rules);

  const registry = opts.registry ?? new CacheRegistry();
  const fingerprint = computeFingerprint(rules);
  const { cache, reused } = registry.bind(source, fingerprint);
  log.debug(reused ? 'result cache reused' : 'result cache reset', {
    source,
    fingerprint: fingerprint.digest.slice(0, 12),
    entries: cache.size,
  });
  return new MatcherEngine(rules, cache);
}

function includeHooks(log: Logger): ParseHooks {
  return {
    onInclude: (target, from, predicates) => log.debug('include spliced', { target, from, predicates }),
  };
}
