export { loadRules, parseRules, type LoadOptions } from './core/loader.js';
export { MatcherEngine, EXCLUDE_MARKER, normalizePath, type MatchExplanation } from './core/matcher/engine.js';
export { ResultCache, CacheRegistry, type CacheBinding } from './core/matcher/cache.js';
export {
  computeFingerprint,
  fingerprintsEqual,
  type Fingerprint,
  type FingerprintEntry,
} from './core/matcher/fingerprint.js';
export { compileRule, compileLine, expandLine, INCLUDE_DIRECTIVE } from './core/rules/compiler.js';
export type { Polarity, Predicate, RuleOrigin, RuleSet } from './core/rules/types.js';
export {
  PathRulesError,
  PatternCompileError,
  IncludeCycleError,
  IncludeCycleOrDuplicateError,
  SourceUnavailableError,
  isPathRulesError,
  type PathRulesErrorCode,
  type IncludeFailure,
} from './core/errors.js';
export { Logger, silentLogger, type LogLevel, type LoggerOptions } from './utils/logger.js';
