export type PathRulesErrorCode = 'PATTERN_COMPILE' | 'INCLUDE_CYCLE' | 'SOURCE_UNAVAILABLE';

/**
 * Base class for every failure raised while building a rule set.
 *
 * Construction is all-or-nothing: any of these aborts the whole load and no partial
 * rule set is returned. `match()` itself never throws.
 */
export class PathRulesError extends Error {
  readonly code: PathRulesErrorCode;
  readonly file?: string;

  constructor(code: PathRulesErrorCode, message: string, opts: { file?: string; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.code = code;
    this.file = opts.file;
  }
}

export class PatternCompileError extends PathRulesError {
  readonly pattern: string;
  readonly line?: number;

  constructor(pattern: string, opts: { file?: string; line?: number; reason?: string; cause?: unknown } = {}) {
    const where = opts.file ? ` (${opts.file}${opts.line ? `:${opts.line}` : ''})` : '';
    const why = opts.reason ? `: ${opts.reason}` : '';
    super('PATTERN_COMPILE', `Invalid pattern ${JSON.stringify(pattern)}${where}${why}`, opts);
    this.pattern = pattern;
    this.line = opts.line;
  }
}

export type IncludeFailure = 'cycle' | 'duplicate';

export class IncludeCycleError extends PathRulesError {
  readonly reason: IncludeFailure;
  /** Files that were open when the offending include was reached, outermost first. */
  readonly chain: readonly string[];

  constructor(file: string, reason: IncludeFailure, chain: readonly string[]) {
    const message =
      reason === 'cycle'
        ? `Include cycle: ${[...chain, file].join(' -> ')}`
        : `Multiple include of rule file ${JSON.stringify(file)}`;
    super('INCLUDE_CYCLE', message, { file });
    this.reason = reason;
    this.chain = chain;
  }
}

/** Same class under the name the rule-file docs use for it. */
export { IncludeCycleError as IncludeCycleOrDuplicateError };

export class SourceUnavailableError extends PathRulesError {
  constructor(file: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('SOURCE_UNAVAILABLE', `Cannot read rule file ${JSON.stringify(file)}: ${detail}`, { file, cause });
  }
}

export function isPathRulesError(err: unknown): err is PathRulesError {
  return err instanceof PathRulesError;
}
