import picomatch from 'picomatch';

import { PatternCompileError } from '../errors.js';
import type { CompileContext, Polarity, Predicate, RuleSet } from './types.js';

export const INCLUDE_DIRECTIVE = '#include ';

/**
 * Glob translation settings.
 *
 * - `*` and `?` stay within one path segment. `**` crosses segments only as a whole
 *   segment; inside one (`a/**b`) it behaves like `*`.
 * - `[!a]` and `[^a]` are negated classes and never match `/`.
 * - Dotfiles are ordinary names.
 * - A leading `!` is ours (polarity), never the translator's.
 * - Braces and extglobs are plain text: `{a,b}` matches itself, not `a` or `b`.
 * - Unbalanced brackets and invalid regex output are errors instead of silently
 *   compiling to a never-matching pattern.
 * - `dir/**` requires the separator, so it does not match `dir` itself.
 */
const GLOB_OPTIONS = {
  dot: true,
  posix: true,
  nonegate: true,
  nobrace: true,
  noextglob: true,
  strictBrackets: true,
  strictSlashes: true,
  debug: true,
};

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

/**
 * Line preprocessing: the variants a raw rule line is compiled as.
 *
 * `#`-led lines (includes and literal `#` patterns) are compiled once; splicing an include
 * twice would trip duplicate detection.
 */
export function expandLine(line: string): string[] {
  if (line.startsWith('#')) return [line];
  if (line.endsWith('/**')) return [line];
  if (line.endsWith('/')) return [line, `${line}**`];
  return [line, `${line}/**`];
}

/**
 * Compile one preprocessed rule variant into zero or more predicates.
 *
 * Forms are tried in priority order: `!` polarity marker, `/` root anchor, `**\/` any-depth
 * prefix, `#include ` directive, then the default (literal plus implicit `**\/` variant).
 */
export function compileRule(text: string, ctx: CompileContext): RuleSet {
  let polarity: Polarity = 'select';
  let rule = text;
  if (rule.startsWith('!')) {
    rule = rule.slice(1);
    polarity = 'deselect';
  }

  if (rule.startsWith('/')) {
    return [compileGlob(rule.slice(1), polarity, ctx)];
  }
  if (rule.startsWith('**/')) {
    return [compileGlob(rule, polarity, ctx), compileGlob(rule.slice(3), polarity, ctx)];
  }
  if (rule.startsWith(INCLUDE_DIRECTIVE)) {
    return ctx.include(rule.slice(INCLUDE_DIRECTIVE.length));
  }
  return [compileGlob(rule, polarity, ctx), compileGlob(`**/${rule}`, polarity, ctx)];
}

/** Compile every variant of one trimmed source line, in order. */
export function compileLine(line: string, ctx: CompileContext): RuleSet {
  const out: Predicate[] = [];
  for (const variant of expandLine(line)) {
    out.push(...compileRule(variant, ctx));
  }
  return out;
}

export function compileGlob(pattern: string, polarity: Polarity, ctx: CompileContext): Predicate {
  const fail = (reason: string, cause?: unknown) =>
    new PatternCompileError(pattern, { file: ctx.file, line: ctx.line, reason, cause });

  if (CONTROL_CHARS.test(pattern)) throw fail('control character in pattern');

  // An empty glob (from a bare `/` or `!` line) only matches the empty path.
  let isMatch: (path: string) => boolean = (path) => path === '';
  if (pattern !== '') {
    try {
      isMatch = picomatch(pattern, GLOB_OPTIONS);
    } catch (err) {
      throw fail(err instanceof Error ? err.message : String(err), err);
    }
  }

  return Object.freeze({
    pattern,
    polarity,
    origin: Object.freeze({ file: ctx.file, line: ctx.line, text: ctx.text }),
    matches: (path: string) => isMatch(path),
  });
}
