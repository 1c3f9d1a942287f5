import { compileLine } from './compiler.js';
import { resolveInclude } from './include.js';
import type { CompileContext, InclusionChain, Predicate, RuleSet } from './types.js';

export interface ParseHooks {
  /** Called after an `#include` has been spliced in. */
  onInclude?: (target: string, from: string, predicates: number) => void;
}

/**
 * Scan rule text top to bottom and compile it into an ordered rule set.
 *
 * Blank lines and `//` comments are skipped. Every other line is trimmed and compiled;
 * a line starting with `#` that is not an `#include ` directive is an ordinary pattern.
 */
export function parseRuleText(text: string, file: string, chain: InclusionChain, hooks: ParseHooks = {}): RuleSet {
  const parse = (body: string, includedFile: string) => parseRuleText(body, includedFile, chain, hooks);
  const out: Predicate[] = [];

  const lines = text.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === '' || line.startsWith('//')) continue;

    const ctx: CompileContext = {
      file,
      line: i + 1,
      text: line,
      include: (target) => {
        const included = resolveInclude(target, file, chain, parse);
        hooks.onInclude?.(target, file, included.length);
        return included;
      },
    };
    out.push(...compileLine(line, ctx));
  }

  return out;
}
