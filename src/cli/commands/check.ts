import { normalizePath, type MatchExplanation } from '../../core/matcher/engine.js';
import { openRules, type RulesCommandOptions } from '../rules.js';
import { getRenderer } from '../ui/renderer.js';

export interface CheckCommandOptions extends RulesCommandOptions {
  paths: string[];
  explain?: boolean;
}

/**
 * `pathrules check <paths...>` — prints whether each path is ignored by the active rules.
 */
export async function runCheckCommand(
  opts: CheckCommandOptions
): Promise<{ ok: boolean; results?: MatchExplanation[]; details?: unknown }> {
  const r = getRenderer();
  const opened = await openRules(opts);
  if (!opened.ok) {
    r.error(opened.title, opened.details, opened.tip);
    return { ok: false, details: opened.details };
  }

  const { engine, logger } = opened;
  const results: MatchExplanation[] = [];
  for (const path of opts.paths) {
    const result = opts.explain ? engine.explain(path) : { path: normalizePath(path), selected: engine.match(path) };
    r.matchResult(result, { explain: opts.explain });
    results.push(result);
  }

  if (engine.cache) {
    logger.debug('cache stats', { hits: engine.cache.hits, misses: engine.cache.misses, entries: engine.cache.size });
  }
  return { ok: true, results };
}
