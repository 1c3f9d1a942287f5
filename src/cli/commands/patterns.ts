import { openRules, type RulesCommandOptions } from '../rules.js';
import { getRenderer } from '../ui/renderer.js';

/**
 * `pathrules patterns` — lists the compiled predicates in evaluation order.
 */
export async function runPatternsCommand(
  opts: RulesCommandOptions
): Promise<{ ok: boolean; patterns?: string[]; details?: unknown }> {
  const r = getRenderer();
  const opened = await openRules(opts);
  if (!opened.ok) {
    r.error(opened.title, opened.details, opened.tip);
    return { ok: false, details: opened.details };
  }

  const { engine } = opened;
  if (engine.size === 0) {
    r.info(`No rules in ${opened.config.rulesFile}; nothing is ignored.`);
    return { ok: true, patterns: [] };
  }

  engine.predicates.forEach((predicate, index) => r.predicate(index, predicate));
  return { ok: true, patterns: engine.describe() };
}
