import { createInterface } from 'node:readline';

import { openRules, type RulesCommandOptions } from '../rules.js';
import { getRenderer } from '../ui/renderer.js';

export interface FilterCommandOptions extends RulesCommandOptions {
  /** Paths to filter; defaults to the lines of stdin. */
  lines?: AsyncIterable<string> | Iterable<string>;
}

/**
 * `pathrules filter` — reads one path per line and writes back those the rules keep.
 */
export async function runFilterCommand(
  opts: FilterCommandOptions
): Promise<{ ok: boolean; kept?: string[]; details?: unknown }> {
  const r = getRenderer();
  const opened = await openRules(opts);
  if (!opened.ok) {
    r.error(opened.title, opened.details, opened.tip);
    return { ok: false, details: opened.details };
  }

  const { engine, logger } = opened;
  const lines = opts.lines ?? createInterface({ input: process.stdin, crlfDelay: Infinity });
  const kept: string[] = [];
  let total = 0;

  for await (const raw of lines) {
    const path = raw.trim();
    if (path === '') continue;
    total++;
    if (engine.match(path)) continue;
    kept.push(path);
    r.keptPath(path);
  }

  logger.debug('filter done', { total, kept: kept.length });
  return { ok: true, kept };
}
