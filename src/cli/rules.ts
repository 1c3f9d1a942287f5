import { resolve } from 'node:path';

import { readConfig } from '../config/reader.js';
import type { PathRulesConfig } from '../config/schema.js';
import { isPathRulesError } from '../core/errors.js';
import { loadRules } from '../core/loader.js';
import type { CacheRegistry } from '../core/matcher/cache.js';
import type { MatcherEngine } from '../core/matcher/engine.js';
import { Logger } from '../utils/logger.js';

export interface RulesCommandOptions {
  cwd?: string;
  /** Explicit config file (`--config`). */
  configPath?: string;
  /** Overrides `rulesFile` from config (`--rules`). */
  rulesFile?: string;
  /** Overrides `cache` from config. */
  cache?: boolean;
  verbose?: boolean;
  registry?: CacheRegistry;
  /** Overrides the logger built from config; tests pass a captured one. */
  logger?: Logger;
}

export type OpenRulesResult =
  | { ok: true; engine: MatcherEngine; config: PathRulesConfig; logger: Logger }
  | { ok: false; title: string; details: string; tip?: string };

/**
 * Shared front half of every command: config, logger, then the rule file itself.
 * Load failures come back as a result; anything that is not a rules error is rethrown.
 */
export async function openRules(opts: RulesCommandOptions): Promise<OpenRulesResult> {
  const cwd = resolve(opts.cwd ?? process.cwd());
  const cfg = await readConfig({ cwd, path: opts.configPath });
  if (!cfg.ok || !cfg.config) {
    return {
      ok: false,
      title: 'Invalid configuration',
      details: (cfg.errors ?? ['unknown error']).join('\n'),
      tip: cfg.path ? `Check ${cfg.path}` : undefined,
    };
  }

  const config = cfg.config;
  const logger =
    opts.logger ?? new Logger({ level: opts.verbose ? 'debug' : config.log.level, json: config.log.json });
  const rulesFile = opts.rulesFile ? resolve(cwd, opts.rulesFile) : config.rulesFile;

  try {
    const engine = loadRules(rulesFile, { cache: opts.cache ?? config.cache, registry: opts.registry, logger });
    return { ok: true, engine, config: { ...config, rulesFile }, logger };
  } catch (err) {
    if (!isPathRulesError(err)) throw err;
    logger.debug('rule load failed', { code: err.code, file: err.file });
    return {
      ok: false,
      title: 'Rules failed to load',
      details: err.message,
      tip: err.code === 'SOURCE_UNAVAILABLE' ? 'Pass --rules <file> or set rulesFile in pathrules.config.yaml.' : undefined,
    };
  }
}
