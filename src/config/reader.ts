import { dirname, isAbsolute, resolve } from 'node:path';
import type { ZodIssue } from 'zod';

import { fileExists, readYaml } from '../utils/fs.js';
import { DEFAULT_CONFIG_FILE, PathRulesConfigSchema, type PathRulesConfig } from './schema.js';

export interface ConfigReadResult {
  ok: boolean;
  config?: PathRulesConfig;
  /** Absolute path of the file that was read; absent when defaults were used. */
  path?: string;
  errors?: string[];
}

/**
 * Read `pathrules.config.yaml` from `cwd` (or an explicit path).
 *
 * A missing default file means defaults; a missing explicit file is an error.
 * `rulesFile` is resolved against the config file's directory.
 */
export async function readConfig(opts: { cwd?: string; path?: string } = {}): Promise<ConfigReadResult> {
  const cwd = resolve(opts.cwd ?? process.cwd());
  const path = resolve(cwd, opts.path ?? DEFAULT_CONFIG_FILE);

  if (!(await fileExists(path))) {
    if (opts.path) return { ok: false, errors: [`Config file not found: ${path}`] };
    const config = PathRulesConfigSchema.parse({});
    return { ok: true, config: { ...config, rulesFile: resolve(cwd, config.rulesFile) } };
  }

  let raw: unknown;
  try {
    raw = await readYaml(path);
  } catch (err) {
    return { ok: false, path, errors: [`Invalid YAML in ${path}: ${err instanceof Error ? err.message : String(err)}`] };
  }

  const parsed = PathRulesConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    return { ok: false, path, errors: parsed.error.issues.map(formatIssue) };
  }

  const config = parsed.data;
  const rulesFile = isAbsolute(config.rulesFile) ? config.rulesFile : resolve(dirname(path), config.rulesFile);
  return { ok: true, path, config: { ...config, rulesFile } };
}

function formatIssue(issue: ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${where}: ${issue.message}`;
}
