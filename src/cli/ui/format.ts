import { relative } from 'node:path';

import type { RuleOrigin } from '../../core/rules/types.js';

// ── Table Alignment ─────────────────────────────────────────────────────────

/**
 * Pad a string to a fixed width (right-pad with spaces).
 */
export function padRight(str: string, width: number): string {
  if (str.length >= width) return str;
  return str + ' '.repeat(width - str.length);
}

/**
 * Pad a string to a fixed width (left-pad with spaces).
 */
export function padLeft(str: string, width: number): string {
  if (str.length >= width) return str;
  return ' '.repeat(width - str.length) + str;
}

// ── Rule Locations ──────────────────────────────────────────────────────────

/**
 * `file:line`, with the file shown relative to `cwd` when it lives below it.
 * Examples: ".pathignore:3", "shared/common.ignore:12"
 */
export function formatOrigin(origin: RuleOrigin, cwd: string = process.cwd()): string {
  const rel = relative(cwd, origin.file);
  const file = rel !== '' && !rel.startsWith('..') ? rel : origin.file;
  return `${file}:${origin.line}`;
}
