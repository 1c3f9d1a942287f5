import chalk from 'chalk';

// ── Semantic Colors ─────────────────────────────────────────────────────────
// Centralized color definitions. Respects NO_COLOR / FORCE_COLOR via chalk.

export const theme = {
  // Structural
  bold: chalk.bold,
  dim: chalk.dim,

  // Semantic
  error: chalk.red,
  info: chalk.blue,

  // Match outcome
  ignored: chalk.red,
  kept: chalk.green,
  exclude: chalk.magenta,

  // Symbols
  arrow: chalk.dim('←'),
} as const;

// ── Layout Constants ────────────────────────────────────────────────────────

/** Default indent for nested content (two spaces). */
export const INDENT = '  ';

/** Width of the outcome column in `check` output. */
export const OUTCOME_WIDTH = 9;
