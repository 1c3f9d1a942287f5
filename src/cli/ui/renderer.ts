import type { MatchExplanation } from '../../core/matcher/engine.js';
import type { Predicate } from '../../core/rules/types.js';
import { theme, INDENT, OUTCOME_WIDTH } from './theme.js';
import { formatOrigin, padLeft, padRight } from './format.js';

// ── Renderer Interface ──────────────────────────────────────────────────────

/**
 * The Renderer is the single output coordinator for the CLI.
 * Results go to stdout, diagnostics to stderr, through one of:
 * - InteractiveRenderer for colored, aligned human output
 * - QuietRenderer for machine-friendly JSON lines (--quiet mode)
 */
export interface Renderer {
  // ── Results ──
  matchResult(result: MatchExplanation, opts?: { explain?: boolean }): void;
  predicate(index: number, predicate: Predicate): void;
  keptPath(path: string): void;

  // ── Errors ──
  error(title: string, details: string, tip?: string): void;

  // ── Notices ──
  info(message: string): void;
}

// ── Interactive Renderer ────────────────────────────────────────────────────

export class InteractiveRenderer implements Renderer {
  private out(msg: string = ''): void {
    process.stdout.write(msg + '\n');
  }
  private writeln(msg: string = ''): void {
    process.stderr.write(msg + '\n');
  }

  matchResult(result: MatchExplanation, opts: { explain?: boolean } = {}): void {
    const outcome = result.selected
      ? theme.ignored(padRight('ignored', OUTCOME_WIDTH))
      : theme.kept(padRight('kept', OUTCOME_WIDTH));
    let line = `${outcome}${result.path}`;
    if (opts.explain) {
      const p = result.predicate;
      const why = p ? `${describePredicate(p)} (${formatOrigin(p.origin)})` : 'no rule matched';
      line += `  ${theme.arrow} ${theme.dim(why)}`;
    }
    this.out(line);
  }

  predicate(index: number, predicate: Predicate): void {
    const text = predicate.polarity === 'deselect' ? theme.exclude(describePredicate(predicate)) : predicate.pattern;
    this.out(`${theme.dim(padLeft(String(index), 4))}  ${text}  ${theme.dim(formatOrigin(predicate.origin))}`);
  }

  keptPath(path: string): void {
    this.out(path);
  }

  error(title: string, details: string, tip?: string): void {
    this.writeln();
    this.writeln(`${INDENT}${theme.error(theme.bold('ERROR'))}  ${title}`);
    this.writeln();
    for (const line of details.split('\n')) {
      this.writeln(`${INDENT}${line}`);
    }
    if (tip) {
      this.writeln();
      this.writeln(`${INDENT}${theme.dim('Tip:')} ${tip}`);
    }
    this.writeln();
  }

  info(message: string): void {
    this.writeln(`${INDENT}${theme.info('ℹ')} ${message}`);
  }
}

// ── Quiet Renderer (JSON Lines) ─────────────────────────────────────────────

export class QuietRenderer implements Renderer {
  private emit(type: string, data: Record<string, unknown> = {}, stream: NodeJS.WriteStream = process.stdout): void {
    stream.write(JSON.stringify({ type, ...data }) + '\n');
  }

  matchResult(result: MatchExplanation, opts: { explain?: boolean } = {}): void {
    const p = result.predicate;
    this.emit('match', {
      path: result.path,
      ignored: result.selected,
      ...(opts.explain && p ? { pattern: p.pattern, polarity: p.polarity, file: p.origin.file, line: p.origin.line } : {}),
    });
  }

  predicate(index: number, predicate: Predicate): void {
    this.emit('predicate', {
      index,
      pattern: predicate.pattern,
      polarity: predicate.polarity,
      file: predicate.origin.file,
      line: predicate.origin.line,
    });
  }

  keptPath(path: string): void {
    this.emit('kept', { path });
  }

  error(title: string, details: string, tip?: string): void {
    this.emit('error', { title, details, tip }, process.stderr);
  }

  info(message: string): void {
    this.emit('info', { message }, process.stderr);
  }
}

// ── Helpers ─────────────────────────────────────────────────────────────────

function describePredicate(p: Predicate): string {
  return p.polarity === 'deselect' ? `!${p.pattern}` : p.pattern;
}

// ── Singleton Access ────────────────────────────────────────────────────────

let _instance: Renderer | null = null;

/**
 * Get the active Renderer. Falls back to an InteractiveRenderer.
 */
export function getRenderer(): Renderer {
  if (!_instance) {
    _instance = process.env.PATHRULES_QUIET === '1' ? new QuietRenderer() : new InteractiveRenderer();
  }
  return _instance;
}

/**
 * Override the global Renderer (e.g., for testing or --quiet mode).
 */
export function setRenderer(renderer: Renderer): void {
  _instance = renderer;
}

/**
 * Create the appropriate renderer based on flags.
 */
export function createRenderer(opts: { quiet?: boolean } = {}): Renderer {
  const r = opts.quiet ? new QuietRenderer() : new InteractiveRenderer();
  _instance = r;
  return r;
}
