import type { MatchExplanation } from '../src/core/matcher/engine.js';
import type { Predicate } from '../src/core/rules/types.js';
import type { Renderer } from '../src/cli/ui/renderer.js';

export type RecordedEvent =
  | { type: 'match'; result: MatchExplanation; explain: boolean }
  | { type: 'predicate'; index: number; pattern: string }
  | { type: 'kept'; path: string }
  | { type: 'error'; title: string; details: string; tip?: string }
  | { type: 'message'; level: 'info'; message: string };

/**
 * Renderer that records calls instead of writing to the terminal.
 */
export class RecordingRenderer implements Renderer {
  readonly events: RecordedEvent[] = [];

  matchResult(result: MatchExplanation, opts: { explain?: boolean } = {}): void {
    this.events.push({ type: 'match', result, explain: !!opts.explain });
  }
  predicate(index: number, predicate: Predicate): void {
    this.events.push({ type: 'predicate', index, pattern: predicate.pattern });
  }
  keptPath(path: string): void {
    this.events.push({ type: 'kept', path });
  }
  error(title: string, details: string, tip?: string): void {
    this.events.push({ type: 'error', title, details, tip });
  }
  info(message: string): void {
    this.events.push({ type: 'message', level: 'info', message });
  }

  ofType<T extends RecordedEvent['type']>(type: T): Extract<RecordedEvent, { type: T }>[] {
    return this.events.filter((e): e is Extract<RecordedEvent, { type: T }> => e.type === type);
  }
}
