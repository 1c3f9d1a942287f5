import { describe, expect, it } from 'vitest';

import { compileGlob, compileLine, compileRule, expandLine } from '../src/core/rules/compiler.js';
import { PatternCompileError } from '../src/core/errors.js';
import type { CompileContext, RuleSet } from '../src/core/rules/types.js';

function ctx(overrides: Partial<CompileContext> = {}): CompileContext {
  return {
    file: '/rules/.pathignore',
    line: 1,
    text: '',
    include: () => {
      throw new Error('unexpected include');
    },
    ...overrides,
  };
}

function patterns(rules: RuleSet): string[] {
  return rules.map((p) => p.pattern);
}

describe('line preprocessing', () => {
  it('adds a descendant variant to plain lines', () => {
    expect(expandLine('build')).toEqual(['build', 'build/**']);
    expect(expandLine('!keep.log')).toEqual(['!keep.log', '!keep.log/**']);
  });

  it('expands a trailing slash with **', () => {
    expect(expandLine('out/')).toEqual(['out/', 'out/**']);
  });

  it('compiles trailing /** and #-led lines once', () => {
    expect(expandLine('src/gen/**')).toEqual(['src/gen/**']);
    expect(expandLine('#include common.ignore')).toEqual(['#include common.ignore']);
    expect(expandLine('#notes')).toEqual(['#notes']);
  });
});

describe('compileRule', () => {
  it('compiles a plain pattern at the root and at any depth', () => {
    const rules = compileRule('build', ctx());
    expect(patterns(rules)).toEqual(['build', '**/build']);
    expect(rules.every((p) => p.polarity === 'select')).toBe(true);
  });

  it('root-anchors a leading slash', () => {
    const rules = compileRule('/build', ctx());
    expect(patterns(rules)).toEqual(['build']);
    expect(rules[0].matches('build')).toBe(true);
    expect(rules[0].matches('a/build')).toBe(false);
  });

  it('adds the root form for a leading **/', () => {
    expect(patterns(compileRule('**/build', ctx()))).toEqual(['**/build', 'build']);
  });

  it('strips ! and flips polarity before the other forms apply', () => {
    const negated = compileRule('!keep.log', ctx());
    expect(patterns(negated)).toEqual(['keep.log', '**/keep.log']);
    expect(negated.every((p) => p.polarity === 'deselect')).toBe(true);

    const rooted = compileRule('!/build', ctx());
    expect(patterns(rooted)).toEqual(['build']);
    expect(rooted[0].polarity).toBe('deselect');
  });

  it('splices included predicates in place of the directive', () => {
    const spliced = compileRule('only', ctx()).concat(compileRule('other', ctx()));
    const targets: string[] = [];
    const rules = compileRule(
      '#include shared/common.ignore',
      ctx({
        include: (target) => {
          targets.push(target);
          return spliced;
        },
      })
    );
    expect(targets).toEqual(['shared/common.ignore']);
    expect(rules).toEqual(spliced);
  });

  it('treats other #-led lines as literal patterns', () => {
    const rules = compileRule('#notes', ctx());
    expect(patterns(rules)).toEqual(['#notes', '**/#notes']);
    expect(rules[0].matches('#notes')).toBe(true);
    expect(rules[1].matches('docs/#notes')).toBe(true);
  });

  it('records where each predicate came from', () => {
    const [p] = compileRule('build', ctx({ line: 7, text: 'build' }));
    expect(p.origin).toEqual({ file: '/rules/.pathignore', line: 7, text: 'build' });
  });
});

describe('compileLine', () => {
  it('compiles every preprocessed variant in order', () => {
    expect(patterns(compileLine('build', ctx()))).toEqual(['build', '**/build', 'build/**', '**/build/**']);
    expect(patterns(compileLine('out/', ctx()))).toEqual(['out/', '**/out/', 'out/**', '**/out/**']);
    expect(patterns(compileLine('/dist', ctx()))).toEqual(['dist', 'dist/**']);
  });

  it('resolves an include exactly once', () => {
    let calls = 0;
    compileLine(
      '#include other.ignore',
      ctx({
        include: () => {
          calls++;
          return [];
        },
      })
    );
    expect(calls).toBe(1);
  });
});

describe('glob semantics', () => {
  it('keeps * and ? within one segment', () => {
    const star = compileGlob('*.log', 'select', ctx());
    expect(star.matches('debug.log')).toBe(true);
    expect(star.matches('logs/debug.log')).toBe(false);

    const qmark = compileGlob('?.txt', 'select', ctx());
    expect(qmark.matches('a.txt')).toBe(true);
    expect(qmark.matches('ab.txt')).toBe(false);
  });

  it('lets ** cross segments', () => {
    const deep = compileGlob('**/*.log', 'select', ctx());
    expect(deep.matches('a/b/debug.log')).toBe(true);
    expect(deep.matches('debug.log')).toBe(true);
  });

  it('supports character classes', () => {
    const cls = compileGlob('[ab].txt', 'select', ctx());
    expect(cls.matches('a.txt')).toBe(true);
    expect(cls.matches('c.txt')).toBe(false);
  });

  it('negates a class with ! or ^', () => {
    for (const glob of ['[!a].txt', '[^a].txt']) {
      const negated = compileGlob(glob, 'select', ctx());
      expect(negated.matches('b.txt')).toBe(true);
      expect(negated.matches('a.txt')).toBe(false);
      expect(negated.matches('!.txt')).toBe(true);
    }
  });

  it('never lets a negated class match the separator', () => {
    const cls = compileGlob('x[!a]y', 'select', ctx());
    expect(cls.matches('xby')).toBe(true);
    expect(cls.matches('x/y')).toBe(false);
  });

  it('treats braces as plain text', () => {
    const braces = compileGlob('file{a,b}', 'select', ctx());
    expect(braces.matches('file{a,b}')).toBe(true);
    expect(braces.matches('filea')).toBe(false);
    expect(braces.matches('fileb')).toBe(false);

    expect(compileGlob('a{b', 'select', ctx()).matches('a{b')).toBe(true);
  });

  it('does not expand extglobs', () => {
    const ext = compileGlob('@(x)', 'select', ctx());
    expect(ext.matches('x')).toBe(false);
    expect(ext.matches('@x')).toBe(true);
  });

  it('matches dotfiles like any other name', () => {
    expect(compileGlob('*', 'select', ctx()).matches('.env')).toBe(true);
  });

  it('requires the separator before a trailing /**', () => {
    const tree = compileGlob('out/**', 'select', ctx());
    expect(tree.matches('out/a/b.txt')).toBe(true);
    expect(tree.matches('out')).toBe(false);
  });
});

describe('compile errors', () => {
  it('rejects an unterminated character class', () => {
    expect(() => compileRule('[abc', ctx())).toThrow(PatternCompileError);
  });

  it('reports pattern and location', () => {
    let caught: unknown;
    try {
      compileRule('[abc', ctx({ line: 4 }));
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(PatternCompileError);
    if (!(caught instanceof PatternCompileError)) return;
    expect(caught.code).toBe('PATTERN_COMPILE');
    expect(caught.pattern).toBe('[abc');
    expect(caught.file).toBe('/rules/.pathignore');
    expect(caught.line).toBe(4);
  });

  it('rejects control characters', () => {
    expect(() => compileRule('bad\u0001name', ctx())).toThrow(/control character/);
  });
});
