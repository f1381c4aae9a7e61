import { describe, it, expect } from 'vitest';
import { SourceScanner } from '../../scanner/source_scanner.js';
import { isSuppressed, parseSuppressions, type SuppressionMap } from '../suppressions.js';

function suppressionsOf(text: string): SuppressionMap {
  return parseSuppressions(new SourceScanner().parse('src/app/fixture.ts', text).sourceFile);
}

const SOURCE = [
  '// convention-lint-disable-next-line rxjs/finnish-notation',
  'const ticks = interval(1000);',
  "const clicks = fromEvent(document, 'click'); // convention-lint-disable-line",
  '/* convention-lint-disable-file ngrx/no-inline-selector, rxjs/no-exposed-subject */',
  '// convention-lint-disable-next-line rxjs/no-nested-subscribe -- legacy callback',
  'source.subscribe(() => inner.subscribe());',
].join('\n');

describe('parseSuppressions', () => {
  const map = suppressionsOf(SOURCE);

  it('maps next-line directives to the following line', () => {
    expect(map.lines.get(2)).toEqual(new Set(['rxjs/finnish-notation']));
    expect(isSuppressed(map, 'rxjs/finnish-notation', 2)).toBe(true);
    expect(isSuppressed(map, 'rxjs/finnish-notation', 1)).toBe(false);
    expect(isSuppressed(map, 'rxjs/takeuntil-last', 2)).toBe(false);
  });

  it('covers every rule when a directive names none', () => {
    expect(map.lines.get(3)).toBe('all');
    expect(isSuppressed(map, 'angular/component-selector', 3)).toBe(true);
  });

  it('applies file directives to every line', () => {
    expect(map.file).toEqual(new Set(['ngrx/no-inline-selector', 'rxjs/no-exposed-subject']));
    expect(isSuppressed(map, 'ngrx/no-inline-selector', 99)).toBe(true);
    expect(isSuppressed(map, 'rxjs/finnish-notation', 99)).toBe(false);
  });

  it('ignores the reason after --', () => {
    expect(map.lines.get(6)).toEqual(new Set(['rxjs/no-nested-subscribe']));
  });

  it('merges directives that target the same line', () => {
    const merged = suppressionsOf(
      ['// convention-lint-disable-next-line rxjs/b', 'const a = 1; // convention-lint-disable-line rxjs/a'].join('\n'),
    );

    expect(merged.lines.get(2)).toEqual(new Set(['rxjs/b', 'rxjs/a']));
  });

  it('does not match look-alike directives', () => {
    const lookalikes = suppressionsOf(
      ['// convention-lint-disable-nextline', '// convention-lint-disable-lines', '// eslint-disable-line'].join('\n'),
    );

    expect(lookalikes.lines.size).toBe(0);
    expect(lookalikes.file).toBeUndefined();
  });

  it('ignores directives inside string and template literals', () => {
    const literals = suppressionsOf(
      [
        "const marker = '// convention-lint-disable-file';",
        'const note = `${marker} /* convention-lint-disable-line */`;',
        'const ticks = interval(1000);',
      ].join('\n'),
    );

    expect(literals.file).toBeUndefined();
    expect(literals.lines.size).toBe(0);
  });

  it('reads rule ids from every line of a block comment', () => {
    const block = suppressionsOf(
      [
        '/* convention-lint-disable-file',
        '   rxjs/a */',
        '/**',
        ' * convention-lint-disable-next-line',
        ' *   rxjs/b, rxjs/c',
        ' */',
        'const ticks = interval(1000);',
      ].join('\n'),
    );

    expect(block.file).toEqual(new Set(['rxjs/a']));
    expect(block.lines.get(7)).toEqual(new Set(['rxjs/b', 'rxjs/c']));
    expect(block.lines.size).toBe(1);
  });
});
