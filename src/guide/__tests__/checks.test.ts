import { describe, it, expect } from 'vitest';
import { isNumberedEntry, lintGuide } from '../checks.js';

const GUIDE = [
  '# Style guide',
  '',
  '- [Components](#1-components)',
  '- [Missing](#nowhere)',
  '',
  '## 1. Components',
  '',
  '### 1.1 Selectors',
  '',
  '- **Avoid** camelCase selectors.',
  '',
  '```ts',
  'const ok = 1;',
  '...',
  '```',
  '',
  '### 1.2 Outputs',
  '',
  'Some prose without bullets.',
  '',
  '```typescript',
  'const broken = ;',
  '```',
  '',
  '```bash',
  'npm run build (',
  '```',
].join('\n');

describe('lintGuide', () => {
  it('reports broken anchors, unguided entries and unparseable samples', () => {
    const result = lintGuide('docs/guide.md', GUIDE);

    expect(result.violations).toEqual([
      {
        ruleId: 'guide/toc-anchor',
        severity: 'error',
        file: 'docs/guide.md',
        line: 4,
        column: 3,
        message: 'Link "Missing" points to missing anchor "#nowhere"',
      },
      {
        ruleId: 'guide/entry-guidance',
        severity: 'error',
        file: 'docs/guide.md',
        line: 17,
        column: 1,
        message: 'Entry "1.2 Outputs" has no "Do" or "Avoid" bullet',
      },
      {
        ruleId: 'guide/code-block-parseable',
        severity: 'error',
        file: 'docs/guide.md',
        line: 22,
        column: 16,
        message: 'Code block does not parse: Expression expected.',
      },
    ]);
    expect(result.files).toBe(1);
    expect(result.errorCount).toBe(3);
  });

  it('accepts a guide that satisfies every check', () => {
    const guide = [
      '# Guide',
      '',
      '- [Setup](#1-setup)',
      '',
      '## 1) Setup',
      '',
      '- _Do_ install once.',
      '',
      '```tsx',
      'export const App = () => <main />;',
      '```',
    ].join('\n');

    expect(lintGuide('GUIDE.md', guide).violations).toEqual([]);
  });

  it('checks fenced samples indented under a list item', () => {
    const guide = ['## 1. Entry', '', '- Avoid this:', '', '  ```ts', '  const x = ;', '  ```'].join('\n');

    expect(lintGuide('GUIDE.md', guide).violations).toEqual([
      {
        ruleId: 'guide/code-block-parseable',
        severity: 'error',
        file: 'GUIDE.md',
        line: 6,
        column: 13,
        message: 'Code block does not parse: Expression expected.',
      },
    ]);
  });

  it('does not read comment lines inside an indented sample as guidance bullets', () => {
    const guide = [
      '## 1. Entry',
      '',
      'Prose only.',
      '',
      '  ```ts',
      '  /**',
      '   * Do not call this',
      '   */',
      '  export function call(): void {}',
      '  ```',
    ].join('\n');

    expect(lintGuide('GUIDE.md', guide).violations).toEqual([
      {
        ruleId: 'guide/entry-guidance',
        severity: 'error',
        file: 'GUIDE.md',
        line: 1,
        column: 1,
        message: 'Entry "1. Entry" has no "Do" or "Avoid" bullet',
      },
    ]);
  });

  it('checks fences with an info string and fences left open', () => {
    const titled = ['```ts title="a.ts"', 'const x = ;', '```'].join('\n');
    const unclosed = ['## 1. Entry', '', '- Do this.', '', '```ts', 'const x = ;'].join('\n');

    expect(lintGuide('GUIDE.md', titled).violations.map((v) => [v.ruleId, v.line, v.column])).toEqual([
      ['guide/code-block-parseable', 2, 11],
    ]);
    expect(lintGuide('GUIDE.md', unclosed).violations.map((v) => [v.ruleId, v.line, v.column])).toEqual([
      ['guide/code-block-parseable', 6, 11],
    ]);
  });

  it('ignores external links', () => {
    expect(lintGuide('GUIDE.md', 'See [the docs](https://example.test/docs).').violations).toEqual([]);
  });
});

describe('isNumberedEntry', () => {
  it('recognizes numbered headings', () => {
    expect(isNumberedEntry('1. Components')).toBe(true);
    expect(isNumberedEntry('2) Setup')).toBe(true);
    expect(isNumberedEntry('3.4 takeUntil comes last')).toBe(true);
    expect(isNumberedEntry('1.2.3. Deep entry')).toBe(true);
    expect(isNumberedEntry('Table of contents')).toBe(false);
    expect(isNumberedEntry('2024 roadmap')).toBe(false);
  });
});
