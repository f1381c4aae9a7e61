import { describe, it, expect } from 'vitest';
import { createDefaultRegistry, RuleRegistry } from '../../rules/registry.js';
import { takeUntilLastRule } from '../../rules/rxjs/takeuntil_last.js';
import { lintGuide } from '../checks.js';
import { renderGuide } from '../render.js';

describe('renderGuide', () => {
  const markdown = renderGuide(createDefaultRegistry());
  const lines = markdown.split('\n');

  it('passes every guide check', () => {
    expect(lintGuide('GUIDE.md', markdown).violations).toEqual([]);
  });

  it('numbers sections by category and entries by rule id', () => {
    expect(lines[0]).toBe('# Angular, NgRx and RxJS conventions');
    expect(lines).toContain('## 1. Angular');
    expect(lines).toContain('## 2. NgRx');
    expect(lines).toContain('## 3. RxJS');
    expect(lines).toContain('### 1.1 Prefixed kebab-case component selectors');
    expect(lines).toContain('### 3.4 takeUntil comes last');
  });

  it('links every entry from the table of contents', () => {
    expect(lines).toContain('- [2. NgRx](#2-ngrx)');
    expect(lines).toContain('  - [3.4 takeUntil comes last](#34-takeuntil-comes-last)');
  });

  it('renders Avoid, Do and Why bullets for each rule', () => {
    expect(lines.filter((line) => line === '- **Avoid** code like this:')).toHaveLength(13);
    expect(lines.filter((line) => line === '- **Do** write it this way:')).toHaveLength(13);
    expect(lines).toContain(`- **Why?** ${takeUntilLastRule.rationale}`);
    expect(lines).toContain('`rxjs/takeuntil-last` (default: warning)');
  });

  it('numbers only the categories that have rules', () => {
    const single = renderGuide(new RuleRegistry([takeUntilLastRule])).split('\n');

    expect(single).toContain('## 1. RxJS');
    expect(single).toContain('### 1.1 takeUntil comes last');
  });
});
