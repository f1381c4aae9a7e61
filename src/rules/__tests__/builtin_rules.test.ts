import { describe, it, expect } from 'vitest';
import { runRule } from '../../__tests__/helpers/rules.js';
import { SourceScanner } from '../../scanner/source_scanner.js';
import { BUILTIN_RULES } from '../builtin.js';

describe('built-in rule documentation', () => {
  const scanner = new SourceScanner();

  it.each(BUILTIN_RULES.map((rule) => [rule.id, rule] as const))('%s examples parse', (_id, rule) => {
    expect(scanner.parse('avoid.ts', rule.avoid).parseErrors).toEqual([]);
    expect(scanner.parse('prefer.ts', rule.prefer).parseErrors).toEqual([]);
  });

  it.each(BUILTIN_RULES.map((rule) => [rule.id, rule] as const))('%s flags its Avoid example only', (_id, rule) => {
    expect(runRule(rule, rule.avoid).length).toBeGreaterThan(0);
    expect(runRule(rule, rule.prefer)).toEqual([]);
  });

  it('fills every documentation field', () => {
    for (const rule of BUILTIN_RULES) {
      expect(rule.name.length).toBeGreaterThan(0);
      expect(rule.description.endsWith('.')).toBe(true);
      expect(rule.rationale.endsWith('.')).toBe(true);
    }
  });
});
