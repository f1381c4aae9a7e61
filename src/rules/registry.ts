/**
 * @fileoverview Rule Registry
 *
 * Holds one record per documented convention. Ids are unique and namespaced
 * by category (`rxjs/finnish-notation`).
 */

import { RuleRegistryError } from '../core/errors.js';
import { BUILTIN_RULES } from './builtin.js';
import { RULE_CATEGORIES, type AnyRuleDefinition, type RuleCategory } from './types.js';

const RULE_ID_PATTERN = /^([a-z]+)\/[a-z0-9]+(-[a-z0-9]+)*$/;

export interface RuleQuery {
  category?: RuleCategory;
}

export function isRuleCategory(value: string): value is RuleCategory {
  return RULE_CATEGORIES.some((candidate) => candidate === value);
}

// ============================================================================
// REGISTRY
// ============================================================================

export class RuleRegistry {
  private readonly rules = new Map<string, AnyRuleDefinition>();

  constructor(rules: readonly AnyRuleDefinition[] = []) {
    for (const rule of rules) {
      this.register(rule);
    }
  }

  get size(): number {
    return this.rules.size;
  }

  register(rule: AnyRuleDefinition): void {
    const match = RULE_ID_PATTERN.exec(rule.id);
    if (!match) {
      throw new RuleRegistryError(rule.id, `Invalid rule id "${rule.id}": expected "<category>/<kebab-case-name>"`);
    }
    if (match[1] !== rule.category) {
      throw new RuleRegistryError(
        rule.id,
        `Rule id "${rule.id}" does not match its category "${rule.category}"`,
      );
    }
    if (this.rules.has(rule.id)) {
      throw new RuleRegistryError(rule.id, `Rule "${rule.id}" is already registered`);
    }
    this.rules.set(rule.id, rule);
  }

  has(id: string): boolean {
    return this.rules.has(id);
  }

  get(id: string): AnyRuleDefinition | undefined {
    return this.rules.get(id);
  }

  /**
   * Like `get`, but throws with the closest known ids when the rule is missing.
   */
  require(id: string): AnyRuleDefinition {
    const rule = this.rules.get(id);
    if (rule) return rule;
    const suggestions = this.suggest(id);
    const hint = suggestions.length > 0 ? ` Did you mean ${suggestions.map((s) => `"${s}"`).join(' or ')}?` : '';
    throw new RuleRegistryError(id, `Unknown rule "${id}".${hint}`, suggestions);
  }

  list(query: RuleQuery = {}): AnyRuleDefinition[] {
    return Array.from(this.rules.values())
      .filter((rule) => !query.category || rule.category === query.category)
      .sort((a, b) => a.id.localeCompare(b.id));
  }

  ids(): string[] {
    return this.list().map((rule) => rule.id);
  }

  suggest(id: string, limit = 2): string[] {
    const needle = id.toLowerCase();
    return this.ids()
      .map((candidate) => ({ candidate, distance: editDistance(needle, candidate) }))
      .filter(({ candidate, distance }) => distance <= Math.max(3, Math.floor(candidate.length / 4)))
      .sort((a, b) => a.distance - b.distance || a.candidate.localeCompare(b.candidate))
      .slice(0, limit)
      .map(({ candidate }) => candidate);
  }
}

// ============================================================================
// FACTORY
// ============================================================================

export function createDefaultRegistry(): RuleRegistry {
  return new RuleRegistry(BUILTIN_RULES);
}

function editDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, index) => index);
  for (let i = 1; i <= a.length; i += 1) {
    const current = [i];
    for (let j = 1; j <= b.length; j += 1) {
      const substitution = previous[j - 1] + (a[i - 1] === b[j - 1] ? 0 : 1);
      current.push(Math.min(previous[j] + 1, current[j - 1] + 1, substitution));
    }
    previous = current;
  }
  return previous[b.length];
}
