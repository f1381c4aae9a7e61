/**
 * @fileoverview Renders the rule registry as a style guide document.
 *
 * One numbered section per category and one numbered entry per rule, each
 * with Avoid, Do and Why bullets. The output passes every guide check.
 */

import type { RuleRegistry } from '../rules/registry.js';
import { RULE_CATEGORIES, type AnyRuleDefinition, type RuleCategory } from '../rules/types.js';
import { CONVENTION_LINT_VERSION } from '../version.js';
import { Slugger } from './markdown.js';

export const GUIDE_TITLE = 'Angular, NgRx and RxJS conventions';

const CATEGORY_TITLES: Record<RuleCategory, string> = {
  angular: 'Angular',
  ngrx: 'NgRx',
  rxjs: 'RxJS',
};

interface Section {
  heading: string;
  entries: Array<{ heading: string; rule: AnyRuleDefinition }>;
}

function buildSections(registry: RuleRegistry): Section[] {
  const sections: Section[] = [];
  for (const category of RULE_CATEGORIES) {
    const rules = registry.list({ category });
    if (rules.length === 0) continue;
    const number = sections.length + 1;
    sections.push({
      heading: `${number}. ${CATEGORY_TITLES[category]}`,
      entries: rules.map((rule, index) => ({ heading: `${number}.${index + 1} ${rule.name}`, rule })),
    });
  }
  return sections;
}

function renderEntry(heading: string, rule: AnyRuleDefinition): string[] {
  return [
    `### ${heading}`,
    '',
    `\`${rule.id}\` (default: ${rule.defaultSeverity})`,
    '',
    rule.description,
    '',
    '- **Avoid** code like this:',
    '',
    '```ts',
    rule.avoid,
    '```',
    '',
    '- **Do** write it this way:',
    '',
    '```ts',
    rule.prefer,
    '```',
    '',
    `- **Why?** ${rule.rationale}`,
    '',
  ];
}

export function renderGuide(registry: RuleRegistry): string {
  const sections = buildSections(registry);
  const slugger = new Slugger();
  slugger.slug(GUIDE_TITLE);
  slugger.slug('Table of contents');

  const toc: string[] = [];
  for (const section of sections) {
    toc.push(`- [${section.heading}](#${slugger.slug(section.heading)})`);
    for (const entry of section.entries) {
      toc.push(`  - [${entry.heading}](#${slugger.slug(entry.heading)})`);
    }
  }

  const lines = [
    `# ${GUIDE_TITLE}`,
    '',
    `Generated by convention-lint ${CONVENTION_LINT_VERSION.string}. Each entry names the rule that enforces it.`,
    '',
    '## Table of contents',
    '',
    ...toc,
    '',
  ];

  for (const section of sections) {
    lines.push(`## ${section.heading}`, '');
    for (const entry of section.entries) {
      lines.push(...renderEntry(entry.heading, entry.rule));
    }
  }

  return lines.join('\n');
}
