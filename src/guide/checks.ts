/**
 * @fileoverview Style guide document checks
 *
 * The guide is itself linted: every in-document link must land on a heading,
 * every numbered entry must say what to do or avoid, and every TypeScript or
 * JavaScript sample must parse.
 */

import { buildLintResult, type LintResult } from '../engine/evaluator.js';
import type { Violation } from '../rules/types.js';
import { SourceScanner } from '../scanner/source_scanner.js';
import { parseMarkdown, type GuideDocument } from './markdown.js';

export interface GuideCheck {
  id: string;
  description: string;
  check(doc: GuideDocument, relPath: string): Violation[];
}

const NUMBERED_ENTRY = /^(?:\d+(?:\.\d+)+\.?|\d+[.)])\s+/;
const GUIDANCE_BULLET = /^(?:\*\*|__|\*|_)?(?:Do|Avoid)(?:\*\*|__|\*|_)?(?=[\s:.,]|$)/;
const ELIDED_LINE = /^\s*\.\.\.\s*$/;

const CODE_EXTENSIONS = new Map<string, string>([
  ['ts', 'ts'],
  ['typescript', 'ts'],
  ['tsx', 'tsx'],
  ['js', 'js'],
  ['javascript', 'js'],
  ['jsx', 'jsx'],
]);

export function isNumberedEntry(headingText: string): boolean {
  return NUMBERED_ENTRY.test(headingText);
}

export const tocAnchorCheck: GuideCheck = {
  id: 'guide/toc-anchor',
  description: 'Every in-document link points at an existing heading anchor.',
  check(doc, relPath) {
    const anchors = new Set(doc.headings.map((heading) => heading.slug));
    return doc.links
      .filter((link) => link.url.startsWith('#') && !anchors.has(link.url.slice(1)))
      .map((link): Violation => ({
        ruleId: 'guide/toc-anchor',
        severity: 'error',
        file: relPath,
        line: link.line,
        column: link.column,
        message: `Link "${link.text}" points to missing anchor "${link.url}"`,
      }));
  },
};

export const entryGuidanceCheck: GuideCheck = {
  id: 'guide/entry-guidance',
  description: 'Every numbered entry has a "Do" or "Avoid" bullet.',
  check(doc, relPath) {
    const violations: Violation[] = [];

    doc.headings.forEach((heading, index) => {
      if (!isNumberedEntry(heading.text)) return;
      const next = doc.headings.slice(index + 1).find((candidate) => candidate.level <= heading.level);
      const end = next ? next.line : Number.POSITIVE_INFINITY;
      const guided = doc.bullets.some(
        (bullet) => bullet.line > heading.line && bullet.line < end && GUIDANCE_BULLET.test(bullet.text),
      );
      if (!guided) {
        violations.push({
          ruleId: 'guide/entry-guidance',
          severity: 'error',
          file: relPath,
          line: heading.line,
          column: 1,
          message: `Entry "${heading.text}" has no "Do" or "Avoid" bullet`,
        });
      }
    });

    return violations;
  },
};

export const codeBlockParseableCheck: GuideCheck = {
  id: 'guide/code-block-parseable',
  description: 'Every ts, tsx, js and jsx code block parses; a line holding only "..." is ignored.',
  check(doc, relPath) {
    const scanner = new SourceScanner();
    const violations: Violation[] = [];

    doc.codeBlocks.forEach((block, index) => {
      const extension = block.language ? CODE_EXTENSIONS.get(block.language) : undefined;
      if (!extension) return;
      const text = block.content
        .split('\n')
        .map((line) => (ELIDED_LINE.test(line) ? '' : line))
        .join('\n');
      const parsed = scanner.parse(`guide-block-${index + 1}.${extension}`, text);
      for (const error of parsed.parseErrors) {
        violations.push({
          ruleId: 'guide/code-block-parseable',
          severity: 'error',
          file: relPath,
          line: block.lineStart + error.line - 1,
          column: block.indent + error.column,
          message: `Code block does not parse: ${error.message}`,
        });
      }
    });

    return violations;
  },
};

export const GUIDE_CHECKS: readonly GuideCheck[] = [tocAnchorCheck, entryGuidanceCheck, codeBlockParseableCheck];

export function lintGuide(relPath: string, text: string): LintResult {
  const doc = parseMarkdown(text);
  const violations = GUIDE_CHECKS.flatMap((guideCheck) => guideCheck.check(doc, relPath));
  return buildLintResult(1, violations);
}
