/**
 * @fileoverview Inline suppression directives
 *
 *   // convention-lint-disable-next-line rxjs/finnish-notation
 *   const value = of(1); // convention-lint-disable-line
 *   /* convention-lint-disable-file ngrx/no-inline-selector, rxjs/no-exposed-subject *\/
 *
 * Without rule ids a directive covers every rule. Text after ` -- ` is a
 * free-form reason and is ignored. Directives are read from comments only,
 * never from string or template literals; a block comment may list its rule
 * ids on the lines after the directive.
 */

import { SyntaxKind, type CommentRange, type SourceFile } from 'ts-morph';

const DIRECTIVE = /^\s*convention-lint-(disable-next-line|disable-line|disable-file)(?=\s|$)([\s\S]*)$/;

type RuleScope = 'all' | Set<string>;

export interface SuppressionMap {
  file?: RuleScope;
  lines: Map<number, RuleScope>;
}

function parseRuleIds(rest: string): RuleScope {
  const withoutReason = rest.split(' -- ')[0] ?? '';
  const ids = withoutReason.split(/[\s,]+/).filter((id) => id.length > 0);
  return ids.length === 0 ? 'all' : new Set(ids);
}

function mergeScope(existing: RuleScope | undefined, next: RuleScope): RuleScope {
  if (existing === 'all' || next === 'all') return 'all';
  if (!existing) return next;
  return new Set([...existing, ...next]);
}

/**
 * Every comment in the file, in order. Ranges nested in an earlier one
 * (positions inside a JSDoc block) are dropped.
 */
function collectComments(sourceFile: SourceFile): CommentRange[] {
  const byPos = new Map<number, CommentRange>();
  for (const node of [sourceFile, ...sourceFile.getDescendants()]) {
    for (const range of [...node.getLeadingCommentRanges(), ...node.getTrailingCommentRanges()]) {
      byPos.set(range.getPos(), range);
    }
  }

  const comments: CommentRange[] = [];
  for (const range of [...byPos.values()].sort((a, b) => a.getPos() - b.getPos())) {
    const previous = comments[comments.length - 1];
    if (previous && range.getPos() < previous.getEnd()) continue;
    comments.push(range);
  }
  return comments;
}

/** Comment text without its delimiters; block comments lose their leading `*`s and become one line. */
function commentBody(range: CommentRange): string {
  const text = range.getText();
  if (range.getKind() === SyntaxKind.SingleLineCommentTrivia) return text.slice(2);
  const inner = text.endsWith('*/') ? text.slice(2, -2) : text.slice(2);
  return inner
    .split(/\r?\n/)
    .map((line) => line.replace(/^\s*\*?/, ''))
    .join(' ');
}

export function parseSuppressions(sourceFile: SourceFile): SuppressionMap {
  const map: SuppressionMap = { lines: new Map() };

  for (const comment of collectComments(sourceFile)) {
    const match = DIRECTIVE.exec(commentBody(comment));
    if (!match) continue;
    const kind = match[1];
    const scope = parseRuleIds(match[2] ?? '');

    if (kind === 'disable-file') {
      map.file = mergeScope(map.file, scope);
    } else {
      const target =
        kind === 'disable-next-line'
          ? sourceFile.getLineAndColumnAtPos(comment.getEnd()).line + 1
          : sourceFile.getLineAndColumnAtPos(comment.getPos()).line;
      map.lines.set(target, mergeScope(map.lines.get(target), scope));
    }
  }

  return map;
}

function covers(scope: RuleScope | undefined, ruleId: string): boolean {
  if (!scope) return false;
  return scope === 'all' || scope.has(ruleId);
}

export function isSuppressed(map: SuppressionMap, ruleId: string, line: number): boolean {
  return covers(map.file, ruleId) || covers(map.lines.get(line), ruleId);
}
