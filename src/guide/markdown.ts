/**
 * @fileoverview Markdown structure for style-guide documents
 *
 * Line-based: headings, inline links, list bullets and fenced code blocks.
 * Nothing inside a fence is treated as a heading, link or bullet. Fences may
 * be indented (under a list item, say) and carry an info string after the
 * language; a fence left open runs to the end of the document.
 */

export interface GuideHeading {
  level: number;
  text: string;
  line: number;
  /** GitHub anchor, unique within the document */
  slug: string;
}

export interface GuideLink {
  text: string;
  url: string;
  line: number;
  column: number;
}

export interface GuideBullet {
  text: string;
  line: number;
}

export interface GuideCodeBlock {
  language: string | null;
  content: string;
  /** First content line (the line after the opening fence) */
  lineStart: number;
  /** Last content line; the last line of the document when the fence never closes */
  lineEnd: number;
  /** Indentation of the opening fence, stripped from each content line */
  indent: number;
}

export interface GuideDocument {
  headings: GuideHeading[];
  links: GuideLink[];
  bullets: GuideBullet[];
  codeBlocks: GuideCodeBlock[];
}

// ============================================================================
// SLUGS
// ============================================================================

/**
 * GitHub's heading anchor: inline markup reduced to its text, lower-cased,
 * punctuation other than `-` and `_` dropped, each space turned into `-`.
 */
export function slugify(text: string): string {
  return text
    .replace(/!?\[([^\]]*)\]\([^)]*\)/g, '$1')
    .toLowerCase()
    .replace(/[^\p{L}\p{M}\p{N}\p{Pc}\- ]/gu, '')
    .replace(/ /g, '-');
}

/**
 * Hands out unique slugs in document order: the second "Usage" heading
 * becomes `usage-1`, the third `usage-2`.
 */
export class Slugger {
  private readonly seen = new Map<string, number>();

  slug(text: string): string {
    const base = slugify(text);
    let candidate = base;
    let count = this.seen.get(base) ?? 0;
    while (this.seen.has(candidate)) {
      count += 1;
      candidate = `${base}-${count}`;
    }
    this.seen.set(base, count);
    this.seen.set(candidate, 0);
    return candidate;
  }
}

// ============================================================================
// PARSING
// ============================================================================

const FENCE_OPEN = /^([ \t]*)(`{3,}|~{3,})(.*)$/;
const FENCE_CLOSE = /^[ \t]*(`{3,}|~{3,})[ \t]*$/;
const HEADING = /^(#{1,6})\s+(.+?)\s*#*\s*$/;
const BULLET = /^\s*[-*+]\s+(.+)$/;
const LINK = /\[([^\]]+)\]\(([^)\s]+)\)/g;

interface OpenFence {
  marker: string;
  indent: number;
  language: string | null;
  lineStart: number;
  lines: string[];
}

function openFence(line: string, lineNumber: number): OpenFence | null {
  const match = FENCE_OPEN.exec(line);
  if (!match) return null;
  const marker = match[2] ?? '```';
  const info = (match[3] ?? '').trim();
  // A backtick in the info string makes the line inline code, not a fence.
  if (marker.startsWith('`') && info.includes('`')) return null;
  const language = info.split(/\s+/)[0] ?? '';
  return {
    marker,
    indent: (match[1] ?? '').length,
    language: language ? language.toLowerCase() : null,
    lineStart: lineNumber + 1,
    lines: [],
  };
}

function closesFence(fence: OpenFence, line: string): boolean {
  const match = FENCE_CLOSE.exec(line);
  const marker = match?.[1];
  return marker !== undefined && marker[0] === fence.marker[0] && marker.length >= fence.marker.length;
}

function stripIndent(line: string, width: number): string {
  let offset = 0;
  while (offset < width && (line[offset] === ' ' || line[offset] === '\t')) offset += 1;
  return line.slice(offset);
}

function toCodeBlock(fence: OpenFence, lineEnd: number): GuideCodeBlock {
  return {
    language: fence.language,
    content: fence.lines.join('\n'),
    lineStart: fence.lineStart,
    lineEnd,
    indent: fence.indent,
  };
}

export function parseMarkdown(content: string): GuideDocument {
  const headings: GuideHeading[] = [];
  const links: GuideLink[] = [];
  const bullets: GuideBullet[] = [];
  const codeBlocks: GuideCodeBlock[] = [];
  const slugger = new Slugger();
  const lines = content.split(/\r?\n/);
  let fence: OpenFence | null = null;

  for (let index = 0; index < lines.length; index += 1) {
    const lineNumber = index + 1;
    const line = lines[index] ?? '';

    if (fence) {
      if (closesFence(fence, line)) {
        codeBlocks.push(toCodeBlock(fence, lineNumber - 1));
        fence = null;
      } else {
        fence.lines.push(stripIndent(line, fence.indent));
      }
      continue;
    }

    fence = openFence(line, lineNumber);
    if (fence) continue;

    const headingMatch = HEADING.exec(line);
    if (headingMatch) {
      const text = (headingMatch[2] ?? '').trim();
      headings.push({
        level: headingMatch[1]?.length ?? 1,
        text,
        line: lineNumber,
        slug: slugger.slug(text),
      });
    }

    const bulletMatch = BULLET.exec(line);
    if (bulletMatch) {
      bullets.push({ text: (bulletMatch[1] ?? '').trim(), line: lineNumber });
    }

    for (const linkMatch of line.matchAll(LINK)) {
      links.push({
        text: linkMatch[1] ?? '',
        url: linkMatch[2] ?? '',
        line: lineNumber,
        column: (linkMatch.index ?? 0) + 1,
      });
    }
  }

  if (fence) codeBlocks.push(toCodeBlock(fence, lines.length));

  return { headings, links, bullets, codeBlocks };
}
