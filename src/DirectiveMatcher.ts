// file: src/DirectiveMatcher.ts
import * as fs from 'fs/promises';
import { Directive, DirectiveKind, LineDirective, Target } from './IgnorePrimitives';

// An optional start/stop keyword, then ignore/ignoring as a whole word, then the target text
const directiveRegex = /\b(?:(start|stop)\s+)?ignor(?:e|ing)\b(.*)$/i;
const identifierRegex = /[A-Za-z_][\w.-]*/y;
const wordRegex = /[\w.-]+/y;

/**
 * Turns the free text after `ignore` into targets. Returns null when the
 * text is malformed, in which case the whole line is not a directive.
 */
export type TargetListParser = (text: string) => Target[] | null;

/**
 * Classifies one line of text as a directive, or null when it holds none.
 */
export type DirectiveMatcher = (line: string) => Directive | null;

/**
 * Index of the `)` closing the group opened at `open`, or -1 when the group is
 * unterminated or nests another group.
 */
function findGroupEnd(text: string, open: number): number {
  for (let j = open + 1; j < text.length; j++) {
    if (text[j] === ')') return j;
    if (text[j] === '(') return -1;
  }
  return -1;
}

/**
 * Flat target grammar: identifiers, each optionally followed directly by a
 * parenthesized qualifier such as `flake8(E501)`. Targets are picked out by
 * repeated matching, so no separator is required between them. A qualifier
 * list `flake8(E501, E302)` yields one target per rule.
 */
export function parseFlatTargetList(text: string): Target[] | null {
  const targets: Target[] = [];
  let i = 0;
  while (i < text.length) {
    identifierRegex.lastIndex = i;
    const ident = identifierRegex.exec(text);
    if (!ident) {
      if (text[i] === '(') {
        // Free-standing group, e.g. "(see ticket)": skip it
        const close = findGroupEnd(text, i);
        if (close < 0) return null;
        i = close + 1;
        continue;
      }
      wordRegex.lastIndex = i;
      const word = wordRegex.exec(text);
      i += word ? word[0].length : 1;
      continue;
    }
    const analyzer = ident[0];
    i += analyzer.length;
    if (text[i] !== '(') {
      targets.push({ analyzer });
      continue;
    }
    const close = findGroupEnd(text, i);
    if (close < 0) return null;
    const rules = text
      .slice(i + 1, close)
      .split(',')
      .map(r => r.trim())
      .filter(r => r.length > 0);
    if (rules.length === 0) {
      targets.push({ analyzer });
    } else {
      for (const rule of rules) {
        targets.push({ analyzer, rule });
      }
    }
    i = close + 1;
  }
  return targets;
}

/**
 * Builds a directive matcher over the given target grammar.
 */
export function createDirectiveMatcher(
  parseTargets: TargetListParser = parseFlatTargetList
): DirectiveMatcher {
  return (line: string): Directive | null => {
    const m = directiveRegex.exec(line);
    if (!m) {
      return null;
    }
    const targets = parseTargets(m[2]);
    if (targets === null) {
      return null;
    }
    const keyword = m[1]?.toLowerCase();
    const kind: DirectiveKind = keyword === 'start' ? 'Start' : keyword === 'stop' ? 'Stop' : 'Inline';
    return { kind, targets };
  };
}

/**
 * Matches `start ignoring`, `stop ignoring` and `ignore` directives using the
 * flat target grammar.
 */
export const matchDirective: DirectiveMatcher = createDirectiveMatcher();

/**
 * Reads a whole file and returns every directive in it, in line order.
 * Used by scan mode; suppression queries go through the range manager instead.
 */
export async function parseFileDirectives(
  filePath: string,
  matcher: DirectiveMatcher = matchDirective
): Promise<LineDirective[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err: unknown) {
    // If path is a directory, skip without error
    if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'EISDIR') {
      return [];
    }
    throw err;
  }
  const directives: LineDirective[] = [];
  content.split(/\r?\n/).forEach((text, index) => {
    const directive = matcher(text);
    if (directive) {
      directives.push({ ...directive, line: index + 1 });
    }
  });
  return directives;
}
