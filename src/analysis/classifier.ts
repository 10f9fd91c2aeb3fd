/**
 * Heuristic line classifier.
 *
 * Each non-blank line is sorted into "comment" or "code" by its leading
 * characters alone. The only state carried between lines is whether the
 * scanner believes it is inside a multi-line comment. Nothing here parses a
 * real grammar, so markers inside strings are treated like any other text.
 */

import { splitLines } from '../core/fileio.js';

export type LineKind = 'blank' | 'comment' | 'code';

export interface ScanState {
  readonly inMultilineComment: boolean;
}

export interface ScanStep {
  kind: LineKind;
  state: ScanState;
}

export interface ClassificationResult {
  readonly commentLines: number;
  readonly codeLines: number;
  readonly blankLines: number;
  readonly ratio: number;
}

export const INITIAL_SCAN_STATE: ScanState = Object.freeze({ inMultilineComment: false });

const DOCSTRING_DELIMITERS = ['"""', "'''"];
const LINE_COMMENT_MARKERS = ['#', '//'];
const BLOCK_COMMENT_OPEN = '/*';

// Unicode whitespace without U+FEFF, plus the information separators U+001C..U+001F.
const WHITESPACE =
  '[\\t\\n\\v\\f\\r\\x1c-\\x1f \\x85\\xa0\\u1680\\u2000-\\u200a\\u2028\\u2029\\u202f\\u205f\\u3000]';
const EDGE_WHITESPACE = new RegExp(`^${WHITESPACE}+|${WHITESPACE}+$`, 'g');

export function stripLine(line: string): string {
  return line.replace(EDGE_WHITESPACE, '');
}

function startsWithAny(line: string, prefixes: readonly string[]): boolean {
  return prefixes.some((prefix) => line.startsWith(prefix));
}

/**
 * Comment lines per code line, or 0 when there is no code at all.
 */
export function computeRatio(commentLines: number, codeLines: number): number {
  return codeLines > 0 ? commentLines / codeLines : 0;
}

/**
 * Classify a single raw line given the state left by the previous one.
 */
export function classifyLine(rawLine: string, state: ScanState): ScanStep {
  const line = stripLine(rawLine);

  if (!line) {
    return { kind: 'blank', state };
  }

  // A triple quote always flips the flag, even when it also closes on this line.
  if (startsWithAny(line, DOCSTRING_DELIMITERS)) {
    return { kind: 'comment', state: { inMultilineComment: !state.inMultilineComment } };
  }

  // While the flag is set a trailing `*/` is counted here and does not clear it.
  if (state.inMultilineComment) {
    return { kind: 'comment', state };
  }

  if (startsWithAny(line, LINE_COMMENT_MARKERS)) {
    return { kind: 'comment', state };
  }

  // `/* ... */` on one line still leaves the flag set.
  if (line.startsWith(BLOCK_COMMENT_OPEN)) {
    return { kind: 'comment', state: { inMultilineComment: true } };
  }

  return { kind: 'code', state };
}

export function classifyLines(lines: readonly string[]): ClassificationResult {
  let state = INITIAL_SCAN_STATE;
  let commentLines = 0;
  let codeLines = 0;
  let blankLines = 0;

  for (const rawLine of lines) {
    const step = classifyLine(rawLine, state);
    state = step.state;
    if (step.kind === 'comment') commentLines++;
    else if (step.kind === 'code') codeLines++;
    else blankLines++;
  }

  return Object.freeze({
    commentLines,
    codeLines,
    blankLines,
    ratio: computeRatio(commentLines, codeLines),
  });
}

export function classifySource(content: string): ClassificationResult {
  return classifyLines(splitLines(content));
}
