/**
 * Single-file analysis
 */

import {
  readLines as readLinesFromDisk,
  toReadError,
  CommentRatioError,
} from '../core/index.js';
import { classifyLines, ClassificationResult } from './classifier.js';

/** Reads one file into physical lines, throwing a read error on failure. */
export type LineReader = (filePath: string) => string[];

export type FileAnalysis =
  | { ok: true; path: string; result: ClassificationResult }
  | { ok: false; path: string; error: CommentRatioError };

export function analyzeFile(
  filePath: string,
  readLines: LineReader = readLinesFromDisk,
): FileAnalysis {
  let lines: string[];
  try {
    lines = readLines(filePath);
  } catch (error) {
    return { ok: false, path: filePath, error: toReadError(error, filePath) };
  }
  return { ok: true, path: filePath, result: classifyLines(lines) };
}
