/**
 * Directory tree aggregation
 */

import * as path from 'path';
import {
  readLines as readLinesFromDisk,
  InvalidPathError,
  ErrorCode,
  AnalysisLogger,
} from '../core/index.js';
import { computeRatio, ClassificationResult } from './classifier.js';
import { analyzeFile, LineReader } from './file.js';
import {
  listFiles as listFilesOnDisk,
  isRegularFile,
  getPathKind,
  FileLister,
} from './scanners/filesystem.js';
import { formatFileLine } from './utils/format.js';

export interface AggregateResult {
  fileCount: number;
  totalCommentLines: number;
  totalCodeLines: number;
  overallRatio: number;
}

export interface FileReport {
  path: string;
  result: ClassificationResult;
}

export interface FileFailure {
  path: string;
  code: ErrorCode;
  message: string;
}

export interface DirectoryReport {
  root: string;
  aggregate: AggregateResult;
  files: FileReport[];
  failures: FileFailure[];
}

export interface AnalyzeDirectoryOptions {
  logger: AnalysisLogger;
  /** Extensions to skip, compared with their leading dot and case-sensitively. */
  exclude?: ReadonlySet<string>;
  readLines?: LineReader;
  listFiles?: FileLister;
}

export function createAggregate(): AggregateResult {
  return { fileCount: 0, totalCommentLines: 0, totalCodeLines: 0, overallRatio: 0 };
}

export function addToAggregate(aggregate: AggregateResult, result: ClassificationResult): void {
  aggregate.fileCount += 1;
  aggregate.totalCommentLines += result.commentLines;
  aggregate.totalCodeLines += result.codeLines;
}

export function finalizeAggregate(aggregate: AggregateResult): AggregateResult {
  aggregate.overallRatio = computeRatio(aggregate.totalCommentLines, aggregate.totalCodeLines);
  return aggregate;
}

export function isExcluded(filePath: string, exclude: ReadonlySet<string>): boolean {
  if (exclude.size === 0) return false;
  return exclude.has(path.extname(filePath));
}

export function analyzeDirectory(
  rootPath: string,
  options: AnalyzeDirectoryOptions,
): DirectoryReport {
  const {
    logger,
    exclude = new Set<string>(),
    readLines = readLinesFromDisk,
    listFiles = listFilesOnDisk,
  } = options;

  if (getPathKind(rootPath) !== 'directory') {
    throw new InvalidPathError(rootPath);
  }

  const aggregate = createAggregate();
  const files: FileReport[] = [];
  const failures: FileFailure[] = [];

  for (const filePath of listFiles(rootPath)) {
    if (isExcluded(filePath, exclude)) {
      logger.debug(`Skipping file (excluded extension): ${filePath}`);
      continue;
    }

    if (!isRegularFile(filePath)) {
      logger.debug(`Skipping non-file item: ${filePath}`);
      continue;
    }

    const analysis = analyzeFile(filePath, readLines);
    if (!analysis.ok) {
      logger.warn(`Skipping ${filePath} due to error during analysis: ${analysis.error.message}`);
      failures.push({ path: filePath, code: analysis.error.code, message: analysis.error.message });
      continue;
    }

    addToAggregate(aggregate, analysis.result);
    files.push({ path: filePath, result: analysis.result });
    logger.info(formatFileLine(filePath, analysis.result));
  }

  return { root: rootPath, aggregate: finalizeAggregate(aggregate), files, failures };
}
