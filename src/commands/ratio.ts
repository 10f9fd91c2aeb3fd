import {
  createLogger,
  loadConfig,
  resolveExcludeExtensions,
  InvalidPathError,
  emitCliJsonError,
  Logger,
  CommentRatioConfig,
} from '../core/index.js';
import {
  analyzeFile,
  analyzeDirectory,
  getPathKind,
  formatFileLine,
  formatSummary,
} from '../analysis/index.js';
import { jsonSuccess, outputJson } from '../utils/json-output.js';

export interface RatioCommandOptions {
  exclude?: string;
  verbose?: boolean;
  json?: boolean;
  config?: string;
}

export async function runRatioCommand(
  targetPath: string,
  options: RatioCommandOptions = {},
): Promise<void> {
  const config = await loadConfig(options.config);
  const verbose = options.verbose === true || config.verbose === true;
  const json = options.json === true || config.json === true;
  const logger = createLogger({ verbose, stderr: json });

  try {
    analyzeTarget(targetPath, options, config, logger, json);
  } catch (error) {
    // JSON may have been switched on by config alone, which the CLI wrapper cannot see.
    if (!json) throw error;
    emitCliJsonError('ratio', error);
  }
}

function analyzeTarget(
  targetPath: string,
  options: RatioCommandOptions,
  config: CommentRatioConfig,
  logger: Logger,
  json: boolean,
): void {
  const kind = getPathKind(targetPath);

  if (kind === 'file') {
    const analysis = analyzeFile(targetPath);
    if (!analysis.ok) throw analysis.error;

    if (json) {
      outputJson(jsonSuccess({ mode: 'file', path: targetPath, ...analysis.result }));
    } else {
      logger.log(formatFileLine(targetPath, analysis.result));
    }
    return;
  }

  if (kind === 'directory') {
    const exclude = resolveExcludeExtensions(options.exclude, config);
    logger.debug(`Analyzing directory: ${targetPath}`);
    if (exclude.size > 0) {
      logger.debug(`Excluded extensions: ${[...exclude].join(', ')}`);
    }

    const report = analyzeDirectory(targetPath, { exclude, logger });

    if (json) {
      outputJson(jsonSuccess({ mode: 'directory', ...report }));
    } else {
      logger.log(formatSummary(report.aggregate));
    }
    return;
  }

  throw new InvalidPathError(targetPath);
}
