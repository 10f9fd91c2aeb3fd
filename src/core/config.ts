/**
 * Configuration loading and management
 */

import * as path from 'path';
import { fileExists, readJSON } from './fileio.js';
import { ConfigError } from './errors.js';

export interface CommentRatioConfig {
  exclude?: string[];
  verbose?: boolean;
  json?: boolean;
}

export const CONFIG_FILES = ['.commentratiorc.json', 'comment-ratio.config.json'];

const DEFAULT_CONFIG: CommentRatioConfig = {
  exclude: [],
  verbose: false,
  json: false,
};

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function validateConfig(raw: unknown, source: string): CommentRatioConfig {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigError(`Invalid config file: ${source}`);
  }
  const config: CommentRatioConfig = {};
  if ('exclude' in raw) {
    if (!isStringArray(raw.exclude)) throw new ConfigError(`Invalid config file: ${source}`);
    config.exclude = raw.exclude;
  }
  for (const key of ['verbose', 'json'] as const) {
    if (!(key in raw)) continue;
    const value: unknown = Reflect.get(raw, key);
    if (typeof value !== 'boolean') throw new ConfigError(`Invalid config file: ${source}`);
    config[key] = value;
  }
  return config;
}

export async function loadConfig(
  configPath?: string,
  cwd: string = process.cwd(),
): Promise<CommentRatioConfig> {
  if (configPath && !(await fileExists(path.resolve(cwd, configPath)))) {
    throw new ConfigError(`Invalid config file: ${configPath}`);
  }

  const candidates = configPath ? [configPath, ...CONFIG_FILES] : CONFIG_FILES;

  for (const candidate of candidates) {
    const resolved = path.resolve(cwd, candidate);
    if (await fileExists(resolved)) {
      let raw: unknown;
      try {
        raw = await readJSON(resolved);
      } catch {
        throw new ConfigError(`Invalid config file: ${candidate}`);
      }
      return { ...DEFAULT_CONFIG, ...validateConfig(raw, candidate) };
    }
  }

  return { ...DEFAULT_CONFIG };
}

/**
 * Split a comma-separated extension list such as `.txt, .log`.
 */
export function parseExcludeList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((ext) => ext.trim())
    .filter(Boolean);
}

export function resolveExcludeExtensions(
  cliValue: string | undefined,
  config: CommentRatioConfig,
): Set<string> {
  return new Set([...(config.exclude ?? []), ...parseExcludeList(cliValue)]);
}
