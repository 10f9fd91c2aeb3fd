/**
 * File I/O utilities with error handling
 */

import * as fs from 'fs';
import { promisify, TextDecoder } from 'util';
import { toReadError } from './errors.js';

const readFile = promisify(fs.readFile);
const access = promisify(fs.access);

const LINE_BREAK = /\r\n|\r|\n/;

/**
 * Split text into physical lines. A trailing line break ends the last line
 * rather than opening an empty one.
 */
export function splitLines(content: string): string[] {
  if (content === '') return [];
  const lines = content.split(LINE_BREAK);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/**
 * Read a file as strict UTF-8 and split it into physical lines. A byte order
 * mark is kept as part of the first line.
 * Throws FileNotFoundError, PermissionDeniedError or FileReadError.
 */
export function readLines(filePath: string): string[] {
  try {
    const buffer = fs.readFileSync(filePath);
    const content = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(buffer);
    return splitLines(content);
  } catch (error) {
    throw toReadError(error, filePath);
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export async function readJSON(filePath: string): Promise<unknown> {
  const content = await readFile(filePath, 'utf-8');
  return JSON.parse(content);
}
