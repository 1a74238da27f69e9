import { readFileSync, writeFileSync, existsSync, mkdirSync, statSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { SourceFileError, toError } from '../core/errors.js';

/**
 * Ensure a directory exists, creating it recursively if needed
 */
export function ensureDirSync(dirPath: string): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true });
  }
}

/**
 * Read a required file. Failure is fatal for the run.
 */
export function readSourceFile(filePath: string): string {
  try {
    return readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new SourceFileError(`Cannot open file: ${filePath}`, filePath, toError(err));
  }
}

/**
 * Require `dirPath` to be an existing directory. Failure is fatal for the run.
 */
export function assertDirectory(dirPath: string): void {
  if (!existsSync(dirPath) || !statSync(dirPath).isDirectory()) {
    throw new SourceFileError(`Cannot open directory: ${dirPath}`, dirPath);
  }
}

/**
 * Write a generated file, creating parent directories as needed
 */
export function writeOutputFile(filePath: string, content: string): void {
  try {
    ensureDirSync(dirname(filePath));
    writeFileSync(filePath, content, 'utf-8');
  } catch (err) {
    throw new SourceFileError(`Cannot write file: ${filePath}`, filePath, toError(err));
  }
}

/**
 * Walk up from `startDir` looking for a directory that contains `marker`.
 * Returns null when the filesystem root or `maxDepth` is reached first.
 */
export function findUpwards(startDir: string, marker: string, maxDepth: number = 20): string | null {
  let dir = resolve(startDir);
  for (let depth = 0; depth <= maxDepth; depth++) {
    if (existsSync(join(dir, marker))) return dir;
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return null;
}
