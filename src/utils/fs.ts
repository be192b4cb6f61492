/**
 * File System Utilities
 * File discovery and reads for ingestion
 */

import * as fs from "node:fs";
import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import fg from "fast-glob";

/**
 * Options for file discovery
 */
export interface GlobOptions {
  patterns: string[];
  ignore?: string[];
  cwd?: string;
  absolute?: boolean;
}

/**
 * Ignored on every scan, on top of caller patterns
 */
export const DEFAULT_IGNORE_PATTERNS: readonly string[] = [
  "**/node_modules/**",
  "**/.git/**",
  "**/dist/**",
  "**/build/**",
  "**/.next/**",
  "**/coverage/**",
  "**/__pycache__/**",
  "**/.venv/**",
  "**/venv/**",
];

/**
 * Find files matching glob patterns. Dotfiles are never returned.
 *
 * @returns Matching file paths, sorted
 */
export async function findFiles(options: GlobOptions): Promise<string[]> {
  const { patterns, ignore = [], cwd = process.cwd(), absolute = true } = options;

  const files = await fg(patterns, {
    cwd,
    absolute,
    onlyFiles: true,
    ignore: [...DEFAULT_IGNORE_PATTERNS, ...ignore],
    dot: false,
    followSymbolicLinks: false,
  });
  return files.sort();
}

/**
 * Get the path of `filePath` relative to `root`, with forward slashes
 */
export function getRelativePath(filePath: string, root: string): string {
  return path.relative(root, filePath).split(path.sep).join("/");
}

/**
 * Whether `dirPath` is a directory this process can list
 */
export async function isReadableDirectory(dirPath: string): Promise<boolean> {
  try {
    const stats = await fsPromises.stat(dirPath);
    if (!stats.isDirectory()) return false;
    await fsPromises.access(dirPath, fs.constants.R_OK | fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Synchronous file exists check
 */
export function fileExistsSync(filePath: string): boolean {
  return fs.existsSync(filePath);
}

/**
 * Size of a file in bytes
 */
export async function getFileSize(filePath: string): Promise<number> {
  const stats = await fsPromises.stat(filePath);
  return stats.size;
}

/**
 * Read a file as raw bytes
 */
export async function readFileBytes(filePath: string): Promise<Buffer> {
  return fsPromises.readFile(filePath);
}
