/**
 * Shared utilities
 */

import * as fs from "node:fs";
import * as path from "node:path";

// Re-export logger module
export * from "./logger.js";

// Re-export file system utilities
export * from "./fs.js";

// =============================================================================
// Configuration Paths
// =============================================================================

export const CONFIG_DIR = ".chunkgraph";
export const CONFIG_FILE = "config.json";

export function getProjectRoot(): string {
  return process.cwd();
}

export function getConfigDir(projectRoot: string = getProjectRoot()): string {
  return path.join(projectRoot, CONFIG_DIR);
}

export function getConfigPath(projectRoot: string = getProjectRoot()): string {
  return path.join(getConfigDir(projectRoot), CONFIG_FILE);
}

// =============================================================================
// Text
// =============================================================================

/**
 * Whether cutting `text` at `index` would separate a UTF-16 surrogate pair
 */
export function splitsSurrogatePair(text: string, index: number): boolean {
  if (index <= 0 || index >= text.length) return false;
  const before = text.charCodeAt(index - 1);
  const after = text.charCodeAt(index);
  return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}

// =============================================================================
// JSON Files
// =============================================================================

/**
 * Read and parse a JSON file. Throws on a missing file or invalid JSON.
 */
export function readJson(filePath: string): unknown {
  const content = fs.readFileSync(filePath, "utf-8");
  return JSON.parse(content);
}
