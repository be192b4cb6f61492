/**
 * Directory Scanner
 *
 * Discovers the files under an ingested directory and reads them as raw
 * bytes, tagged with their language. Decoding is left to the chunker.
 *
 * @module
 */

import * as path from "node:path";
import type { Language, SourceFile } from "../../types/index.js";
import { DecodeError, ErrorCode, InvalidArgumentError } from "../errors.js";
import {
  createLogger,
  findFiles,
  getFileSize,
  getRelativePath,
  isReadableDirectory,
  readFileBytes,
} from "../../utils/index.js";
import { mapConcurrent } from "../../utils/async.js";
import { detectLanguage } from "../chunker/languages.js";

const logger = createLogger("scanner");

// =============================================================================
// Types
// =============================================================================

export interface ScannerOptions {
  /** Glob patterns for files to read (default: every file) */
  include?: string[];
  /** Glob patterns to skip, on top of the default ignores */
  exclude?: string[];
  /** Files larger than this many bytes are skipped */
  maxFileSize?: number;
  /** Maximum number of concurrent file reads */
  concurrency?: number;
}

export interface ScanProgress {
  current: number;
  total: number;
  file: string;
}

/**
 * Scan result with statistics
 */
export interface ScanResult {
  /** Files read, sorted by relative path */
  files: SourceFile[];
  /** Files that were found but not read */
  skipped: DecodeError[];
  /** Total size of the files read, in bytes */
  totalSize: number;
  scanTimeMs: number;
  byLanguage: Map<Language, number>;
}

// =============================================================================
// Directory Scanner Class
// =============================================================================

/**
 * Reads every eligible file under a directory.
 *
 * @example
 * ```typescript
 * const scanner = new DirectoryScanner({ maxFileSize: 1024 * 1024 });
 * const result = await scanner.scan("./my-project");
 *
 * console.log(`Read ${result.files.length} files`);
 * ```
 */
export class DirectoryScanner {
  private readonly include: string[];
  private readonly exclude: string[];
  private readonly maxFileSize: number;
  private readonly concurrency: number;

  constructor(options: ScannerOptions = {}) {
    this.include = options.include ?? ["**/*"];
    this.exclude = options.exclude ?? [];
    this.maxFileSize = options.maxFileSize ?? 1024 * 1024;
    this.concurrency = options.concurrency ?? 4;
  }

  /**
   * Scans a directory for files.
   *
   * @throws InvalidArgumentError if the directory is missing or unreadable
   */
  async scan(
    directory: string,
    onProgress?: (progress: ScanProgress) => void
  ): Promise<ScanResult> {
    const startTime = Date.now();
    const rootPath = path.resolve(directory);

    if (!(await isReadableDirectory(rootPath))) {
      throw new InvalidArgumentError(`Directory not found or not readable: ${directory}`, {
        directory,
      });
    }

    const filePaths = await findFiles({
      patterns: this.include,
      ignore: this.exclude,
      cwd: rootPath,
      absolute: true,
    });
    logger.debug({ rootPath, count: filePaths.length }, "Discovered files");

    let processed = 0;
    const outcomes = await mapConcurrent(
      filePaths,
      async (absolutePath) => {
        const outcome = await this.readFile(absolutePath, rootPath);
        processed++;
        onProgress?.({ current: processed, total: filePaths.length, file: absolutePath });
        return outcome;
      },
      this.concurrency
    );

    const files: SourceFile[] = [];
    const skipped: DecodeError[] = [];
    const byLanguage = new Map<Language, number>();
    let totalSize = 0;

    for (const outcome of outcomes) {
      if (outcome instanceof DecodeError) {
        skipped.push(outcome);
        continue;
      }
      files.push(outcome);
      totalSize += outcome.content.byteLength;
      byLanguage.set(outcome.language, (byLanguage.get(outcome.language) ?? 0) + 1);
    }

    return {
      files,
      skipped,
      totalSize,
      scanTimeMs: Date.now() - startTime,
      byLanguage,
    };
  }

  private async readFile(absolutePath: string, rootPath: string): Promise<SourceFile | DecodeError> {
    const relativePath = getRelativePath(absolutePath, rootPath);

    try {
      const size = await getFileSize(absolutePath);
      if (size > this.maxFileSize) {
        return new DecodeError(
          `File is ${size} bytes, over the ${this.maxFileSize} byte limit`,
          { filePath: relativePath, size },
          ErrorCode.FILE_TOO_LARGE
        );
      }

      return {
        absolutePath,
        relativePath,
        content: await readFileBytes(absolutePath),
        language: detectLanguage(relativePath),
      };
    } catch (error) {
      // Deleted or unreadable between discovery and read
      logger.warn({ err: error, file: relativePath }, "Failed to read file");
      return new DecodeError("File could not be read", { filePath: relativePath });
    }
  }
}

/**
 * Create a directory scanner
 */
export function createDirectoryScanner(options: ScannerOptions = {}): DirectoryScanner {
  return new DirectoryScanner(options);
}
