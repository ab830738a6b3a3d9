/**
 * Entitle Runtime Host — StateIO Interface
 *
 * A home-scoped, injectable I/O abstraction for reading/writing JSON state
 * files and appending to JSONL log files.
 *
 * Two implementations are provided:
 *   - FileStateIO   — durable file I/O under the resolved PRO_HOME
 *   - MemoryStateIO — in-memory I/O for tests and embedded (non-persistent) use
 *
 * Stores inject StateIO rather than touching the file system themselves, so
 * a test can run the whole service manager without a temp directory.
 */

import { appendFileSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

/**
 * A home-scoped I/O abstraction for reading, writing, and appending state.
 *
 * All file paths are relative filenames; the implementation resolves them.
 *
 * Invariants:
 * - readJson and writeJson address the `state/` subdirectory of the home
 * - appendLine addresses the `logs/` subdirectory of the home
 */
export interface StateIO {
  /**
   * Read and parse a JSON file.
   *
   * Returns undefined if the file does not exist or is not valid JSON.
   * The value is untrusted: callers narrow it before use.
   *
   * @param filename - Filename within the state subdirectory (e.g. 'attachment.json')
   */
  readJson(filename: string): unknown;

  /**
   * Serialize a value as JSON (2-space indent) and write it to a file.
   * Creates the state subdirectory if it does not exist.
   */
  writeJson(filename: string, value: unknown): void;

  /**
   * Append a line to a log file. A newline is added after the content.
   * Creates the logs subdirectory if it does not exist.
   *
   * @param logfilename - Filename within the logs subdirectory (e.g. 'operations.jsonl')
   */
  appendLine(logfilename: string, line: string): void;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * Durable file-system StateIO implementation for a home directory.
 *
 * Reads JSON state from  `<home>/state/<filename>`.
 * Writes JSON state to   `<home>/state/<filename>`.
 * Appends log lines to   `<home>/logs/<logfilename>`.
 *
 * ENOENT and SyntaxError are recoverable (return undefined).
 * Other I/O errors are rethrown (the operator must address them).
 */
export class FileStateIO implements StateIO {
  constructor(private readonly homeDir: string) {}

  readJson(filename: string): unknown {
    const filePath = join(this.homeDir, 'state', filename);
    try {
      const raw = readFileSync(filePath, 'utf-8');
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch (err: unknown) {
      if (err instanceof SyntaxError || isNodeError(err, 'ENOENT')) {
        return undefined;
      }
      throw err;
    }
  }

  writeJson(filename: string, value: unknown): void {
    const subDir = join(this.homeDir, 'state');
    mkdirSync(subDir, { recursive: true });
    writeFileSync(join(subDir, filename), JSON.stringify(value, null, 2), 'utf-8');
  }

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.homeDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * In-memory StateIO implementation.
 *
 * Instances are isolated from each other. Values round-trip through JSON
 * serialization to match FileStateIO semantics (undefined values dropped,
 * readonly arrays copied).
 */
export class MemoryStateIO implements StateIO {
  private readonly store: Map<string, string> = new Map();
  private readonly logs: Map<string, string[]> = new Map();

  readJson(filename: string): unknown {
    const raw = this.store.get(filename);
    if (raw === undefined) return undefined;
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  }

  writeJson(filename: string, value: unknown): void {
    this.store.set(filename, JSON.stringify(value));
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /**
   * Return all lines appended to a log file.
   *
   * Specific to MemoryStateIO; use it in tests to verify log output without
   * touching the file system.
   */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
export function isNodeError(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}
