/**
 * Switchboard Runtime Host - StateIO Interface
 *
 * A home-scoped, injectable I/O abstraction for reading/writing JSON files
 * and appending to JSONL log files.
 *
 * Two implementations are provided:
 *   - FileStateIO   - durable file I/O under the resolved home directory
 *   - MemoryStateIO - in-memory I/O for tests and embedded (non-persistent) use
 *
 * Everything that persists (runtime config, the change log) goes through an
 * injected StateIO rather than touching node:fs itself.
 */

import { mkdirSync, readFileSync, writeFileSync, appendFileSync } from 'node:fs';
import { join } from 'node:path';

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

/**
 * A home-scoped I/O abstraction for reading, writing, and appending state.
 *
 * All file paths are relative filenames. The implementation resolves them
 * under its home directory; callers never construct absolute paths.
 *
 * Invariants:
 * - readJson and writeJson address the home directory itself
 * - appendLine and readLogRaw address its `logs/` subdirectory
 */
export interface StateIO {
  /**
   * Read a JSON file and parse it.
   *
   * Returns undefined if the file does not exist or cannot be parsed.
   * The result is unvalidated; callers check its shape.
   *
   * @param filename - Filename within the home directory (e.g. 'config.json')
   */
  readJson(filename: string): unknown;

  /**
   * Serialize a value as JSON and write it to a file, replacing any
   * existing content. Creates the home directory if needed.
   */
  writeJson(filename: string, value: unknown): void;

  /**
   * Append a line to a log file.
   *
   * Creates the logs subdirectory if it does not exist.
   * A newline character is appended after the line content.
   *
   * @param logfilename - Filename within the logs subdirectory (e.g. 'option-changes.jsonl')
   * @param line - Line content to append (without trailing newline)
   */
  appendLine(logfilename: string, line: string): void;

  /**
   * Return the raw text content of a log file, or an empty string if it
   * does not exist.
   */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * Durable file-system StateIO implementation rooted at a home directory.
 *
 * Reads and writes JSON at `<homeDir>/<filename>`.
 * Appends log lines to    `<homeDir>/logs/<logfilename>`.
 *
 * Synchronous I/O matches the CLI's single-process design.
 * ENOENT and SyntaxError are recoverable (undefined / empty string).
 * Other I/O errors are rethrown.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly homeDir: string) {}

  readJson(filename: string): unknown {
    const filePath = join(this.homeDir, filename);
    try {
      const raw = readFileSync(filePath, 'utf-8');
      return JSON.parse(raw) as unknown;
    } catch (err: unknown) {
      if (err instanceof SyntaxError || isNodeError(err, 'ENOENT')) {
        return undefined;
      }
      throw err;
    }
  }

  writeJson(filename: string, value: unknown): void {
    mkdirSync(this.homeDir, { recursive: true });
    const filePath = join(this.homeDir, filename);
    writeFileSync(filePath, JSON.stringify(value, null, 2) + '\n', 'utf-8');
  }

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.homeDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    const logPath = join(this.homeDir, 'logs', logfilename);
    try {
      return readFileSync(logPath, 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * In-memory StateIO implementation.
 *
 * Stores JSON documents in a Map<string, unknown> and log lines in a
 * Map<string, string[]>. No file system access.
 *
 * Documents round-trip through JSON serialization to match FileStateIO
 * semantics (e.g. undefined values are dropped).
 */
export class MemoryStateIO implements StateIO {
  private readonly store: Map<string, unknown> = new Map();
  private readonly logs: Map<string, string[]> = new Map();

  readJson(filename: string): unknown {
    return this.store.get(filename);
  }

  writeJson(filename: string, value: unknown): void {
    this.store.set(filename, JSON.parse(JSON.stringify(value)) as unknown);
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /**
   * Return all lines appended to a log file.
   *
   * Specific to MemoryStateIO; not part of the StateIO interface.
   */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    if (lines.length === 0) return '';
    // Match FileStateIO: each appendLine call adds 'line\n'
    return lines.join('\n') + '\n';
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
function isNodeError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
