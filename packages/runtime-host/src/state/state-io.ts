/**
 * Capstack Runtime Host — StateIO
 *
 * Injectable I/O for everything a stack persists: JSON state documents
 * (agents, sessions, registered shields) and append-only JSONL logs (call
 * records, telemetry events).
 *
 * Two implementations:
 *   - FileStateIO   — durable files under a root directory
 *   - MemoryStateIO — in-memory, for tests and stacks without a home
 *
 * Layout under a FileStateIO root:
 *   <root>/state/<name>.json
 *   <root>/logs/<name>.jsonl
 *
 * readJson returns `unknown`: persisted JSON is untrusted input and every
 * caller parses it with its own schema.
 */

import { mkdirSync, readFileSync, writeFileSync, appendFileSync, rmSync, renameSync } from 'node:fs';
import { join } from 'node:path';

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

export interface StateIO {
  /**
   * Read and parse a JSON state file.
   * Returns undefined if the file does not exist or is not valid JSON.
   */
  readJson(filename: string): unknown;

  /** Serialize a value and replace the state file with it. */
  writeJson(filename: string, value: unknown): void;

  /** Remove a state file. Removing a missing file is a no-op. */
  removeJson(filename: string): void;

  /** Append one line (newline added) to a log file. */
  appendLine(logfilename: string, line: string): void;

  /** Raw text of a log file, or '' if it has never been written. */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * StateIO over the local file system. Writes are synchronous so a record
 * is on disk before the caller continues. State files are replaced through
 * a temporary file and rename, so a crash never leaves half a document.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly rootDir: string) {}

  readJson(filename: string): unknown {
    const filePath = join(this.rootDir, 'state', filename);
    try {
      return JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (err: unknown) {
      if (err instanceof SyntaxError || isNodeError(err, 'ENOENT')) {
        return undefined;
      }
      throw err;
    }
  }

  writeJson(filename: string, value: unknown): void {
    const stateDir = join(this.rootDir, 'state');
    mkdirSync(stateDir, { recursive: true });
    const filePath = join(stateDir, filename);
    const tmpPath = `${filePath}.tmp`;
    writeFileSync(tmpPath, JSON.stringify(value, null, 2), 'utf-8');
    renameSync(tmpPath, filePath);
  }

  removeJson(filename: string): void {
    rmSync(join(this.rootDir, 'state', filename), { force: true });
  }

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.rootDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(join(this.rootDir, 'logs', logfilename), 'utf-8');
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
 * In-memory StateIO. Instances are isolated from each other. Values
 * round-trip through JSON on write, matching what FileStateIO persists.
 */
export class MemoryStateIO implements StateIO {
  private readonly store: Map<string, string> = new Map();
  private readonly logs: Map<string, string[]> = new Map();

  readJson(filename: string): unknown {
    const raw = this.store.get(filename);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  writeJson(filename: string, value: unknown): void {
    this.store.set(filename, JSON.stringify(value));
  }

  removeJson(filename: string): void {
    this.store.delete(filename);
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /** Lines appended to a log file. Test helper; not part of StateIO. */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    if (lines.length === 0) return '';
    return lines.join('\n') + '\n';
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
export function isNodeError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
