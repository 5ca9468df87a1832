/**
 * Local file history backend
 *
 * Saves go to a temp file beside the target and are renamed over it, so a
 * crash mid-write leaves the previous history intact.
 */

import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { PersistenceError, describeError } from '../errors.js';
import { parseHistory, serializeHistory } from './history.js';
import type { History, HistoryStore } from './types.js';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileHistoryStore implements HistoryStore {
  constructor(private readonly filePath: string) {}

  describe(): string {
    return `file:${this.filePath}`;
  }

  async load(): Promise<History> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return {};
      }
      throw new PersistenceError(`Cannot read history ${this.filePath}: ${describeError(error)}`, { cause: error });
    }
    return parseHistory(text);
  }

  async save(history: History): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.${Date.now()}.tmp`;
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, serializeHistory(history), 'utf-8');
      await rename(tempPath, this.filePath);
    } catch (error) {
      await unlink(tempPath).catch(() => undefined);
      throw new PersistenceError(`Cannot write history ${this.filePath}: ${describeError(error)}`, { cause: error });
    }
  }
}
