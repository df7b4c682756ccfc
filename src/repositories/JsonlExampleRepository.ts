/**
 * JSON Lines implementation of IExampleRepository.
 * One example per line, appended with a single write per record.
 */

import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { PersistenceError } from '../errors.js';
import type { PersistedExample } from '../types/models.js';
import type { IExampleRepository } from './IExampleRepository.js';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class JsonlExampleRepository implements IExampleRepository {
  private ready: Promise<void> | null = null;

  constructor(readonly path: string) {}

  async append(record: PersistedExample): Promise<void> {
    const line = `${JSON.stringify(record)}\n`;
    try {
      await this.ensureDirectory();
      await appendFile(this.path, line, 'utf8');
    } catch (err) {
      throw new PersistenceError(`Failed to append to ${this.path}`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  }

  async loadAll(): Promise<unknown[]> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw new PersistenceError(`Failed to read ${this.path}`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }

    const lines = text.split('\n');
    const records: unknown[] = [];
    for (const [index, line] of lines.entries()) {
      if (line.trim() === '') continue;
      try {
        records.push(JSON.parse(line));
      } catch (err) {
        // An interrupted final write leaves one unterminated line behind.
        if (index === lines.length - 1) break;
        throw new PersistenceError(`Corrupt record at ${this.path}:${index + 1}`, {
          line: index + 1,
          cause: err instanceof Error ? err.message : String(err),
        });
      }
    }
    return records;
  }

  private ensureDirectory(): Promise<void> {
    this.ready ??= mkdir(dirname(this.path), { recursive: true }).then(() => undefined);
    return this.ready;
  }
}
