/**
 * Preference Stores
 *
 * Key/value persistence for the saved server list. The registry uses a
 * single list-valued slot; reads and writes are synchronous so every
 * mutation is persisted before it returns.
 */

import fs from 'fs';
import path from 'path';
import type { SerializedServerConfiguration } from '../types/index.js';
import { PersistenceError, RestoreFailureError, toError } from '../utils/errors.js';

export const SERVER_LIST_KEY = 'ServerConfigurationList';

export interface PreferenceStore {
  /** Saved items, not yet validated */
  read(): unknown[];
  write(list: SerializedServerConfiguration[]): void;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * JSON object file holding preferences. Keys other than the server list
 * are left as they are.
 */
export class JsonPreferenceStore implements PreferenceStore {
  constructor(
    readonly filePath: string,
    private readonly key: string = SERVER_LIST_KEY
  ) {}

  read(): unknown[] {
    const value = this.readAll()[this.key];
    if (value === undefined) return [];
    if (!Array.isArray(value)) {
      throw new RestoreFailureError(`Preference "${this.key}" is not a list`, {
        filePath: this.filePath
      });
    }
    return value;
  }

  write(list: SerializedServerConfiguration[]): void {
    let preferences: Record<string, unknown>;
    try {
      preferences = this.readAll();
    } catch {
      // An unreadable file is replaced rather than blocking every save
      preferences = {};
    }
    preferences[this.key] = list;

    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, JSON.stringify(preferences, null, 2), 'utf8');
    } catch (err) {
      throw new PersistenceError(`Failed to write preferences: ${toError(err).message}`, {
        filePath: this.filePath
      });
    }
  }

  private readAll(): Record<string, unknown> {
    let data: string;
    try {
      data = fs.readFileSync(this.filePath, 'utf8');
    } catch (err) {
      // If file doesn't exist, start empty
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return {};
      }
      throw new RestoreFailureError(`Failed to read preferences: ${toError(err).message}`, {
        filePath: this.filePath
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (err) {
      throw new RestoreFailureError(`Preferences file is not valid JSON: ${toError(err).message}`, {
        filePath: this.filePath
      });
    }
    if (!isRecord(parsed)) {
      throw new RestoreFailureError('Preferences file does not hold an object', {
        filePath: this.filePath
      });
    }
    return parsed;
  }
}

/**
 * In-process store for embedding and tests
 */
export class MemoryPreferenceStore implements PreferenceStore {
  private list: unknown[];
  /** Number of writes since construction */
  writes = 0;

  constructor(initial: unknown[] = []) {
    this.list = structuredClone(initial);
  }

  read(): unknown[] {
    return structuredClone(this.list);
  }

  write(list: SerializedServerConfiguration[]): void {
    this.list = structuredClone(list);
    this.writes++;
  }
}
