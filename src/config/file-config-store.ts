import fs from 'node:fs/promises';
import path from 'node:path';
import type { ConfigStore } from './config-store.js';
import { ConfigError, errorMessage } from '../core/errors.js';

type JsonObject = Record<string, unknown>;

export interface FileConfigStoreOptions {
  filePath: string;
}

function isJsonObject(v: unknown): v is JsonObject {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isNotFound(e: unknown): boolean {
  return typeof e === 'object' && e !== null && 'code' in e && e.code === 'ENOENT';
}

/**
 * One JSON object per file, one top-level key per setting group.
 * A missing file reads as empty; writes are serialised.
 */
export class FileConfigStore implements ConfigStore {
  private readonly filePath: string;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(opts: FileConfigStoreOptions) {
    this.filePath = opts.filePath;
  }

  async get(key: string): Promise<unknown> {
    const obj = await this.readAll();
    return obj[key];
  }

  async set(key: string, value: unknown): Promise<void> {
    await this.enqueue(async () => {
      const obj = await this.readAll();
      obj[key] = value;
      await this.writeAll(obj);
    });
  }

  async delete(key: string): Promise<void> {
    await this.enqueue(async () => {
      const obj = await this.readAll();
      delete obj[key];
      await this.writeAll(obj);
    });
  }

  private async enqueue(fn: () => Promise<void>): Promise<void> {
    const next = this.writeQueue.then(fn, fn);
    // A failed write must not poison the writes queued after it.
    this.writeQueue = next.catch(() => undefined);
    return next;
  }

  private async readAll(): Promise<JsonObject> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (e) {
      if (isNotFound(e)) return {};
      throw e;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      throw new ConfigError(`Config file ${this.filePath} is not valid JSON`, [errorMessage(e)]);
    }
    return isJsonObject(parsed) ? parsed : {};
  }

  private async writeAll(obj: JsonObject): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(obj, null, 2) + '\n', 'utf8');
  }
}
