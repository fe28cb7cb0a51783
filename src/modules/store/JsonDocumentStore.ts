import fs from 'fs';
import path from 'path';
import { Logger } from '../../utils/logger.js';
import { ConfigError } from '../../types/errors.js';
import type { IDocumentStore } from '../../types/index.js';

const KEY_RE = /^[A-Za-z0-9_-][A-Za-z0-9._-]*(\/[A-Za-z0-9_-][A-Za-z0-9._-]*)*$/;

/**
 * One pretty-printed JSON file per key under the profile's state directory.
 * `daily/2026-01-05` lives at `<dir>/daily/2026-01-05.json`. Writes go
 * through a temp file and a rename so a killed run never leaves half a file.
 */
export class JsonDocumentStore implements IDocumentStore {
  private readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = path.resolve(baseDir);
  }

  describe(key: string): string {
    return this.filePath(key);
  }

  async get(key: string): Promise<unknown | null> {
    const filePath = this.filePath(key);
    let content: string;
    try {
      content = await fs.promises.readFile(filePath, 'utf8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
    try {
      return JSON.parse(content);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`Stored document ${filePath} is not valid JSON: ${detail}`);
    }
  }

  async set(key: string, value: unknown): Promise<void> {
    const filePath = this.filePath(key);
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    await fs.promises.writeFile(tmpPath, `${JSON.stringify(value, null, 2)}\n`, 'utf8');
    await fs.promises.rename(tmpPath, filePath);
    Logger.debug(`Saved ${filePath}`);
  }

  private filePath(key: string): string {
    if (!KEY_RE.test(key)) {
      throw new Error(`Invalid document key: ${key}`);
    }
    return path.join(this.baseDir, ...key.split('/')) + '.json';
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
