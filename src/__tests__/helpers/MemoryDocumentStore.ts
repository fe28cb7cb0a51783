import type { IDocumentStore } from '../../types/index.js';

// Keeps documents as JSON text so callers never share object references
export class MemoryDocumentStore implements IDocumentStore {
  readonly docs = new Map<string, string>();

  async get(key: string): Promise<unknown | null> {
    const text = this.docs.get(key);
    if (text === undefined) return null;
    const value: unknown = JSON.parse(text);
    return value;
  }

  async set(key: string, value: unknown): Promise<void> {
    this.docs.set(key, JSON.stringify(value));
  }
}
