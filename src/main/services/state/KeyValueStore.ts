import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

/**
 * Host-wide hierarchical key/value storage. Keys are `namespace/name`;
 * implementations may throw on I/O or corruption, callers decide how to degrade.
 */
export interface KeyValueStore {
  get(key: string): string | null;
  set(key: string, value: string): void;
  deleteTree(namespace: string): void;
}

const persistedStoreSchema = z.object({
  entries: z.record(z.string())
});

export class FileKeyValueStore implements KeyValueStore {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  get(key: string): string | null {
    const entries = this.read();
    return Object.prototype.hasOwnProperty.call(entries, key) ? entries[key] ?? null : null;
  }

  set(key: string, value: string): void {
    const entries = this.read();
    entries[key] = value;
    this.write(entries);
  }

  deleteTree(namespace: string): void {
    if (!fs.existsSync(this.filePath)) {
      return;
    }

    const prefix = `${namespace}/`;
    const entries = this.read();
    const kept: Record<string, string> = {};
    for (const [key, value] of Object.entries(entries)) {
      if (key !== namespace && !key.startsWith(prefix)) {
        kept[key] = value;
      }
    }
    this.write(kept);
  }

  // Sempre le do disco: installer e upgrader compartilham o mesmo arquivo.
  private read(): Record<string, string> {
    if (!fs.existsSync(this.filePath)) {
      return {};
    }

    const raw = fs.readFileSync(this.filePath, 'utf-8');
    const parsed = persistedStoreSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Store de estado corrompido em ${this.filePath}.`);
    }

    return { ...parsed.data.entries };
  }

  private write(entries: Record<string, string>): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.tmp`;
    fs.writeFileSync(tempPath, JSON.stringify({ entries }, null, 2), 'utf-8');
    fs.renameSync(tempPath, this.filePath);
  }
}

export class MemoryKeyValueStore implements KeyValueStore {
  private readonly entries = new Map<string, string>();

  get(key: string): string | null {
    return this.entries.get(key) ?? null;
  }

  set(key: string, value: string): void {
    this.entries.set(key, value);
  }

  deleteTree(namespace: string): void {
    const prefix = `${namespace}/`;
    for (const key of Array.from(this.entries.keys())) {
      if (key === namespace || key.startsWith(prefix)) {
        this.entries.delete(key);
      }
    }
  }
}
