import fs from 'node:fs/promises';
import path from 'node:path';
import { randomUUID } from 'node:crypto';

import { z } from 'zod';

import { clientLogger, normalizeError, type ClientLogger } from '../observability/logger';

/**
 * Small string key/value persistence used for client credentials.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string): Promise<void>;
  delete(key: string): Promise<boolean>;
}

export class MemoryKeyValueStore implements KeyValueStore {
  private readonly values = new Map<string, string>();

  async get(key: string): Promise<string | undefined> {
    return this.values.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    this.values.set(key, value);
  }

  async delete(key: string): Promise<boolean> {
    return this.values.delete(key);
  }

  get size(): number {
    return this.values.size;
  }
}

const StoreDocumentSchema = z.object({
  version: z.literal(1),
  values: z.record(z.string())
});

type StoreDocument = z.infer<typeof StoreDocumentSchema>;

export interface FileKeyValueStoreOptions {
  logger?: ClientLogger;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * JSON file backed store. Writes go through a temp file and a rename so a
 * crash never leaves a truncated document behind. A document that cannot be
 * read as JSON, or has an unknown shape, is logged and treated as empty; the
 * next write replaces it.
 */
export class FileKeyValueStore implements KeyValueStore {
  private readonly filePath: string;
  private readonly logger: ClientLogger;
  private loading: Promise<void> | null = null;
  private readonly values = new Map<string, string>();
  private persistChain: Promise<void> = Promise.resolve();

  constructor(filePath: string, options: FileKeyValueStoreOptions = {}) {
    this.filePath = filePath;
    this.logger = (options.logger ?? clientLogger).child({ component: 'kv-store' });
  }

  async get(key: string): Promise<string | undefined> {
    await this.ensureLoaded();
    return this.values.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    await this.ensureLoaded();
    this.values.set(key, value);
    await this.enqueuePersist();
  }

  async delete(key: string): Promise<boolean> {
    await this.ensureLoaded();
    const removed = this.values.delete(key);
    if (removed) {
      await this.enqueuePersist();
    }
    return removed;
  }

  private ensureLoaded(): Promise<void> {
    if (!this.loading) {
      this.loading = this.load().catch((error: unknown) => {
        this.loading = null;
        throw error;
      });
    }
    return this.loading;
  }

  private async load(): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw error;
    }
    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      this.logger.warn(
        { err: normalizeError(error), filePath: this.filePath },
        'store file is not valid JSON, starting empty'
      );
      return;
    }
    const parsed = StoreDocumentSchema.safeParse(document);
    if (!parsed.success) {
      this.logger.warn({ filePath: this.filePath }, 'store file has an unknown format, starting empty');
      return;
    }
    for (const [key, value] of Object.entries(parsed.data.values)) {
      this.values.set(key, value);
    }
  }

  private enqueuePersist(): Promise<void> {
    const run = this.persistChain.then(() => this.persist());
    this.persistChain = run.catch(() => undefined);
    return run;
  }

  private async persist(): Promise<void> {
    const dir = path.dirname(this.filePath);
    await fs.mkdir(dir, { recursive: true });
    const payload: StoreDocument = { version: 1, values: Object.fromEntries(this.values) };
    const tempPath = path.join(dir, `${path.basename(this.filePath)}.${randomUUID()}.tmp`);
    try {
      await fs.writeFile(tempPath, JSON.stringify(payload, null, 2), { mode: 0o600 });
      await fs.rename(tempPath, this.filePath);
    } finally {
      await fs.rm(tempPath, { force: true });
    }
  }
}
