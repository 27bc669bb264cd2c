import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { z } from 'zod';

/**
 * Byte-level key-value persistence. The engine owns the serialization shape.
 */
export interface KeyValueStore {
  get(key: string): Promise<Uint8Array | null>;
  set(key: string, value: Uint8Array): Promise<void>;
}

export class MemoryStore implements KeyValueStore {
  private readonly entries = new Map<string, Uint8Array>();

  async get(key: string): Promise<Uint8Array | null> {
    const value = this.entries.get(key);
    return value ? new Uint8Array(value) : null;
  }

  async set(key: string, value: Uint8Array): Promise<void> {
    this.entries.set(key, new Uint8Array(value));
  }
}

/**
 * One file per key under `dir`. Writes go to a temporary file that is renamed
 * over the old one, so readers see either the old or the new value.
 */
export class FileStore implements KeyValueStore {
  private writes = 0;

  constructor(private readonly dir: string) {}

  private pathFor(key: string): string {
    if (!/^[A-Za-z0-9_.-]+$/.test(key)) {
      throw new Error(`Invalid store key: ${key}`);
    }
    return join(this.dir, `${key}.json`);
  }

  async get(key: string): Promise<Uint8Array | null> {
    try {
      return new Uint8Array(await readFile(this.pathFor(key)));
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  async set(key: string, value: Uint8Array): Promise<void> {
    const path = this.pathFor(key);
    await mkdir(this.dir, { recursive: true });
    const tmp = `${path}.${process.pid}.${++this.writes}.tmp`;
    await writeFile(tmp, value);
    await rename(tmp, path);
  }
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Read a JSON value stored under `key`, validated by `schema`. Missing keys give
 * `fallback`; a corrupt value is logged and also gives `fallback`.
 */
export async function readJson<T>(store: KeyValueStore, key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T): Promise<T> {
  const bytes = await store.get(key);
  if (!bytes) return fallback;

  let raw: unknown;
  try {
    raw = JSON.parse(decoder.decode(bytes));
  } catch (error) {
    console.error('Stored value is not JSON, ignoring', { key, error: String(error) });
    return fallback;
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    console.error('Stored value failed validation, ignoring', { key, issues: parsed.error.issues.slice(0, 3) });
    return fallback;
  }
  return parsed.data;
}

export async function writeJson(store: KeyValueStore, key: string, value: unknown): Promise<void> {
  await store.set(key, encoder.encode(JSON.stringify(value)));
}
