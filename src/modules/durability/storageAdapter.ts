import { promises as fs } from 'node:fs';
import * as path from 'node:path';

/**
 * Byte-level storage the durability layer writes through.
 *
 * `write` needs no atomicity of its own: the durability layer writes a temp
 * file and then `rename`s it over the target, and `rename` must replace the
 * target in one step.
 */
export interface StorageAdapter {
  /** Returns `null` when nothing exists at `file`. */
  read(file: string): Promise<Uint8Array | null>;
  write(file: string, data: Uint8Array): Promise<void>;
  /** Copies `from` over `to`, replacing any existing `to`. */
  copy(from: string, to: string): Promise<void>;
  /** Moves `from` over `to`, replacing any existing `to`. */
  rename(from: string, to: string): Promise<void>;
  /** No-op when `file` does not exist. */
  remove(file: string): Promise<void>;
  exists(file: string): Promise<boolean>;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class FileSystemAdapter implements StorageAdapter {
  async read(file: string): Promise<Uint8Array | null> {
    try {
      return new Uint8Array(await fs.readFile(file));
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async write(file: string, data: Uint8Array): Promise<void> {
    await fs.mkdir(path.dirname(file), { recursive: true });
    const handle = await fs.open(file, 'w');
    try {
      await handle.writeFile(data);
      await handle.sync();
    } finally {
      await handle.close();
    }
  }

  async copy(from: string, to: string): Promise<void> {
    await fs.mkdir(path.dirname(to), { recursive: true });
    await fs.copyFile(from, to);
  }

  async rename(from: string, to: string): Promise<void> {
    await fs.rename(from, to);
  }

  async remove(file: string): Promise<void> {
    await fs.rm(file, { force: true });
  }

  async exists(file: string): Promise<boolean> {
    try {
      await fs.access(file);
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }
}

/**
 * Storage held in a Map of path → bytes. Lives only for the lifetime of the
 * process; suitable for tests and ephemeral stores.
 */
export class InMemoryAdapter implements StorageAdapter {
  private files = new Map<string, Uint8Array>();

  async read(file: string): Promise<Uint8Array | null> {
    const data = this.files.get(file);
    return data ? new Uint8Array(data) : null;
  }

  async write(file: string, data: Uint8Array): Promise<void> {
    this.files.set(file, new Uint8Array(data));
  }

  async copy(from: string, to: string): Promise<void> {
    this.files.set(to, new Uint8Array(this.require(from)));
  }

  async rename(from: string, to: string): Promise<void> {
    const data = this.require(from);
    this.files.delete(from);
    this.files.set(to, data);
  }

  async remove(file: string): Promise<void> {
    this.files.delete(file);
  }

  async exists(file: string): Promise<boolean> {
    return this.files.has(file);
  }

  /** Synchronous text view of a file, for inspection. */
  readText(file: string): string | null {
    const data = this.files.get(file);
    return data ? Buffer.from(data).toString('utf8') : null;
  }

  /** Replaces a file's contents directly, bypassing the durability layer. */
  seed(file: string, content: string | Uint8Array): void {
    const bytes = typeof content === 'string' ? Buffer.from(content, 'utf8') : content;
    this.files.set(file, new Uint8Array(bytes));
  }

  paths(): string[] {
    return Array.from(this.files.keys()).sort();
  }

  private require(file: string): Uint8Array {
    const data = this.files.get(file);
    if (!data) {
      throw Object.assign(new Error(`ENOENT: no such file, '${file}'`), { code: 'ENOENT' });
    }
    return data;
  }
}
