import { DecodeError, type DocumentRole, describeError, WriteError } from '../../errors';
import type { PrefEntries, RawDocument, Result } from '../../types';
import { canonicalJson } from '../../utils/canonicalJson';
import type { Logger } from '../../utils/logger';
import { defineEntry, PlainRecordSchema } from '../../utils/records';
import type { KeyRegistry } from '../keys';
import { fromRaw, inferFromRaw, toRaw } from '../values';
import type { StorageAdapter } from './storageAdapter';

export { FileSystemAdapter, InMemoryAdapter, type StorageAdapter } from './storageAdapter';

export interface DocumentPaths {
  primary: string;
  backup: string;
  temp: string;
  preMigration: string;
}

export function documentPaths(primary: string): DocumentPaths {
  return {
    primary,
    backup: `${primary}.backup`,
    temp: `${primary}.tmp`,
    preMigration: `${primary}.pre-migration`,
  };
}

export interface DurableDocumentConfig {
  path: string;
  adapter: StorageAdapter;
  keys: KeyRegistry;
  logger: Logger;
}

/**
 * The flat JSON document on durable storage, plus its single-generation backup.
 *
 * Writes go temp file → rename, so the primary path always holds either the
 * previous document or the new one in full.
 */
export class DurableDocument {
  readonly paths: DocumentPaths;
  readonly adapter: StorageAdapter;
  private readonly keys: KeyRegistry;
  private readonly logger: Logger;

  constructor(config: DurableDocumentConfig) {
    this.paths = documentPaths(config.path);
    this.adapter = config.adapter;
    this.keys = config.keys;
    this.logger = config.logger;
  }

  /**
   * Canonical encoding: keys sorted at every depth, two-space indentation.
   * Equal stores always produce identical bytes.
   */
  serialize(entries: PrefEntries): string {
    const raw: RawDocument = {};
    for (const [key, value] of entries) defineEntry(raw, key, toRaw(value));
    return canonicalJson(raw);
  }

  /**
   * Rotates the current primary into the backup, then atomically replaces the
   * primary. Never throws; on failure the primary is untouched.
   */
  async persist(entries: PrefEntries): Promise<Result<void, WriteError>> {
    const { primary, backup, temp } = this.paths;
    const bytes = new Uint8Array(Buffer.from(this.serialize(entries), 'utf8'));

    try {
      if (await this.adapter.exists(primary)) {
        await this.adapter.copy(primary, backup);
      }
      await this.adapter.write(temp, bytes);
      await this.adapter.rename(temp, primary);
    } catch (err) {
      await this.discardTemp();
      return {
        success: false,
        data: null,
        error: new WriteError(primary, `Write to ${primary} failed: ${describeError(err)}`, {
          cause: err,
        }),
      };
    }

    this.logger.debug(`Wrote ${entries.size} keys to ${primary}`);
    return { success: true, data: undefined, error: null };
  }

  /**
   * Reads and decodes one generation of the document.
   * Throws {@link DecodeError} when it is missing, unreadable or malformed.
   */
  async read(which: DocumentRole): Promise<PrefEntries> {
    const file = this.pathOf(which);

    let bytes: Uint8Array | null;
    try {
      bytes = await this.adapter.read(file);
    } catch (err) {
      throw new DecodeError(which, 'unreadable', `Cannot read ${file}: ${describeError(err)}`, {
        cause: err,
      });
    }
    if (!bytes) {
      throw new DecodeError(which, 'missing', `${file} does not exist`);
    }

    return this.decode(Buffer.from(bytes).toString('utf8'), which);
  }

  decode(text: string, which: DocumentRole): PrefEntries {
    const file = this.pathOf(which);

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new DecodeError(which, 'malformed', `${file} is not valid JSON: ${describeError(err)}`, {
        cause: err,
      });
    }

    const shape = PlainRecordSchema.safeParse(json);
    if (!shape.success) {
      throw new DecodeError(which, 'malformed', `${file} is not a flat key-value document`, {
        cause: shape.error,
      });
    }

    const entries: PrefEntries = new Map();
    for (const [key, raw] of Object.entries(shape.data)) {
      const kind = this.keys.kindOf(key);
      const value = kind ? fromRaw(raw, kind) : inferFromRaw(raw);
      if (!value) {
        this.logger.warn(
          `Dropping "${key}" from ${which} document: value does not match ${kind ?? 'any supported kind'}`,
        );
        continue;
      }
      entries.set(key, value);
    }
    return entries;
  }

  pathOf(which: DocumentRole): string {
    switch (which) {
      case 'primary':
        return this.paths.primary;
      case 'backup':
        return this.paths.backup;
      case 'pre-migration':
        return this.paths.preMigration;
    }
  }

  private async discardTemp(): Promise<void> {
    try {
      await this.adapter.remove(this.paths.temp);
    } catch (err) {
      this.logger.warn(`Could not remove ${this.paths.temp}: ${describeError(err)}`);
    }
  }
}
