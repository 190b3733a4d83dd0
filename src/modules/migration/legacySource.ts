import { describeError } from '../../errors';
import { PlainRecordSchema } from '../../utils/records';
import type { StorageAdapter } from '../durability/storageAdapter';

/**
 * Read-only view of a legacy flat preference store, plus the one flag the
 * migration writes back into it.
 *
 * Supports both synchronous and asynchronous implementations. `read` returns
 * (or resolves to) `undefined` for keys the legacy store never held.
 */
export interface LegacySource {
  read(legacyKey: string): unknown;
  isMigrated(flagKey: string): boolean | Promise<boolean>;
  markMigrated(flagKey: string): void | Promise<void>;
}

/**
 * Legacy store backed by a plain record. The flag lives in the same record,
 * next to the preferences, the way a platform defaults database keeps it.
 */
export class InMemoryLegacySource implements LegacySource {
  private readonly values: Record<string, unknown>;

  constructor(values: Record<string, unknown> = {}) {
    this.values = { ...values };
  }

  read(legacyKey: string): unknown {
    return Object.hasOwn(this.values, legacyKey) ? this.values[legacyKey] : undefined;
  }

  isMigrated(flagKey: string): boolean {
    return this.values[flagKey] === true;
  }

  markMigrated(flagKey: string): void {
    this.values[flagKey] = true;
  }

  /** Clears the flag, as if the process died before it was stored. */
  resetMigrated(flagKey: string): void {
    delete this.values[flagKey];
  }
}

/**
 * Legacy preferences exported as one flat JSON object.
 *
 * A missing file reads as an empty store. Only the flag key is ever written
 * back, through a temp file and a rename.
 */
export class JsonFileLegacySource implements LegacySource {
  private cache: Record<string, unknown> | null = null;

  constructor(
    private readonly file: string,
    private readonly adapter: StorageAdapter,
  ) {}

  async read(legacyKey: string): Promise<unknown> {
    const values = await this.load();
    return Object.hasOwn(values, legacyKey) ? values[legacyKey] : undefined;
  }

  async isMigrated(flagKey: string): Promise<boolean> {
    const values = await this.load();
    return values[flagKey] === true;
  }

  async markMigrated(flagKey: string): Promise<void> {
    this.cache = null;
    const values = { ...(await this.load()), [flagKey]: true };
    const temp = `${this.file}.tmp`;
    const bytes = new Uint8Array(Buffer.from(JSON.stringify(values, null, 2), 'utf8'));
    await this.adapter.write(temp, bytes);
    await this.adapter.rename(temp, this.file);
    this.cache = values;
  }

  private async load(): Promise<Record<string, unknown>> {
    if (this.cache) return this.cache;

    const bytes = await this.adapter.read(this.file);
    if (!bytes) {
      this.cache = {};
      return this.cache;
    }

    let json: unknown;
    try {
      json = JSON.parse(Buffer.from(bytes).toString('utf8'));
    } catch (err) {
      throw new Error(`Legacy preferences at ${this.file} are not valid JSON: ${describeError(err)}`, {
        cause: err,
      });
    }
    const parsed = PlainRecordSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`Legacy preferences at ${this.file} must be a JSON object`, {
        cause: parsed.error,
      });
    }
    this.cache = parsed.data;
    return this.cache;
  }
}
