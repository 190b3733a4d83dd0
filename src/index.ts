import * as os from 'node:os';
import * as path from 'node:path';
import type { z } from 'zod';
import { ALL_KEYS, LEGACY_TABLE } from './catalog';
import { describeError } from './errors';
import { DurableDocument, FileSystemAdapter, type StorageAdapter } from './modules/durability';
import { KeyRegistry } from './modules/keys';
import {
  type AnyLegacyMapping,
  type LegacySource,
  MigrationEngine,
  type MigrationReport,
} from './modules/migration';
import { type RecoverySource, recoverDocument } from './modules/recovery';
import {
  type Clock,
  createSystemClock,
  type SchedulerState,
  WriteScheduler,
} from './modules/scheduler';
import { decodePayload, encodePayload, fromRaw, tag, toRaw, untag } from './modules/values';
import { InMemoryStore } from './stores/InMemoryStore';
import type {
  PrefKey,
  RawDocument,
  ValueKind,
  ValueOf,
  WriteEvent,
  WritePriority,
  WriteTrigger,
} from './types';
import { createConsoleLogger, type Logger } from './utils/logger';
import { defineEntry } from './utils/records';
import { SerialQueue } from './utils/serialQueue';

export { ALL_KEYS, Keys, LEGACY_TABLE } from './catalog';
export * from './errors';
export {
  DurableDocument,
  type DocumentPaths,
  documentPaths,
  FileSystemAdapter,
  InMemoryAdapter,
  type StorageAdapter,
} from './modules/durability';
export { defineKey, KeyRegistry } from './modules/keys';
export {
  type AnyLegacyMapping,
  DEFAULT_MIGRATION_FLAG,
  InMemoryLegacySource,
  JsonFileLegacySource,
  type LegacyMapping,
  type LegacySource,
  mapLegacy,
  MigrationEngine,
  type MigrationPhase,
  type MigrationReport,
} from './modules/migration';
export { type RecoveryResult, type RecoverySource, recoverDocument } from './modules/recovery';
export {
  type Clock,
  createSystemClock,
  DEFAULT_DEBOUNCE_MS,
  ManualClock,
  type SchedulerState,
  type TimerHandle,
  WriteScheduler,
} from './modules/scheduler';
export { InMemoryStore } from './stores/InMemoryStore';
export * from './types';
export { createConsoleLogger, type Logger, type LogLevel, silentLogger } from './utils/logger';

export const DEFAULT_STATE_DIRNAME = '.prefvault';
export const DEFAULT_STATE_FILENAME = 'state.json';

/** `~/.prefvault/<appName>/state.json` */
export function defaultStatePath(appName: string): string {
  return path.join(os.homedir(), DEFAULT_STATE_DIRNAME, appName, DEFAULT_STATE_FILENAME);
}

export interface LegacyMigrationConfig {
  source: LegacySource;
  /** Defaults to the built-in {@link LEGACY_TABLE}. */
  table?: readonly AnyLegacyMapping[];
  /** Flag name inside the legacy store. Defaults to `prefvault.migrated.v1`. */
  flagKey?: string;
}

export interface PrefStoreConfig {
  /** Primary document path. The backup lives next to it as `<path>.backup`. */
  path: string;
  /** Defaults to the file system. */
  adapter?: StorageAdapter;
  /**
   * Known keys, used to decode the document. Defaults to the built-in catalog.
   * Keys of the legacy table are added when `legacy` is set.
   */
  keys?: Iterable<PrefKey>;
  /** Quiet period for deferred writes. Defaults to 500 ms. */
  debounceMs?: number;
  clock?: Clock;
  logger?: Logger;
  /** When set, runs the one-time legacy import during `open()`. */
  legacy?: LegacyMigrationConfig;
  /**
   * Lifecycle hook fired after every durable write attempt, successful or not.
   * Useful for status indicators or write counting in tests.
   */
  onWrite?: (event: WriteEvent) => void;
  /** Fired once after load with the generation the store was loaded from. */
  onRecover?: (source: RecoverySource) => void;
}

/**
 * Type-tagged preference store with atomic, debounced persistence.
 *
 * In-memory reads and writes are synchronous and always see the latest value.
 * Durable writes, whatever triggers them, run one at a time through a single
 * queue, and each one serializes the store as it is when the write starts.
 *
 * @example
 * const prefs = await PrefStore.open({ path: defaultStatePath('my-app') });
 * await prefs.set(Keys.theme, 'dark');               // debounced
 * await prefs.set(Keys.relayApiKey, key, 'critical'); // on disk when this resolves
 * process.on('beforeExit', () => prefs.close());
 */
export class PrefStore {
  private readonly store = new InMemoryStore();
  private readonly queue = new SerialQueue();
  private readonly keys: KeyRegistry;
  private readonly document: DurableDocument;
  private readonly scheduler: WriteScheduler;
  private readonly logger: Logger;
  private readonly onWrite?: (event: WriteEvent) => void;
  private readonly onRecover?: (source: RecoverySource) => void;
  private readonly legacy?: LegacyMigrationConfig;
  private _migrationReport: MigrationReport | null = null;
  private _loadedFrom: RecoverySource = 'empty';

  private constructor(config: PrefStoreConfig) {
    this.logger = config.logger ?? createConsoleLogger('prefvault');
    this.legacy = config.legacy;
    this.onWrite = config.onWrite;
    this.onRecover = config.onRecover;

    this.keys = new KeyRegistry(config.keys ?? ALL_KEYS);
    if (config.legacy) {
      for (const mapping of config.legacy.table ?? LEGACY_TABLE) this.keys.register(mapping.key);
    }

    this.document = new DurableDocument({
      path: config.path,
      adapter: config.adapter ?? new FileSystemAdapter(),
      keys: this.keys,
      logger: this.logger,
    });

    this.scheduler = new WriteScheduler({
      clock: config.clock ?? createSystemClock(),
      debounceMs: config.debounceMs,
      onFire: () => this.write('deferred'),
      onError: (error) => this.logger.error(`Deferred write failed: ${describeError(error)}`),
    });
  }

  /**
   * Loads the store (primary, then backup, then empty) and runs the legacy
   * migration if one is configured and not yet done. Never throws for
   * unreadable documents.
   */
  static async open(config: PrefStoreConfig): Promise<PrefStore> {
    const prefs = new PrefStore(config);
    await prefs.load();
    return prefs;
  }

  get<K extends ValueKind>(key: PrefKey<K>): ValueOf<K> | undefined {
    const entry = this.store.get(key.name);
    if (!entry) return undefined;
    const value = untag(entry, key.kind);
    if (value !== undefined || this.keys.has(key.name)) return value;
    // Loaded without a registered kind, so a blob was read back as a string.
    return untag(fromRaw(toRaw(entry), key.kind), key.kind);
  }

  bool(key: PrefKey<'bool'>, defaultValue = false): boolean {
    return this.get(key) ?? defaultValue;
  }

  string(key: PrefKey<'string'>, defaultValue = ''): string {
    return this.get(key) ?? defaultValue;
  }

  stringList(key: PrefKey<'stringList'>): string[] {
    return this.get(key) ?? [];
  }

  boolMap(key: PrefKey<'boolMap'>): Record<string, boolean> {
    return this.get(key) ?? {};
  }

  has(key: PrefKey): boolean {
    return this.get(key) !== undefined;
  }

  /**
   * Writes a value; `null` removes the key. The new value is visible to `get`
   * immediately.
   *
   * - `'deferred'` (default): resolves at once; the write happens after the
   *   debounce window, coalesced with any other deferred sets.
   * - `'critical'`: cancels the pending deferred write and resolves once the
   *   document on disk holds the new value.
   *
   * Never rejects because of a failed write; failures are logged and reported
   * through `onWrite`, and the next write tries again.
   *
   * A key not yet known to the store is registered with its kind for the
   * store's lifetime. Rejects with {@link KeyConflictError}, and changes
   * nothing, when the name is already registered with another kind.
   */
  async set<K extends ValueKind>(
    key: PrefKey<K>,
    value: ValueOf<K> | null,
    priority: WritePriority = 'deferred',
  ): Promise<void> {
    this.keys.register(key);
    this.store.set(key.name, value === null ? null : tag(key.kind, value));

    if (priority === 'critical') {
      this.scheduler.cancel();
      await this.write('critical');
      return;
    }
    this.scheduler.schedule();
  }

  /**
   * Stores a JSON-compatible payload as an opaque blob. Structured data is
   * user data, so the default priority is `'critical'`. `null` or `undefined`
   * removes the key.
   */
  async setEncoded(
    key: PrefKey<'blob'>,
    payload: unknown,
    priority: WritePriority = 'critical',
  ): Promise<void> {
    const bytes = payload === null || payload === undefined ? null : encodePayload(payload);
    await this.set(key, bytes, priority);
  }

  /**
   * Decodes a blob written by {@link setEncoded}. With a schema, a payload that
   * does not match it reads as absent.
   */
  getEncoded(key: PrefKey<'blob'>): unknown;
  getEncoded<T>(key: PrefKey<'blob'>, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined;
  getEncoded<T>(
    key: PrefKey<'blob'>,
    schema?: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): T | unknown {
    const bytes = this.get(key);
    if (!bytes) return undefined;

    let payload: unknown;
    try {
      payload = decodePayload(bytes);
    } catch (err) {
      this.logger.warn(`"${key.name}" does not hold an encoded payload: ${describeError(err)}`);
      return undefined;
    }
    if (!schema) return payload;

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      this.logger.warn(`"${key.name}" payload does not match its schema: ${parsed.error.message}`);
      return undefined;
    }
    return parsed.data;
  }

  /**
   * Cancels any pending deferred write and writes now. Resolves once the
   * write has completed. Call on shutdown.
   */
  async flush(): Promise<void> {
    this.scheduler.cancel();
    await this.write('flush');
  }

  /** Resolves when no durable write is queued or running. */
  async settled(): Promise<void> {
    await this.queue.drain();
  }

  /**
   * Flushes, then stops the debounce timer. Later sets still update memory;
   * only a `flush()` or a critical set writes them.
   */
  async close(): Promise<void> {
    await this.flush();
    this.scheduler.stop();
  }

  /** Flat document view of the current in-memory state. */
  snapshot(): RawDocument {
    const raw: RawDocument = {};
    for (const [key, value] of this.store.snapshot()) defineEntry(raw, key, toRaw(value));
    return raw;
  }

  get schedulerState(): SchedulerState {
    return this.scheduler.state;
  }

  get migrationReport(): MigrationReport | null {
    return this._migrationReport;
  }

  get loadedFrom(): RecoverySource {
    return this._loadedFrom;
  }

  get path(): string {
    return this.document.paths.primary;
  }

  private async load(): Promise<void> {
    const { entries, source } = await recoverDocument(this.document, this.logger);
    this.store.restore(entries);
    this._loadedFrom = source;
    this.onRecover?.(source);

    if (!this.legacy) return;
    const engine = new MigrationEngine({
      store: this.store,
      document: this.document,
      source: this.legacy.source,
      table: this.legacy.table ?? LEGACY_TABLE,
      flagKey: this.legacy.flagKey,
      logger: this.logger,
      persist: async (store) => {
        const result = await this.document.persist(store.snapshot());
        this.report({
          trigger: 'migration',
          success: result.success,
          error: result.error ?? undefined,
        });
        return result;
      },
    });
    this._migrationReport = await this.queue.run(() => engine.run());
  }

  private write(trigger: WriteTrigger): Promise<void> {
    return this.queue.run(async () => {
      const result = await this.document.persist(this.store.snapshot());
      if (!result.success) {
        this.logger.error(`Save failed (${trigger}): ${result.error.message}`);
      }
      this.report({ trigger, success: result.success, error: result.error ?? undefined });
    });
  }

  private report(event: WriteEvent): void {
    if (!this.onWrite) return;
    try {
      this.onWrite(event);
    } catch (err) {
      this.logger.error(`onWrite hook threw: ${describeError(err)}`);
    }
  }
}
