import { describeError, MigrationError, type WriteError } from '../../errors';
import type { PrefEntries, PrefKey, PrefValue, Result, ValueKind, ValueOf } from '../../types';
import type { Logger } from '../../utils/logger';
import type { InMemoryStore } from '../../stores/InMemoryStore';
import type { DurableDocument } from '../durability';
import { fromRaw, tag, valuesEqual } from '../values';
import type { LegacySource } from './legacySource';

export { InMemoryLegacySource, JsonFileLegacySource, type LegacySource } from './legacySource';

export const DEFAULT_MIGRATION_FLAG = 'prefvault.migrated.v1';

export type MigrationPhase =
  | 'notStarted'
  | 'snapshotting'
  | 'importing'
  | 'writing'
  | 'committed'
  | 'rolledBack'
  | 'skipped';

/**
 * One row of the fixed legacy table. Without a `default`, the key is only
 * imported when the legacy store holds a value for it.
 */
export interface LegacyMapping<K extends ValueKind = ValueKind> {
  legacyKey: string;
  key: PrefKey<K>;
  default?: ValueOf<K>;
}

export type AnyLegacyMapping = { [K in ValueKind]: LegacyMapping<K> }[ValueKind];

export function mapLegacy<K extends ValueKind>(
  legacyKey: string,
  key: PrefKey<K>,
  defaultValue?: ValueOf<K>,
): LegacyMapping<K> {
  return defaultValue === undefined
    ? { legacyKey, key }
    : { legacyKey, key, default: defaultValue };
}

export interface MigrationReport {
  phase: MigrationPhase;
  /** Every phase entered, in order. */
  phases: MigrationPhase[];
  /** Keys written from a legacy value. */
  imported: string[];
  /** Keys written from the table default because the legacy store had no value. */
  defaulted: string[];
  /** Keys left alone because they already hold a non-default value. */
  kept: string[];
  error?: MigrationError;
}

/** What rollback does to the primary document. */
type PrimaryRestore = 'untouched' | 'fromPreMigration' | 'remove';

export interface MigrationEngineConfig {
  store: InMemoryStore;
  document: DurableDocument;
  source: LegacySource;
  table: readonly AnyLegacyMapping[];
  flagKey?: string;
  logger: Logger;
  /** The durable write used in the writing phase. */
  persist: (store: InMemoryStore) => Promise<Result<void, WriteError>>;
}

/**
 * One-time import from a legacy preference store, gated by a flag kept in
 * that store.
 *
 * `notStarted → snapshotting → importing → writing → committed | rolledBack`
 *
 * A failed run leaves the primary document byte-identical to its state before
 * the run and the flag unset, so the next start retries. Importing never
 * overwrites a key that already holds a non-default value, which makes a retry
 * after a crash between writing and flag-set converge on the same result.
 */
export class MigrationEngine {
  private readonly config: MigrationEngineConfig;
  readonly flagKey: string;

  constructor(config: MigrationEngineConfig) {
    this.config = config;
    this.flagKey = config.flagKey ?? DEFAULT_MIGRATION_FLAG;
  }

  async run(): Promise<MigrationReport> {
    const { source, logger } = this.config;
    const report: MigrationReport = {
      phase: 'notStarted',
      phases: ['notStarted'],
      imported: [],
      defaulted: [],
      kept: [],
    };

    try {
      if (await source.isMigrated(this.flagKey)) {
        this.enter(report, 'skipped');
        return report;
      }
    } catch (err) {
      logger.error(`Cannot read migration flag "${this.flagKey}": ${describeError(err)}`);
      report.error = new MigrationError('Migration flag unreadable', { cause: err });
      this.enter(report, 'skipped');
      return report;
    }

    logger.info('Migrating from legacy preferences...');
    const { store, document } = this.config;
    const { primary, preMigration } = document.paths;

    this.enter(report, 'snapshotting');
    const snapshot = store.snapshot();
    let hadPrimary: boolean;
    try {
      hadPrimary = await document.adapter.exists(primary);
      if (hadPrimary) await document.adapter.copy(primary, preMigration);
    } catch (err) {
      return this.fail(report, snapshot, 'untouched', 'Snapshot of the current document failed', err);
    }

    this.enter(report, 'importing');
    for (const mapping of this.config.table) {
      await this.importMapping(mapping, report);
    }

    this.enter(report, 'writing');
    const restore: PrimaryRestore = hadPrimary ? 'fromPreMigration' : 'remove';
    const written = await this.config.persist(store);
    if (!written.success) {
      return this.fail(report, snapshot, restore, 'Migration write failed', written.error);
    }

    try {
      await source.markMigrated(this.flagKey);
    } catch (err) {
      return this.fail(report, snapshot, restore, 'Migration flag could not be stored', err);
    }

    try {
      await document.adapter.remove(preMigration);
    } catch (err) {
      logger.warn(`Could not remove ${preMigration}: ${describeError(err)}`);
    }

    this.enter(report, 'committed');
    const { imported, defaulted, kept } = report;
    logger.info(
      `Migration complete (${imported.length} imported, ${defaulted.length} defaulted, ${kept.length} kept)`,
    );
    return report;
  }

  private async importMapping<K extends ValueKind>(
    mapping: LegacyMapping<K>,
    report: MigrationReport,
  ): Promise<void> {
    const { store, source, logger } = this.config;
    const { name, kind } = mapping.key;

    const fallback = mapping.default === undefined ? undefined : tag(kind, mapping.default);
    const current = store.get(name);
    if (current && current.kind === kind && !valuesEqual(current, fallback)) {
      report.kept.push(name);
      return;
    }

    let raw: unknown;
    try {
      raw = await source.read(mapping.legacyKey);
    } catch (err) {
      logger.warn(`Cannot read legacy "${mapping.legacyKey}": ${describeError(err)}`);
      raw = undefined;
    }

    const legacy = raw === undefined ? undefined : this.decodeLegacy(raw, kind);
    if (raw !== undefined && !legacy) {
      logger.warn(`Legacy "${mapping.legacyKey}" is not a ${kind}; ignoring it`);
    }

    if (legacy) {
      store.set(name, legacy);
      report.imported.push(name);
    } else if (fallback) {
      store.set(name, fallback);
      report.defaulted.push(name);
    }
  }

  private decodeLegacy(raw: unknown, kind: ValueKind): PrefValue | undefined {
    if (kind === 'blob' && raw instanceof Uint8Array) return tag('blob', raw);
    return fromRaw(raw, kind);
  }

  private async fail(
    report: MigrationReport,
    snapshot: PrefEntries,
    restore: PrimaryRestore,
    message: string,
    cause: unknown,
  ): Promise<MigrationReport> {
    const { store, document, logger } = this.config;
    const { primary, preMigration } = document.paths;
    const error = new MigrationError(`${message}: ${describeError(cause)}`, { cause });
    logger.error(`Migration FAILED (${error.message}), rolling back`);

    store.restore(snapshot);
    try {
      if (restore === 'fromPreMigration') {
        await document.adapter.rename(preMigration, primary);
      } else if (restore === 'remove') {
        await document.adapter.remove(primary);
      }
    } catch (err) {
      logger.error(`Could not restore ${primary} after failed migration: ${describeError(err)}`);
    }

    report.error = error;
    this.enter(report, 'rolledBack');
    return report;
  }

  private enter(report: MigrationReport, phase: MigrationPhase): void {
    report.phase = phase;
    report.phases.push(phase);
    if (phase !== 'notStarted') this.config.logger.debug(`Migration phase: ${phase}`);
  }
}
