import { DecodeError, describeError } from '../../errors';
import type { PrefEntries } from '../../types';
import type { Logger } from '../../utils/logger';
import type { DurableDocument } from '../durability';

export type RecoverySource = 'primary' | 'backup' | 'empty';

export interface RecoveryResult {
  entries: PrefEntries;
  source: RecoverySource;
}

/**
 * Loads the store: primary document, then backup, then an empty store.
 * Never throws. Each fallback is logged.
 */
export async function recoverDocument(
  document: DurableDocument,
  logger: Logger,
): Promise<RecoveryResult> {
  let primaryMissing = false;

  try {
    const entries = await document.read('primary');
    logger.info(`Loaded ${entries.size} keys`);
    return { entries, source: 'primary' };
  } catch (err) {
    primaryMissing = err instanceof DecodeError && err.reason === 'missing';
    if (primaryMissing) {
      logger.info(`No document at ${document.paths.primary}, checking backup`);
    } else {
      logger.warn(`Load failed: ${describeError(err)}; attempting recovery from backup`);
    }
  }

  try {
    const entries = await document.read('backup');
    logger.warn(`Recovered ${entries.size} keys from backup`);
    return { entries, source: 'backup' };
  } catch (err) {
    if (primaryMissing && err instanceof DecodeError && err.reason === 'missing') {
      logger.info('Starting with an empty store');
    } else {
      logger.warn(`Backup unusable (${describeError(err)}); starting with an empty store`);
    }
  }

  return { entries: new Map(), source: 'empty' };
}
