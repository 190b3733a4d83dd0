export type DocumentRole = 'primary' | 'backup' | 'pre-migration';

export type DecodeFailure = 'missing' | 'unreadable' | 'malformed';

export class PrefvaultError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Primary or backup document is missing, unreadable or malformed. */
export class DecodeError extends PrefvaultError {
  constructor(
    readonly which: DocumentRole,
    readonly reason: DecodeFailure,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** A durable write failed (disk full, permissions, I/O fault). */
export class WriteError extends PrefvaultError {
  constructor(
    readonly path: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The write (or flag commit) during a legacy migration failed. */
export class MigrationError extends PrefvaultError {}

/** The same key name was defined twice with different kinds. */
export class KeyConflictError extends PrefvaultError {}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
