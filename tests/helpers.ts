import { InMemoryAdapter } from '../src/modules/durability';
import type { Logger, LogLevel } from '../src/utils/logger';

export interface LogLine {
  level: LogLevel;
  message: string;
}

export interface TestLogger {
  logger: Logger;
  lines: LogLine[];
  at: (level: LogLevel) => string[];
}

export function createTestLogger(): TestLogger {
  const lines: LogLine[] = [];
  const push = (level: LogLevel) => (message: string) => {
    lines.push({ level, message });
  };
  return {
    logger: { debug: push('debug'), info: push('info'), warn: push('warn'), error: push('error') },
    lines,
    at: (level) => lines.filter((line) => line.level === level).map((line) => line.message),
  };
}

export type AdapterOp = 'read' | 'write' | 'copy' | 'rename' | 'remove' | 'exists';

/**
 * InMemoryAdapter that throws on demand, to simulate disk faults.
 */
export class FlakyAdapter extends InMemoryAdapter {
  failWhen: ((op: AdapterOp, file: string) => boolean) | null = null;

  override async read(file: string): Promise<Uint8Array | null> {
    this.check('read', file);
    return super.read(file);
  }

  override async write(file: string, data: Uint8Array): Promise<void> {
    this.check('write', file);
    return super.write(file, data);
  }

  override async copy(from: string, to: string): Promise<void> {
    this.check('copy', to);
    return super.copy(from, to);
  }

  override async rename(from: string, to: string): Promise<void> {
    this.check('rename', to);
    return super.rename(from, to);
  }

  override async remove(file: string): Promise<void> {
    this.check('remove', file);
    return super.remove(file);
  }

  override async exists(file: string): Promise<boolean> {
    this.check('exists', file);
    return super.exists(file);
  }

  private check(op: AdapterOp, file: string): void {
    if (this.failWhen?.(op, file)) {
      throw new Error(`EIO: simulated ${op} fault on ${file}`);
    }
  }
}
